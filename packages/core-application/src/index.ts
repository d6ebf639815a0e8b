// Public API of the core-application package: ports, services, the Node
// adapters and the wiring helper used by the entry script.

// Ports (interfaces)
export * from "./ports/clock";
export * from "./ports/logger";
export type { ConfigStore } from "./ports/config-store";
export type { PathRegistry } from "./ports/path-registry";
export type { FileHash, FileHasher } from "./ports/file-hasher";
export type { DigestLedger } from "./ports/digest-ledger";
export type { InboxRepository } from "./ports/inbox-repository";

// Application
export * from "./application/errors";
export * from "./application/resource-paths";
export * from "./application/create-inbox-sorter";

// Services
export * from "./services/prefix-match";
export * from "./services/dispatch-service";
export * from "./services/dispatcher";

// Node adapters
export * from "./adapters/node-config-store";
export * from "./adapters/node-path-registry";
export * from "./adapters/node-file-hasher";
export { NodeDigestLedger } from "./adapters/node-digest-ledger";
export * from "./adapters/node-inbox-repository";
export * from "./adapters/console-logger";
