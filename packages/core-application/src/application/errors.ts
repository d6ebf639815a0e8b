export class ConfigError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "ConfigError";
  }
}

export class RegistryError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "RegistryError";
  }
}

export class IOError extends Error {
  constructor(message: string, public path?: string, public cause?: unknown) {
    super(message);
    this.name = "IOError";
  }
}

export class MoveError extends Error {
  constructor(
    message: string,
    public source: string,
    public destination: string,
    public cause?: unknown
  ) {
    super(message);
    this.name = "MoveError";
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
