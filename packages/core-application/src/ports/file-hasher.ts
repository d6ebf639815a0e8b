import type { FileDigest } from "@inbox-sorter/core-domain";

export type FileHash = FileDigest;

export interface FileHasher {
  // `algorithm` is the raw configured name; unknown names resolve to MD5
  hashFile(absolutePath: string, algorithm: string): Promise<FileHash>;
}
