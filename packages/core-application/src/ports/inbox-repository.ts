export interface InboxRepository {
  /** Creates the directory (and parents) when missing. Returns true if it was created. */
  ensureDirectory(dirAbs: string): Promise<boolean>;

  /** Names of the regular files directly inside `dirAbs`, in listing order. */
  listFiles(dirAbs: string): Promise<string[]>;

  moveFile(sourceAbs: string, destinationAbs: string): Promise<void>;
}
