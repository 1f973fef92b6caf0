import {
  backupPathFor,
  ensureBackupExists,
  readConfigFile,
  restoreBackup,
  writeBackup,
  writeFileAtomic,
} from "./fileOps.js";

/**
 * Load/save/backup plumbing shared by the client and server config models.
 * Subclasses own the in-memory document and how text maps onto it.
 */
export abstract class EditableConfig {
  readonly path: string;

  protected constructor(path: string) {
    this.path = path;
  }

  /** Replace the in-memory document with one parsed from `text`. */
  protected abstract parse(text: string): void;

  abstract toText(): string;

  /**
   * Read and parse the file. On any failure the previous document is kept,
   * since `parse` only runs once the whole file has been read.
   */
  load(): this {
    const text = readConfigFile(this.path);
    this.parse(text);
    return this;
  }

  get backupPath(): string {
    return backupPathFor(this.path);
  }

  writeBackup(bakPath?: string): string {
    return writeBackup(this.path, bakPath);
  }

  restoreBackup(bakPath?: string): void {
    restoreBackup(this.path, bakPath);
  }

  ensureBackup(): string {
    return ensureBackupExists(this.path);
  }

  /** Back up the live file, write the document over it, then reload from disk. */
  save(): string {
    const text = this.toText();
    const bak = this.writeBackup();
    writeFileAtomic(this.path, text);
    this.load();
    return bak;
  }

  /** Write the in-memory document to the backup path instead of the live file. */
  saveAsBackup(bakPath?: string): string {
    const bak = bakPath ?? this.backupPath;
    writeFileAtomic(bak, this.toText());
    return bak;
  }
}

export function checkIndex<T>(items: readonly T[], index: number, what: string): T {
  if (!Number.isInteger(index) || index < 0 || index >= items.length) {
    throw new RangeError(`${what} index out of range: ${index}`);
  }
  return items[index];
}
