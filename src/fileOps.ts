import path from "node:path";
import {
  constants as FS_CONST,
  copyFileSync,
  existsSync,
  readFileSync,
  realpathSync,
  renameSync,
  rmSync,
  statSync,
  writeFileSync,
} from "node:fs";
import { EncodingError, NotFoundError } from "./errors.js";

// BOM is kept so it is written back unchanged
const UTF8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Read a config file as strict UTF-8. A missing file is a NotFoundError and
 * undecodable bytes an EncodingError; other I/O errors propagate.
 */
export function readConfigFile(configPath: string): string {
  if (!existsSync(configPath)) {
    throw new NotFoundError(`Config file not found: ${configPath}`, configPath);
  }
  const bytes = readFileSync(configPath);
  try {
    return UTF8.decode(bytes);
  } catch {
    throw new EncodingError(`Config file is not valid UTF-8: ${configPath}`, configPath);
  }
}

export function backupPathFor(configPath: string): string {
  return `${configPath}.bak`;
}

/**
 * Copy the live file byte-for-byte to `bakPath` (default `<config>.bak`),
 * overwriting any previous backup.
 */
export function writeBackup(configPath: string, bakPath?: string): string {
  const bak = bakPath ?? backupPathFor(configPath);
  if (!existsSync(configPath)) {
    throw new NotFoundError(`Config file not found: ${configPath}`, configPath);
  }
  copyFileSync(configPath, bak);
  console.log(`[Backup] ${configPath} -> ${bak}`);
  return bak;
}

/** Copy the backup back over the live file. */
export function restoreBackup(configPath: string, bakPath?: string): void {
  const bak = bakPath ?? backupPathFor(configPath);
  if (!existsSync(bak)) {
    throw new NotFoundError("Backup not found", bak);
  }
  copyFileSync(bak, configPath);
  console.log(`[Backup] Restored ${configPath} from ${bak}`);
}

/**
 * Create `<config>.bak` from the live file unless a backup is already there.
 * An existing backup is never overwritten.
 */
export function ensureBackupExists(configPath: string): string {
  const bak = backupPathFor(configPath);
  if (existsSync(bak)) return bak;
  if (!existsSync(configPath)) {
    throw new NotFoundError(`Config file not found: ${configPath}`, configPath);
  }
  copyFileSync(configPath, bak, FS_CONST.COPYFILE_EXCL);
  console.log(`[Backup] Initial backup created: ${bak}`);
  return bak;
}

/**
 * Write through a sibling temp file and rename it over the target, keeping
 * the target's permission bits when it already exists. A symlinked target is
 * resolved first so the link survives and the file it points at is replaced.
 */
export function writeFileAtomic(target: string, content: string): void {
  const exists = existsSync(target);
  const real = exists ? realpathSync(target) : target;
  const dir = path.dirname(real);
  const base = path.basename(real);
  const tmp = path.join(dir, `.${base}.${process.pid}.${Date.now()}.tmp`);
  const mode = exists ? statSync(real).mode & 0o777 : 0o644;

  try {
    writeFileSync(tmp, content, { encoding: "utf8", mode });
    renameSync(tmp, real);
  } catch (error) {
    rmSync(tmp, { force: true });
    throw error;
  }
}
