import os from "node:os";
import path from "node:path";
import {
  type ConfigLine,
  type DirectiveUpdate,
  applyDirectiveUpdate,
  createDirective,
  keyEquals,
} from "./configLine.js";
import { ValidationError } from "./errors.js";
import { EditableConfig, checkIndex } from "./editableConfig.js";
import { type HostBlock, hostPattern, parseSsh, stringifySsh } from "./sshParser.js";

export const DEFAULT_SSH_CONFIG_PATH = path.join(os.homedir(), ".ssh", "config");

function hostHeader(pattern: string): string {
  const trimmed = pattern.trim();
  if (!trimmed) throw new ValidationError("Host pattern must not be empty");
  if (/[\r\n]/.test(trimmed)) throw new ValidationError("Host pattern must be a single line");
  return `Host ${trimmed}`;
}

function appendDirective(lines: ConfigLine[], key: string, value: string, commented: boolean): ConfigLine {
  if (!commented && keyEquals(key, "Host")) {
    throw new ValidationError("Use addHost to start a new Host block");
  }
  const line = createDirective(key, value, commented);
  lines.push(line);
  return line;
}

function editDirective(lines: ConfigLine[], index: number, update: DirectiveUpdate): ConfigLine {
  const line = checkIndex(lines, index, "Line");
  const key = update.key ?? line.key;
  const commented = update.commented ?? line.commented;
  if (!commented && keyEquals(key, "Host")) {
    throw new ValidationError("Use addHost or renameHost for Host lines");
  }
  return applyDirectiveUpdate(line, update);
}

function removeLine(lines: ConfigLine[], index: number): ConfigLine {
  checkIndex(lines, index, "Line");
  const [removed] = lines.splice(index, 1);
  return removed;
}

/**
 * ssh_config as an ordered list of Host blocks, preceded by whatever lines
 * appear before the first Host line.
 */
export class SshConfig extends EditableConfig {
  preamble: ConfigLine[] = [];
  blocks: HostBlock[] = [];

  constructor(path: string = DEFAULT_SSH_CONFIG_PATH) {
    super(path);
  }

  protected parse(text: string): void {
    const doc = parseSsh(text);
    this.preamble = doc.preamble;
    this.blocks = doc.blocks;
    console.log(`[SSH Config] Loaded ${this.path}: ${doc.blocks.length} host blocks`);
  }

  toText(): string {
    return stringifySsh({ preamble: this.preamble, blocks: this.blocks });
  }

  get hostPatterns(): string[] {
    return this.blocks.map(hostPattern);
  }

  block(blockIndex: number): HostBlock {
    return checkIndex(this.blocks, blockIndex, "Host block");
  }

  addHost(pattern: string): HostBlock {
    const block: HostBlock = { header: hostHeader(pattern), headerLineNumber: 0, lines: [] };
    this.blocks.push(block);
    return block;
  }

  renameHost(blockIndex: number, pattern: string): HostBlock {
    const block = this.block(blockIndex);
    block.header = hostHeader(pattern);
    return block;
  }

  removeHost(blockIndex: number): HostBlock {
    this.block(blockIndex);
    const [removed] = this.blocks.splice(blockIndex, 1);
    return removed;
  }

  addOption(blockIndex: number, key: string, value = "", commented = false): ConfigLine {
    return appendDirective(this.block(blockIndex).lines, key, value, commented);
  }

  editOption(blockIndex: number, index: number, update: DirectiveUpdate): ConfigLine {
    return editDirective(this.block(blockIndex).lines, index, update);
  }

  deleteLine(blockIndex: number, index: number): ConfigLine {
    return removeLine(this.block(blockIndex).lines, index);
  }

  /** Global options before the first Host line. */
  addPreambleOption(key: string, value = "", commented = false): ConfigLine {
    return appendDirective(this.preamble, key, value, commented);
  }

  editPreambleOption(index: number, update: DirectiveUpdate): ConfigLine {
    return editDirective(this.preamble, index, update);
  }

  deletePreambleLine(index: number): ConfigLine {
    return removeLine(this.preamble, index);
  }

  /** Case-insensitive lookup across the preamble and every block. */
  getOptionsByKey(key: string): ConfigLine[] {
    const all = [this.preamble, ...this.blocks.map((b) => b.lines)].flat();
    return all.filter((l) => l.key !== "" && keyEquals(l.key, key));
  }
}
