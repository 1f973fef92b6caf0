import {
  type ConfigLine,
  type DirectiveUpdate,
  type IncludeRef,
  applyDirectiveUpdate,
  createDirective,
  keyEquals,
} from "./configLine.js";
import type { BoilerplateBlock } from "./boilerplate.js";
import { EditableConfig, checkIndex } from "./editableConfig.js";
import { parseSshd, stringifySshd } from "./sshdParser.js";

export const DEFAULT_SSHD_CONFIG_PATH = "/etc/ssh/sshd_config";

export type SshdConfigOptions = {
  boilerplate?: readonly BoilerplateBlock[];
};

/**
 * sshd_config as a flat, ordered list of lines. `Include` lines stay in the
 * list as ordinary directives and are also recorded in `includes`.
 */
export class SshdConfig extends EditableConfig {
  lines: ConfigLine[] = [];
  includes: IncludeRef[] = [];
  private readonly boilerplate?: readonly BoilerplateBlock[];

  constructor(path: string = DEFAULT_SSHD_CONFIG_PATH, options: SshdConfigOptions = {}) {
    super(path);
    this.boilerplate = options.boilerplate;
  }

  protected parse(text: string): void {
    const doc = parseSshd(text, { boilerplate: this.boilerplate });
    this.lines = doc.lines;
    this.includes = doc.includes;
    console.log(`[SSHD Config] Loaded ${this.path}: ${doc.lines.length} lines, ${doc.includes.length} includes`);
  }

  toText(): string {
    return stringifySshd({ lines: this.lines, includes: this.includes });
  }

  /** Active directives only. */
  get options(): ConfigLine[] {
    return this.lines.filter((l) => l.key !== "" && !l.commented);
  }

  /** Pure comment and blank lines. */
  get comments(): ConfigLine[] {
    return this.lines.filter((l) => l.key === "");
  }

  getOptionsByKey(key: string): ConfigLine[] {
    return this.lines.filter((l) => l.key !== "" && keyEquals(l.key, key));
  }

  addOption(key: string, value = "", commented = false): ConfigLine {
    const line = createDirective(key, value, commented);
    this.lines.push(line);
    return line;
  }

  editOption(index: number, update: DirectiveUpdate): ConfigLine {
    return applyDirectiveUpdate(checkIndex(this.lines, index, "Line"), update);
  }

  /** Remove one line. Recorded includes are left as they are. */
  deleteLine(index: number): ConfigLine {
    checkIndex(this.lines, index, "Line");
    const [removed] = this.lines.splice(index, 1);
    return removed;
  }
}
