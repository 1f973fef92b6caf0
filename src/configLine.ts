import { ValidationError } from "./errors.js";

/**
 * Line model shared by the ssh_config and sshd_config parsers.
 *
 * Every physical line of a config file becomes one ConfigLine. Directives carry
 * a key and a value; pure comments and blank lines carry an empty key and a
 * null value. A directive disabled with a leading `#` keeps its key and value
 * and is flagged `commented`.
 */

export interface ConfigLine {
  key: string;
  value: string | null;
  raw: string;
  commented: boolean;
  /** 1-based position in the source file, 0 for lines created in memory. */
  lineNumber: number;
}

export interface IncludeRef {
  path: string;
  raw: string;
  lineNumber: number;
}

export type DirectiveUpdate = {
  key?: string;
  value?: string;
  commented?: boolean;
};

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\f" || ch === "\v" || ch === "\r" || ch === "\n";
}

/**
 * Split `<token> [rest]` on the first whitespace run. Returns null when the
 * text holds no token at all.
 */
export function splitDirective(text: string): { key: string; value: string } | null {
  const s = text.trim();
  if (s === "") return null;

  let i = 0;
  while (i < s.length && !isWhitespace(s[i])) i++;
  const key = s.slice(0, i);
  while (i < s.length && isWhitespace(s[i])) i++;
  return { key, value: s.slice(i) };
}

export function commentLine(raw: string, lineNumber = 0): ConfigLine {
  return { key: "", value: null, raw, commented: true, lineNumber };
}

export function isCommentOrBlank(raw: string): boolean {
  const trimmed = raw.trim();
  return trimmed === "" || trimmed.startsWith("#");
}

/**
 * Classify one line (terminator already removed). Catalogue elision is the
 * sshd parser's job and happens before this is called.
 */
export function classifyLine(raw: string, lineNumber: number): ConfigLine {
  const trimmed = raw.trim();

  if (isCommentOrBlank(raw)) {
    if (trimmed.startsWith("#")) {
      const disabled = splitDirective(trimmed.replace(/^#+/, ""));
      if (disabled) {
        return { key: disabled.key, value: disabled.value, raw, commented: true, lineNumber };
      }
    }
    return commentLine(raw, lineNumber);
  }

  const active = splitDirective(trimmed);
  if (!active) return commentLine(raw, lineNumber);
  return { key: active.key, value: active.value, raw, commented: false, lineNumber };
}

/** `Key value`, or `Key` alone for an empty value, `#`-prefixed when disabled. */
export function formatDirective(key: string, value: string, commented: boolean): string {
  const raw = value ? `${key} ${value}` : key;
  return commented ? `#${raw}` : raw;
}

export function createDirective(key: string, value = "", commented = false): ConfigLine {
  assertKey(key);
  assertSingleLine(value);
  return { key, value, raw: formatDirective(key, value, commented), commented, lineNumber: 0 };
}

/**
 * Apply an edit in place. The raw text is regenerated from the fields, so any
 * original spacing or trailing inline comment is lost once a line is edited.
 */
export function applyDirectiveUpdate(line: ConfigLine, update: DirectiveUpdate): ConfigLine {
  const key = update.key ?? line.key;
  assertKey(key);
  const value = update.value ?? line.value ?? "";
  assertSingleLine(value);
  const commented = update.commented ?? line.commented;

  line.key = key;
  line.value = value;
  line.commented = commented;
  line.raw = formatDirective(key, value, commented);
  return line;
}

export function keyEquals(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/** Text of a line as written back to disk. */
export function renderLine(line: ConfigLine): string {
  if (line.commented && line.key && !line.raw.trimStart().startsWith("#")) {
    return `#${line.raw}`;
  }
  return line.raw;
}

/** Split file content into lines without terminators; a final newline does not add an empty line. */
export function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export function joinLines(lines: string[]): string {
  return lines.join("\n") + "\n";
}

function assertKey(key: string): void {
  if (key.startsWith("#") || splitDirective(key)?.key !== key) {
    throw new ValidationError(`Invalid directive key: "${key}"`);
  }
}

function assertSingleLine(value: string): void {
  if (/[\r\n]/.test(value)) {
    throw new ValidationError("Directive value must be a single line");
  }
}
