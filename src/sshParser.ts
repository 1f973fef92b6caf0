import {
  type ConfigLine,
  classifyLine,
  joinLines,
  keyEquals,
  renderLine,
  splitDirective,
  splitLines,
} from "./configLine.js";

export interface HostBlock {
  /** Raw `Host <pattern>` line as written. */
  header: string;
  headerLineNumber: number;
  lines: ConfigLine[];
}

export type SshDoc = {
  /** Lines before the first Host line: global options and leading comments. */
  preamble: ConfigLine[];
  blocks: HostBlock[];
};

export function isHostLine(line: ConfigLine): boolean {
  return !line.commented && keyEquals(line.key, "Host");
}

export function hostPattern(block: HostBlock): string {
  return splitDirective(block.header)?.value ?? "";
}

export function parseSsh(text: string): SshDoc {
  const preamble: ConfigLine[] = [];
  const blocks: HostBlock[] = [];
  let current: HostBlock | null = null;

  splitLines(text).forEach((raw, i) => {
    const line = classifyLine(raw, i + 1);
    if (isHostLine(line)) {
      current = { header: raw, headerLineNumber: i + 1, lines: [] };
      blocks.push(current);
      return;
    }
    (current ? current.lines : preamble).push(line);
  });

  return { preamble, blocks };
}

export function stringifySsh(doc: SshDoc): string {
  const out = doc.preamble.map(renderLine);
  for (const block of doc.blocks) {
    out.push(block.header, ...block.lines.map(renderLine));
  }
  return joinLines(out);
}
