import {
  type ConfigLine,
  type IncludeRef,
  classifyLine,
  isCommentOrBlank,
  joinLines,
  keyEquals,
  renderLine,
  splitLines,
} from "./configLine.js";
import { type BoilerplateBlock, getDefaultCatalogue, matchBoilerplate } from "./boilerplate.js";

export type SshdDoc = {
  lines: ConfigLine[];
  includes: IncludeRef[];
};

export type SshdParseOptions = {
  /** Stock comment blocks dropped on parse; the bundled catalogue when omitted. */
  boilerplate?: readonly BoilerplateBlock[];
};

export function parseSshd(text: string, options: SshdParseOptions = {}): SshdDoc {
  const catalogue = options.boilerplate ?? getDefaultCatalogue();
  const rawLines = splitLines(text);
  const lines: ConfigLine[] = [];
  const includes: IncludeRef[] = [];

  let i = 0;
  while (i < rawLines.length) {
    const raw = rawLines[i];
    const lineNumber = i + 1;

    if (isCommentOrBlank(raw)) {
      const skipped = matchBoilerplate(rawLines, i, catalogue);
      if (skipped > 0) {
        i += skipped;
        continue;
      }
    }

    const line = classifyLine(raw, lineNumber);
    if (!line.commented && keyEquals(line.key, "Include")) {
      includes.push({ path: line.value ?? "", raw, lineNumber });
    }
    lines.push(line);
    i++;
  }

  return { lines, includes };
}

export function stringifySshd(doc: SshdDoc): string {
  return joinLines(doc.lines.map(renderLine));
}
