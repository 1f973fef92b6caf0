import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { readFileSync } from "fs";

/** One stock comment block, stored as trimmed lines. */
export type BoilerplateBlock = readonly string[];

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const CATALOGUE_PATH = join(__dirname, "data/sshdBoilerplate.json");

let defaultCatalogue: BoilerplateBlock[] | null = null;

function isBlockList(data: unknown): data is string[][] {
  return (
    Array.isArray(data) &&
    data.every((block) => Array.isArray(block) && block.length > 0 && block.every((l) => typeof l === "string"))
  );
}

/**
 * Read a catalogue file: a JSON array of blocks, each an array of lines.
 * Lines are trimmed on load so comparisons stay whitespace-insensitive at the edges.
 */
export function loadBoilerplateCatalogue(file: string): BoilerplateBlock[] {
  const data: unknown = JSON.parse(readFileSync(file, "utf8"));
  if (!isBlockList(data)) {
    throw new Error(`Invalid boilerplate catalogue: ${file}`);
  }
  return data.map((block) => block.map((line) => line.trim()));
}

/** Catalogue of stock sshd_config commentary shipped with this package. */
export function getDefaultCatalogue(): BoilerplateBlock[] {
  if (!defaultCatalogue) {
    defaultCatalogue = loadBoilerplateCatalogue(CATALOGUE_PATH);
  }
  return defaultCatalogue;
}

/**
 * Number of lines consumed by the first catalogue block that matches `lines`
 * starting at `start`, or 0. Only whole blocks match, tried in catalogue order.
 */
export function matchBoilerplate(lines: readonly string[], start: number, catalogue: readonly BoilerplateBlock[]): number {
  for (const block of catalogue) {
    if (start + block.length > lines.length) continue;
    let matched = true;
    for (let i = 0; i < block.length; i++) {
      if (lines[start + i].trim() !== block[i]) {
        matched = false;
        break;
      }
    }
    if (matched) return block.length;
  }
  return 0;
}
