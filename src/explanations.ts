import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { readFileSync } from "fs";

export type Explanations = Record<string, string>;

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_EXPLANATIONS_FILE = join(__dirname, "data/sshdExplanations.json");

/**
 * Load directive descriptions keyed by exact directive name.
 * Non-string entries are skipped.
 */
export function loadExplanations(file: string = DEFAULT_EXPLANATIONS_FILE): Explanations {
  const data: unknown = JSON.parse(readFileSync(file, "utf8"));
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new Error(`Explanations file must hold a JSON object: ${file}`);
  }

  const out: Explanations = {};
  for (const [key, text] of Object.entries(data)) {
    if (typeof text === "string") out[key] = text;
  }
  return out;
}

export function explain(explanations: Explanations, key: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(explanations, key) ? explanations[key] : undefined;
}
