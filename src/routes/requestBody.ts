import type { ConfigLine, DirectiveUpdate } from '../configLine.js';
import { type Explanations, explain } from '../explanations.js';

export type BodyResult<T> = { ok: true; value: T } | { ok: false; error: string };

export type NewDirective = {
  key: string;
  value: string;
  commented: boolean;
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** Route parameter holding a non-negative integer, or null. */
export function parseIndex(raw: string): number | null {
  return /^\d+$/.test(raw) ? Number(raw) : null;
}

export function parseNewDirective(body: unknown): BodyResult<NewDirective> {
  if (!isRecord(body)) return { ok: false, error: 'Missing request body' };
  const { key, value, commented } = body;
  if (typeof key !== 'string' || !key.trim()) return { ok: false, error: 'Missing key' };
  if (value !== undefined && typeof value !== 'string') return { ok: false, error: 'value must be a string' };
  if (commented !== undefined && typeof commented !== 'boolean') return { ok: false, error: 'commented must be a boolean' };
  return { ok: true, value: { key: key.trim(), value: value?.trim() ?? '', commented: commented ?? false } };
}

export function parseDirectiveUpdate(body: unknown): BodyResult<DirectiveUpdate> {
  if (!isRecord(body)) return { ok: false, error: 'Missing request body' };
  const { key, value, commented } = body;
  const update: DirectiveUpdate = {};

  if (key !== undefined) {
    if (typeof key !== 'string' || !key.trim()) return { ok: false, error: 'key must be a non-empty string' };
    update.key = key.trim();
  }
  if (value !== undefined) {
    if (typeof value !== 'string') return { ok: false, error: 'value must be a string' };
    update.value = value.trim();
  }
  if (commented !== undefined) {
    if (typeof commented !== 'boolean') return { ok: false, error: 'commented must be a boolean' };
    update.commented = commented;
  }
  if (Object.keys(update).length === 0) return { ok: false, error: 'Nothing to update' };
  return { ok: true, value: update };
}

export function parseHostPattern(body: unknown): BodyResult<string> {
  if (!isRecord(body)) return { ok: false, error: 'Missing request body' };
  const { pattern } = body;
  if (typeof pattern !== 'string' || !pattern.trim()) return { ok: false, error: 'Missing pattern' };
  return { ok: true, value: pattern.trim() };
}

export function describeLine(line: ConfigLine, index: number, explanations?: Explanations) {
  const explanation = explanations && line.key ? explain(explanations, line.key) : undefined;
  return {
    index,
    key: line.key,
    value: line.value,
    raw: line.raw,
    commented: line.commented,
    lineNumber: line.lineNumber,
    ...(explanation !== undefined && { explanation }),
  };
}
