import { isDeepStrictEqual } from 'node:util';
import type { KnowledgeBase } from './knowledge-base.js';
import { PERSISTED_FIELDS, toPersistedRecord } from './generate.js';
import { compareKeys } from './lib/canon.js';

export type DiffChangeType = 'created' | 'updated' | 'deleted';

export interface DiffEntry {
  key: string;
  changeType: DiffChangeType;
  diff: Record<string, unknown>;
}

export interface ChangeReport {
  created: number;
  updated: number;
  deleted: number;
  changes: DiffEntry[];
}

function pickFields(source: Record<string, unknown> | undefined, fields: readonly string[]) {
  const result: Record<string, unknown> = {};
  if (!source) return result;
  for (const field of fields) {
    if (Object.prototype.hasOwnProperty.call(source, field)) {
      result[field] = source[field];
    }
  }
  return result;
}

export function computeDiff(
  before: Record<string, unknown> | undefined,
  after: Record<string, unknown> | undefined,
  fields: readonly string[]
): Record<string, unknown> | null {
  if (!before && after) {
    return { after: pickFields(after, fields) };
  }
  if (before && !after) {
    return { before: pickFields(before, fields) };
  }
  if (!before || !after) {
    return null;
  }

  const changes: Record<string, { before: unknown; after: unknown }> = {};
  for (const field of fields) {
    const prev = before[field];
    const next = after[field];
    if (!isDeepStrictEqual(prev, next)) {
      changes[field] = { before: prev ?? null, after: next ?? null };
    }
  }

  return Object.keys(changes).length ? changes : null;
}

/** Compares two knowledge bases on the persisted fields, ordered by lookup key. */
export function diffKnowledgeBases(previous: KnowledgeBase, next: KnowledgeBase): ChangeReport {
  const report: ChangeReport = { created: 0, updated: 0, deleted: 0, changes: [] };
  const keys = [...new Set([...previous.keys(), ...next.keys()])];

  const entries = keys.flatMap((key) => {
    const before = previous.get(key);
    const after = next.get(key);
    const either = before ?? after;
    return either ? [{ key, before, after, either }] : [];
  });
  entries.sort((a, b) => compareKeys(a.either, b.either));

  for (const { key, before, after } of entries) {
    const diff = computeDiff(
      before ? toPersistedRecord(before) : undefined,
      after ? toPersistedRecord(after) : undefined,
      PERSISTED_FIELDS
    );
    if (!diff) continue;

    const changeType: DiffChangeType = !before ? 'created' : !after ? 'deleted' : 'updated';
    report[changeType]++;
    report.changes.push({ key, changeType, diff });
  }

  return report;
}
