import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CandidateEntry, CanonicalEntry, Result } from '../types/index.js';

export const SUMMARY_INFORMATION = 'f29f85e0-4ff9-1068-ab91-08002b27b3d9';
export const DOCUMENT_SUMMARY_INFORMATION = 'd5cdd502-2e9c-101b-9397-08002b2cf9ae';
export const STORAGE = 'b725f130-47ef-101a-a5f1-02608c9eebac';

export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'shell-property-kb-'));
}

export async function removeTempDir(dir: string | undefined): Promise<void> {
  if (dir) await rm(dir, { recursive: true, force: true });
}

export function candidate(
  source: string,
  propertyIdentifier: number,
  fields: Partial<Omit<CandidateEntry, 'source' | 'property_identifier'>> = {}
): CandidateEntry {
  return {
    format_identifier: DOCUMENT_SUMMARY_INFORMATION,
    property_identifier: propertyIdentifier,
    ...fields,
    source
  };
}

export function canonical(entry: Omit<CanonicalEntry, 'provenance'> & { provenance?: string[] }): CanonicalEntry {
  return { ...entry, provenance: entry.provenance ?? ['headers'] };
}

export function expectOk<T, E>(result: Result<T, E>): T {
  if (!result.ok) throw new Error(`Expected success, got ${String(result.error)}`);
  return result.value;
}

export function expectErr<T, E>(result: Result<T, E>): E {
  if (result.ok) throw new Error('Expected failure, got a value');
  return result.error;
}

export async function collect<T>(sequence: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of sequence) items.push(item);
  return items;
}

export function yamlRecord(fields: Record<string, string | number>): string {
  return `---\n${Object.entries(fields).map(([key, value]) => `${key}: ${value}`).join('\n')}\n`;
}
