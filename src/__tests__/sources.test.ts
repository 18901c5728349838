import { appendFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { SourceUnavailableError } from '../errors.js';
import { load } from '../sources.js';
import {
  DOCUMENT_SUMMARY_INFORMATION,
  collect,
  createTempDir,
  removeTempDir,
  yamlRecord
} from './helpers.js';

function validRecords(from: number, to: number = from): string {
  let text = '';
  for (let pid = from; pid <= to; pid++) {
    text += yamlRecord({ format_identifier: DOCUMENT_SUMMARY_INFORMATION, property_identifier: pid, name: `System.Test${pid}` });
  }
  return text;
}

describe('load', () => {
  let dir: string | undefined;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
    dir = undefined;
  });

  function tempDir(): string {
    if (!dir) throw new Error('temp dir missing');
    return dir;
  }

  it('should skip and count a malformed record without losing the valid ones', async () => {
    const file = join(tempDir(), 'headers.yaml');
    const malformed = yamlRecord({ format_identifier: DOCUMENT_SUMMARY_INFORMATION, property_identifier: 'not-a-number' });
    await writeFile(file, validRecords(1, 4) + malformed + validRecords(5, 9));

    const stream = load('headers.yaml', 'headers', [], { cwd: tempDir() });
    const candidates = await collect(stream);

    expect(candidates).toHaveLength(9);
    expect(candidates.map((entry) => entry.property_identifier)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(stream.stats.read).toBe(10);
    expect(stream.stats.accepted).toBe(9);
    expect(stream.stats.dropped).toBe(1);
    expect(stream.stats.drops[0]).toMatchObject({ file, kind: 'MalformedIdentifier' });
  });

  it('should count YAML syntax problems as malformed records', async () => {
    const file = join(tempDir(), 'docs.yaml');
    await writeFile(
      file,
      `---\nformat_identifier: ${DOCUMENT_SUMMARY_INFORMATION}\nformat_identifier: ${DOCUMENT_SUMMARY_INFORMATION}\nproperty_identifier: 1\n` +
        validRecords(1)
    );

    const stream = load(file, 'docs');
    const candidates = await collect(stream);

    expect(candidates).toHaveLength(1);
    expect(stream.stats.drops).toHaveLength(1);
    expect(stream.stats.drops[0].kind).toBe('MalformedRecord');
  });

  it('should drop a record whose alias has no anchor and keep reading', async () => {
    const file = join(tempDir(), 'docs.yaml');
    const unresolved = `---\nformat_identifier: ${DOCUMENT_SUMMARY_INFORMATION}\nproperty_identifier: 2\nname: *missing\n`;
    await writeFile(file, validRecords(1) + unresolved + validRecords(3));

    const stream = load(file, 'docs');
    const candidates = await collect(stream);

    expect(candidates.map((entry) => entry.property_identifier)).toEqual([1, 3]);
    expect(stream.stats.dropped).toBe(1);
    expect(stream.stats.drops[0]).toMatchObject({ file, document: 2, kind: 'MalformedRecord' });
    expect(stream.stats.drops[0].message).toMatch(/alias/i);
  });

  it('should tag every candidate with its source', async () => {
    await writeFile(join(tempDir(), 'docs.yaml'), validRecords(1, 2));
    const candidates = await collect(load('docs.yaml', 'docs', [], { cwd: tempDir() }));
    expect(candidates.map((entry) => entry.source)).toEqual(['docs', 'docs']);
  });

  it('should re-read the source on every iteration', async () => {
    const file = join(tempDir(), 'docs.yaml');
    await writeFile(file, validRecords(1, 2));
    const stream = load(file, 'docs');

    expect(await collect(stream)).toHaveLength(2);
    expect(await collect(stream)).toHaveLength(2);

    await appendFile(file, yamlRecord({ format_identifier: DOCUMENT_SUMMARY_INFORMATION, property_identifier: 3 }));
    expect(await collect(stream)).toHaveLength(3);
    expect(stream.stats.accepted).toBe(3);
  });

  it('should read glob matches in sorted order', async () => {
    await writeFile(
      join(tempDir(), 'part-b.yaml'),
      yamlRecord({ format_identifier: DOCUMENT_SUMMARY_INFORMATION, property_identifier: 20 })
    );
    await writeFile(
      join(tempDir(), 'part-a.yaml'),
      yamlRecord({ format_identifier: DOCUMENT_SUMMARY_INFORMATION, property_identifier: 10 })
    );

    const stream = load('part-*.yaml', 'docs', [], { cwd: tempDir() });
    const candidates = await collect(stream);

    expect(candidates.map((entry) => entry.property_identifier)).toEqual([10, 20]);
    expect(stream.stats.files).toEqual([join(tempDir(), 'part-a.yaml'), join(tempDir(), 'part-b.yaml')]);
  });

  it('should raise SourceUnavailable for a missing file', async () => {
    const stream = load('missing.yaml', 'docs', [], { cwd: tempDir() });
    await expect(collect(stream)).rejects.toBeInstanceOf(SourceUnavailableError);
    await expect(collect(stream)).rejects.toMatchObject({
      sources: ['docs'],
      path: join(tempDir(), 'missing.yaml')
    });
  });

  it('should raise SourceUnavailable when a glob matches nothing', async () => {
    const stream = load('*.yaml', 'docs', [], { cwd: tempDir() });
    await expect(collect(stream)).rejects.toBeInstanceOf(SourceUnavailableError);
  });
});
