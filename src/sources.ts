import { readFile } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';
import fg from 'fast-glob';
import { parseAllDocuments } from 'yaml';
import { SourceUnavailableError, type PipelineErrorKind } from './errors.js';
import { normalize, type CompiledRuleSet } from './normalize.js';
import { log } from './utils/log.js';
import type { CandidateEntry, SourceCandidates, SourceTag } from './types/index.js';

export interface SourceDrop {
  file: string;
  /** 1-based position of the YAML document in its file. */
  document: number;
  kind: PipelineErrorKind;
  message: string;
}

export interface SourceStats {
  files: string[];
  read: number;
  accepted: number;
  dropped: number;
  drops: SourceDrop[];
}

export interface LoadOptions {
  /** Directory relative paths and globs are resolved against. */
  cwd?: string;
}

function emptyStats(): SourceStats {
  return { files: [], read: 0, accepted: 0, dropped: 0, drops: [] };
}

/**
 * Lazy view of one source's record stream. Each iteration re-reads the
 * matched files and starts a fresh `stats` object.
 */
export class SourceStream implements AsyncIterable<CandidateEntry> {
  stats: SourceStats = emptyStats();

  constructor(
    readonly source: SourceTag,
    readonly path: string,
    private readonly rules: CompiledRuleSet,
    private readonly cwd: string
  ) {}

  async *[Symbol.asyncIterator](): AsyncIterator<CandidateEntry> {
    const stats = emptyStats();
    this.stats = stats;

    stats.files = await this.resolveFiles();

    for (const file of stats.files) {
      let text: string;
      try {
        text = await readFile(file, 'utf8');
      } catch (error) {
        throw new SourceUnavailableError(
          `Unable to read source "${this.source}" from ${file}: ${error instanceof Error ? error.message : String(error)}`,
          { sources: [this.source], path: file },
          { cause: error }
        );
      }

      let position = 0;
      for (const document of parseAllDocuments(text)) {
        position++;
        if (!document.errors.length && document.contents === null) continue;
        stats.read++;

        if (document.errors.length) {
          this.drop(stats, {
            file,
            document: position,
            kind: 'MalformedRecord',
            message: document.errors.map((error) => error.message).join('; ')
          });
          continue;
        }

        // Unresolved aliases and alias expansion limits only surface here.
        let raw: unknown;
        try {
          raw = document.toJS();
        } catch (error) {
          this.drop(stats, {
            file,
            document: position,
            kind: 'MalformedRecord',
            message: error instanceof Error ? error.message : String(error)
          });
          continue;
        }

        const result = normalize(raw, this.source, this.rules);
        if (!result.ok) {
          this.drop(stats, {
            file,
            document: position,
            kind: result.error.kind,
            message: result.error.message
          });
          continue;
        }

        stats.accepted++;
        yield result.value;
      }
    }

    log.debug('Source read', {
      source: this.source,
      files: stats.files.length,
      accepted: stats.accepted,
      dropped: stats.dropped
    });
  }

  private drop(stats: SourceStats, drop: SourceDrop) {
    stats.dropped++;
    stats.drops.push(drop);
    log.warn('Dropped malformed record', { source: this.source, ...drop });
  }

  private async resolveFiles(): Promise<string[]> {
    const absolute = isAbsolute(this.path) ? this.path : join(this.cwd, this.path);
    if (!fg.isDynamicPattern(this.path)) {
      return [absolute];
    }

    const files = await fg(this.path, { cwd: this.cwd, absolute: true, onlyFiles: true });
    if (!files.length) {
      throw new SourceUnavailableError(
        `No files match source "${this.source}" pattern ${this.path} under ${this.cwd}`,
        { sources: [this.source], path: absolute }
      );
    }
    return files.sort();
  }
}

export function load(
  sourcePath: string,
  sourceTag: SourceTag,
  rules: CompiledRuleSet = [],
  options: LoadOptions = {}
): SourceStream {
  return new SourceStream(sourceTag, sourcePath, rules, options.cwd ?? process.cwd());
}

export interface ConfiguredSource {
  tag: SourceTag;
  path: string;
  rules: CompiledRuleSet;
}

export function loadSources(sources: readonly ConfiguredSource[], dataRoot: string): SourceStream[] {
  return sources.map((source) => load(source.path, source.tag, source.rules, { cwd: dataRoot }));
}

export function asCandidateSequences(streams: readonly SourceStream[]): SourceCandidates[] {
  return streams.map((stream) => ({ source: stream.source, candidates: stream }));
}
