import type { PrecedencePolicy } from './config/pipeline.js';
import { PrecedenceConfigurationError, SourceUnavailableError } from './errors.js';
import { KnowledgeBase } from './knowledge-base.js';
import { compareKeys, preferSpecific, toLookupKey } from './lib/canon.js';
import { SourceStream } from './sources.js';
import { log } from './utils/log.js';
import { RunSummary, type NameConflict } from './utils/run-summary.js';
import {
  OPTIONAL_FIELDS,
  type CandidateEntry,
  type CanonicalEntry,
  type PropertyMetadata,
  type SourceCandidates,
  type SourceTag
} from './types/index.js';

export interface MergeOptions {
  summary?: RunSummary;
}

export interface ResolvedKey {
  entry: CanonicalEntry;
  conflict?: NameConflict;
}

async function collect(
  source: SourceTag,
  candidates: SourceCandidates['candidates']
): Promise<CandidateEntry[]> {
  const collected: CandidateEntry[] = [];
  for await (const candidate of candidates) {
    collected.push(candidate.source === source ? candidate : { ...candidate, source });
  }
  return collected;
}

function rankOf(policy: PrecedencePolicy, source: SourceTag): number {
  const rank = policy.rank(source);
  if (rank === undefined) {
    throw new PrecedenceConfigurationError(`Source "${source}" has no precedence rank`);
  }
  return rank;
}

/**
 * Resolves every field of one key independently: the highest tier that has
 * a value wins, and within a tier the most specific value wins.
 */
export function resolveKey(candidates: readonly CandidateEntry[], policy: PrecedencePolicy): ResolvedKey {
  if (!candidates.length) {
    throw new Error('resolveKey requires at least one candidate');
  }

  const [first] = candidates;
  const metadata: PropertyMetadata = {};

  for (const field of OPTIONAL_FIELDS) {
    let bestRank = Number.POSITIVE_INFINITY;
    let values: string[] = [];
    for (const candidate of candidates) {
      const value = candidate[field];
      if (!value) continue;
      const rank = rankOf(policy, candidate.source);
      if (rank < bestRank) {
        bestRank = rank;
        values = [value];
      } else if (rank === bestRank) {
        values.push(value);
      }
    }
    const chosen = preferSpecific(values);
    if (chosen !== undefined) metadata[field] = chosen;
  }

  const provenance = [...new Set(candidates.map((candidate) => candidate.source))].sort((a, b) =>
    policy.compareSources(a, b)
  );

  const entry: CanonicalEntry = {
    format_identifier: first.format_identifier,
    property_identifier: first.property_identifier,
    ...metadata,
    provenance
  };

  // Only disagreement between sources is a conflict.
  let conflict: NameConflict | undefined;
  const named = candidates.filter((candidate) => candidate.name);
  const names = new Set(named.map((candidate) => candidate.name));
  const namingSources = provenance.filter((source) => named.some((candidate) => candidate.source === source));
  if (names.size > 1 && namingSources.length > 1 && metadata.name !== undefined) {
    const chosen = metadata.name;
    conflict = {
      key: toLookupKey(entry),
      chosen,
      rejected: [...names].flatMap((name) => (name && name !== chosen ? [name] : [])).sort(),
      sources: namingSources
    };
  }

  return { entry, conflict };
}

/**
 * Merges the candidate streams of all sources into one knowledge base.
 *
 * Each source is read to completion before its candidates join the merge,
 * so a source that fails halfway contributes nothing. Output depends only
 * on the candidates and the policy, never on the order sources arrive in.
 */
export async function merge(
  candidateSequences: Iterable<SourceCandidates>,
  policy: PrecedencePolicy,
  options: MergeOptions = {}
): Promise<KnowledgeBase> {
  const summary = options.summary ?? new RunSummary();
  const groups = new Map<string, CandidateEntry[]>();
  const failed: SourceTag[] = [];
  let attempted = 0;

  const sequences = [...candidateSequences];
  const unranked = sequences.filter(({ source }) => !policy.has(source)).map(({ source }) => source);
  if (unranked.length) {
    throw new PrecedenceConfigurationError(
      `Sources not part of the precedence policy: ${[...new Set(unranked)].join(', ')}`
    );
  }

  for (const { source, candidates } of sequences) {
    attempted++;

    let collected: CandidateEntry[];
    try {
      collected = await collect(source, candidates);
    } catch (error) {
      if (!(error instanceof SourceUnavailableError)) throw error;
      log.error('Source unavailable, continuing without it', { source, path: error.path, error });
      summary.recordSourceUnavailable(source, error);
      failed.push(source);
      continue;
    }

    summary.recordSourceLoaded(
      source,
      collected.length,
      candidates instanceof SourceStream ? candidates.stats : undefined
    );

    for (const candidate of collected) {
      const key = toLookupKey(candidate);
      const group = groups.get(key);
      if (group) {
        group.push(candidate);
      } else {
        groups.set(key, [candidate]);
      }
    }
  }

  if (attempted > 0 && failed.length === attempted) {
    throw new SourceUnavailableError(`Every source is unavailable: ${failed.join(', ')}`, {
      sources: failed
    });
  }

  const entries: CanonicalEntry[] = [];
  const ordered = [...groups.values()].sort((a, b) => compareKeys(a[0], b[0]));
  for (const group of ordered) {
    const { entry, conflict } = resolveKey(group, policy);
    entries.push(entry);
    if (conflict) summary.recordConflict(conflict);
  }

  const knowledgeBase = KnowledgeBase.fromEntries(entries);
  const candidateCount = [...groups.values()].reduce((total, group) => total + group.length, 0);
  summary.updateStats({ keys: knowledgeBase.size, candidates: candidateCount });
  log.info('Merge complete', {
    sources: attempted - failed.length,
    unavailable: failed,
    keys: knowledgeBase.size
  });
  return knowledgeBase;
}
