import { resolvePrecedence } from './config/pipeline.js';
import type { KnowledgeBase } from './knowledge-base.js';
import { merge } from './merge.js';
import { load } from './sources.js';
import { pathExists } from './utils/fs.js';
import { RunSummary } from './utils/run-summary.js';

export const PERSISTED_SOURCE_TAG = 'knowledge_base';

/**
 * Reads a persisted knowledge base back as a single-source merge. Returns
 * undefined when the file does not exist yet.
 */
export async function readPersistedKnowledgeBase(
  file: string,
  summary: RunSummary = new RunSummary()
): Promise<KnowledgeBase | undefined> {
  if (!(await pathExists(file))) return undefined;
  const policy = resolvePrecedence([PERSISTED_SOURCE_TAG], [PERSISTED_SOURCE_TAG]);
  return merge([{ source: PERSISTED_SOURCE_TAG, candidates: load(file, PERSISTED_SOURCE_TAG) }], policy, {
    summary
  });
}
