import { join } from 'node:path';
import {
  loadPipelineConfig,
  resolveOutputDir,
  type PipelineConfig,
  type PipelineConfigOverrides
} from './config/pipeline.js';
import { diffKnowledgeBases, type ChangeReport } from './diffs.js';
import { GenerationWriteError } from './errors.js';
import { generate, OUTPUT_FILES } from './generate.js';
import type { KnowledgeBase } from './knowledge-base.js';
import { merge } from './merge.js';
import { readPersistedKnowledgeBase } from './persisted.js';
import { asCandidateSequences, loadSources } from './sources.js';
import { writeJson } from './utils/fs.js';
import { log } from './utils/log.js';
import { RunSummary } from './utils/run-summary.js';
import { validateKnowledgeBase, defaultSchemaDir } from './validate.js';
import type { TargetFormat } from './types/index.js';

export const RUN_SUMMARY_FILE = 'run_summary.json';
export const CHANGES_FILE = 'changes.json';

export interface RunOptions {
  config: PipelineConfig;
  formats: readonly TargetFormat[];
  skipDiffs?: boolean;
  schemaDir?: string;
  summary?: RunSummary;
}

export interface RunResult {
  knowledgeBase: KnowledgeBase;
  outputs: string[];
  changes?: ChangeReport;
  summary: RunSummary;
}

/**
 * Load, merge, validate and generate. The run summary is written last, on
 * success only; callers own the failure path.
 */
export async function runPipeline(options: RunOptions): Promise<RunResult> {
  const { config } = options;
  const summary = options.summary ?? new RunSummary();
  summary.start({
    config: config.configPath,
    data_root: config.dataRoot,
    output_dir: config.outputDir,
    precedence: config.precedence.tiers
  });

  const streams = loadSources(config.sources, config.dataRoot);
  const knowledgeBase = await merge(asCandidateSequences(streams), config.precedence, { summary });
  await validateKnowledgeBase(knowledgeBase, options.schemaDir ?? defaultSchemaDir);

  let changes: ChangeReport | undefined;
  if (options.skipDiffs) {
    log.info('Change report skipped by request');
  } else {
    // The previous knowledge base has to be read before it is overwritten below.
    const previous = await readPersistedKnowledgeBase(join(config.outputDir, OUTPUT_FILES.yaml));
    if (previous) {
      changes = diffKnowledgeBases(previous, knowledgeBase);
      const changesFile = join(config.outputDir, CHANGES_FILE);
      await writeJson(changesFile, changes);
      summary.addOutput(changesFile);
      log.info('Change report written', {
        file: changesFile,
        created: changes.created,
        updated: changes.updated,
        deleted: changes.deleted
      });
    }
  }

  const outputs: string[] = [];
  for (const format of options.formats) {
    const file = await generate(knowledgeBase, format, config.outputDir, { directory: true });
    outputs.push(file);
    summary.addOutput(file);
  }

  summary.updateStats({ dropped: summary.droppedCount, unavailable: summary.unavailableSources });
  summary.finishSuccess();
  await summary.write(join(config.outputDir, RUN_SUMMARY_FILE));

  return { knowledgeBase, outputs, changes, summary };
}

export interface BuildOptions extends PipelineConfigOverrides {
  formats: readonly TargetFormat[];
  skipDiffs?: boolean;
  schemaDir?: string;
}

/**
 * Loads the configuration and runs the pipeline. Any failure, configuration
 * errors included, leaves a failed run summary in the output directory
 * before it is rethrown.
 */
export async function runBuild(options: BuildOptions): Promise<RunResult> {
  const summary = new RunSummary();
  const outputDir = resolveOutputDir(options.outputDir);

  try {
    const config = await loadPipelineConfig(options);
    return await runPipeline({
      config,
      formats: options.formats,
      skipDiffs: options.skipDiffs,
      schemaDir: options.schemaDir,
      summary
    });
  } catch (error) {
    summary.finishFail(error);
    const summaryFile = join(outputDir, RUN_SUMMARY_FILE);
    try {
      await summary.write(summaryFile);
    } catch (writeError) {
      if (!(writeError instanceof GenerationWriteError)) throw writeError;
      log.error('Unable to write run summary', { file: summaryFile, error: writeError });
    }
    throw error;
  }
}
