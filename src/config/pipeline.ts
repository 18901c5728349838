import { isAbsolute, join } from 'node:path';
import { ConfigurationError, PrecedenceConfigurationError } from '../errors.js';
import { compileRules } from '../normalize.js';
import type { ConfiguredSource } from '../sources.js';
import { readJson } from '../utils/fs.js';
import { log } from '../utils/log.js';
import { validatePipelineConfig } from '../validate.js';
import type { PipelineConfigFile, PrecedenceTier, SourceTag } from '../types/index.js';

export const DEFAULT_CONFIG_PATH = join('config', 'pipeline.json');

/**
 * Tier of every recognized source, 0 being the most trusted. Sources that
 * share a tier are ranked against each other by value specificity.
 */
export class PrecedencePolicy {
  private readonly ranks: ReadonlyMap<SourceTag, number>;

  constructor(readonly tiers: readonly (readonly SourceTag[])[]) {
    const ranks = new Map<SourceTag, number>();
    tiers.forEach((tier, index) => {
      for (const tag of tier) ranks.set(tag, index);
    });
    this.ranks = ranks;
  }

  rank(source: SourceTag): number | undefined {
    return this.ranks.get(source);
  }

  has(source: SourceTag): boolean {
    return this.ranks.has(source);
  }

  /** Sources in precedence order; same-tier sources by tag. */
  get sources(): SourceTag[] {
    return this.tiers.flatMap((tier) => [...tier].sort());
  }

  compareSources(a: SourceTag, b: SourceTag): number {
    const diff = (this.rank(a) ?? Number.MAX_SAFE_INTEGER) - (this.rank(b) ?? Number.MAX_SAFE_INTEGER);
    if (diff !== 0) return diff;
    return a < b ? -1 : a > b ? 1 : 0;
  }
}

export function resolvePrecedence(
  knownSources: readonly SourceTag[],
  order: readonly PrecedenceTier[]
): PrecedencePolicy {
  const known = new Set(knownSources);
  if (known.size !== knownSources.length) {
    throw new PrecedenceConfigurationError(`Source list contains duplicate tags: ${knownSources.join(', ')}`);
  }

  const seen = new Set<SourceTag>();
  const tiers: SourceTag[][] = [];

  for (const tier of order) {
    const tags = Array.isArray(tier) ? [...tier] : [tier];
    if (!tags.length) {
      throw new PrecedenceConfigurationError('Precedence order contains an empty tier');
    }
    for (const tag of tags) {
      if (!known.has(tag)) {
        throw new PrecedenceConfigurationError(
          `Precedence references unknown source "${tag}" (known: ${[...known].join(', ')})`
        );
      }
      if (seen.has(tag)) {
        throw new PrecedenceConfigurationError(`Source "${tag}" appears more than once in the precedence order`);
      }
      seen.add(tag);
    }
    tiers.push(tags);
  }

  const missing = knownSources.filter((tag) => !seen.has(tag));
  if (missing.length) {
    throw new PrecedenceConfigurationError(`Precedence order does not rank: ${missing.join(', ')}`);
  }

  return new PrecedencePolicy(tiers);
}

export interface PipelineConfig {
  configPath: string;
  dataRoot: string;
  outputDir: string;
  sources: ConfiguredSource[];
  precedence: PrecedencePolicy;
}

export interface PipelineConfigOverrides {
  configPath?: string;
  dataRoot?: string;
  outputDir?: string;
}

function resolvePath(path: string): string {
  return isAbsolute(path) ? path : join(process.cwd(), path);
}

/** Output directory from the override, `OUTPUT_DIR` or the default; needs no configuration file. */
export function resolveOutputDir(override?: string): string {
  return resolvePath(override ?? process.env.OUTPUT_DIR ?? 'data');
}

/**
 * Builds the run configuration from the JSON file and the environment.
 * Any inconsistency aborts here, before a source is read.
 */
export async function loadPipelineConfig(overrides: PipelineConfigOverrides = {}): Promise<PipelineConfig> {
  const configPath = resolvePath(overrides.configPath ?? process.env.KB_CONFIG ?? DEFAULT_CONFIG_PATH);
  const dataRoot = resolvePath(overrides.dataRoot ?? process.env.DATA_ROOT ?? 'build');
  const outputDir = resolveOutputDir(overrides.outputDir);

  let raw: unknown;
  try {
    raw = await readJson(configPath);
  } catch (error) {
    throw new ConfigurationError(
      `Unable to read pipeline configuration ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const file = await validatePipelineConfig(raw);
  return buildPipelineConfig(file, { configPath, dataRoot, outputDir });
}

export function buildPipelineConfig(
  file: PipelineConfigFile,
  paths: Pick<PipelineConfig, 'configPath' | 'dataRoot' | 'outputDir'>
): PipelineConfig {
  const precedence = resolvePrecedence(
    file.sources.map((source) => source.tag),
    file.precedence
  );

  const sources = file.sources.map((source) => ({
    tag: source.tag,
    path: source.path,
    rules: compileRules(source.tag, source.rules)
  }));

  log.info('Pipeline configuration loaded', {
    config: paths.configPath,
    sources: sources.map((source) => source.tag),
    precedence: precedence.tiers
  });

  return { ...paths, sources, precedence };
}

export function parseBoolean(raw: string | undefined, defaultValue: boolean): boolean {
  if (!raw) return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  log.warn('Unable to parse boolean env flag, falling back to default', {
    value: raw
  });
  return defaultValue;
}
