import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Ajv, type ValidateFunction } from 'ajv';
import addFormatsPlugin, { type FormatsPluginOptions } from 'ajv-formats';
import { ConfigurationError } from './errors.js';
import type { KnowledgeBase } from './knowledge-base.js';
import type { PipelineConfigFile } from './types/index.js';

const ajv = new Ajv({ allErrors: true, strict: false });
// ajv-formats is CommonJS; its default import is the plugin function at run time.
const addFormats = addFormatsPlugin as unknown as (
  ajv: Ajv,
  options?: FormatsPluginOptions
) => Ajv;
addFormats(ajv, { formats: ['uuid'] });

const validatorCache = new Map<string, ValidateFunction>();

async function loadValidator (schemaPath: string): Promise<ValidateFunction> {
  const cached = validatorCache.get(schemaPath);
  if (cached) {
    return cached;
  }
  const schema = JSON.parse(await readFile(schemaPath, 'utf8'));
  const validator = ajv.compile(schema);
  validatorCache.set(schemaPath, validator);
  return validator;
}

export const defaultSchemaDir = join(process.cwd(), 'schemas');

export async function validatePipelineConfig (
  data: unknown,
  schemaDir: string = defaultSchemaDir
): Promise<PipelineConfigFile> {
  const validator = await loadValidator(join(schemaDir, 'pipeline_config.json'));
  const isPipelineConfig = (value: unknown): value is PipelineConfigFile => validator(value);
  if (!isPipelineConfig(data)) {
    throw new ConfigurationError(
      `Invalid pipeline configuration: ${ajv.errorsText(validator.errors, { dataVar: 'config' })}`
    );
  }
  return data;
}

export async function validateKnowledgeBase (
  knowledgeBase: KnowledgeBase,
  schemaDir: string = defaultSchemaDir
) {
  const validator = await loadValidator(join(schemaDir, 'canonical_entry.json'));
  let index = 0;
  for (const entry of knowledgeBase.all()) {
    if (!validator(entry)) {
      const message = ajv.errorsText(validator.errors, { dataVar: `entries[${index}]` });
      throw new Error(message);
    }
    index++;
  }
}
