import type { OptionalField, SourceTag } from './property.js';

export interface FieldRule {
  field: OptionalField;
  pattern: string;
  flags?: string;
  /** Without a replacement the rule keeps only values matching `pattern`. */
  replace?: string;
}

export interface SourceDefinition {
  tag: SourceTag;
  /** File path or glob, relative to the data root. */
  path: string;
  rules?: FieldRule[];
}

export type PrecedenceTier = SourceTag | SourceTag[];

export interface PipelineConfigFile {
  sources: SourceDefinition[];
  precedence: PrecedenceTier[];
}

export type TargetFormat = 'yaml' | 'json' | 'typescript';

export const TARGET_FORMATS: readonly TargetFormat[] = ['yaml', 'json', 'typescript'];
