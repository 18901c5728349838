import { join } from 'node:path';
import { stringify } from 'yaml';
import type { KnowledgeBase } from './knowledge-base.js';
import { toLookupKey } from './lib/canon.js';
import { writeTextFile } from './utils/fs.js';
import { log } from './utils/log.js';
import type { CanonicalEntry, PropertyMetadata, TargetFormat } from './types/index.js';

export const KNOWLEDGE_BASE_HEADER = '# Shell property knowledge base';

// Field order of the persisted records.
export const PERSISTED_FIELDS = [
  'name',
  'shell_property_key',
  'format_identifier',
  'format_class',
  'property_identifier',
  'alias',
  'value_type'
] as const;

export const LOOKUP_FIELDS = ['name', 'shell_property_key', 'format_class', 'alias', 'value_type'] as const;

export const OUTPUT_FILES: Record<TargetFormat, string> = {
  yaml: 'defined_properties.yaml',
  json: 'property_keys.json',
  typescript: 'property_keys.ts'
};

export type PersistedRecord = Partial<Record<(typeof PERSISTED_FIELDS)[number], string | number>>;

export function toPersistedRecord(entry: CanonicalEntry): PersistedRecord {
  const record: PersistedRecord = {};
  for (const field of PERSISTED_FIELDS) {
    const value = entry[field];
    if (value !== undefined) record[field] = value;
  }
  return record;
}

export function toLookupMetadata(entry: CanonicalEntry): PropertyMetadata {
  const metadata: PropertyMetadata = {};
  for (const field of LOOKUP_FIELDS) {
    const value = entry[field];
    if (value !== undefined) metadata[field] = value;
  }
  return metadata;
}

/** Multi-document YAML, one `---` document per entry. */
export function serializeKnowledgeBase(knowledgeBase: KnowledgeBase): string {
  const parts = [`${KNOWLEDGE_BASE_HEADER}\n`];
  for (const entry of knowledgeBase.all()) {
    parts.push('---\n', stringify(toPersistedRecord(entry), { lineWidth: 0 }));
  }
  return parts.join('');
}

function renderJsonLookup(knowledgeBase: KnowledgeBase): string {
  const lookup: Record<string, PropertyMetadata> = {};
  for (const entry of knowledgeBase.all()) {
    lookup[toLookupKey(entry)] = toLookupMetadata(entry);
  }
  return `${JSON.stringify(lookup, null, 2)}\n`;
}

function renderTypeScriptLookup(knowledgeBase: KnowledgeBase): string {
  const lines = [
    '// Shell property key lookup table, generated from the property knowledge base.',
    '// Regenerate it instead of editing it.',
    '',
    'export interface PropertyKeyMetadata {',
    ...LOOKUP_FIELDS.map((field) => `  readonly ${field}?: string;`),
    '}',
    '',
    'export const PROPERTY_KEYS: Readonly<Record<string, PropertyKeyMetadata>> = Object.freeze({'
  ];
  for (const entry of knowledgeBase.all()) {
    lines.push(`  ${JSON.stringify(toLookupKey(entry))}: ${JSON.stringify(toLookupMetadata(entry))},`);
  }
  lines.push(
    '});',
    '',
    'export function lookupPropertyKey(',
    '  formatIdentifier: string,',
    '  propertyIdentifier: number',
    '): PropertyKeyMetadata | undefined {',
    "  const guid = formatIdentifier.trim().replace(/^\\{|\\}$/g, '').toLowerCase();",
    '  return PROPERTY_KEYS[`{${guid}}/${propertyIdentifier}`];',
    '}',
    ''
  );
  return lines.join('\n');
}

export function renderResource(knowledgeBase: KnowledgeBase, targetFormat: TargetFormat): string {
  switch (targetFormat) {
    case 'yaml':
      return serializeKnowledgeBase(knowledgeBase);
    case 'json':
      return renderJsonLookup(knowledgeBase);
    case 'typescript':
      return renderTypeScriptLookup(knowledgeBase);
  }
}

/**
 * Renders the knowledge base in `targetFormat` and writes it to
 * `outputPath` (a directory receives the default file name for the format).
 * Returns the path written.
 */
export async function generate(
  knowledgeBase: KnowledgeBase,
  targetFormat: TargetFormat,
  outputPath: string,
  options: { directory?: boolean } = {}
): Promise<string> {
  const file = options.directory ? join(outputPath, OUTPUT_FILES[targetFormat]) : outputPath;
  const contents = renderResource(knowledgeBase, targetFormat);
  await writeTextFile(file, contents);
  log.info('Resource generated', { format: targetFormat, file, entries: knowledgeBase.size });
  return file;
}
