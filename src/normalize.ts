import {
  canonicalFormatIdentifier,
  cleanText,
  formatValueType,
  parsePropertyIdentifier,
  preferSpecific
} from './lib/canon.js';
import {
  MalformedIdentifierError,
  MalformedRecordError,
  ConfigurationError,
  type NormalizationError
} from './errors.js';
import {
  OPTIONAL_FIELDS,
  SUPPORTED_KEYS,
  err,
  ok,
  type CandidateEntry,
  type FieldRule,
  type OptionalField,
  type Result,
  type SourceTag
} from './types/index.js';

export interface CompiledRule {
  field: OptionalField;
  pattern: RegExp;
  replace?: string;
}

export type CompiledRuleSet = readonly CompiledRule[];

export function compileRules(source: SourceTag, rules: readonly FieldRule[] = []): CompiledRuleSet {
  return rules.map((rule, index) => {
    let pattern: RegExp;
    try {
      pattern = new RegExp(rule.pattern, rule.flags);
    } catch (error) {
      throw new ConfigurationError(
        `Invalid cleanup rule #${index} for source "${source}" (${rule.field}): ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
    return { field: rule.field, pattern, replace: rule.replace };
  });
}

function applyRules(field: OptionalField, value: string, rules: CompiledRuleSet): string | undefined {
  let current = value;
  for (const rule of rules) {
    if (rule.field !== field) continue;
    if (rule.replace !== undefined) {
      current = current.replace(rule.pattern, rule.replace);
    } else {
      // Filter rules may carry the g flag; lastIndex must not leak between values.
      rule.pattern.lastIndex = 0;
      if (!rule.pattern.test(current)) return undefined;
    }
  }
  const cleaned = cleanText(current);
  return cleaned || undefined;
}

function scalarToText(field: OptionalField, value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isInteger(value)) {
    return field === 'value_type' ? formatValueType(value) : String(value);
  }
  if (typeof value === 'boolean') return String(value);
  return undefined;
}

function normalizeField(field: OptionalField, value: unknown, rules: CompiledRuleSet): string | undefined {
  const values = Array.isArray(value) ? value : [value];
  const cleaned: string[] = [];
  for (const entry of values) {
    const text = scalarToText(field, entry);
    if (text === undefined) continue;
    const result = applyRules(field, cleanText(text), rules);
    if (result) cleaned.push(result);
  }
  return preferSpecific(cleaned);
}

/** Brings one raw record into candidate form; bad input yields an error result. */
export function normalize(
  rawRecord: unknown,
  sourceTag: SourceTag,
  rules: CompiledRuleSet = []
): Result<CandidateEntry, NormalizationError> {
  if (rawRecord === null || typeof rawRecord !== 'object' || Array.isArray(rawRecord)) {
    return err(new MalformedRecordError('Record is not a mapping of fields'));
  }

  const record: Record<string, unknown> = { ...rawRecord };
  const unsupported = Object.keys(record).filter((key) => !SUPPORTED_KEYS.has(key));
  if (unsupported.length) {
    return err(new MalformedRecordError(`Unsupported keys: ${unsupported.sort().join(', ')}`));
  }

  const formatIdentifier = canonicalFormatIdentifier(record.format_identifier);
  if (!formatIdentifier) {
    return err(new MalformedIdentifierError('format_identifier', record.format_identifier));
  }

  const propertyIdentifier = parsePropertyIdentifier(record.property_identifier);
  if (propertyIdentifier === undefined) {
    return err(
      new MalformedIdentifierError(
        'property_identifier',
        record.property_identifier,
        'expected an unsigned 32-bit decimal integer'
      )
    );
  }

  const entry: CandidateEntry = {
    format_identifier: formatIdentifier,
    property_identifier: propertyIdentifier,
    source: sourceTag
  };

  for (const field of OPTIONAL_FIELDS) {
    if (record[field] === undefined || record[field] === null) continue;
    const value = normalizeField(field, record[field], rules);
    if (value !== undefined) entry[field] = value;
  }

  return ok(entry);
}
