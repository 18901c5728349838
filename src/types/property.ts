export const OPTIONAL_FIELDS = [
  'name',
  'shell_property_key',
  'format_class',
  'alias',
  'value_type'
] as const;

export type OptionalField = (typeof OPTIONAL_FIELDS)[number];

export const SUPPORTED_KEYS: ReadonlySet<string> = new Set<string>([
  'format_identifier',
  'property_identifier',
  ...OPTIONAL_FIELDS
]);

export type SourceTag = string;

/** One YAML document as it comes out of a source's record stream. */
export type RawRecord = Record<string, unknown>;

export interface PropertyKey {
  format_identifier: string;
  property_identifier: number;
}

export interface PropertyMetadata {
  name?: string;
  shell_property_key?: string;
  format_class?: string;
  alias?: string;
  value_type?: string;
}

export interface CandidateEntry extends PropertyKey, PropertyMetadata {
  source: SourceTag;
}

export interface CanonicalEntry extends Readonly<PropertyKey>, Readonly<PropertyMetadata> {
  readonly provenance: readonly SourceTag[];
}

export interface SourceCandidates {
  source: SourceTag;
  candidates: Iterable<CandidateEntry> | AsyncIterable<CandidateEntry>;
}
