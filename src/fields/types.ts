/**
 * Field schema and document shapes shared by the caches and the compiler.
 */

export type NumericFieldType = "long" | "integer" | "float" | "double";

/**
 * Mapping types the compiler dispatches on. Engines report others
 * ("text", "ip", "object", ...); those are kept verbatim and compile like keyword.
 */
export type KnownFieldType = "keyword" | NumericFieldType | "date" | "boolean";

export interface FieldMetadata {
  type: string;
  searchable: boolean;
  aggregatable: boolean;
  /** Set once the field has been seen in a returned document. */
  active: boolean;
}

export interface FieldCapability {
  type: string;
  searchable: boolean;
  aggregatable: boolean;
}

/**
 * Body of a `_field_caps` response: field → mapping type → capability.
 */
export interface FieldCapabilitiesResponse {
  fields: Record<string, Record<string, FieldCapability>>;
}

/** One returned document, metadata fields (`_id`, `_index`, ...) included. */
export type SearchDocument = Record<string, unknown>;
