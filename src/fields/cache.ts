/**
 * Field name → query-relevant schema, for one index/session.
 * No TTL and no eviction: entries are overwritten on refresh and the whole
 * cache is discarded when the session switches index.
 */

import type { FieldCapabilitiesResponse, FieldMetadata, NumericFieldType } from "./types";

const NUMERIC_TYPES: ReadonlySet<string> = new Set<NumericFieldType>(["long", "integer", "float", "double"]);

/** Assumed for any field the cache has never heard of. */
export const DEFAULT_FIELD_METADATA: Readonly<FieldMetadata> = Object.freeze({
  type: "keyword",
  searchable: true,
  aggregatable: true,
  active: false,
});

const METADATA_FIELDS = ["_id", "_index"] as const;

export function isNumericType(type: string): boolean {
  return NUMERIC_TYPES.has(type);
}

export function isNumericOrDate(type: string): boolean {
  return type === "date" || isNumericType(type);
}

export class FieldCache {
  private readonly entries = new Map<string, FieldMetadata>();

  get(field: string): FieldMetadata | undefined {
    return this.entries.get(field);
  }

  set(field: string, metadata: FieldMetadata): void {
    this.entries.set(field, { ...metadata });
  }

  has(field: string): boolean {
    return this.entries.has(field);
  }

  get size(): number {
    return this.entries.size;
  }

  fields(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Metadata used by the compiler: cached entry, or keyword defaults.
   */
  resolve(field: string): FieldMetadata {
    return this.entries.get(field) ?? { ...DEFAULT_FIELD_METADATA };
  }

  seedDefaults(): void {
    for (const field of METADATA_FIELDS) {
      this.set(field, { type: "keyword", searchable: true, aggregatable: true, active: false });
    }
  }

  /**
   * Populate from a field capabilities response. A field reported under
   * several types keeps the first type listed in the response.
   */
  applyCapabilities(response: FieldCapabilitiesResponse): void {
    this.seedDefaults();
    for (const [field, byType] of Object.entries(response.fields)) {
      const first = Object.entries(byType)[0];
      if (!first) continue;
      const [typeName, capability] = first;
      this.set(field, {
        type: typeName,
        searchable: capability.searchable,
        aggregatable: capability.aggregatable,
        active: this.entries.get(field)?.active ?? false,
      });
    }
  }

  missing(fields: Iterable<string>): string[] {
    const out: string[] = [];
    for (const field of fields) {
      if (!this.entries.has(field)) out.push(field);
    }
    return out;
  }

  markActive(fields: Iterable<string>): void {
    for (const field of fields) {
      const meta = this.entries.get(field);
      if (meta) meta.active = true;
    }
  }
}
