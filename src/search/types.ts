/**
 * Contracts of the collaborators a search session drives. Implementations
 * wrap an OpenSearch/Elasticsearch client; this package never does network I/O.
 */

import type { CompiledQuery } from "../dsl/types";
import type { FieldCapabilitiesError } from "../errors";
import type { FieldCapabilitiesResponse, SearchDocument } from "../fields/types";

export interface SearchPage {
  documents: SearchDocument[];
  total: number;
}

export interface SearchExecutor {
  /**
   * Run a compiled query against an index pattern. Throws SearchThrottledError
   * (or any error carrying `statusCode: 429`) when the engine throttles.
   */
  search(query: CompiledQuery, index: string, signal?: AbortSignal): Promise<SearchPage>;
}

export interface FieldCapabilitiesProvider {
  getFieldCapabilities(index: string, fieldGlob: string, signal?: AbortSignal): Promise<FieldCapabilitiesResponse>;
}

export interface IndexLister {
  listIndices(pattern: string, signal?: AbortSignal): Promise<string[]>;
}

export interface SearchRequest {
  filters: string[];
  size?: number;
  timeframe?: string;
  now?: Date;
  signal?: AbortSignal;
}

export interface SearchOutcome extends SearchPage {
  query: CompiledQuery;
  /** Attempts made, throttled ones included. */
  attempts: number;
  /** Whether the discovered field set changed with this page. */
  fieldsChanged: boolean;
  /** Set when the page succeeded but its field metadata could not be refreshed. */
  metadataError?: FieldCapabilitiesError;
}
