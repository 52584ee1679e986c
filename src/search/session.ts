/**
 * One operator's search context for one index: field caches, pacing and the
 * collaborators that actually talk to the engine.
 */

import { resolveSearchConfig } from "../config";
import type { RateLimitConfig, SearchConfig } from "../config";
import { buildQuery } from "../dsl/compiler";
import type { CompiledQuery } from "../dsl/types";
import {
  FieldCapabilitiesError,
  RetriesExhaustedError,
  SearchCoreError,
  formatError,
  isThrottlingError,
} from "../errors";
import { FieldCache } from "../fields/cache";
import { collectFieldSet } from "../fields/documents";
import { FieldSelectionState } from "../fields/selection";
import type { FieldCapabilitiesResponse } from "../fields/types";
import { noopLogger } from "../logger";
import type { Logger } from "../logger";
import { RateLimiter } from "./rate-limiter";
import type { Clock } from "./rate-limiter";
import type {
  FieldCapabilitiesProvider,
  IndexLister,
  SearchExecutor,
  SearchOutcome,
  SearchPage,
  SearchRequest,
} from "./types";

export interface SearchSessionOptions {
  index: string;
  executor: SearchExecutor;
  fieldCapabilities?: FieldCapabilitiesProvider;
  indexLister?: IndexLister;
  rateLimit?: Partial<RateLimitConfig>;
  search?: Partial<SearchConfig>;
  logger?: Logger;
  clock?: Clock;
}

function requireIndex(index: string): string {
  const trimmed = index.trim();
  if (trimmed === "") {
    throw new SearchCoreError("index cannot be empty");
  }
  return trimmed;
}

export class SearchSession {
  readonly rateLimiter: RateLimiter;

  private readonly executor: SearchExecutor;
  private readonly fieldCapabilities?: FieldCapabilitiesProvider;
  private readonly indexLister?: IndexLister;
  private readonly config: SearchConfig;
  private readonly logger: Logger;

  private index: string;
  private cache = new FieldCache();
  private selection = new FieldSelectionState();
  /** Missing fields a successful metadata refresh has already been asked about. */
  private requestedFields = new Set<string>();
  /** Bumped on every index switch so late responses are not absorbed. */
  private generation = 0;

  constructor(options: SearchSessionOptions) {
    this.index = requireIndex(options.index);
    this.executor = options.executor;
    this.fieldCapabilities = options.fieldCapabilities;
    this.indexLister = options.indexLister;
    this.config = resolveSearchConfig(options.search);
    this.logger = options.logger ?? noopLogger;
    this.rateLimiter = new RateLimiter(options.rateLimit, options.clock);
    this.cache.seedDefaults();
  }

  get currentIndex(): string {
    return this.index;
  }

  /** Replaced on every index switch; read it again after `switchIndex`. */
  get fieldCache(): FieldCache {
    return this.cache;
  }

  get fieldSelection(): FieldSelectionState {
    return this.selection;
  }

  /**
   * Start over on another index pattern. Field metadata and selection are
   * discarded, not merged; the rate limiter carries over.
   */
  switchIndex(index: string): void {
    this.index = requireIndex(index);
    this.cache = new FieldCache();
    this.cache.seedDefaults();
    this.selection = new FieldSelectionState();
    this.requestedFields = new Set();
    this.generation++;
    this.logger.debug("Switched index", { index: this.index });
  }

  async listIndices(pattern = "*", signal?: AbortSignal): Promise<string[]> {
    if (!this.indexLister) {
      throw new SearchCoreError("no index lister configured");
    }
    return this.indexLister.listIndices(pattern, signal);
  }

  /**
   * Compile, pace, execute and absorb one page of results.
   */
  async search(request: SearchRequest): Promise<SearchOutcome> {
    const query = buildQuery(
      {
        filters: request.filters,
        size: request.size ?? this.config.defaultSize,
        timeframe: request.timeframe,
        now: request.now,
      },
      this.cache
    );

    const generation = this.generation;
    const { page, attempts } = await this.execute(query, this.index, request.signal);

    if (generation !== this.generation) {
      this.logger.debug("Discarding results for a previous index", { attempts });
      return { ...page, query, attempts, fieldsChanged: false };
    }

    const fieldsChanged = this.selection.updateFromDocuments(page.documents);
    const discovered = collectFieldSet(page.documents);

    let metadataError: FieldCapabilitiesError | undefined;
    const requested = this.requestedFields;
    const unrequested = this.cache.missing(discovered).filter((field) => !requested.has(field));
    if (unrequested.length > 0) {
      try {
        if (await this.refreshFieldMetadata(request.signal)) {
          for (const field of unrequested) requested.add(field);
        }
      } catch (err) {
        if (!(err instanceof FieldCapabilitiesError)) throw err;
        this.logger.error("Field metadata refresh failed", { index: err.index, error: formatError(err.cause) });
        metadataError = err;
      }
    }
    if (generation === this.generation) {
      this.cache.markActive(discovered);
    }

    return { ...page, query, attempts, fieldsChanged, metadataError };
  }

  /**
   * Fetch field capabilities for the current index into the field cache.
   * Returns false when no provider is configured. On failure the cache keeps
   * whatever it held before.
   */
  async refreshFieldMetadata(signal?: AbortSignal): Promise<boolean> {
    const provider = this.fieldCapabilities;
    if (!provider) return false;

    const cache = this.cache;
    const index = this.index;

    let response: FieldCapabilitiesResponse;
    try {
      response = await provider.getFieldCapabilities(index, this.config.fieldCapabilitiesGlob, signal);
    } catch (err) {
      throw new FieldCapabilitiesError(index, err);
    }

    cache.applyCapabilities(response);
    this.logger.debug("Field metadata refreshed", {
      index,
      fields: Object.keys(response.fields).length,
    });
    return true;
  }

  private async execute(
    query: CompiledQuery,
    index: string,
    signal: AbortSignal | undefined
  ): Promise<{ page: SearchPage; attempts: number }> {
    let attempts = 0;
    for (;;) {
      await this.rateLimiter.waitForSlot(signal);
      attempts++;
      try {
        const page = await this.executor.search(query, index, signal);
        this.rateLimiter.reset();
        return { page, attempts };
      } catch (err) {
        if (!isThrottlingError(err)) {
          this.logger.error("Search failed", { index, attempts, error: formatError(err) });
          throw err;
        }
        const retryAfterMs = this.rateLimiter.handleTooManyRequests();
        if (attempts > this.config.maxRetries) {
          this.logger.error("Search still throttled, giving up", { index, attempts });
          throw new RetriesExhaustedError(attempts, err);
        }
        this.logger.warn("Search throttled, backing off", { index, attempts, retryAfterMs });
      }
    }
  }
}
