/**
 * Session configuration: rate limiting and search defaults.
 */

import { ConfigError } from "./errors";

export interface RateLimitConfig {
  /** Minimum gap between requests when nothing is throttled. */
  initialDelayMs: number;
  /** Ceiling for the backoff delay. */
  maxDelayMs: number;
  /** Factor applied to the delay on every throttling response; must exceed 1. */
  retryMultiplier: number;
}

export interface SearchConfig {
  /** Retries after a throttled attempt before the search gives up. */
  maxRetries: number;
  defaultSize: number;
  /** Field glob sent with field capabilities requests. */
  fieldCapabilitiesGlob: string;
}

export const DEFAULT_RATE_LIMIT_CONFIG: Readonly<RateLimitConfig> = Object.freeze({
  initialDelayMs: 100,
  maxDelayMs: 5_000,
  retryMultiplier: 2,
});

export const DEFAULT_SEARCH_CONFIG: Readonly<SearchConfig> = Object.freeze({
  maxRetries: 3,
  defaultSize: 50,
  fieldCapabilitiesGlob: "*",
});

function requirePositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive number, got ${value}`);
  }
}

function requireNonNegativeInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got ${value}`);
  }
}

export function resolveRateLimitConfig(overrides: Partial<RateLimitConfig> = {}): RateLimitConfig {
  const config: RateLimitConfig = { ...DEFAULT_RATE_LIMIT_CONFIG, ...overrides };

  requirePositive("initialDelayMs", config.initialDelayMs);
  requirePositive("maxDelayMs", config.maxDelayMs);
  requirePositive("retryMultiplier", config.retryMultiplier);
  if (config.retryMultiplier <= 1) {
    throw new ConfigError(`retryMultiplier must be greater than 1, got ${config.retryMultiplier}`);
  }
  if (config.initialDelayMs > config.maxDelayMs) {
    throw new ConfigError(
      `initialDelayMs (${config.initialDelayMs}) cannot exceed maxDelayMs (${config.maxDelayMs})`
    );
  }
  return config;
}

export function resolveSearchConfig(overrides: Partial<SearchConfig> = {}): SearchConfig {
  const config: SearchConfig = { ...DEFAULT_SEARCH_CONFIG, ...overrides };

  requireNonNegativeInteger("maxRetries", config.maxRetries);
  requireNonNegativeInteger("defaultSize", config.defaultSize);
  if (config.fieldCapabilitiesGlob.trim() === "") {
    throw new ConfigError("fieldCapabilitiesGlob cannot be empty");
  }
  return config;
}
