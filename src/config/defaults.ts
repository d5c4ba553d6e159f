/**
 * Solver Configuration
 *
 * Default configuration and factory functions for the swap search and
 * the word fill solver.
 */

import { FillConfig, SearchConfig } from '../model/types';

// =============================================================================
// Waffle Bounds
// =============================================================================

export const WAFFLE_LIMITS = {
  /** A daily waffle is always solvable in this many swaps */
  maxSwaps: 10,
  /** Smallest waffle side length */
  minSize: 3,
} as const;

// =============================================================================
// Default Configuration
// =============================================================================

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  maxDepth: WAFFLE_LIMITS.maxSwaps,
  maxExpansions: Infinity,
  debugLevel: 0,
};

export const DEFAULT_FILL_CONFIG: FillConfig = {
  findAll: true,
  maxSolutions: Infinity,
  debugLevel: 0,
};

// =============================================================================
// Configuration Factories
// =============================================================================

/**
 * Create search config with overrides
 */
export function createSearchConfig(overrides: Partial<SearchConfig> = {}): SearchConfig {
  return {
    ...DEFAULT_SEARCH_CONFIG,
    ...overrides,
  };
}

export function createFillConfig(overrides: Partial<FillConfig> = {}): FillConfig {
  return {
    ...DEFAULT_FILL_CONFIG,
    ...overrides,
  };
}
