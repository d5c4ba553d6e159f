/**
 * Minimum-swap search.
 *
 * Best-first search over boards reachable by swapping two cells. Only
 * swaps that strictly lower the distance to the target are explored, so
 * a branch is at most (initial distance) swaps deep and the search always
 * terminates. Boards are deduplicated by content; a board is only
 * re-queued when a strictly shorter path to it turns up.
 *
 * The frontier is ordered by the lower bound pathLength + ceil(distance / 2)
 * (one swap fixes at most two cells), then by distance, then by path length,
 * then by the swaps themselves. The bound never drops by more than one per
 * swap, so the first target board popped carries a shortest path.
 */

import { createSearchConfig } from '../config/defaults';
import { applySwap, boardDistance, boardKey } from '../model/board';
import {
  Board,
  comparePaths,
  formatCell,
  SearchConfig,
  SearchStats,
  SearchStep,
  Swap,
  SwapSearchResult,
} from '../model/types';
import { createLogger } from '../utils/logger';
import { Frontier } from './frontier';
import { generateMoves } from './moves';

interface FrontierEntry {
  board: Board;
  key: string;
  path: Swap[];
  distance: number;
}

export interface SearchHooks {
  onEnqueue?: (step: SearchStep) => void;
}

const lowerBound = (entry: FrontierEntry): number => entry.path.length + Math.ceil(entry.distance / 2);

function compareEntries(a: FrontierEntry, b: FrontierEntry): number {
  return (
    lowerBound(a) - lowerBound(b) ||
    a.distance - b.distance ||
    a.path.length - b.path.length ||
    comparePaths(a.path, b.path)
  );
}

/**
 * Find the shortest sequence of swaps turning `start` into `target`.
 * Throws DimensionMismatchError when the boards differ in size; every
 * other outcome is reported through the result status.
 */
export function findSwaps(
  start: Board,
  target: Board,
  overrides: Partial<SearchConfig> = {},
  hooks: SearchHooks = {}
): SwapSearchResult {
  const config = createSearchConfig(overrides);
  const log = createLogger('SEARCH', config.debugLevel);
  const startTime = Date.now();

  const stats: SearchStats = {
    expanded: 0,
    generated: 0,
    pruned: 0,
    duplicates: 0,
    depthCutoffs: 0,
    singleMismatches: 0,
    timeMs: 0,
  };

  const finish = (path: Swap[] | null, incomplete = false): SwapSearchResult => {
    stats.timeMs = Date.now() - startTime;
    log.info(
      `Finished after ${stats.expanded} expansions: ${
        path ? `${path.length} swap(s)` : incomplete ? 'budget exhausted' : 'no path'
      }`
    );
    if (path) return { status: 'solved', path, stats };
    return { status: incomplete ? 'incomplete' : 'unsolvable', path: null, stats };
  };

  const startDistance = boardDistance(start, target);
  log.info(`Start distance ${startDistance}, max depth ${config.maxDepth}`);
  if (startDistance === 0) {
    return finish([]);
  }

  // Best known path to every board discovered so far
  const best = new Map<string, Swap[]>();
  const frontier = new Frontier<FrontierEntry>(compareEntries);

  const startKey = boardKey(start);
  best.set(startKey, []);
  frontier.push({ board: start, key: startKey, path: [], distance: startDistance });

  while (frontier.size > 0) {
    if (stats.expanded >= config.maxExpansions) {
      return finish(null, true);
    }

    const entry = frontier.pop();
    if (!entry) break;

    // Superseded by a shorter path found after this entry was queued
    const known = best.get(entry.key);
    if (known && known.length < entry.path.length) {
      continue;
    }

    if (entry.distance === 0) {
      return finish(entry.path);
    }

    stats.expanded++;
    const { moves, diagnostic } = generateMoves(entry.board, target);

    if (diagnostic === 'single_mismatch') {
      stats.singleMismatches++;
      log.debug(`Dead end at depth ${entry.path.length}: a single cell differs`);
      continue;
    }

    for (const swap of moves) {
      stats.generated++;
      const next = applySwap(entry.board, swap);
      const distance = boardDistance(next, target);

      if (distance >= entry.distance) {
        stats.pruned++;
        continue;
      }

      const path = [...entry.path, swap];
      if (path.length > config.maxDepth) {
        stats.depthCutoffs++;
        continue;
      }

      const key = boardKey(next);
      const previous = best.get(key);
      if (previous && previous.length <= path.length) {
        stats.duplicates++;
        continue;
      }

      best.set(key, path);
      frontier.push({ board: next, key, path, distance });
      hooks.onEnqueue?.({
        parent: entry.board,
        child: next,
        swap,
        parentDistance: entry.distance,
        childDistance: distance,
        depth: path.length,
      });
      log.debug(
        `Depth ${path.length}: swap ${formatCell(swap.a)}-${formatCell(swap.b)} -> distance ${distance}`
      );
    }
  }

  return finish(null);
}

/**
 * Shortest swap path, or null when none was found
 */
export function findSwapPath(
  start: Board,
  target: Board,
  overrides: Partial<SearchConfig> = {}
): Swap[] | null {
  return findSwaps(start, target, overrides).path;
}
