/**
 * Slot ordering for the word fill search.
 * MRV (Minimum Remaining Values): fill the slot with the fewest candidate words first.
 */

import { FillBoard, Slot } from '../model/types';
import { constraintMatches, openSlots } from './constraints';

export interface SlotChoice {
  slot: Slot;
  candidates: string[];
}

/**
 * Words from the list that fit the slot's length and fixed letters
 */
export function candidateWords(slot: Slot, wordlist: readonly string[]): string[] {
  return wordlist.filter(word => constraintMatches(slot.constraint, word));
}

/**
 * Choose the next slot to fill, or null when the board is complete.
 * A slot with no candidates is returned immediately so the caller can backtrack.
 */
export function selectNextSlot(board: FillBoard, wordlist: readonly string[]): SlotChoice | null {
  let best: SlotChoice | null = null;

  for (const slot of openSlots(board)) {
    const candidates = candidateWords(slot, wordlist);
    if (candidates.length === 0) {
      return { slot, candidates };
    }
    if (!best || candidates.length < best.candidates.length) {
      best = { slot, candidates };
    }
  }

  return best;
}

/**
 * Trim, lowercase and deduplicate a raw wordlist, keeping first-seen order
 */
export function normalizeWordlist(words: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const raw of words) {
    const word = raw.trim().toLowerCase();
    if (word) seen.add(word);
  }
  return [...seen];
}
