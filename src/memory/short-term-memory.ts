/**
 * Fixed-capacity ring buffer of recent turns.
 *
 * `add` is O(1): once full, the oldest turn is overwritten in place.
 * `turns()` always returns oldest first.
 */

import type { IntentCategory } from '../types/intent.js';
import type { Turn } from '../types/memory.js';

export class ShortTermMemory {
  private readonly slots: Array<Turn | undefined>;
  /** Position of the oldest turn */
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`ShortTermMemory capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<Turn | undefined>(capacity).fill(undefined);
  }

  /**
   * Append a turn.
   *
   * @returns The evicted turn, or null when there was room
   */
  add(turn: Turn): Turn | null {
    if (this.count < this.capacity) {
      this.slots[(this.head + this.count) % this.capacity] = turn;
      this.count++;
      return null;
    }
    const evicted = this.slots[this.head] ?? null;
    this.slots[this.head] = turn;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  turns(): Turn[] {
    const ordered: Turn[] = [];
    for (let i = 0; i < this.count; i++) {
      const turn = this.slots[(this.head + i) % this.capacity];
      if (turn) ordered.push(turn);
    }
    return ordered;
  }

  last(): Turn | null {
    if (this.count === 0) return null;
    return this.slots[(this.head + this.count - 1) % this.capacity] ?? null;
  }

  get size(): number {
    return this.count;
  }

  /** True iff the most recent turn's intent category equals the candidate. */
  isTopicContinuation(candidate: IntentCategory): boolean {
    return this.last()?.intent.category === candidate;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }
}
