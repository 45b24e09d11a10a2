/**
 * Fixed-capacity reservoir implementing Algorithm R over a line stream
 */

import { Guarded } from "./guard.js";
import type {
  ReservoirEntry,
  ReservoirSnapshot,
  SnapshotSource,
} from "./types.js";
import {
  createRandomSource,
  type RandomSource,
} from "../../utils/seed-manager.js";
import { ConfigError } from "../../utils/errors.js";

export const DEFAULT_CAPACITY = 100;

interface ReservoirState {
  entries: ReservoirEntry[];
  seen: number;
}

export interface ReservoirOptions {
  capacity?: number;
  /** Injected randomness; defaults to an entropy-seeded generator */
  random?: RandomSource;
}

export class Reservoir implements SnapshotSource {
  readonly capacity: number;
  private readonly random: RandomSource;
  private readonly guard: Guarded<ReservoirState>;

  constructor(options: ReservoirOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_CAPACITY;
    if (!Number.isSafeInteger(capacity) || capacity < 1) {
      throw new ConfigError(
        `Reservoir capacity must be a positive integer, got ${capacity}`,
        { capacity },
      );
    }
    this.capacity = capacity;
    this.random = options.random ?? createRandomSource();
    this.guard = new Guarded<ReservoirState>({ entries: [], seen: 0 });
  }

  /**
   * Offer one record to the reservoir.
   * @returns whether the record was retained
   */
  admit(content: string): boolean {
    return this.guard.run((state) => {
      const sequenceIndex = state.seen;
      let kept = false;

      if (state.entries.length < this.capacity) {
        state.entries.push({ content, sequenceIndex });
        kept = true;
      } else if (this.random.next() < this.capacity / (state.seen + 1)) {
        const slot = Math.min(
          Math.floor(this.random.next() * this.capacity),
          this.capacity - 1,
        );
        // Replace the whole entry so content and index never disagree
        state.entries[slot] = { content, sequenceIndex };
        kept = true;
      }

      state.seen++;
      return kept;
    });
  }

  seenCount(): number {
    return this.guard.run((state) => state.seen);
  }

  /**
   * Point-in-time copy of the reservoir, sorted by sequence index.
   * Entries and `seen` are captured in the same critical section; sorting
   * happens after the guard is released.
   */
  snapshot(): ReservoirSnapshot {
    const { entries, seen } = this.guard.run((state) => ({
      entries: state.entries.map((entry) => ({ ...entry })),
      seen: state.seen,
    }));
    entries.sort((a, b) => a.sequenceIndex - b.sequenceIndex);
    return { entries, seen };
  }
}

export function createReservoir(options: ReservoirOptions = {}): Reservoir {
  return new Reservoir(options);
}
