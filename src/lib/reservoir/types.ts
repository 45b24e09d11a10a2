/**
 * Reservoir module types
 */

export interface ReservoirEntry {
  content: string;
  /** 0-based position of the record in the input stream */
  sequenceIndex: number;
}

export interface ReservoirSnapshot {
  /** Sorted ascending by sequenceIndex */
  entries: ReservoirEntry[];
  /** Records seen at the instant the entries were copied */
  seen: number;
}

/**
 * Anything that can hand out snapshots; the exposure layer only needs this
 */
export interface SnapshotSource {
  snapshot(): ReservoirSnapshot;
}
