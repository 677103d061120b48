/**
 * Whole-document snapshots and a bounded undo history built on them.
 */

import type { Document } from './document';

export const DEFAULT_MAX_SNAPSHOTS = 10;

export function createSnapshot(source: Document): Document {
  return source.clone();
}

/**
 * Replaces `target`'s content with a copy of `snapshot`'s, in place, so
 * existing references to `target` see the restored state.
 */
export function restoreSnapshot(target: Document, snapshot: Document): void {
  target.clear();
  target.defaultSection.clear();

  const copy = snapshot.clone();
  for (const property of copy.defaultSection) {
    target.defaultSection.add(property);
  }
  target.defaultSection.preComments.addRange(copy.defaultSection.preComments);
  target.defaultSection.comment = copy.defaultSection.comment;
  for (const section of copy) {
    target.add(section);
  }
}

export class SnapshotHistory {
  /** Newest first. */
  private snapshots: Document[] = [];

  constructor(
    public readonly current: Document,
    private readonly maxSnapshots: number = DEFAULT_MAX_SNAPSHOTS
  ) {
    if (!Number.isInteger(maxSnapshots) || maxSnapshots < 1) {
      throw new RangeError('Max snapshots must be at least 1');
    }
  }

  get length(): number {
    return this.snapshots.length;
  }

  get canUndo(): boolean {
    return this.snapshots.length > 0;
  }

  take(): void {
    this.snapshots.unshift(createSnapshot(this.current));
    if (this.snapshots.length > this.maxSnapshots) {
      this.snapshots.length = this.maxSnapshots;
    }
  }

  /** Restores the newest snapshot; false when there is none. */
  undo(): boolean {
    const snapshot = this.snapshots.shift();
    if (snapshot === undefined) return false;
    restoreSnapshot(this.current, snapshot);
    return true;
  }

  clear(): void {
    this.snapshots = [];
  }
}
