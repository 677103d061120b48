/**
 * Insertion-ordered, case-insensitively keyed collection.
 *
 * Backs both Document (over sections) and Section (over properties).
 * A single Map is the only store: its iteration order is the element
 * order, so lookup and sequence can never disagree. Positional edits
 * rebuild the map.
 */

export interface Named {
  readonly name: string;
}

export function foldName(name: string): string {
  return name.toLowerCase();
}

export class NamedList<T extends Named> implements Iterable<T> {
  private entries = new Map<string, T>();
  private ordered: readonly T[] | null = null;

  get length(): number {
    return this.entries.size;
  }

  get(name: string): T | undefined {
    return this.entries.get(foldName(name));
  }

  has(name: string): boolean {
    return this.entries.has(foldName(name));
  }

  at(index: number): T | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.entries.size) return undefined;
    return this.toArray()[index];
  }

  indexOf(name: string): number {
    const key = foldName(name);
    let i = 0;
    for (const k of this.entries.keys()) {
      if (k === key) return i;
      i++;
    }
    return -1;
  }

  /** Appends; returns false when the name is already taken. */
  append(item: T): boolean {
    const key = foldName(item.name);
    if (this.entries.has(key)) return false;
    this.entries.set(key, item);
    this.ordered = null;
    return true;
  }

  /** Inserts at `index` (0..length); returns false when the name is taken. */
  insertAt(index: number, item: T): boolean {
    if (this.has(item.name)) return false;
    const list = [...this.toArray()];
    list.splice(index, 0, item);
    this.rebuild(list);
    return true;
  }

  /** Swaps in `item` for the element of the same name, keeping its position. */
  replace(item: T): boolean {
    const key = foldName(item.name);
    if (!this.entries.has(key)) return false;
    this.entries.set(key, item);
    this.ordered = null;
    return true;
  }

  delete(name: string): T | undefined {
    const key = foldName(name);
    const item = this.entries.get(key);
    if (item === undefined) return undefined;
    this.entries.delete(key);
    this.ordered = null;
    return item;
  }

  deleteAt(index: number): T | undefined {
    const item = this.at(index);
    if (item === undefined) return undefined;
    return this.delete(item.name);
  }

  move(fromIndex: number, toIndex: number): void {
    const list = [...this.toArray()];
    const [item] = list.splice(fromIndex, 1);
    list.splice(toIndex, 0, item);
    this.rebuild(list);
  }

  sort(compare: (a: T, b: T) => number): void {
    this.rebuild([...this.toArray()].sort(compare));
  }

  clear(): void {
    this.entries.clear();
    this.ordered = null;
  }

  toArray(): readonly T[] {
    if (this.ordered === null) {
      this.ordered = [...this.entries.values()];
    }
    return this.ordered;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.toArray()[Symbol.iterator]();
  }

  private rebuild(list: T[]): void {
    this.entries = new Map(list.map(item => [foldName(item.name), item] as const));
    this.ordered = null;
  }
}
