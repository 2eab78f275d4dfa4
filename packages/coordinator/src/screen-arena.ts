import { ScreenNotFoundError } from '@threadline/utils/errors';

interface ArenaEntry<T> {
  value: T;
  parent: number | null;
  children: number[];
}

/**
 * Arena of screens. Parents are referenced by index, so a child never holds
 * its parent and removal never leaves a dangling back-reference.
 * Freed slots are not reused; an index stays unique for the arena's life.
 */
export class ScreenArena<T> {
  private entries: Array<ArenaEntry<T> | undefined> = [];
  private live = 0;

  get size(): number {
    return this.live;
  }

  add(value: T, parent: number | null = null): number {
    if (parent !== null) {
      this.entry(parent);
    }
    const index = this.entries.length;
    this.entries.push({ value, parent, children: [] });
    if (parent !== null) {
      this.entry(parent).children.push(index);
    }
    this.live++;
    return index;
  }

  has(index: number): boolean {
    return this.entries[index] !== undefined;
  }

  get(index: number): T {
    return this.entry(index).value;
  }

  parentOf(index: number): number | null {
    return this.entry(index).parent;
  }

  childrenOf(index: number): number[] {
    return [...this.entry(index).children];
  }

  /** Index of the first live entry whose value satisfies the predicate */
  findIndex(predicate: (value: T) => boolean): number {
    return this.entries.findIndex((entry) => entry !== undefined && predicate(entry.value));
  }

  /**
   * Remove an entry and its whole subtree.
   * @returns removed values, children before their parent
   */
  remove(index: number): T[] {
    const target = this.entry(index);
    const removed: T[] = [];
    for (const child of [...target.children]) {
      removed.push(...this.remove(child));
    }
    if (target.parent !== null) {
      const parent = this.entries[target.parent];
      if (parent) {
        parent.children = parent.children.filter((c) => c !== index);
      }
    }
    this.entries[index] = undefined;
    this.live--;
    removed.push(target.value);
    return removed;
  }

  private entry(index: number): ArenaEntry<T> {
    const entry = Number.isInteger(index) ? this.entries[index] : undefined;
    if (!entry) {
      throw new ScreenNotFoundError(index);
    }
    return entry;
  }
}
