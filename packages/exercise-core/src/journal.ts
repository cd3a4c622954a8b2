// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/journal`
 * Purpose: All-or-nothing state changes for exercise calls and the collaborators they touch.
 * Scope: Undo journal plus journaled map/value/list containers. Does not know about tokens or modules.
 * Invariants:
 * - Writes inside `atomic` record an undo entry; a thrown error unwinds the frame in reverse order and rethrows.
 * - A committed nested frame hands its undo entries to the parent frame, so an outer failure still unwinds it.
 * - Writes outside any frame are permanent.
 * Side-effects: none
 * Notes: Every structure sharing one Journal rolls back together; build one Journal per simulated chain.
 * @public
 */

type Undo = () => void;

export class Journal {
  private readonly frames: Undo[][] = [];

  get depth(): number {
    return this.frames.length;
  }

  /**
   * Run `fn` as one atomic unit. Returns its result or rethrows its error
   * after every journaled write made inside it has been reverted.
   */
  atomic<T>(fn: () => T): T {
    const frame: Undo[] = [];
    this.frames.push(frame);
    try {
      const result = fn();
      this.frames.pop();
      const parent = this.frames[this.frames.length - 1];
      if (parent) parent.push(...frame);
      return result;
    } catch (error) {
      this.frames.pop();
      for (let i = frame.length - 1; i >= 0; i--) {
        frame[i]?.();
      }
      throw error;
    }
  }

  record(undo: Undo): void {
    const frame = this.frames[this.frames.length - 1];
    if (frame) frame.push(undo);
  }
}

export class JournaledValue<T> {
  constructor(
    private readonly journal: Journal,
    private value: T
  ) {}

  get(): T {
    return this.value;
  }

  set(next: T): void {
    const previous = this.value;
    this.journal.record(() => {
      this.value = previous;
    });
    this.value = next;
  }
}

export class JournaledMap<K, V extends NonNullable<unknown>> {
  private readonly entries = new Map<K, V>();

  constructor(private readonly journal: Journal) {}

  get(key: K): V | undefined {
    return this.entries.get(key);
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  set(key: K, value: V): void {
    this.remember(key);
    this.entries.set(key, value);
  }

  delete(key: K): void {
    if (!this.entries.has(key)) return;
    this.remember(key);
    this.entries.delete(key);
  }

  keys(): K[] {
    return [...this.entries.keys()];
  }

  values(): V[] {
    return [...this.entries.values()];
  }

  private remember(key: K): void {
    const previous = this.entries.get(key);
    if (previous !== undefined) {
      this.journal.record(() => {
        this.entries.set(key, previous);
      });
    } else {
      this.journal.record(() => {
        this.entries.delete(key);
      });
    }
  }
}

export class JournaledList<T> {
  private readonly items: T[] = [];

  constructor(private readonly journal: Journal) {}

  get length(): number {
    return this.items.length;
  }

  at(index: number): T | undefined {
    return this.items[index];
  }

  push(item: T): void {
    this.items.push(item);
    this.journal.record(() => {
      this.items.pop();
    });
  }

  toArray(): readonly T[] {
    return [...this.items];
  }
}
