import { StateJournal } from './StateJournal.js';

export class JournaledValue<T> {
  constructor(
    private readonly journal: StateJournal,
    private value: T,
  ) {}

  get(): T {
    return this.value;
  }

  set(value: T): void {
    const previous = this.value;
    this.value = value;
    this.journal.record(() => {
      this.value = previous;
    });
  }
}

export class JournaledSet<T> {
  private readonly items = new Set<T>();

  constructor(private readonly journal: StateJournal) {}

  get size(): number {
    return this.items.size;
  }

  has(item: T): boolean {
    return this.items.has(item);
  }

  /** @returns whether the item was inserted */
  add(item: T): boolean {
    if (this.items.has(item)) return false;
    this.items.add(item);
    this.journal.record(() => this.items.delete(item));
    return true;
  }

  /** @returns whether the item was present */
  delete(item: T): boolean {
    if (!this.items.delete(item)) return false;
    this.journal.record(() => this.items.add(item));
    return true;
  }

  values(): T[] {
    return [...this.items];
  }
}

export class JournaledMap<K, V> {
  private readonly entries = new Map<K, V>();

  constructor(private readonly journal: StateJournal) {}

  get size(): number {
    return this.entries.size;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  get(key: K): V | undefined {
    return this.entries.get(key);
  }

  set(key: K, value: V): void {
    this.journal.record(this.restorer(key));
    this.entries.set(key, value);
  }

  delete(key: K): boolean {
    if (!this.entries.has(key)) return false;
    this.journal.record(this.restorer(key));
    this.entries.delete(key);
    return true;
  }

  keys(): K[] {
    return [...this.entries.keys()];
  }

  private restorer(key: K): () => void {
    if (!this.entries.has(key)) return () => this.entries.delete(key);
    const previous = this.entries.get(key);
    return () => {
      if (previous !== undefined) this.entries.set(key, previous);
    };
  }
}
