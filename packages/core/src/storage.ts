// Asset Registry - Key-Value Storage
//
// Single-key get/set storage the registry state lives in. The host environment
// may back it with anything durable; MemoryKeyValueStore keeps it in-process.

export type StoredValue = string | number | boolean;

export interface KeyValueStore {
  get(key: string): StoredValue | undefined;
  set(key: string, value: StoredValue): void;
  delete(key: string): void;
  /** Live entries, in insertion order */
  entries(): IterableIterator<[string, StoredValue]>;
}

export class MemoryKeyValueStore implements KeyValueStore {
  private readonly data: Map<string, StoredValue>;

  constructor(initial?: Iterable<[string, StoredValue]>) {
    this.data = new Map(initial);
  }

  get(key: string): StoredValue | undefined {
    return this.data.get(key);
  }

  set(key: string, value: StoredValue): void {
    this.data.set(key, value);
  }

  delete(key: string): void {
    this.data.delete(key);
  }

  entries(): IterableIterator<[string, StoredValue]> {
    return this.data.entries();
  }

  get size(): number {
    return this.data.size;
  }
}
