/**
 * Open connections, in the order their handshakes completed.
 *
 * Backed by a Set: deleting an entry while a `for...of` over the registry is in
 * progress is allowed, and entries not yet visited are still visited.
 */
export class ClientRegistry<T> implements Iterable<T> {
  private _entries = new Set<T>();

  get size(): number {
    return this._entries.size;
  }

  add(entry: T): void {
    this._entries.add(entry);
  }

  delete(entry: T): boolean {
    return this._entries.delete(entry);
  }

  has(entry: T): boolean {
    return this._entries.has(entry);
  }

  /**
   * Copy of the current entries, unaffected by later adds.
   */
  snapshot(): T[] {
    return [...this._entries];
  }

  clear(): void {
    this._entries.clear();
  }

  [Symbol.iterator](): Iterator<T> {
    return this._entries.values();
  }
}
