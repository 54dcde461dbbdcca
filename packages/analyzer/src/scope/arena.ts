/**
 * Append-only storage keyed by sequential ids.
 *
 * Nothing is ever removed during a pass, so an id handed out by `insert`
 * stays valid for as long as the arena lives.
 */
export class Arena<K extends number, V> {
  private readonly items: V[] = [];

  constructor(private readonly brand: (n: number) => K) {}

  insert(item: V): K {
    const id = this.brand(this.items.length);
    this.items.push(item);
    return id;
  }

  get(id: K): V | undefined {
    return this.items[id];
  }

  get size(): number {
    return this.items.length;
  }

  values(): readonly V[] {
    return this.items;
  }
}
