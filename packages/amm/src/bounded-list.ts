/**
 * Fixed-capacity, append-only ordered list.
 *
 * Appending past capacity throws; nothing is ever dropped.
 */
export class BoundedList<T> {
  private readonly _items: T[] = [];

  constructor(
    public readonly capacity: number,
    private readonly _onOverflow: (capacity: number) => Error,
  ) {}

  get length(): number {
    return this._items.length;
  }

  isFull(): boolean {
    return this._items.length >= this.capacity;
  }

  append(item: T): void {
    if (this.isFull()) {
      throw this._onOverflow(this.capacity);
    }
    this._items.push(item);
  }

  toArray(): readonly T[] {
    return [...this._items];
  }
}
