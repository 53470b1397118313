export interface LengthOf {
  readonly length: number;
}

export interface IndexedAccess<T> {
  /** Negative indices count from the end. Throws `OutOfBoundsError` outside the range. */
  at(index: number): T;
}

export interface KeyedLookup<K, V> {
  get(key: K): V | undefined;
  has(key: K): boolean;
}
