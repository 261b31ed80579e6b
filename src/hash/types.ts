// Capability shared by every streaming hash: feed bytes, read the result.
// finish() never mutates, so calling it twice without writes returns the same value.
export interface Hasher<T extends number | bigint> {
  write(bytes: Uint8Array): this;
  finish(): T;
  reset(): this;
}

export type HasherFactory<T extends number | bigint> = () => Hasher<T>;
