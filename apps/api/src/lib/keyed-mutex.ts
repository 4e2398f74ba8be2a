// =====================================================
// Keyed Mutex
// =====================================================
// Serializes async work per key within this process. Keys are hashed
// (32-bit FNV-1a) onto a fixed number of shards, each shard being a
// promise chain. Two keys on the same shard also wait for each other.

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export function fnv1a(input: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash >>> 0;
}

export class KeyedMutex {
  private readonly tails: Array<Promise<void>>;

  constructor(readonly shardCount: number) {
    if (!Number.isInteger(shardCount) || shardCount < 1) {
      throw new Error('KeyedMutex shardCount must be a positive integer');
    }
    this.tails = Array.from({ length: shardCount }, () => Promise.resolve());
  }

  shardOf(key: string): number {
    return fnv1a(key) % this.shardCount;
  }

  /**
   * Runs `work` once every earlier holder of the same shard has settled.
   * A rejection is returned to this caller only; the chain continues.
   */
  runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const shard = this.shardOf(key);
    const result = this.tails[shard].then(work);
    this.tails[shard] = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
