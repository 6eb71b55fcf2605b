import path from 'path';

export type CloneFn = (destination: string) => Promise<void>;

export interface CloneResult {
  path: string;
  /** True when the clone was started by an earlier caller. */
  cached: boolean;
}

/**
 * Maps `repository@revision` keys to local checkouts under a workspace
 * directory. The first caller for a key triggers the clone; everyone else,
 * including callers that arrive while it is still running, awaits the same
 * promise. Entries are never evicted, and a failed clone stays failed.
 */
export class CloneCache {
  private readonly entries = new Map<string, Promise<string>>();
  private counter = 0;

  constructor(private readonly workspace: string) {}

  /**
   * Return the checkout for `key`, running `clone` into a fresh
   * `clone-<n>` directory if nobody has requested this key before.
   */
  async acquire(key: string, clone: CloneFn): Promise<CloneResult> {
    const existing = this.entries.get(key);
    if (existing) {
      return {path: await existing, cached: true};
    }

    this.counter += 1;
    const destination = path.join(this.workspace, `clone-${this.counter}`);
    const pending = clone(destination).then(() => destination);
    this.entries.set(key, pending);

    return {path: await pending, cached: false};
  }

  /** Number of distinct clones started so far. */
  get size(): number {
    return this.entries.size;
  }
}
