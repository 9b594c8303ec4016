/**
 * All-or-nothing execution over a set of in-memory stores.
 *
 * Each registered store is snapshotted before `fn` runs and restored if it
 * throws. Nested atomic() calls take their own snapshots, so an inner
 * failure caught by an outer caller only unwinds the inner work.
 */

export interface Snapshotable<S> {
  snapshot(): S;
  restore(snapshot: S): void;
}

export function isSnapshotable(value: object): value is Snapshotable<unknown> {
  return (
    "snapshot" in value &&
    typeof value.snapshot === "function" &&
    "restore" in value &&
    typeof value.restore === "function"
  );
}

export class Journal {
  private stores = new Set<Snapshotable<unknown>>();

  register(store: Snapshotable<unknown>): void {
    this.stores.add(store);
  }

  atomic<T>(fn: () => T): T {
    const frames = Array.from(this.stores, (store) => ({
      store,
      snapshot: store.snapshot(),
    }));

    try {
      return fn();
    } catch (err) {
      for (const { store, snapshot } of frames) {
        store.restore(snapshot);
      }
      throw err;
    }
  }
}
