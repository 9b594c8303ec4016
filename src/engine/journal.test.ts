import { describe, it, expect } from "vitest";
import { Journal, isSnapshotable, type Snapshotable } from "./journal.js";

class Counter implements Snapshotable<number> {
  value = 0;

  snapshot(): number {
    return this.value;
  }

  restore(snapshot: number): void {
    this.value = snapshot;
  }
}

describe("Journal", () => {
  it("returns the result and keeps changes on success", () => {
    const journal = new Journal();
    const counter = new Counter();
    journal.register(counter);

    const result = journal.atomic(() => {
      counter.value += 5;
      return "done";
    });

    expect(result).toBe("done");
    expect(counter.value).toBe(5);
  });

  it("restores every store and rethrows on failure", () => {
    const journal = new Journal();
    const a = new Counter();
    const b = new Counter();
    journal.register(a);
    journal.register(b);
    a.value = 1;

    expect(() =>
      journal.atomic(() => {
        a.value = 10;
        b.value = 20;
        throw new Error("boom");
      })
    ).toThrow("boom");

    expect(a.value).toBe(1);
    expect(b.value).toBe(0);
  });

  it("unwinds only the inner frame when the outer caller recovers", () => {
    const journal = new Journal();
    const counter = new Counter();
    journal.register(counter);

    journal.atomic(() => {
      counter.value = 1;
      try {
        journal.atomic(() => {
          counter.value = 2;
          throw new Error("inner");
        });
      } catch (err) {
        expect((err as Error).message).toBe("inner");
      }
      counter.value += 10;
    });

    expect(counter.value).toBe(11);
  });

  it("registers a store only once", () => {
    const journal = new Journal();
    const counter = new Counter();
    journal.register(counter);
    journal.register(counter);
    counter.value = 3;

    expect(() =>
      journal.atomic(() => {
        counter.value = 4;
        throw new Error("x");
      })
    ).toThrow("x");
    expect(counter.value).toBe(3);
  });
});

describe("isSnapshotable", () => {
  it("recognizes stores by their snapshot and restore methods", () => {
    expect(isSnapshotable(new Counter())).toBe(true);
    expect(isSnapshotable({ snapshot: () => 1 })).toBe(false);
    expect(isSnapshotable({ snapshot: 1, restore: 2 })).toBe(false);
  });
});
