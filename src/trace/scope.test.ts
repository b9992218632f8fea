import { describe, it, expect } from "vitest";
import { HeapTable } from "./heap";
import { snapshotScope } from "./scope";
import type { Bindings } from "./types";

describe("snapshotScope", () => {
  it("drops dunder names and the builtins binding", () => {
    const scope = snapshotScope(
      { __name__: () => "__main__", __builtins__: () => ({}), _private: () => 1 },
      new HeapTable()
    );
    expect(Object.keys(scope)).toEqual(["_private"]);
  });

  it("sorts names", () => {
    const scope = snapshotScope({ b: () => 2, a: () => 1 }, new HeapTable());
    expect(Object.keys(scope)).toEqual(["a", "b"]);
  });

  it("leaves out bindings that cannot be read yet", () => {
    const scope = snapshotScope(
      {
        ready: () => 1,
        pending: () => {
          throw new ReferenceError("Cannot access 'pending' before initialization");
        },
      },
      new HeapTable()
    );
    expect(scope).toEqual({ ready: { type: "number", repr: "1", value: 1 } });
  });

  it("keeps at most 24 names", () => {
    const bindings: Bindings = {};
    for (let i = 0; i < 30; i++) bindings[`v${String(i).padStart(2, "0")}`] = () => i;

    const names = Object.keys(snapshotScope(bindings, new HeapTable()));
    expect(names).toHaveLength(24);
    expect(names[0]).toBe("v00");
    expect(names[23]).toBe("v23");
  });

  it("serializes every binding into the shared heap", () => {
    const list = [1, 2];
    const heap = new HeapTable();
    const scope = snapshotScope({ a: () => list, b: () => list }, heap);

    expect(scope.a).toEqual({ type: "Array", repr: "[1, 2]", ref: "o1" });
    expect(scope.b).toEqual({ type: "Array", repr: "[1, 2]", ref: "o1" });
    expect(Object.keys(heap.toJSON())).toEqual(["o1"]);
  });
});
