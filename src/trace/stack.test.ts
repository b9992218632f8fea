import { describe, it, expect } from "vitest";
import { USER_FILENAME } from "../config";
import { HeapTable } from "./heap";
import { captureStack, type Frame } from "./stack";

function frame(name: string, line: number, parent: Frame | null, source = USER_FILENAME): Frame {
  return { name, source, line, bindings: { depth: () => line }, parent };
}

describe("captureStack", () => {
  it("lists guest frames outermost first", () => {
    const outer = frame("<module>", 7, null);
    const host = frame("helper", 40, outer, "/srv/host.js");
    const inner = frame("visit", 3, host);

    const stack = captureStack(inner, new HeapTable());

    expect(stack).toEqual([
      { function: "<module>", line: 7, locals: { depth: { type: "number", repr: "7", value: 7 } } },
      { function: "visit", line: 3, locals: { depth: { type: "number", repr: "3", value: 3 } } },
    ]);
  });

  it("stops when a frame repeats", () => {
    const a = frame("a", 1, null);
    const b = frame("b", 2, a);
    a.parent = b;

    expect(captureStack(a, new HeapTable()).map((f) => f.function)).toEqual(["b", "a"]);
  });

  it("is empty without a frame", () => {
    expect(captureStack(null, new HeapTable())).toEqual([]);
  });
});
