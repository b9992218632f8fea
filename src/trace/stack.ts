import { USER_FILENAME } from "../config";
import type { HeapTable } from "./heap";
import { snapshotScope } from "./scope";
import type { Bindings, StackFrame } from "./types";

export type Frame = {
  name: string;
  source: string;
  line: number;
  bindings: Bindings;
  parent: Frame | null;
};

// Outermost guest frame first. Frames from any other source are skipped.
export function captureStack(frame: Frame | null, heap: HeapTable): StackFrame[] {
  const stack: StackFrame[] = [];
  const seen = new Set<Frame>();

  for (let current = frame; current; current = current.parent) {
    if (seen.has(current)) break;
    seen.add(current);
    if (current.source !== USER_FILENAME) continue;
    stack.push({
      function: current.name,
      line: current.line,
      locals: snapshotScope(current.bindings, heap),
    });
  }

  return stack.reverse();
}
