import { SCOPE_LIMIT } from "../config";
import { typeName } from "./format";
import { serializeValue, type HeapTable } from "./heap";
import type { Bindings, Scope } from "./types";

export const BUILTINS_NAME = "__builtins__";

export function isVisibleName(name: string): boolean {
  if (name === BUILTINS_NAME) return false;
  return !(name.startsWith("__") && name.endsWith("__"));
}

/**
 * Snapshot one frame's bindings into `heap`. Names are sorted and capped;
 * a binding still in its temporal dead zone is left out.
 */
export function snapshotScope(bindings: Bindings, heap: HeapTable): Scope {
  const out: Scope = {};
  let count = 0;

  for (const name of Object.keys(bindings).filter(isVisibleName).sort()) {
    if (count >= SCOPE_LIMIT) break;

    let value: unknown;
    try {
      value = bindings[name]();
    } catch {
      continue;
    }

    try {
      out[name] = serializeValue(value, heap);
    } catch {
      const type = typeName(value);
      out[name] = { type, repr: `<unrenderable ${type}>` };
    }
    count++;
  }

  return out;
}
