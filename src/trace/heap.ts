import { types } from "node:util";
import { MAX_REF_DEPTH, PREVIEW_WIDTH } from "../config";
import type { Descriptor, Heap, HeapEntry, MappingEntry, RefId, ScalarDescriptor } from "./types";
import {
  type Field,
  formatValue,
  isPlainObject,
  mapEntries,
  ownFields,
  setValues,
  typeName,
} from "./format";

export const TRUNCATION_MARKER: ScalarDescriptor = { type: "...", repr: "...", truncated: true };

/**
 * Per-step arena. Objects get ids in the order they are first met (`o1`, `o2`, ...),
 * so two names bound to the same object resolve to the same entry.
 */
export class HeapTable {
  private objIdMap = new WeakMap<object, RefId>();
  private objIdSeq = 1;
  private readonly entries: Heap = {};

  lookup(o: object): RefId | undefined {
    return this.objIdMap.get(o);
  }

  allocate(o: object, placeholder: HeapEntry): RefId {
    const id = `o${this.objIdSeq++}`;
    this.objIdMap.set(o, id);
    this.entries[id] = placeholder;
    return id;
  }

  toJSON(): Heap {
    return this.entries;
  }
}

function isComposite(value: unknown): value is object {
  return (typeof value === "object" && value !== null) || typeof value === "function";
}

function scalarDescriptor(value: unknown): ScalarDescriptor {
  const d: ScalarDescriptor = { type: typeName(value), repr: formatValue(value) };
  if (typeof value === "number" && Number.isFinite(value)) d.value = value;
  else if (typeof value === "bigint") d.value = Number(value);
  else if (typeof value === "boolean") d.value = value ? 1 : 0;
  else if (typeof value === "string") d.length = value.length;
  return d;
}

function fill(entry: HeapEntry, value: object, heap: HeapTable, depth: number) {
  const child = (v: unknown) => serializeValue(v, heap, depth + 1);

  if (types.isProxy(value) || typeof value === "function") return;

  if (Array.isArray(value) || types.isTypedArray(value)) {
    const items: ArrayLike<unknown> = value;
    entry.kind = "sequence";
    entry.length = items.length;
    entry.items = [];
    for (let i = 0; i < Math.min(items.length, PREVIEW_WIDTH); i++) entry.items.push(child(items[i]));
    if (items.length > PREVIEW_WIDTH) {
      entry.items.push(TRUNCATION_MARKER);
      entry.truncated = true;
    }
    return;
  }

  if (types.isSet(value)) {
    const sorted = setValues(value)
      .map((v) => ({ text: formatValue(v), v }))
      .sort((a, b) => (a.text < b.text ? -1 : a.text > b.text ? 1 : 0));
    entry.kind = "set";
    entry.length = sorted.length;
    entry.items = sorted.slice(0, PREVIEW_WIDTH).map(({ v }) => child(v));
    if (sorted.length > PREVIEW_WIDTH) {
      entry.items.push(TRUNCATION_MARKER);
      entry.truncated = true;
    }
    return;
  }

  if (types.isMap(value) || isPlainObject(value)) {
    const pairs: Array<[unknown, Field]> = types.isMap(value)
      ? mapEntries(value).map(([k, v]): [unknown, Field] => [k, { value: v }])
      : ownFields(value);
    entry.kind = "mapping";
    entry.length = pairs.length;
    const entries: MappingEntry[] = pairs
      .slice(0, PREVIEW_WIDTH)
      .map(([k, f]) => ({ key: child(k), value: fieldDescriptor(f, child) }));
    if (pairs.length > PREVIEW_WIDTH) {
      entries.push({ truncated: true });
      entry.truncated = true;
    }
    entry.entries = entries;
    return;
  }

  const fields = ownFields(value);
  if (fields.length === 0) return;
  entry.kind = "object";
  const attributes: Record<string, Descriptor> = {};
  for (const [name, f] of fields.slice(0, PREVIEW_WIDTH)) {
    attributes[name] = fieldDescriptor(f, child);
  }
  if (fields.length > PREVIEW_WIDTH) {
    attributes["..."] = TRUNCATION_MARKER;
    entry.truncated = true;
  }
  entry.attributes = attributes;
}

function fieldDescriptor(f: Field, child: (v: unknown) => Descriptor): Descriptor {
  return "value" in f ? child(f.value) : { type: "accessor", repr: f.accessor };
}

/**
 * Turn a value into a JSON-safe descriptor. Scalars are inline; composites are
 * registered in `heap` and referenced by id. The entry is registered before its
 * children are walked, so a structure that contains itself finds its own id.
 */
export function serializeValue(value: unknown, heap: HeapTable, depth = 0): Descriptor {
  if (depth >= MAX_REF_DEPTH) {
    return { type: typeName(value), repr: formatValue(value), truncated: true };
  }
  if (!isComposite(value)) return scalarDescriptor(value);

  const type = typeName(value);
  const repr = formatValue(value);
  const known = heap.lookup(value);
  if (known !== undefined) return { type, repr, ref: known };

  const entry: HeapEntry = { type, repr, kind: "opaque" };
  const ref = heap.allocate(value, entry);
  fill(entry, value, heap, depth);
  return { type, repr, ref };
}
