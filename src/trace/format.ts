import { types } from "node:util";
import { MAX_FORMAT_DEPTH, MAX_STRING_PREVIEW, PREVIEW_WIDTH, STRING_CUT } from "../config";

// Guest values come from another vm realm, so brand checks go through util.types, never instanceof.

export function isClassConstructor(fn: Function): boolean {
  return /^class\b/.test(Function.prototype.toString.call(fn));
}

function constructorName(o: object): string {
  const proto: unknown = Object.getPrototypeOf(o);
  if (proto === null || typeof proto !== "object") return "Object";
  const desc = Object.getOwnPropertyDescriptor(proto, "constructor");
  const ctor: unknown = desc?.value;
  if (typeof ctor === "function" && typeof ctor.name === "string" && ctor.name) return ctor.name;
  return "Object";
}

export function typeName(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "function") return isClassConstructor(value) ? "class" : "function";
  if (typeof value !== "object") return typeof value;
  try {
    return constructorName(value);
  } catch {
    return "object";
  }
}

export function isPlainObject(o: object): boolean {
  const proto: unknown = Object.getPrototypeOf(o);
  if (proto === null) return true;
  if (typeof proto !== "object") return false;
  return Object.getPrototypeOf(proto) === null && constructorName(o) === "Object";
}

export function functionName(fn: Function): string {
  const desc = Object.getOwnPropertyDescriptor(fn, "name");
  const name: unknown = desc?.value;
  return typeof name === "string" && name ? name : "(anonymous)";
}

export function formatString(s: string): string {
  const cut = s.length > MAX_STRING_PREVIEW ? `${s.slice(0, STRING_CUT)}...` : s;
  return JSON.stringify(cut);
}

export function formatNumber(n: number): string {
  return Object.is(n, -0) ? "-0" : String(n);
}

export type Field = { value: unknown } | { accessor: string };

// Own enumerable data properties; accessors are described, never invoked.
export function ownFields(o: object): Array<[string, Field]> {
  const out: Array<[string, Field]> = [];
  for (const key of Object.keys(o)) {
    const desc = Object.getOwnPropertyDescriptor(o, key);
    if (!desc) continue;
    if ("value" in desc) {
      out.push([key, { value: desc.value }]);
    } else {
      const kind = desc.get && desc.set ? "Getter/Setter" : desc.get ? "Getter" : "Setter";
      out.push([key, { accessor: `[${kind}]` }]);
    }
  }
  return out;
}

export function setValues(s: Set<unknown>): unknown[] {
  const out: unknown[] = [];
  s.forEach((v) => out.push(v));
  return out;
}

export function mapEntries(m: Map<unknown, unknown>): Array<[unknown, unknown]> {
  const out: Array<[unknown, unknown]> = [];
  m.forEach((v, k) => out.push([k, v]));
  return out;
}

function joinPreview(parts: string[], total: number): string {
  if (total > PREVIEW_WIDTH) parts.push("...");
  return parts.join(", ");
}

function formatFields(o: object, depth: number): string {
  const fields = ownFields(o);
  const parts = fields
    .slice(0, PREVIEW_WIDTH)
    .map(([k, f]) => `${k}: ${"value" in f ? formatValue(f.value, depth + 1) : f.accessor}`);
  return `{${joinPreview(parts, fields.length)}}`;
}

function formatInner(value: unknown, depth: number): string {
  if (depth > MAX_FORMAT_DEPTH) return "...";
  if (value === null) return "null";

  switch (typeof value) {
    case "undefined":
      return "undefined";
    case "boolean":
      return String(value);
    case "number":
      return formatNumber(value);
    case "bigint":
      return `${value}n`;
    case "string":
      return formatString(value);
    case "symbol":
      return value.toString();
    case "function":
      return isClassConstructor(value) ? `[class ${functionName(value)}]` : `[Function ${functionName(value)}]`;
  }

  if (typeof value !== "object") return String(value);
  if (types.isProxy(value)) return "Proxy {}";

  if (Array.isArray(value)) {
    const items: unknown[] = value;
    const parts: string[] = [];
    for (let i = 0; i < Math.min(items.length, PREVIEW_WIDTH); i++) parts.push(formatValue(items[i], depth + 1));
    return `[${joinPreview(parts, items.length)}]`;
  }
  if (types.isSet(value)) {
    const items = setValues(value);
    const parts = items.slice(0, PREVIEW_WIDTH).map((v) => formatValue(v, depth + 1));
    return `{${joinPreview(parts, items.length)}}`;
  }
  if (types.isMap(value)) {
    const entries = mapEntries(value);
    const parts = entries
      .slice(0, PREVIEW_WIDTH)
      .map(([k, v]) => `${formatValue(k, depth + 1)}: ${formatValue(v, depth + 1)}`);
    return `{${joinPreview(parts, entries.length)}}`;
  }
  if (types.isNativeError(value)) {
    return `${typeName(value)}: ${String(value.message)}`;
  }
  if (types.isDate(value)) {
    return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
  }
  if (types.isRegExp(value)) {
    return `/${value.source}/${value.flags}`;
  }
  if (isPlainObject(value)) return formatFields(value, depth);

  const fields = ownFields(value);
  const name = typeName(value);
  return fields.length === 0 ? `${name} {}` : `${name} ${formatFields(value, depth)}`;
}

/**
 * Short, depth-bounded rendering of any value. Never throws: a value whose
 * rendering fails comes back as `<unrepr TYPE>`.
 */
export function formatValue(value: unknown, depth = 0): string {
  try {
    return formatInner(value, depth);
  } catch {
    return `<unrepr ${typeName(value)}>`;
  }
}
