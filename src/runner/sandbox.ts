import * as util from "node:util";
import * as vm from "node:vm";
import { USER_FILENAME } from "../config";
import { formatValue, typeName } from "../trace/format";
import type { Bindings, TraceResult } from "../trace/types";
import { instrument } from "./instrument";
import { TraceSession } from "./traceSession";

type Sink = (text: string) => void;

const CONSOLE_METHODS = ["log", "info", "debug", "warn", "error", "trace"] as const;

function createConsole(sink: Sink): Record<(typeof CONSOLE_METHODS)[number], (...args: unknown[]) => void> {
  const write = (...args: unknown[]) => sink(`${util.format(...args)}\n`);
  return { log: write, info: write, debug: write, warn: write, error: write, trace: write };
}

function chunkText(chunk: string | Uint8Array): string {
  return typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf8");
}

// Host writes to stdout/stderr land in the same buffer while `fn` runs.
export function withCapturedOutput<R>(sink: Sink, fn: () => R): R {
  const oldOut = process.stdout.write;
  const oldErr = process.stderr.write;
  const capture = (chunk: string | Uint8Array, ...rest: unknown[]): boolean => {
    sink(chunkText(chunk));
    const cb = rest.find((r) => typeof r === "function");
    if (typeof cb === "function") cb();
    return true;
  };
  process.stdout.write = capture;
  process.stderr.write = capture;
  try {
    return fn();
  } finally {
    process.stdout.write = oldOut;
    process.stderr.write = oldErr;
  }
}

const USER_FRAME = new RegExp(`(${USER_FILENAME.replace(/[<>]/g, "\\$&")}:\\d+):\\d+`, "g");

/**
 * `Name: message`, then the guest's own stack lines with columns dropped.
 * Errors raised while parsing keep only the first line of their message.
 */
export function formatGuestError(error: unknown): string {
  try {
    if (!util.types.isNativeError(error)) return `Uncaught ${formatValue(error)}`;
    const message = String(error.message).split("\n")[0];
    const frames = String(error.stack ?? "")
      .split("\n")
      .filter((l) => l.trimStart().startsWith("at ") && l.includes(USER_FILENAME))
      .map((l) => `    ${l.trim().replace(USER_FRAME, "$1")}`);
    return [`${typeName(error)}: ${message}`, ...frames].join("\n");
  } catch {
    return `Uncaught ${typeName(error)}`;
  }
}

/**
 * Rejections nobody handled only surface after the run returns. The first one
 * becomes the run's error unless the run already failed.
 */
export function withUnhandledRejections(result: TraceResult, reasons: unknown[]): TraceResult {
  if (reasons.length === 0 || result.error !== null) return result;
  const reason = reasons[0];
  const text = util.types.isNativeError(reason) ? formatGuestError(reason) : formatValue(reason);
  return { ...result, error: `Uncaught (in promise) ${text}` };
}

function implicitGlobals(sandbox: Record<string, unknown>): Bindings {
  const out: Bindings = {};
  for (const key of Object.keys(sandbox)) {
    const desc = Object.getOwnPropertyDescriptor(sandbox, key);
    if (desc && "value" in desc) out[key] = () => sandbox[key];
  }
  return out;
}

/**
 * Instrument and run one guest program in a fresh vm context, recording at
 * most `maxSteps` steps. Never throws: every outcome is a TraceResult.
 */
export function runUserCode(code: string, { maxSteps }: { maxSteps: number }): TraceResult {
  let stdout = "";
  const sink: Sink = (text) => {
    stdout += text;
  };

  const sandbox: Record<string, unknown> = { __name__: "__main__" };
  const session = new TraceSession(maxSteps, () => implicitGlobals(sandbox));
  Object.defineProperty(sandbox, "console", { value: createConsole(sink), enumerable: false });
  const context = vm.createContext(sandbox);

  let error: string | null = null;
  let truncated = false;

  withCapturedOutput(sink, () => {
    try {
      const compiled = instrument(code);
      Object.defineProperty(sandbox, compiled.tracer, { value: session.hooks(), enumerable: false });
      try {
        vm.runInContext(compiled.code, context, { filename: USER_FILENAME });
        session.finish();
      } catch (e) {
        session.fail(e);
        throw e;
      }
    } catch (e) {
      // once halted, whatever the guest threw on the way out is the step limit unwinding
      if (session.isHalted) {
        truncated = true;
        error = `Visualization limited to ${maxSteps} steps`;
      } else {
        error = formatGuestError(e);
      }
    } finally {
      session.close();
    }
  });

  return { stdout, trace: session.steps, error, truncated, timedOut: false };
}
