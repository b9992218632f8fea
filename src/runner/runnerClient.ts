import { fork, type ChildProcess } from "node:child_process";
import * as path from "node:path";
import { DEFAULT_LIMITS } from "../config";
import { logger } from "../logger";
import type { TraceResult } from "../trace/types";
import { isRunReply, type RunRequest, type RunnerOptions } from "./runnerTypes";

export type { RunnerOptions };

// runner.process.ts under tsx/vitest, runner.process.js once built
const DEFAULT_ENTRY = path.join(__dirname, `runner.process${path.extname(__filename)}`);

const STDERR_TAIL = 2048;

function timedOutResult(): TraceResult {
  return { stdout: "", trace: [], error: "Execution timed out", truncated: false, timedOut: true };
}

function noResult(): TraceResult {
  return { stdout: "", trace: [], error: "No result produced", truncated: false, timedOut: false };
}

function childExecArgv(entry: string, memoryMb: number): string[] {
  const argv = [`--max-old-space-size=${memoryMb}`];
  if (entry.endsWith(".ts")) argv.unshift("--import", "tsx");
  return argv;
}

/**
 * Run guest code in a fresh child process under a wall-clock budget.
 * Always resolves: timeouts and children that die silently become results.
 */
export function executeCode(code: string, opts: RunnerOptions = {}): Promise<TraceResult> {
  const maxSteps = opts.maxSteps ?? DEFAULT_LIMITS.maxSteps;
  const timeoutMs = opts.timeoutMs ?? DEFAULT_LIMITS.timeoutMs;
  const memoryMb = opts.memoryMb ?? DEFAULT_LIMITS.memoryMb;
  const entry = opts.entry ?? DEFAULT_ENTRY;

  return new Promise((resolve) => {
    const startedAt = Date.now();
    let settled = false;
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    let stderr = "";

    const finish = (result: TraceResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      logger.debug(`run finished in ${Date.now() - startedAt}ms (${result.trace.length} steps)`);
      resolve(result);
    };

    let child: ChildProcess;
    try {
      child = fork(entry, [], {
        execArgv: childExecArgv(entry, memoryMb),
        stdio: ["ignore", "ignore", "pipe", "ipc"],
        serialization: "json",
      });
    } catch (e) {
      logger.warn(`runner failed to start: ${e instanceof Error ? e.message : String(e)}`);
      finish(noResult());
      return;
    }
    logger.debug(`runner ${child.pid ?? "?"} started (${code.length} chars, ${maxSteps} steps max)`);

    child.stderr?.setEncoding("utf8");
    child.stderr?.on("data", (chunk: string) => {
      stderr = (stderr + chunk).slice(-STDERR_TAIL);
    });

    timer = setTimeout(() => {
      timedOut = true;
      logger.warn(`runner ${child.pid ?? "?"} exceeded ${timeoutMs}ms, killing`);
      child.kill("SIGKILL");
      // resolved from 'close' once the child is gone
    }, timeoutMs);

    child.on("message", (msg: unknown) => {
      if (timedOut) return;
      if (!isRunReply(msg)) {
        logger.warn(`runner ${child.pid ?? "?"} sent an unexpected message`);
        return;
      }
      finish(msg.result);
      if (child.exitCode === null && child.signalCode === null) child.kill("SIGKILL");
    });

    child.on("error", (err) => {
      logger.warn(`runner error: ${err.message}`);
      if (timedOut) return;
      clearTimeout(timer);
      finish(noResult());
    });

    child.on("close", (exitCode, signal) => {
      if (timedOut) {
        finish(timedOutResult());
        return;
      }
      if (!settled) {
        const detail = stderr.trim() ? `: ${stderr.trim().split("\n").slice(-1)[0]}` : "";
        logger.warn(`runner exited without a result (code ${exitCode}, signal ${signal})${detail}`);
      }
      finish(noResult());
    });

    const request: RunRequest = { type: "run", code, maxSteps };
    child.send(request, (err) => {
      if (err) logger.warn(`could not send code to runner: ${err.message}`);
    });
  });
}
