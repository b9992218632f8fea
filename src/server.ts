import * as fs from "node:fs";
import * as http from "node:http";
import * as path from "node:path";
import { z } from "zod";
import type { RunLimits } from "./config";
import { logger } from "./logger";
import { executeCode } from "./runner/runnerClient";
import { loadSamples, type SampleProgram } from "./samples/catalog";
import type { TraceResult } from "./trace/types";

export type Executor = (code: string) => Promise<TraceResult>;

export type ServerOptions = {
  limits?: Partial<RunLimits>;
  // replaces the child-process runner; tests pass a fake
  execute?: Executor;
  publicDir?: string;
  samples?: () => SampleProgram[];
};

export const MAX_BODY_BYTES = 256 * 1024;

const DEFAULT_PUBLIC_DIR = path.join(__dirname, "..", "public");

const runPayload = z.object({ code: z.string() });

const INVALID_PAYLOAD: TraceResult & { error: string } = {
  error: "Invalid code payload",
  trace: [],
  stdout: "",
  truncated: false,
  timedOut: false,
};

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const text = JSON.stringify(body);
  res.writeHead(status, {
    "Content-Type": "application/json; charset=utf-8",
    "Content-Length": Buffer.byteLength(text),
  });
  res.end(text);
}

// Oversized bodies are drained, then rejected, so the 413 can still be written.
function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size <= MAX_BODY_BYTES) chunks.push(chunk);
    });
    req.on("end", () => {
      if (size > MAX_BODY_BYTES) reject(new HttpError(413, "Payload too large"));
      else resolve(Buffer.concat(chunks).toString("utf8"));
    });
    req.on("error", reject);
  });
}

function parseRunPayload(body: string): string | null {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return null;
  }
  const parsed = runPayload.safeParse(json);
  return parsed.success ? parsed.data.code : null;
}

/**
 * HTTP front for the tracer: the landing page, `POST /api/run` and the
 * sample catalog. The server is returned unstarted.
 */
export function createServer(opts: ServerOptions = {}): http.Server {
  const execute: Executor = opts.execute ?? ((code) => executeCode(code, opts.limits));
  const publicDir = opts.publicDir ?? DEFAULT_PUBLIC_DIR;
  const samples = opts.samples ?? loadSamples;

  const routes: Record<string, (req: http.IncomingMessage, res: http.ServerResponse) => Promise<void>> = {
    "GET /": async (_req, res) => {
      const html = await fs.promises.readFile(path.join(publicDir, "index.html"));
      res.writeHead(200, { "Content-Type": "text/html; charset=utf-8", "Content-Length": html.length });
      res.end(html);
    },

    "POST /api/run": async (req, res) => {
      const code = parseRunPayload(await readBody(req));
      if (code === null) {
        sendJson(res, 400, INVALID_PAYLOAD);
        return;
      }
      const result = await execute(code);
      logger.verbose(
        `run: ${result.trace.length} steps${result.truncated ? " (truncated)" : ""}${result.timedOut ? " (timed out)" : ""}`
      );
      sendJson(res, 200, result);
    },

    "GET /api/samples": async (_req, res) => {
      sendJson(res, 200, samples());
    },
  };
  const knownPaths = new Set(Object.keys(routes).map((r) => r.slice(r.indexOf(" ") + 1)));

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    const method = req.method ?? "GET";
    const pathname = (req.url ?? "/").split("?")[0];
    try {
      const route = routes[`${method} ${pathname}`];
      if (route) {
        await route(req, res);
      } else if (knownPaths.has(pathname)) {
        sendJson(res, 405, { error: "Method not allowed" });
      } else {
        sendJson(res, 404, { error: "Not found" });
      }
    } catch (e) {
      if (e instanceof HttpError) {
        sendJson(res, e.status, { error: e.message });
        return;
      }
      logger.error(`${method} ${pathname} failed: ${e instanceof Error ? (e.stack ?? e.message) : String(e)}`);
      if (!res.headersSent) sendJson(res, 500, { error: "Internal error" });
      else res.end();
    }
  };

  return http.createServer((req, res) => {
    handle(req, res).catch((e: unknown) => {
      logger.error(`request handler crashed: ${String(e)}`);
    });
  });
}
