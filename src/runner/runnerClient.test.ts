import * as path from "node:path";
import { beforeAll, describe, it, expect } from "vitest";
import { logger } from "../logger";
import { executeCode } from "./runnerClient";

// These fork real children through the tsx loader, so budgets leave room for startup.
describe("executeCode", () => {
  beforeAll(() => {
    logger.configure({ level: "silent" });
  });

  it("returns the child's trace result", async () => {
    const result = await executeCode("console.log(1 + 1);", { timeoutMs: 15000 });

    expect(result.stdout).toBe("2\n");
    expect(result.error).toBeNull();
    expect(result.timedOut).toBe(false);
    expect(result.trace.map((s) => s.event)).toEqual(["call", "line", "return"]);
  });

  it("passes the step ceiling to the child", async () => {
    const result = await executeCode("let i = 0;\nwhile (true) {\n  i++;\n}", { maxSteps: 20, timeoutMs: 15000 });

    expect(result.truncated).toBe(true);
    expect(result.error).toBe("Visualization limited to 20 steps");
    expect(result.trace).toHaveLength(20);
  });

  it("keeps the result when a guest promise is rejected without a handler", async () => {
    const code = ["async function boom() {", '  throw new Error("late");', "}", "boom();", 'console.log("ok");'].join("\n");
    const result = await executeCode(code, { timeoutMs: 15000 });

    expect(result.stdout).toBe("ok\n");
    expect(result.error?.split("\n")[0]).toBe("Uncaught (in promise) Error: late");
    expect(result.timedOut).toBe(false);
    expect(result.trace.map((s) => s.event)).toEqual(["call", "line", "line", "return"]);
  });

  it("kills a child that runs past the wall-clock budget", async () => {
    const result = await executeCode("while (true) {}", { timeoutMs: 1500 });

    expect(result).toEqual({
      stdout: "",
      trace: [],
      error: "Execution timed out",
      truncated: false,
      timedOut: true,
    });
  });

  it("reports a child that exits without replying", async () => {
    const entry = path.join(__dirname, "__fixtures__", "silent-exit.ts");
    const result = await executeCode("console.log(1);", { entry, timeoutMs: 15000 });

    expect(result).toEqual({
      stdout: "",
      trace: [],
      error: "No result produced",
      truncated: false,
      timedOut: false,
    });
  });

  it("reports a runner that cannot be started", async () => {
    const entry = path.join(__dirname, "__fixtures__", "missing-entry.js");
    const result = await executeCode("1;", { entry, timeoutMs: 15000 });

    expect(result.error).toBe("No result produced");
    expect(result.timedOut).toBe(false);
  });
});
