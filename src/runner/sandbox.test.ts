import { describe, it, expect } from "vitest";
import { formatGuestError, runUserCode, withUnhandledRejections } from "./sandbox";

const run = (code: string, maxSteps = 200) => runUserCode(code, { maxSteps });

describe("runUserCode", () => {
  it("traces a straight-line program and captures its output", () => {
    const result = run("let x = 1;\nlet y = x + 1;\nconsole.log(y);");

    expect(result.stdout).toBe("2\n");
    expect(result.error).toBeNull();
    expect(result.truncated).toBe(false);
    expect(result.timedOut).toBe(false);
    expect(result.trace.map((s) => [s.event, s.line])).toEqual([
      ["call", 1],
      ["line", 1],
      ["line", 2],
      ["line", 3],
      ["return", 3],
    ]);

    const atPrint = result.trace[3];
    expect(atPrint.locals).toEqual({
      x: { type: "number", repr: "1", value: 1 },
      y: { type: "number", repr: "2", value: 2 },
    });
    expect(atPrint.globals).toEqual(atPrint.locals);
    expect(atPrint.stack).toEqual([{ function: "<module>", line: 3, locals: atPrint.locals }]);
    expect(result.trace[1].locals).toEqual({});
    expect(result.trace[4].returnValue).toBe("undefined");
  });

  it("records nested calls on the stack", () => {
    const code = ["function add(a, b) {", "  return a + b;", "}", "const total = add(2, 3);"].join("\n");
    const result = run(code);

    expect(result.trace.map((s) => `${s.event} ${s.function}`)).toEqual([
      "call <module>",
      "line <module>",
      "call add",
      "line add",
      "return add",
      "return <module>",
    ]);
    const inAdd = result.trace[3];
    expect(inAdd.line).toBe(2);
    expect(inAdd.locals).toEqual({
      a: { type: "number", repr: "2", value: 2 },
      b: { type: "number", repr: "3", value: 3 },
    });
    expect(inAdd.stack.map((f) => [f.function, f.line])).toEqual([
      ["<module>", 4],
      ["add", 2],
    ]);
    expect(result.trace[4].returnValue).toBe("5");
  });

  it("grows the stack with recursion", () => {
    const code = [
      "function fact(n) {",
      "  if (n <= 1) {",
      "    return 1;",
      "  }",
      "  return n * fact(n - 1);",
      "}",
      "console.log(fact(3));",
    ].join("\n");
    const result = run(code);

    expect(result.stdout).toBe("6\n");
    expect(Math.max(...result.trace.map((s) => s.stack.length))).toBe(4);
  });

  describe("heap", () => {
    it("resolves two names bound to one object to one id", () => {
      const result = run("const a = [1, 2];\nconst b = a;\nconsole.log(b.length);");
      const step = result.trace[3];

      expect(step.locals.a).toEqual({ type: "Array", repr: "[1, 2]", ref: "o1" });
      expect(step.locals.b).toEqual({ type: "Array", repr: "[1, 2]", ref: "o1" });
      expect(step.heap.o1).toMatchObject({ kind: "sequence", length: 2 });
    });

    it("handles an object that contains itself", () => {
      const result = run('const o = {};\no.self = o;\nconsole.log("ok");');
      const step = result.trace[3];

      expect(step.locals.o).toMatchObject({ ref: "o1" });
      expect(step.heap.o1.entries?.[0]).toMatchObject({ value: { ref: "o1" } });
    });

    it("reports implicit globals apart from declared locals", () => {
      const result = run("count = 3;\nconsole.log(count);");
      const step = result.trace[2];

      expect(step.locals).toEqual({});
      expect(step.globals).toEqual({ count: { type: "number", repr: "3", value: 3 } });
    });
  });

  describe("limits and errors", () => {
    it("stops at the step ceiling", () => {
      const result = run("let i = 0;\nwhile (true) {\n  i++;\n}", 10);

      expect(result.truncated).toBe(true);
      expect(result.timedOut).toBe(false);
      expect(result.error).toBe("Visualization limited to 10 steps");
      expect(result.trace).toHaveLength(10);
    });

    it("cannot be kept running by a guest catch", () => {
      const code = ["let n = 0;", "while (true) {", "  try {", "    n++;", "  } catch (e) {}", "}"].join("\n");
      const result = run(code, 5);

      expect(result.truncated).toBe(true);
      expect(result.trace).toHaveLength(5);
    });

    it("cannot be kept running by a catch inside a generator", () => {
      const code = [
        "function f() {",
        "  return 1;",
        "}",
        "function* g() {",
        "  while (true) {",
        "    try {",
        "      f();",
        "    } catch (e) {}",
        "  }",
        "}",
        "g().next();",
      ].join("\n");
      const result = run(code, 50);

      expect(result.truncated).toBe(true);
      expect(result.error).toBe("Visualization limited to 50 steps");
      expect(result.trace).toHaveLength(50);
    });

    it("records an error caught in the frame that raised it", () => {
      const code = [
        "function f() {",
        "  try {",
        '    throw new Error("x");',
        "  } catch (e) {",
        "    return 1;",
        "  }",
        "}",
        "f();",
      ].join("\n");
      const result = run(code);

      expect(result.error).toBeNull();
      expect(result.trace.map((s) => `${s.event} ${s.function} ${s.line}`)).toEqual([
        "call <module> 1",
        "line <module> 8",
        "call f 1",
        "line f 2",
        "line f 3",
        "exception f 3",
        "line f 5",
        "return f 5",
        "return <module> 8",
      ]);
      expect(result.trace[5].exception).toEqual({ type: "Error", value: "Error: x" });
    });

    it("keeps the partial trace when the program throws", () => {
      const result = run("let a = 1;\nlet b = null;\nconsole.log(a);\nb.x = 2;");

      expect(result.stdout).toBe("1\n");
      expect(result.truncated).toBe(false);
      expect(result.error?.split("\n")[0]).toBe("TypeError: Cannot set properties of null (setting 'x')");
      expect(result.error).toContain("at <user_code>:4");
      const last = result.trace[result.trace.length - 1];
      expect(last).toMatchObject({ event: "exception", function: "<module>", line: 4 });
      expect(last.exception?.type).toBe("TypeError");
    });

    it("reports a thrown non-error value", () => {
      const result = run("throw 42;");

      expect(result.error).toBe("Uncaught 42");
      expect(result.trace.map((s) => s.event)).toEqual(["call", "line", "exception"]);
      expect(result.trace[2].exception).toEqual({ type: "number", value: "42" });
    });

    it("reports syntax errors without a trace", () => {
      const result = run("let = ;");

      expect(result.error).toMatch(/^SyntaxError: /);
      expect(result.trace).toEqual([]);
      expect(result.stdout).toBe("");
    });
  });

  it("gives the same trace for the same program", () => {
    const code = [
      "const items = [{ id: 1 }, { id: 2 }];",
      "function total(list) {",
      "  let sum = 0;",
      "  for (const item of list) {",
      "    sum += item.id;",
      "  }",
      "  return sum;",
      "}",
      "console.log(total(items));",
    ].join("\n");

    expect(run(code)).toEqual(run(code));
  });

  it("lets the guest use names that look internal", () => {
    const result = run("var __frame__ = 1;\nvar _tracer = 2;\nconsole.log(__frame__ + _tracer);");

    expect(result.error).toBeNull();
    expect(result.stdout).toBe("3\n");
  });

  it("formats console arguments like the host console", () => {
    const result = run('console.log("a", 1, { b: 2 });\nconsole.error("oops");');
    expect(result.stdout).toBe("a 1 { b: 2 }\noops\n");
  });

  it("restores the host output streams", () => {
    const before = process.stdout.write;
    run('console.log("x");');
    expect(process.stdout.write).toBe(before);
  });
});

describe("formatGuestError", () => {
  it("renders non-errors as uncaught values", () => {
    expect(formatGuestError("boom")).toBe('Uncaught "boom"');
  });

  it("keeps only guest stack lines", () => {
    expect(formatGuestError(new RangeError("too far"))).toBe("RangeError: too far");
  });
});

describe("withUnhandledRejections", () => {
  const ok = { stdout: "ok\n", trace: [], error: null, truncated: false, timedOut: false };

  it("leaves a clean run alone", () => {
    expect(withUnhandledRejections(ok, [])).toBe(ok);
  });

  it("reports the first rejection of a successful run", () => {
    const result = withUnhandledRejections(ok, [new TypeError("late"), 2]);

    expect(result.error).toBe("Uncaught (in promise) TypeError: late");
    expect(result.stdout).toBe("ok\n");
    expect(withUnhandledRejections(ok, ["nope"]).error).toBe('Uncaught (in promise) "nope"');
  });

  it("keeps an earlier error", () => {
    const failed = { ...ok, error: "Visualization limited to 5 steps", truncated: true };
    expect(withUnhandledRejections(failed, [new Error("late")])).toBe(failed);
  });
});
