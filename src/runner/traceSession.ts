import { USER_FILENAME } from "../config";
import { formatValue, typeName } from "../trace/format";
import { HeapTable } from "../trace/heap";
import { snapshotScope } from "../trace/scope";
import { captureStack, type Frame } from "../trace/stack";
import type { Bindings, EventKind, Step } from "../trace/types";

export const MODULE_NAME = "<module>";

export class TraceLimitExceeded extends Error {
  constructor(readonly limit: number) {
    super(`Visualization limited to ${limit} steps`);
    this.name = "TraceLimitExceeded";
  }
}

// The hooks instrumented code calls through its tracer global. Method names here are emitted by instrument.ts.
export type TraceHooks = {
  enterModule(line: number, globals: Bindings): Frame;
  enter(name: string, line: number, bindings: Bindings): Frame;
  line(frame: Frame, line: number, bindings: Bindings): void;
  ret<T>(frame: Frame, value: T): T;
  raise(frame: Frame, error: unknown): void;
  exit(frame: Frame): void;
  check(): void;
};

type StepExtra = Pick<Step, "returnValue" | "exception">;

/**
 * State of one traced run: the frame chain, the recorded steps and the step
 * ceiling. Hooks run synchronously inside guest code.
 *
 * Once the ceiling is hit every hook throws `TraceLimitExceeded`, so a guest
 * `try/catch` cannot keep the program running untraced. Events raised while a
 * step is being recorded (a guest getter hit during the snapshot) are ignored.
 */
export class TraceSession {
  readonly steps: Step[] = [];

  private current: Frame | null = null;
  private moduleFrame: Frame | null = null;
  private declaredGlobals: Bindings = {};
  private halted = false;
  private recording = false;

  constructor(
    private readonly maxSteps: number,
    private readonly implicitGlobals: () => Bindings = () => ({})
  ) {}

  get isHalted(): boolean {
    return this.halted;
  }

  hooks(): TraceHooks {
    const hooks: TraceHooks = {
      enterModule: (line, globals) => this.enterModule(line, globals),
      enter: (name, line, bindings) => this.enter(name, line, bindings),
      line: (frame, line, bindings) => this.line(frame, line, bindings),
      ret: <T>(frame: Frame, value: T): T => this.ret(frame, value),
      raise: (frame, error) => this.raise(frame, error),
      exit: (frame) => this.exit(frame),
      check: () => this.check(),
    };
    return Object.freeze(hooks);
  }

  enterModule(line: number, globals: Bindings): Frame {
    this.declaredGlobals = globals;
    const frame = this.enter(MODULE_NAME, line, globals);
    this.moduleFrame = frame;
    return frame;
  }

  enter(name: string, line: number, bindings: Bindings): Frame {
    this.guard();
    const frame: Frame = { name, source: USER_FILENAME, line, bindings, parent: this.current };
    // a frame opened mid-snapshot is never linked in, so its exit() is a no-op
    if (this.recording) return frame;
    this.current = frame;
    this.record("call", frame);
    return frame;
  }

  line(frame: Frame, line: number, bindings: Bindings): void {
    this.guard();
    if (this.recording) return;
    frame.line = line;
    frame.bindings = bindings;
    this.record("line", frame);
  }

  ret<T>(frame: Frame, value: T): T {
    this.guard();
    if (!this.recording) this.record("return", frame, { returnValue: formatValue(value) });
    return value;
  }

  raise(frame: Frame, error: unknown): void {
    if (this.halted || this.recording || error instanceof TraceLimitExceeded) return;
    this.record("exception", frame, {
      exception: { type: typeName(error), value: formatValue(error) },
    });
  }

  exit(frame: Frame): void {
    if (this.current === frame) this.current = frame.parent;
  }

  // Emitted at the top of every guest catch block.
  check(): void {
    this.guard();
  }

  // Called by the runner once the program body has finished.
  finish(): void {
    if (this.moduleFrame) this.ret(this.moduleFrame, undefined);
  }

  fail(error: unknown): void {
    if (this.moduleFrame) this.raise(this.moduleFrame, error);
  }

  // Anything the guest left queued (promise callbacks) must not extend a finished trace.
  close(): void {
    this.halted = true;
    this.current = null;
  }

  private guard(): void {
    if (this.halted) throw new TraceLimitExceeded(this.maxSteps);
  }

  private globalBindings(): Bindings {
    return { ...this.implicitGlobals(), ...this.declaredGlobals };
  }

  private record(event: EventKind, frame: Frame, extra: StepExtra = {}): void {
    if (this.steps.length >= this.maxSteps) {
      this.halted = true;
      throw new TraceLimitExceeded(this.maxSteps);
    }

    this.recording = true;
    try {
      const heap = new HeapTable();
      const locals = snapshotScope(frame.bindings, heap);
      const globals = snapshotScope(this.globalBindings(), heap);
      const stack = captureStack(frame, heap);
      this.steps.push({
        event,
        line: frame.line,
        function: frame.name,
        locals,
        globals,
        stack,
        heap: heap.toJSON(),
        ...extra,
      });
    } finally {
      this.recording = false;
    }
  }
}
