export type RefId = string;
export type EventKind = "call" | "line" | "return" | "exception";

export type ScalarDescriptor = {
  type: string;
  repr: string;
  value?: number;
  length?: number;
  truncated?: true;
};

export type RefDescriptor = {
  type: string;
  repr: string;
  ref: RefId;
};

export type Descriptor = ScalarDescriptor | RefDescriptor;

export type HeapKind = "sequence" | "mapping" | "set" | "object" | "opaque";

export type MappingEntry =
  | { key: Descriptor; value: Descriptor }
  | { truncated: true };

export type HeapEntry = {
  type: string;
  repr: string;
  kind: HeapKind;
  length?: number;
  items?: Descriptor[];
  entries?: MappingEntry[];
  attributes?: Record<string, Descriptor>;
  truncated?: boolean;
};

export type Heap = Record<RefId, HeapEntry>;

export type Scope = Record<string, Descriptor>;

// name -> getter over the live binding; a getter may throw while the binding is uninitialized
export type Bindings = Record<string, () => unknown>;

export type StackFrame = {
  function: string;
  line: number;
  locals: Scope;
};

export type Step = {
  event: EventKind;
  line: number;
  function: string;
  locals: Scope;
  globals: Scope;
  stack: StackFrame[];
  heap: Heap;
  returnValue?: string;
  exception?: { type: string; value: string };
};

export type TraceResult = {
  stdout: string;
  trace: Step[];
  error: string | null;
  truncated: boolean;
  timedOut: boolean;
};
