import * as fs from "node:fs";
import * as path from "node:path";

export type SampleProgram = {
  id: string;
  name: string;
  level: "simple" | "complex";
  description: string;
  code: string;
};

type SampleInfo = Omit<SampleProgram, "code">;

export const SAMPLES_DIR = path.join(__dirname, "..", "..", "samples");

const sampleInfo: SampleInfo[] = [
  {
    id: "hello",
    name: "Hello Message",
    level: "simple",
    description: "A minimal variable + console.log example.",
  },
  {
    id: "simple-object",
    name: "Simple Object References",
    level: "simple",
    description: "Object property writes and shared references.",
  },
  {
    id: "simple-array",
    name: "Simple Array References",
    level: "simple",
    description: "Array mutation through an object that holds it.",
  },
  {
    id: "doubly-linked-list",
    name: "Doubly Linked List",
    level: "complex",
    description: "Node insertion/removal with prev/next pointer updates.",
  },
  {
    id: "recursion",
    name: "Recursive Factorial",
    level: "complex",
    description: "A call stack that grows and unwinds.",
  },
];

// Sources are read from samples/<id>.js on each call so edits show up without a restart.
export function loadSamples(dir: string = SAMPLES_DIR): SampleProgram[] {
  return sampleInfo.map((info) => ({
    ...info,
    code: fs.readFileSync(path.join(dir, `${info.id}.js`), "utf8"),
  }));
}
