import * as Babel from "@babel/standalone";
import type { NodePath, PluginObj, types as BabelTypes } from "@babel/core";
import { USER_FILENAME } from "../config";

type T = typeof BabelTypes;
type Scope = NodePath["scope"];

// Identifiers the rewritten code uses for itself, picked so they clash with no guest name.
export type InternalNames = {
  tracer: string;
  frame: string;
  error: string;
};

export type Instrumented = {
  code: string;
  // global the runner must bind the trace hooks to
  tracer: string;
};

// Names visible from `scope` up to and including the enclosing function (or program) scope.
function visibleNames(scope: Scope, internal: InternalNames): string[] {
  const names = new Set<string>();
  for (let s: Scope | undefined = scope; s; s = s.parent) {
    for (const [name, binding] of Object.entries(s.bindings)) {
      // "local" is a named function expression's own name
      if (binding.kind !== "local" && !isInternal(name, internal)) names.add(name);
    }
    if (s.path.isFunction() || s.path.isProgram()) break;
  }
  return [...names].sort();
}

function isInternal(name: string, internal: InternalNames): boolean {
  return name === internal.tracer || name === internal.frame || name === internal.error;
}

function paramNames(scope: Scope, internal: InternalNames): string[] {
  return Object.entries(scope.bindings)
    .filter(([name, binding]) => binding.kind === "param" && !isInternal(name, internal))
    .map(([name]) => name)
    .sort();
}

function inferFunctionName(t: T, path: NodePath<BabelTypes.Function>): string {
  const n = path.node;
  if ((t.isFunctionDeclaration(n) || t.isFunctionExpression(n)) && n.id) return n.id.name;
  if ((t.isClassMethod(n) || t.isObjectMethod(n)) && t.isIdentifier(n.key)) return n.key.name;
  if (t.isClassPrivateMethod(n)) return `#${n.key.id.name}`;

  const parent = path.parentPath;
  if (parent?.isVariableDeclarator() && t.isIdentifier(parent.node.id)) return parent.node.id.name;
  if (parent?.isAssignmentExpression() && t.isIdentifier(parent.node.left)) return parent.node.left.name;
  if (parent?.isObjectProperty() && t.isIdentifier(parent.node.key)) return parent.node.key.name;
  if (parent?.isClassProperty() && t.isIdentifier(parent.node.key)) return parent.node.key.name;
  return "anonymous";
}

// Only statements sitting directly in a statement list get a line hook.
function inStatementList(path: NodePath<BabelTypes.Statement>): boolean {
  const parent = path.parentPath;
  if (!parent) return false;
  if (path.listKey === "body") return parent.isProgram() || parent.isBlockStatement() || parent.isStaticBlock();
  if (path.listKey === "consequent") return parent.isSwitchCase();
  return false;
}

function tracePlugin(names: InternalNames) {
  return ({ types: t }: { types: T }): PluginObj => {
    // nodes emitted by this plugin; the visitor never instruments them
    const generated = new WeakSet<BabelTypes.Node>();
    // guest nodes already rewritten, in case a path is visited twice
    const done = new WeakSet<BabelTypes.Node>();
    // statements that got a line hook
    const hooked = new WeakSet<BabelTypes.Node>();
    const gen = <N extends BabelTypes.Node>(node: N): N => {
      generated.add(node);
      return node;
    };

    const hookCall = (method: string, args: BabelTypes.Expression[]) =>
      t.callExpression(t.memberExpression(t.identifier(names.tracer), t.identifier(method)), args);

    const frameRef = () => t.identifier(names.frame);
    const voidZero = () => t.unaryExpression("void", t.numericLiteral(0));

    // { x: () => x, ... } so the snapshot reads each binding live
    const bindingsObject = (list: string[]) =>
      t.objectExpression(
        list.map((name) =>
          t.objectProperty(t.stringLiteral(name), gen(t.arrowFunctionExpression([], t.identifier(name))))
        )
      );

    const declareFrame = (init: BabelTypes.Expression) =>
      gen(t.variableDeclaration("const", [t.variableDeclarator(frameRef(), init)]));

    const checkStatement = () => gen(t.expressionStatement(hookCall("check", [])));

    // Untraced bodies still get the guard, so they cannot swallow a halted session.
    const guardCatches = (path: NodePath<BabelTypes.Function>) => {
      path.traverse({
        CatchClause(inner) {
          const node = inner.node;
          if (generated.has(node) || done.has(node)) return;
          done.add(node);
          node.body.body.unshift(checkStatement());
        },
      });
    };

    // The catch parameter as a plain identifier; patterns are destructured inside the body.
    const catchBinding = (path: NodePath<BabelTypes.CatchClause>): BabelTypes.Identifier => {
      const node = path.node;
      if (t.isIdentifier(node.param)) return node.param;
      const id = path.scope.generateUidIdentifier("error");
      if (node.param) {
        node.body.body.unshift(t.variableDeclaration("let", [t.variableDeclarator(node.param, t.cloneNode(id))]));
      }
      node.param = id;
      return t.cloneNode(id);
    };

    return {
      name: "step-trace",
      visitor: {
        Program: {
          enter(path) {
            names.tracer = path.scope.generateUid("tracer");
            names.frame = path.scope.generateUid("frame");
            names.error = path.scope.generateUid("error");
          },
          exit(path) {
            const first = path.node.body.find((s) => s.loc);
            const line = first?.loc?.start.line ?? 1;
            path.unshiftContainer(
              "body",
              declareFrame(
                hookCall("enterModule", [t.numericLiteral(line), bindingsObject(visibleNames(path.scope, names))])
              )
            );
          },
        },

        Function: {
          enter(path) {
            const node = path.node;
            if (generated.has(node)) {
              path.skip();
              return;
            }
            if (node.async || node.generator) {
              guardCatches(path);
              path.skip();
              return;
            }
            if (t.isArrowFunctionExpression(node) && !t.isBlockStatement(node.body)) {
              const ret = t.returnStatement(node.body);
              ret.loc = node.body.loc;
              node.body = t.blockStatement([ret]);
            }
          },

          // const frame = enter(...); try { body; ret(undefined) } catch { raise; throw } finally { exit }
          exit(path) {
            const node = path.node;
            if (generated.has(node) || node.async || node.generator) return;
            const body = node.body;
            if (!t.isBlockStatement(body)) return;

            const line = node.loc?.start.line ?? 0;
            const enter = declareFrame(
              hookCall("enter", [
                t.stringLiteral(inferFunctionName(t, path)),
                t.numericLiteral(line),
                bindingsObject(paramNames(path.scope, names)),
              ])
            );
            const fallOff = gen(t.expressionStatement(hookCall("ret", [frameRef(), voidZero()])));
            const handler = gen(
              t.catchClause(
                t.identifier(names.error),
                t.blockStatement([
                  gen(t.expressionStatement(hookCall("raise", [frameRef(), t.identifier(names.error)]))),
                  gen(t.throwStatement(t.identifier(names.error))),
                ])
              )
            );
            const finalizer = t.blockStatement([gen(t.expressionStatement(hookCall("exit", [frameRef()])))]);
            const wrapped = gen(t.tryStatement(t.blockStatement([...body.body, fallOff]), handler, finalizer));

            node.body = t.blockStatement([enter, wrapped], body.directives);
          },
        },

        Statement(path) {
          const node = path.node;
          if (generated.has(node) || done.has(node) || !inStatementList(path)) return;
          if (path.isFunctionDeclaration() || path.isEmptyStatement() || path.isBlockStatement()) return;
          const line = node.loc?.start.line;
          if (line === undefined) return;
          done.add(node);

          // one line event per source line within a statement list
          const prev = path.getAllPrevSiblings().find((p) => hooked.has(p.node));
          if (prev?.node.loc?.start.line === line) return;
          hooked.add(node);

          // the parent's scope, so a `for (let i ...)` hook does not try to read its own `i`
          const scope = path.parentPath?.scope ?? path.scope;
          path.insertBefore(
            gen(
              t.expressionStatement(
                hookCall("line", [frameRef(), t.numericLiteral(line), bindingsObject(visibleNames(scope, names))])
              )
            )
          );
        },

        ReturnStatement(path) {
          const node = path.node;
          if (generated.has(node) || done.has(node)) return;
          done.add(node);
          node.argument = hookCall("ret", [frameRef(), node.argument ?? voidZero()]);
        },

        // A caught error is still an exception event in the frame that catches it.
        // The guard comes first: a halted session must not be swallowed by a guest catch.
        CatchClause(path) {
          const node = path.node;
          if (generated.has(node) || done.has(node)) return;
          done.add(node);
          const error = catchBinding(path);
          node.body.body.unshift(
            checkStatement(),
            gen(t.expressionStatement(hookCall("raise", [frameRef(), error])))
          );
        },

        // Single-statement bodies become blocks so their statements get line hooks.
        IfStatement(path) {
          const node = path.node;
          if (!t.isBlockStatement(node.consequent)) node.consequent = t.blockStatement([node.consequent]);
          // `else if` becomes `else { if }` so the inner test gets its own line event
          if (node.alternate && !t.isBlockStatement(node.alternate)) {
            node.alternate = t.blockStatement([node.alternate]);
          }
        },
        Loop(path) {
          const node = path.node;
          if (!t.isBlockStatement(node.body)) node.body = t.blockStatement([node.body]);
        },
        WithStatement(path) {
          const node = path.node;
          if (!t.isBlockStatement(node.body)) node.body = t.blockStatement([node.body]);
        },
      },
    };
  };
}

/**
 * Rewrite guest code so it reports call/line/return/exception events to the
 * global named by `tracer`. Lines are retained so runtime stack traces point
 * at the guest's own line numbers. Syntax errors are thrown.
 */
export function instrument(code: string): Instrumented {
  const names: InternalNames = { tracer: "", frame: "", error: "" };
  const out = Babel.transform(code, {
    ast: false,
    filename: USER_FILENAME,
    babelrc: false,
    configFile: false,
    highlightCode: false,
    sourceType: "script",
    parserOpts: {
      plugins: [
        "classProperties",
        "classPrivateProperties",
        "classPrivateMethods",
        "optionalChaining",
        "nullishCoalescingOperator",
      ],
    },
    plugins: [tracePlugin(names)],
    generatorOpts: { retainLines: true, compact: false, comments: true },
  });

  if (typeof out?.code !== "string") throw new Error("Instrumentation produced no output");
  return { code: out.code, tracer: names.tracer };
}
