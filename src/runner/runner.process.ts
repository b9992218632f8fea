// Child entry: one run request in, one result out, then exit.
import { isRunRequest, type RunReply } from "./runnerTypes";
import { runUserCode, withUnhandledRejections } from "./sandbox";

// Guest promises rejected with no handler would otherwise kill the child before it replies.
const rejections: unknown[] = [];
process.on("unhandledRejection", (reason: unknown) => {
  rejections.push(reason);
});

process.once("message", (msg: unknown) => {
  if (!isRunRequest(msg)) {
    process.exit(1);
    return;
  }

  const result = runUserCode(msg.code, { maxSteps: msg.maxSteps });

  // rejections from the run are reported once the microtask queue has drained
  setImmediate(() => {
    const reply: RunReply = { type: "result", result: withUnhandledRejections(result, rejections) };
    if (!process.send) {
      process.exit(1);
      return;
    }
    process.send(reply, undefined, {}, (err) => {
      // guest callbacks left on the event loop must not keep the child alive
      process.exit(err ? 1 : 0);
    });
  });
});
