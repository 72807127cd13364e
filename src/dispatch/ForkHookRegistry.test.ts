import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ForkHookRegistry, ForkAware } from "./ForkHookRegistry";
import { CallbackDispatcher } from "./CallbackDispatcher";
import { DispatcherState } from "./DispatcherState";
import { FatalDispatchError } from "./errors";
import { RecordingLogger, waitUntil, deferred } from "../testUtils";

function collector(name: string): { dispatcher: CallbackDispatcher<[string]>; sink: string[] } {
  const sink: string[] = [];
  const dispatcher = new CallbackDispatcher<[string]>(
    (value) => {
      if (value === "fatal") {
        throw new FatalDispatchError("gone");
      }
      sink.push(value);
    },
    { name, logger: new RecordingLogger(), onFatalError: () => {} }
  );
  return { dispatcher, sink };
}

describe("ForkHookRegistry", () => {
  it("should pause every registered dispatcher and resume them in the parent", async () => {
    const hooks = new ForkHookRegistry({ logger: new RecordingLogger() });
    const first = collector("first");
    const second = collector("second");
    hooks.register(first.dispatcher);
    hooks.register(second.dispatcher);

    first.dispatcher.call("a");
    second.dispatcher.call("b");
    await hooks.prepare();

    assert.equal(first.dispatcher.getState(), DispatcherState.PAUSED);
    assert.equal(second.dispatcher.getState(), DispatcherState.PAUSED);
    assert.equal(first.dispatcher.isWorkerAlive(), false);

    hooks.afterForkInParent();

    await waitUntil(() => first.sink.length === 1 && second.sink.length === 1);
    assert.deepEqual(first.sink, ["a"]);
    assert.deepEqual(second.sink, ["b"]);

    await Promise.all([first.dispatcher.shutdown(), second.dispatcher.shutdown()]);
  });

  it("should skip dispatchers that were not paused", async () => {
    const hooks = new ForkHookRegistry({ logger: new RecordingLogger() });
    const broken = collector("broken");
    hooks.register(broken.dispatcher);

    broken.dispatcher.call("fatal");
    await waitUntil(() => !broken.dispatcher.isWorkerAlive());

    await hooks.prepare();
    assert.equal(broken.dispatcher.getState(), DispatcherState.RUNNING);

    assert.doesNotThrow(() => hooks.afterForkInParent());
    assert.equal(broken.dispatcher.isWorkerAlive(), false);
  });

  it("should restart workers in the child", async () => {
    const hooks = new ForkHookRegistry({ logger: new RecordingLogger() });
    const paused = collector("paused");
    const broken = collector("broken");
    hooks.register(paused.dispatcher);
    hooks.register(broken.dispatcher);

    broken.dispatcher.call("fatal");
    broken.dispatcher.call("inherited");
    await waitUntil(() => !broken.dispatcher.isWorkerAlive());

    paused.dispatcher.call("kept");
    await hooks.prepare();

    hooks.afterForkInChild({ discardPending: true });
    broken.dispatcher.call("fresh");

    await waitUntil(() => paused.sink.length === 1 && broken.sink.length === 1);
    assert.deepEqual(paused.sink, ["kept"]);
    assert.deepEqual(broken.sink, ["fresh"]);

    await Promise.all([paused.dispatcher.shutdown(), broken.dispatcher.shutdown()]);
  });

  it("should reopen every child target even when an earlier one fails", async () => {
    const logger = new RecordingLogger();
    const hooks = new ForkHookRegistry({ logger });
    const gate = deferred();
    const started = deferred();
    const joining = new CallbackDispatcher<[]>(
      async () => {
        started.resolve();
        await gate.promise;
      },
      { name: "joining", logger: new RecordingLogger() }
    );
    const broken = collector("broken");
    hooks.register(joining);
    hooks.register(broken.dispatcher);

    joining.call();
    await started.promise;
    const pausing = joining.pauseBeforeForkInParent();

    broken.dispatcher.call("fatal");
    await waitUntil(() => !broken.dispatcher.isWorkerAlive());

    assert.throws(() => hooks.afterForkInChild(), { name: "InvalidStateError" });
    assert.equal(broken.dispatcher.isWorkerAlive(), true);
    assert.deepEqual(logger.messages("error"), ["failed to reopen joining: worker was not cleared: worker #1"]);

    broken.dispatcher.call("after");
    await waitUntil(() => broken.sink.length === 1);
    assert.deepEqual(broken.sink, ["after"]);

    gate.resolve();
    await pausing;
    await Promise.all([joining.shutdown(), broken.dispatcher.shutdown()]);
  });

  it("should try every target and rethrow the first resume failure", async () => {
    const logger = new RecordingLogger();
    const hooks = new ForkHookRegistry({ logger });
    const failing: ForkAware = {
      name: "failing",
      getState: () => DispatcherState.PAUSED,
      pauseBeforeForkInParent: async () => {},
      resumeAfterForkInParent: () => {
        throw new Error("cannot resume");
      },
      reopenAfterFork: () => {},
    };
    const healthy = collector("healthy");
    hooks.register(failing);
    hooks.register(healthy.dispatcher);

    await hooks.prepare();

    assert.throws(() => hooks.afterForkInParent(), { message: "cannot resume" });
    assert.equal(healthy.dispatcher.isRunning(), true);
    assert.deepEqual(logger.messages("error"), ["failed to resume failing: cannot resume"]);

    await healthy.dispatcher.shutdown();
  });

  it("should stop tracking unregistered targets", async () => {
    const hooks = new ForkHookRegistry({ logger: new RecordingLogger() });
    const target = collector("target");
    const unregister = hooks.register(target.dispatcher);
    assert.equal(hooks.size, 1);

    unregister();
    await hooks.prepare();

    assert.equal(hooks.size, 0);
    assert.equal(target.dispatcher.isRunning(), true);

    await target.dispatcher.shutdown();
  });
});
