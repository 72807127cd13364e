import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  parseDispatcherConfig,
  loadDispatcherConfigFromEnv,
  createDispatcher,
  DispatcherConfigError,
} from "./DispatcherConfig";
import { DispatcherState } from "../dispatch/DispatcherState";
import { RecordingLogger, waitUntil } from "../testUtils";

describe("parseDispatcherConfig", () => {
  it("should apply defaults", () => {
    assert.deepEqual(parseDispatcherConfig(), {
      name: "CallbackDispatcher",
      shutdownTimeoutMs: 5000,
      logLevel: "info",
      maxEventHistory: 0,
    });
  });

  it("should keep provided values", () => {
    const config = parseDispatcherConfig({ name: "watcher", shutdownTimeoutMs: 250, logLevel: "debug" });

    assert.equal(config.name, "watcher");
    assert.equal(config.shutdownTimeoutMs, 250);
    assert.equal(config.logLevel, "debug");
  });

  it("should report every invalid field", () => {
    assert.throws(
      () => parseDispatcherConfig({ shutdownTimeoutMs: -1, logLevel: "verbose" }),
      (err: unknown) => {
        assert.ok(err instanceof DispatcherConfigError);
        assert.equal(err.issues.length, 2);
        assert.match(err.issues[0], /^shutdownTimeoutMs: /);
        assert.match(err.issues[1], /^logLevel: /);
        return true;
      }
    );
  });
});

describe("loadDispatcherConfigFromEnv", () => {
  it("should read CALLBACK_DISPATCHER_* variables", () => {
    const config = loadDispatcherConfigFromEnv({
      CALLBACK_DISPATCHER_NAME: "events",
      CALLBACK_DISPATCHER_SHUTDOWN_TIMEOUT_MS: "1500",
      CALLBACK_DISPATCHER_LOG_LEVEL: " WARN ",
      CALLBACK_DISPATCHER_MAX_EVENT_HISTORY: "50",
    });

    assert.deepEqual(config, {
      name: "events",
      shutdownTimeoutMs: 1500,
      logLevel: "warn",
      maxEventHistory: 50,
    });
  });

  it("should fall back to defaults for unset or empty variables", () => {
    const config = loadDispatcherConfigFromEnv({ CALLBACK_DISPATCHER_SHUTDOWN_TIMEOUT_MS: "" });

    assert.equal(config.shutdownTimeoutMs, 5000);
    assert.equal(config.name, "CallbackDispatcher");
  });

  it("should reject non-numeric timeouts", () => {
    assert.throws(
      () => loadDispatcherConfigFromEnv({ CALLBACK_DISPATCHER_SHUTDOWN_TIMEOUT_MS: "soon" }),
      DispatcherConfigError
    );
  });
});

describe("createDispatcher", () => {
  it("should wire the dispatcher, its events and its config", async () => {
    const sink: number[] = [];
    const { dispatcher, events, config } = createDispatcher<[number]>(
      (value) => {
        sink.push(value);
      },
      { name: "wired", maxEventHistory: 10 },
      { logger: new RecordingLogger() }
    );

    dispatcher.call(7);
    await waitUntil(() => sink.length === 1);
    await dispatcher.shutdown();

    assert.equal(dispatcher.name, "wired");
    assert.equal(config.shutdownTimeoutMs, 5000);
    assert.equal(dispatcher.getState(), DispatcherState.SHUTDOWN);
    assert.deepEqual(
      events.getHistory().map((event) => event.type),
      ["worker.started", "state.changed", "worker.exited"]
    );
  });
});
