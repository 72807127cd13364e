import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  DispatcherState,
  isTerminalDispatcherState,
  isValidDispatcherTransition,
  getAllowedDispatcherTransitions,
} from "./DispatcherState";

describe("DispatcherState", () => {
  describe("isTerminalDispatcherState", () => {
    it("should identify SHUTDOWN as terminal", () => {
      assert.equal(isTerminalDispatcherState(DispatcherState.SHUTDOWN), true);
    });

    it("should identify RUNNING and PAUSED as non-terminal", () => {
      assert.equal(isTerminalDispatcherState(DispatcherState.RUNNING), false);
      assert.equal(isTerminalDispatcherState(DispatcherState.PAUSED), false);
    });
  });

  describe("isValidDispatcherTransition", () => {
    it("should allow the RUNNING <-> PAUSED cycle", () => {
      assert.equal(isValidDispatcherTransition(DispatcherState.RUNNING, DispatcherState.PAUSED), true);
      assert.equal(isValidDispatcherTransition(DispatcherState.PAUSED, DispatcherState.RUNNING), true);
    });

    it("should allow RUNNING -> SHUTDOWN and PAUSED -> SHUTDOWN", () => {
      assert.equal(isValidDispatcherTransition(DispatcherState.RUNNING, DispatcherState.SHUTDOWN), true);
      assert.equal(isValidDispatcherTransition(DispatcherState.PAUSED, DispatcherState.SHUTDOWN), true);
    });

    it("should disallow self transitions", () => {
      assert.equal(isValidDispatcherTransition(DispatcherState.RUNNING, DispatcherState.RUNNING), false);
      assert.equal(isValidDispatcherTransition(DispatcherState.PAUSED, DispatcherState.PAUSED), false);
    });

    it("should disallow transitions from SHUTDOWN", () => {
      assert.equal(isValidDispatcherTransition(DispatcherState.SHUTDOWN, DispatcherState.RUNNING), false);
      assert.equal(isValidDispatcherTransition(DispatcherState.SHUTDOWN, DispatcherState.PAUSED), false);
    });
  });

  describe("getAllowedDispatcherTransitions", () => {
    it("should return correct transitions for RUNNING", () => {
      assert.deepEqual(getAllowedDispatcherTransitions(DispatcherState.RUNNING), [
        DispatcherState.PAUSED,
        DispatcherState.SHUTDOWN,
      ]);
    });

    it("should return correct transitions for PAUSED", () => {
      assert.deepEqual(getAllowedDispatcherTransitions(DispatcherState.PAUSED), [
        DispatcherState.RUNNING,
        DispatcherState.SHUTDOWN,
      ]);
    });

    it("should return empty array for SHUTDOWN", () => {
      assert.deepEqual(getAllowedDispatcherTransitions(DispatcherState.SHUTDOWN), []);
    });
  });
});
