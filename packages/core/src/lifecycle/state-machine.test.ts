import { describe, it, expect, vi } from "vitest";
import {
  SchedulerStateMachine,
  type StateTransitionEvent,
} from "./state-machine.js";
import { SchedulerStateError } from "../errors/catalog.js";

describe("SchedulerStateMachine", () => {
  it("starts in planned state", () => {
    const sm = new SchedulerStateMachine();
    expect(sm.getState()).toBe("planned");
  });

  it("transitions through planned → submitting → draining → done", () => {
    const sm = new SchedulerStateMachine();
    sm.transition("submitting");
    expect(sm.getState()).toBe("submitting");

    sm.transition("draining");
    expect(sm.getState()).toBe("draining");

    sm.transition("done");
    expect(sm.getState()).toBe("done");
  });

  it("rejects skipping a state", () => {
    const sm = new SchedulerStateMachine();
    expect(sm.canTransition("draining")).toBe(false);
    expect(() => sm.transition("draining")).toThrow(SchedulerStateError);
    expect(() => sm.transition("done")).toThrow(
      "Invalid state transition: planned -> done",
    );
    expect(sm.getState()).toBe("planned");
  });

  it("done is terminal", () => {
    const sm = new SchedulerStateMachine();
    sm.transition("submitting");
    sm.transition("draining");
    sm.transition("done");

    for (const state of ["planned", "submitting", "draining", "done"] as const) {
      expect(sm.canTransition(state)).toBe(false);
    }
  });

  it("notifies listeners with from, to and reason", () => {
    const sm = new SchedulerStateMachine();
    const events: StateTransitionEvent[] = [];
    sm.onStateChange((event) => events.push(event));

    sm.transition("submitting", "5 batches planned");

    expect(events).toHaveLength(1);
    expect(events[0].from).toBe("planned");
    expect(events[0].to).toBe("submitting");
    expect(events[0].reason).toBe("5 batches planned");
    expect(events[0].timestamp).toBeInstanceOf(Date);
  });

  it("stops notifying after unsubscribe", () => {
    const sm = new SchedulerStateMachine();
    const listener = vi.fn();
    const unsubscribe = sm.onStateChange(listener);

    sm.transition("submitting");
    unsubscribe();
    sm.transition("draining");

    expect(listener).toHaveBeenCalledTimes(1);
  });
});
