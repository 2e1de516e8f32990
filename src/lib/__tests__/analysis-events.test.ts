import { describe, it, expect, vi } from "vitest";
import { AnalysisEventBus } from "../analysis-events";

describe("AnalysisEventBus", () => {
  it("delivers events to subscribers", () => {
    const bus = new AnalysisEventBus();
    const listener = vi.fn();

    bus.subscribe("run-1", listener);
    bus.emit({ type: "started", runId: "run-1", fileName: "auth.log" });

    expect(listener).toHaveBeenCalledWith({ type: "started", runId: "run-1", fileName: "auth.log" });
  });

  it("does not deliver events after unsubscribe", () => {
    const bus = new AnalysisEventBus();
    const listener = vi.fn();

    bus.subscribe("run-1", listener);
    bus.unsubscribe("run-1", listener);
    bus.emit({ type: "stage-completed", runId: "run-1", stage: "classification" });

    expect(listener).not.toHaveBeenCalled();
    expect(bus.listenerCount("run-1")).toBe(0);
  });

  it("isolates events by runId", () => {
    const bus = new AnalysisEventBus();
    const listener1 = vi.fn();
    const listener2 = vi.fn();

    bus.subscribe("run-1", listener1);
    bus.subscribe("run-2", listener2);
    bus.emit({ type: "stage-completed", runId: "run-1", stage: "summarization" });

    expect(listener1).toHaveBeenCalledTimes(1);
    expect(listener2).not.toHaveBeenCalled();
  });

  it("supports multiple subscribers for the same runId", () => {
    const bus = new AnalysisEventBus();
    const listenerA = vi.fn();
    const listenerB = vi.fn();

    bus.subscribe("run-1", listenerA);
    bus.subscribe("run-1", listenerB);
    bus.emit({ type: "stage-completed", runId: "run-1", stage: "anomalyDetection" });

    expect(listenerA).toHaveBeenCalledTimes(1);
    expect(listenerB).toHaveBeenCalledTimes(1);
  });

  it("does not throw for a run id named like the EventEmitter error event", () => {
    const bus = new AnalysisEventBus();

    expect(() =>
      bus.emit({
        type: "stage-unavailable",
        runId: "error",
        stage: "summarization",
        reason: "SummarizationUnavailable",
        message: "timed out",
      }),
    ).not.toThrow();
  });
});
