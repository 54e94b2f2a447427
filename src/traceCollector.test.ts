import { type MockInstance, afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TraceCollector, preview } from "./traceCollector.js";

const startTrace = (collector: TraceCollector, traceId = "trace-1") =>
  collector.onTraceStart({
    traceId,
    name: "versonality-bench:task-a:swarm:critic",
    metadata: { run_id: "run-1", task_id: "task-a", arm: "swarm", agent_id: "critic" },
  });

const generationSpan = (traceId = "trace-1", error: unknown = null) => ({
  traceId,
  spanData: {
    type: "generation",
    model: "test-model",
    input: [{ role: "user", content: "Review it." }],
    output: [{ role: "assistant", content: "Looks fine." }],
  },
  error,
});

let log: MockInstance<typeof console.log>;

beforeEach(() => {
  log = vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("preview", () => {
  it("passes short strings through and serializes objects", () => {
    expect(preview("plain")).toBe("plain");
    expect(preview({ a: 1 })).toBe('{"a":1}');
    expect(preview(null)).toBeNull();
    expect(preview(undefined)).toBeNull();
  });

  it("truncates long text", () => {
    expect(preview("x".repeat(12), 10)).toBe(`${"x".repeat(10)}...(2 more chars)`);
  });
});

describe("TraceCollector", () => {
  it("logs one json line per model span of a run trace", async () => {
    const collector = new TraceCollector({ format: "json" });
    await startTrace(collector);
    await collector.onSpanEnd(generationSpan());

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(
      `[trace] model ${JSON.stringify({
        run_id: "run-1",
        task_id: "task-a",
        arm: "swarm",
        agent_id: "critic",
        type: "generation",
        model: "test-model",
        input: '[{"role":"user","content":"Review it."}]',
        output: '[{"role":"assistant","content":"Looks fine."}]',
        error: null,
      })}`,
    );
  });

  it("reads response spans and span errors", async () => {
    const collector = new TraceCollector();
    await startTrace(collector);
    await collector.onSpanEnd({
      traceId: "trace-1",
      spanData: { type: "response", _input: "Review it.", _response: { id: "resp-1" } },
      error: { message: "rate limited" },
    });

    expect(log).toHaveBeenCalledWith("[trace] model", {
      run_id: "run-1",
      task_id: "task-a",
      arm: "swarm",
      agent_id: "critic",
      type: "response",
      model: null,
      input: "Review it.",
      output: '{"id":"resp-1"}',
      error: '{"message":"rate limited"}',
    });
  });

  it("ignores other span types and unknown traces", async () => {
    const collector = new TraceCollector();
    await startTrace(collector);
    await collector.onSpanEnd({ traceId: "trace-1", spanData: { type: "agent", name: "swarm:critic" } });
    await collector.onSpanEnd(generationSpan("trace-2"));

    expect(log).not.toHaveBeenCalled();
  });

  it("ignores traces without run metadata", async () => {
    const collector = new TraceCollector();
    await collector.onTraceStart({ traceId: "judge", metadata: {} });
    await collector.onTraceStart({
      traceId: "bad-arm",
      metadata: { run_id: "run-1", task_id: "task-a", arm: "duo" },
    });
    await collector.onSpanEnd(generationSpan("judge"));
    await collector.onSpanEnd(generationSpan("bad-arm"));

    expect(log).not.toHaveBeenCalled();
  });

  it("stops logging a trace once it ends", async () => {
    const collector = new TraceCollector();
    await startTrace(collector);
    await collector.onTraceEnd({ traceId: "trace-1" });
    await collector.onSpanEnd(generationSpan());

    expect(log).not.toHaveBeenCalled();
  });

  it("falls back to the arm when no agent id is given", async () => {
    const collector = new TraceCollector({ format: "json" });
    await collector.onTraceStart({
      traceId: "trace-3",
      metadata: { run_id: "run-2", task_id: "task-b", arm: "monolith" },
    });
    await collector.onSpanEnd(generationSpan("trace-3"));

    expect(log).toHaveBeenCalledWith(
      `[trace] model ${JSON.stringify({
        run_id: "run-2",
        task_id: "task-b",
        arm: "monolith",
        agent_id: "monolith",
        type: "generation",
        model: "test-model",
        input: '[{"role":"user","content":"Review it."}]',
        output: '[{"role":"assistant","content":"Looks fine."}]',
        error: null,
      })}`,
    );
  });
});
