import type { TracingProcessor } from "@openai/agents";
import { getRecordProp, getStringProp } from "./records.js";
import { armSchema } from "./schemas.js";
import type { Arm } from "./types.js";

type TraceContext = {
  runId: string;
  taskId: string;
  arm: Arm;
  agentId: string;
};

export type TraceCollectorOptions = {
  format?: "json" | "pretty";
  previewLimit?: number;
};

const modelSpanTypes = new Set(["generation", "response"]);

export const preview = (value: unknown, limit = 2000): string | null => {
  if (value === undefined || value === null) {
    return null;
  }
  let text: string;
  if (typeof value === "string") {
    text = value;
  } else {
    try {
      text = JSON.stringify(value);
    } catch {
      text = String(value);
    }
  }
  return text.length <= limit
    ? text
    : `${text.slice(0, limit)}...(${text.length - limit} more chars)`;
};

const traceIdOf = (value: unknown): string | undefined =>
  getStringProp(value, "traceId") ?? getStringProp(value, "trace_id");

// Only traces that carry run metadata are logged; grading calls carry none.
export class TraceCollector implements TracingProcessor {
  private traces = new Map<string, TraceContext>();

  constructor(private readonly options: TraceCollectorOptions = {}) {}

  async onTraceStart(trace: unknown): Promise<void> {
    const traceId = traceIdOf(trace);
    const metadata = getRecordProp(trace, "metadata");
    const runId = getStringProp(metadata, "run_id");
    const taskId = getStringProp(metadata, "task_id");
    const arm = armSchema.safeParse(getRecordProp(metadata, "arm"));
    if (!traceId || !runId || !taskId || !arm.success) {
      return;
    }
    this.traces.set(traceId, {
      runId,
      taskId,
      arm: arm.data,
      agentId: getStringProp(metadata, "agent_id") ?? arm.data,
    });
  }

  async onTraceEnd(trace: unknown): Promise<void> {
    const traceId = traceIdOf(trace);
    if (traceId) {
      this.traces.delete(traceId);
    }
  }

  async onSpanStart(_span: unknown): Promise<void> {}

  async onSpanEnd(span: unknown): Promise<void> {
    const traceId = traceIdOf(span);
    const context = traceId ? this.traces.get(traceId) : undefined;
    const spanData = getRecordProp(span, "spanData") ?? getRecordProp(span, "data");
    const type = getStringProp(spanData, "type");
    if (!context || !type || !modelSpanTypes.has(type)) {
      return;
    }

    const limit = this.options.previewLimit;
    // Response spans keep their payloads under underscored keys.
    const input = getRecordProp(spanData, "input") ?? getRecordProp(spanData, "_input");
    const output =
      getRecordProp(spanData, "output") ?? getRecordProp(spanData, "_response");
    this.log({
      run_id: context.runId,
      task_id: context.taskId,
      arm: context.arm,
      agent_id: context.agentId,
      type,
      model: getStringProp(spanData, "model") ?? null,
      input: preview(input, limit),
      output: preview(output, limit),
      error: preview(getRecordProp(span, "error"), limit),
    });
  }

  private log(payload: Record<string, unknown>): void {
    if (this.options.format === "json") {
      console.log(`[trace] model ${JSON.stringify(payload)}`);
      return;
    }
    console.log("[trace] model", payload);
  }

  async shutdown(_timeout?: number): Promise<void> {}

  async forceFlush(): Promise<void> {}
}
