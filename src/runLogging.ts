import { RunSummaryValidationError } from "./errors.js";
import { appendJsonLine } from "./jsonFiles.js";
import {
  eventRecordSchema,
  failureReasonSchema,
  runSummarySchema,
} from "./schemas.js";
import type {
  Arm,
  EventKind,
  EventRecord,
  FailureReason,
  Phase,
  RunSummary,
  SwarmBlock,
} from "./types.js";

export const utcTimestamp = (date: Date = new Date()): string =>
  date.toISOString().replace(/\.\d{3}Z$/, "Z");

export type EventInput = {
  runId: string;
  taskId: string;
  arm: Arm;
  agentId: string;
  versonality?: string;
  phase: Phase;
  event: EventKind;
  tokensIn?: number;
  tokensOut?: number;
  tool?: string | null;
  toolOk?: boolean | null;
  taskBucket?: string;
  retryCount?: number;
  seed?: number | null;
  handoffTo?: string | null;
};

export class EventLogWriter {
  constructor(readonly filePath: string) {}

  append(input: EventInput): EventRecord {
    const record = eventRecordSchema.parse({
      ts: utcTimestamp(),
      run_id: input.runId,
      task_id: input.taskId,
      arm: input.arm,
      agent_id: input.agentId,
      versonality: input.versonality ?? input.agentId,
      phase: input.phase,
      event: input.event,
      tokens_in: input.tokensIn ?? 0,
      tokens_out: input.tokensOut ?? 0,
      tool: input.tool ?? null,
      tool_ok: input.toolOk ?? null,
      metadata: {
        task_bucket: input.taskBucket ?? "",
        retry_count: input.retryCount ?? 0,
        seed: input.seed ?? null,
        handoff_to: input.handoffTo ?? null,
      },
    });
    appendJsonLine(this.filePath, record);
    return record;
  }
}

export type SwarmInput = {
  conflict?: boolean;
  consensusSeconds?: number;
  handoffs?: number;
  duplicateWork?: boolean;
};

export type RunSummaryInput = {
  runId: string;
  taskId: string;
  arm: Arm;
  seed?: number | null;
  taskBucket: string;
  nAgents: number;
  maxTokens?: number | null;
  maxSeconds?: number | null;
  success: boolean;
  failureReason?: FailureReason | null;
  policyViolation?: boolean;
  criticalHallucination?: boolean;
  quality?: number | null;
  constraintAdherence?: number | null;
  wallSeconds?: number;
  tokensIn: number;
  tokensOut: number;
  toolCalls?: number;
  toolCallsOk?: number;
  swarm?: SwarmInput;
  modelCostUsd?: number;
  toolCostUsd?: number;
  retryCount?: number;
};

const toSwarmBlock = (input?: SwarmInput): SwarmBlock | undefined => {
  if (!input) {
    return undefined;
  }
  const block: SwarmBlock = {
    conflict: input.conflict ?? null,
    consensus_seconds: input.consensusSeconds ?? null,
    handoffs: input.handoffs ?? null,
    duplicate_work: input.duplicateWork ?? null,
  };
  return Object.values(block).some((value) => value !== null) ? block : undefined;
};

// A failed run must name a reason; a successful run never keeps one.
export const resolveFailureReason = (
  success: boolean,
  failureReason: string | null | undefined,
): FailureReason | null => {
  if (success) {
    return null;
  }
  if (failureReason === null || failureReason === undefined) {
    throw new RunSummaryValidationError(
      "failure_reason must be set when success is false",
    );
  }
  return failureReasonSchema.parse(failureReason);
};

export class RunSummaryWriter {
  constructor(readonly filePath: string) {}

  append(input: RunSummaryInput): RunSummary {
    const failureReason = resolveFailureReason(input.success, input.failureReason);
    const modelCost = input.modelCostUsd ?? 0;
    const toolCost = input.toolCostUsd ?? 0;
    const record = runSummarySchema.parse({
      run_id: input.runId,
      task_id: input.taskId,
      arm: input.arm,
      seed: input.seed ?? null,
      task_bucket: input.taskBucket,
      n_agents: input.nAgents,
      budgets: {
        max_tokens: input.maxTokens ?? null,
        max_seconds: input.maxSeconds ?? null,
      },
      outcome: {
        success: input.success,
        failure_reason: failureReason,
        policy_violation: input.policyViolation ?? false,
        critical_hallucination: input.criticalHallucination ?? false,
      },
      scores: {
        quality: input.quality ?? null,
        constraint_adherence: input.constraintAdherence ?? null,
      },
      usage: {
        wall_seconds: input.wallSeconds ?? 0,
        tokens_in: input.tokensIn,
        tokens_out: input.tokensOut,
        tool_calls: input.toolCalls ?? 0,
        tool_calls_ok: input.toolCallsOk ?? 0,
      },
      swarm: toSwarmBlock(input.swarm),
      cost_usd: {
        model: modelCost,
        tools: toolCost,
        total: modelCost + toolCost,
      },
      retry_count: input.retryCount ?? 0,
    });
    appendJsonLine(this.filePath, record);
    return record;
  }
}

export const errorTypeOf = (error: unknown): string =>
  error instanceof Error && error.name ? error.name : "UnknownError";

export const mapErrorToFailureReason = (
  errorType: string | null | undefined,
): FailureReason | null => {
  if (!errorType) {
    return null;
  }
  const name = errorType.toLowerCase();
  if (name.includes("timeout")) {
    return "timeout";
  }
  if (name.includes("budget")) {
    return "budget_exceeded";
  }
  if (name.includes("tool")) {
    return "tool_failure";
  }
  return "planning_error";
};
