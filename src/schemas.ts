import { z } from "zod";

export const armSchema = z.enum(["monolith", "swarm"]);

export const phaseSchema = z.enum([
  "plan",
  "act",
  "tool",
  "verify",
  "decide",
  "finalize",
]);

export const eventKindSchema = z.enum([
  "message",
  "tool_call",
  "tool_result",
  "error",
  "retry",
  "escalation",
  "judge_score",
  "end",
]);

// Exactly one per failed run.
export const failureReasonSchema = z.enum([
  "planning_error",
  "tool_misuse",
  "tool_failure",
  "hallucination",
  "timeout",
  "constraint_break",
  "budget_exceeded",
]);

const requiredId = z.string().min(1);
const tokenCount = z.number().int().nonnegative();

export const eventRecordSchema = z.object({
  ts: z.string(),
  run_id: requiredId,
  task_id: requiredId,
  arm: armSchema,
  agent_id: requiredId,
  versonality: z.string(),
  phase: phaseSchema,
  event: eventKindSchema,
  tokens_in: tokenCount,
  tokens_out: tokenCount,
  tool: z.string().nullable(),
  tool_ok: z.boolean().nullable(),
  metadata: z.object({
    task_bucket: z.string(),
    retry_count: z.number().int().nonnegative(),
    seed: z.number().int().nullable(),
    handoff_to: z.string().nullable(),
  }),
});

export const swarmBlockSchema = z.object({
  conflict: z.boolean().nullable(),
  consensus_seconds: z.number().nonnegative().nullable(),
  handoffs: z.number().int().nonnegative().nullable(),
  duplicate_work: z.boolean().nullable(),
});

export const runSummarySchema = z.object({
  run_id: requiredId,
  task_id: requiredId,
  arm: armSchema,
  seed: z.number().int().nullable(),
  task_bucket: z.string(),
  n_agents: z.number().int().positive(),
  budgets: z.object({
    max_tokens: z.number().int().positive().nullable(),
    max_seconds: z.number().positive().nullable(),
  }),
  outcome: z.object({
    success: z.boolean(),
    failure_reason: failureReasonSchema.nullable(),
    policy_violation: z.boolean(),
    critical_hallucination: z.boolean(),
  }),
  scores: z.object({
    quality: z.number().min(0).max(5).nullable(),
    constraint_adherence: z.number().min(0).max(1).nullable(),
  }),
  usage: z.object({
    wall_seconds: z.number().nonnegative(),
    tokens_in: tokenCount,
    tokens_out: tokenCount,
    tool_calls: tokenCount,
    tool_calls_ok: tokenCount,
  }),
  swarm: swarmBlockSchema.optional(),
  cost_usd: z.object({
    model: z.number().nonnegative(),
    tools: z.number().nonnegative(),
    total: z.number().nonnegative(),
  }),
  retry_count: z.number().int().nonnegative(),
});

const nullableScore = z.number().nullable().optional();

// Unknown keys survive a read-modify-write by the quality scorer.
export const runFileMetricsSchema = z
  .object({
    success: z.boolean(),
    baseline_quality_score: nullableScore,
    swarm_quality_score: nullableScore,
    baseline_constraint_adherence: nullableScore,
    swarm_constraint_adherence: nullableScore,
    quality_score: nullableScore,
    constraint_adherence: nullableScore,
    wall_time_seconds: z.number().nonnegative(),
    tokens_used: z.number().nonnegative().nullable().optional(),
    baseline_tokens_used: z.number().nonnegative().nullable().optional(),
    swarm_tokens_used: z.number().nonnegative().nullable().optional(),
    error_type: z.string().nullable().optional(),
  })
  .passthrough();

export const runFileSchema = z
  .object({
    task_id: requiredId,
    task_bucket: z.string().default(""),
    baseline_output: z.string().nullable().optional(),
    swarm_output: z.string().nullable().optional(),
    metrics: runFileMetricsSchema,
  })
  .passthrough();

const nullableNumber = z.number().nullable();

export const armMetricsSchema = z.object({
  success_rate: nullableNumber,
  fps: nullableNumber,
  avg_tokens_used: nullableNumber,
  asr: nullableNumber,
});

export const failureBucketSchema = z.object({
  count: z.number().int().nonnegative(),
  task_ids: z.array(z.string()),
});

export const summaryDocumentSchema = z.object({
  benchmark_version: z.string(),
  task_count: z.number().int().nonnegative(),
  baseline_metrics: armMetricsSchema,
  swarm_metrics: armMetricsSchema,
  deltas: z.object({
    quality_delta: nullableNumber,
    token_cost_delta: nullableNumber,
  }),
  wall_time_seconds: z.object({
    p50: nullableNumber,
    p95: nullableNumber,
  }),
  coordination_overhead: z.object({ token_delta: z.number() }).nullable(),
  vpd_asr: nullableNumber,
  notable_failures: z.record(failureBucketSchema),
});

export const benchmarkTaskSchema = z.object({
  id: requiredId,
  task_bucket: z.string().default(""),
  prompt: z.string(),
  max_tokens: z.number().int().positive().optional(),
  max_seconds: z.number().positive().optional(),
  seed: z.number().int().optional(),
});

export const benchmarkSchema = z.object({
  benchmark_version: z.string().default("sv-v1"),
  tasks: z.array(benchmarkTaskSchema),
});
