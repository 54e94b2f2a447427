import type { z } from "zod";
import type {
  armMetricsSchema,
  armSchema,
  benchmarkSchema,
  benchmarkTaskSchema,
  eventKindSchema,
  eventRecordSchema,
  failureReasonSchema,
  phaseSchema,
  runFileMetricsSchema,
  runFileSchema,
  runSummarySchema,
  summaryDocumentSchema,
  swarmBlockSchema,
} from "./schemas.js";

export type Arm = z.infer<typeof armSchema>;
export type Phase = z.infer<typeof phaseSchema>;
export type EventKind = z.infer<typeof eventKindSchema>;
export type FailureReason = z.infer<typeof failureReasonSchema>;

export type EventRecord = z.infer<typeof eventRecordSchema>;
export type RunSummary = z.infer<typeof runSummarySchema>;
export type SwarmBlock = z.infer<typeof swarmBlockSchema>;
export type RunFile = z.infer<typeof runFileSchema>;
export type RunFileMetrics = z.infer<typeof runFileMetricsSchema>;
export type ArmMetrics = z.infer<typeof armMetricsSchema>;
export type SummaryDocument = z.infer<typeof summaryDocumentSchema>;
export type Benchmark = z.infer<typeof benchmarkSchema>;
export type BenchmarkTask = z.infer<typeof benchmarkTaskSchema>;

export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type ModelReply = {
  content: string;
  tokensIn: number;
  tokensOut: number;
};

export type CallContext = {
  runId: string;
  taskId: string;
  arm: Arm;
  agentId: string;
};

export type ModelCaller = (
  messages: ChatMessage[],
  context?: CallContext,
) => Promise<ModelReply>;

export type Classification = "helped" | "hurt" | "neutral";

export type ClassificationReasonCode =
  | "swarm_success_baseline_failed"
  | "baseline_success_swarm_failed"
  | "swarm_fewer_tokens"
  | "swarm_more_tokens"
  | "no_difference";

export type TaskClassification = {
  task_id: string;
  task_bucket: string;
  classification: Classification;
  reason_code: ClassificationReasonCode;
  reason: string;
};

export type EvaluationArtifact = {
  generated_at: string;
  benchmark_version: string;
  task_count: number;
  deltas: {
    quality_delta: number | null;
    token_cost_delta: number | null;
  };
  vpd_asr: number | null;
  coordination_overhead: { token_delta: number } | null;
  where_versonalities_helped: TaskClassification[];
  where_versonalities_hurt: TaskClassification[];
  neutral: TaskClassification[];
  cost_efficiency_tradeoff: {
    swarm_uses_more_tokens: boolean;
    token_delta: number | null;
    baseline_avg_tokens: number | null;
    swarm_avg_tokens: number | null;
  };
  notable_failures: SummaryDocument["notable_failures"];
  limitations: string[];
};
