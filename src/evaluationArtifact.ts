import { hasOutput } from "./aggregate.js";
import { readJsonFile, writeJson, writeText } from "./jsonFiles.js";
import { loadRunFiles } from "./runFiles.js";
import { utcTimestamp } from "./runLogging.js";
import { summaryDocumentSchema } from "./schemas.js";
import type {
  EvaluationArtifact,
  RunFile,
  SummaryDocument,
  TaskClassification,
} from "./types.js";

export const LIMITATIONS = [
  "helped/hurt is a heuristic proxy from success and token counts, not a quality judgement.",
  "Coordination overhead covers tokens only; per-arm wall time is not recorded.",
  "First-pass success equals success rate because no run is retried.",
];

export const classifyRun = (run: RunFile): TaskClassification => {
  const base = { task_id: run.task_id, task_bucket: run.task_bucket };
  const baselineOk = hasOutput(run, "baseline");
  const swarmOk = hasOutput(run, "swarm");
  const baselineTokens = run.metrics.baseline_tokens_used ?? 0;
  const swarmTokens = run.metrics.swarm_tokens_used ?? 0;

  if (swarmOk && !baselineOk) {
    return {
      ...base,
      classification: "helped",
      reason_code: "swarm_success_baseline_failed",
      reason: "swarm succeeded where baseline failed.",
    };
  }
  if (baselineOk && !swarmOk) {
    return {
      ...base,
      classification: "hurt",
      reason_code: "baseline_success_swarm_failed",
      reason: "baseline succeeded where swarm failed.",
    };
  }
  if (baselineOk && swarmOk && swarmTokens < baselineTokens) {
    return {
      ...base,
      classification: "helped",
      reason_code: "swarm_fewer_tokens",
      reason: "swarm used fewer tokens.",
    };
  }
  if (baselineOk && swarmOk && swarmTokens > baselineTokens) {
    return {
      ...base,
      classification: "hurt",
      reason_code: "swarm_more_tokens",
      reason: "swarm used more tokens.",
    };
  }
  return {
    ...base,
    classification: "neutral",
    reason_code: "no_difference",
    reason: baselineOk ? "equal tokens." : "both arms failed.",
  };
};

const formatValue = (value: unknown): string =>
  value === null || value === undefined ? "n/a" : String(value);

const taskIdList = (items: TaskClassification[]): string =>
  items.length === 0 ? "(none)" : items.map((item) => item.task_id).join(", ");

export const buildArtifact = (
  summary: SummaryDocument,
  runs: RunFile[],
  generatedAt: string = utcTimestamp(),
): EvaluationArtifact => {
  const classified = runs.map(classifyRun);
  const tokenDelta =
    summary.deltas.token_cost_delta ??
    summary.coordination_overhead?.token_delta ??
    null;

  return {
    generated_at: generatedAt,
    benchmark_version: summary.benchmark_version,
    task_count: summary.task_count,
    deltas: {
      quality_delta: summary.deltas.quality_delta,
      token_cost_delta: tokenDelta,
    },
    vpd_asr: summary.vpd_asr,
    coordination_overhead: summary.coordination_overhead,
    where_versonalities_helped: classified.filter(
      (item) => item.classification === "helped",
    ),
    where_versonalities_hurt: classified.filter(
      (item) => item.classification === "hurt",
    ),
    neutral: classified.filter((item) => item.classification === "neutral"),
    cost_efficiency_tradeoff: {
      swarm_uses_more_tokens: tokenDelta !== null && tokenDelta > 0,
      token_delta: tokenDelta,
      baseline_avg_tokens: summary.baseline_metrics.avg_tokens_used,
      swarm_avg_tokens: summary.swarm_metrics.avg_tokens_used,
    },
    notable_failures: summary.notable_failures,
    limitations: LIMITATIONS,
  };
};

export const generateArtifact = (
  summaryPath: string,
  runsDir: string,
): EvaluationArtifact | null => {
  const summary = readJsonFile(summaryPath, summaryDocumentSchema);
  return summary ? buildArtifact(summary, loadRunFiles(runsDir)) : null;
};

export const renderNarrative = (artifact: EvaluationArtifact): string => {
  const failures = Object.entries(artifact.notable_failures);
  const lines = [
    `Internal evaluation (${artifact.benchmark_version})`,
    `Generated: ${artifact.generated_at}`,
    `Tasks: ${artifact.task_count}`,
    "",
    "Deltas:",
    `  Quality delta (swarm - baseline): ${formatValue(artifact.deltas.quality_delta)}`,
    `  Token cost delta (swarm - baseline): ${formatValue(artifact.deltas.token_cost_delta)}`,
    `  VPD (ASR delta): ${formatValue(artifact.vpd_asr)}`,
    "",
    "Cost/efficiency:",
    `  Swarm uses more tokens: ${artifact.cost_efficiency_tradeoff.swarm_uses_more_tokens ? "yes" : "no"}`,
    `  Baseline avg tokens: ${formatValue(artifact.cost_efficiency_tradeoff.baseline_avg_tokens)}`,
    `  Swarm avg tokens: ${formatValue(artifact.cost_efficiency_tradeoff.swarm_avg_tokens)}`,
    "",
    `Where versonalities helped: ${taskIdList(artifact.where_versonalities_helped)}`,
    `Where versonalities hurt: ${taskIdList(artifact.where_versonalities_hurt)}`,
    `Neutral: ${taskIdList(artifact.neutral)}`,
    "",
    "Notable failures:",
    ...(failures.length === 0
      ? ["  (none)"]
      : failures.map(
          ([errorType, bucket]) =>
            `  ${errorType}: ${bucket.count} (${bucket.task_ids.join(", ")})`,
        )),
    "",
    "Limitations:",
    ...artifact.limitations.map((note) => `  - ${note}`),
  ];
  return `${lines.join("\n")}\n`;
};

export const writeArtifact = (
  jsonPath: string,
  textPath: string,
  artifact: EvaluationArtifact,
): void => {
  writeJson(jsonPath, artifact);
  writeText(textPath, renderNarrative(artifact));
};
