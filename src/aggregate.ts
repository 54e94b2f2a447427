import { writeJson } from "./jsonFiles.js";
import { mean, percentile, roundOrNull, roundTo } from "./stats.js";
import type { RunFile, RunFileMetrics, SummaryDocument } from "./types.js";

type RunFileArm = "baseline" | "swarm";

type FailureBucket = SummaryDocument["notable_failures"][string];

const RATE_DIGITS = 4;
const TOKEN_DIGITS = 2;

export const hasOutput = (run: RunFile, arm: RunFileArm): boolean => {
  const output = arm === "baseline" ? run.baseline_output : run.swarm_output;
  return output !== null && output !== undefined;
};

const armQuality = (metrics: RunFileMetrics, arm: RunFileArm): number | null =>
  (arm === "baseline"
    ? metrics.baseline_quality_score
    : metrics.swarm_quality_score) ??
  metrics.quality_score ??
  null;

const armConstraintAdherence = (
  metrics: RunFileMetrics,
  arm: RunFileArm,
): number | null =>
  (arm === "baseline"
    ? metrics.baseline_constraint_adherence
    : metrics.swarm_constraint_adherence) ??
  metrics.constraint_adherence ??
  null;

const armTokens = (metrics: RunFileMetrics, arm: RunFileArm): number | null =>
  (arm === "baseline" ? metrics.baseline_tokens_used : metrics.swarm_tokens_used) ??
  null;

// success x (quality / 5) x constraint adherence; missing scores count as 0.
export const asrPerRun = (
  success: boolean,
  quality: number | null,
  constraintAdherence: number | null,
): number => (success ? 1 : 0) * ((quality ?? 0) / 5) * (constraintAdherence ?? 0);

const armAsr = (runs: RunFile[], arm: RunFileArm): number =>
  runs.reduce(
    (sum, run) =>
      sum +
      asrPerRun(
        hasOutput(run, arm),
        armQuality(run.metrics, arm),
        armConstraintAdherence(run.metrics, arm),
      ),
    0,
  ) / runs.length;

const presentValues = (values: (number | null)[]): number[] =>
  values.filter((value): value is number => value !== null);

const failureHistogram = (runs: RunFile[]): SummaryDocument["notable_failures"] => {
  const byType = new Map<string, string[]>();
  for (const run of runs) {
    const errorType = run.metrics.error_type;
    if (!errorType) {
      continue;
    }
    const list = byType.get(errorType) ?? [];
    list.push(run.task_id);
    byType.set(errorType, list);
  }
  return Object.fromEntries(
    [...byType.keys()]
      .sort()
      .map((errorType): [string, FailureBucket] => {
        const taskIds = byType.get(errorType) ?? [];
        return [errorType, { count: taskIds.length, task_ids: taskIds }];
      }),
  );
};

export const emptySummary = (benchmarkVersion: string): SummaryDocument => ({
  benchmark_version: benchmarkVersion,
  task_count: 0,
  baseline_metrics: { success_rate: null, fps: null, avg_tokens_used: null, asr: null },
  swarm_metrics: { success_rate: null, fps: null, avg_tokens_used: null, asr: null },
  deltas: { quality_delta: null, token_cost_delta: null },
  wall_time_seconds: { p50: null, p95: null },
  coordination_overhead: null,
  vpd_asr: null,
  notable_failures: {},
});

export const aggregate = (
  runs: RunFile[],
  benchmarkVersion: string,
): SummaryDocument => {
  const n = runs.length;
  if (n === 0) {
    return emptySummary(benchmarkVersion);
  }

  const successRateBaseline =
    runs.filter((run) => hasOutput(run, "baseline")).length / n;
  const successRateSwarm = runs.filter((run) => hasOutput(run, "swarm")).length / n;

  const wallTimes = runs.map((run) => run.metrics.wall_time_seconds);
  const p50 = percentile(wallTimes, 50);
  const p95 = percentile(wallTimes, 95);

  const avgBaselineTokens = mean(
    presentValues(runs.map((run) => armTokens(run.metrics, "baseline"))),
  );
  const avgSwarmTokens = mean(
    presentValues(runs.map((run) => armTokens(run.metrics, "swarm"))),
  );
  const tokenDelta =
    avgBaselineTokens !== null && avgSwarmTokens !== null
      ? avgSwarmTokens - avgBaselineTokens
      : null;

  const qualityDeltas: number[] = [];
  for (const run of runs) {
    const baseline = run.metrics.baseline_quality_score ?? null;
    const swarm = run.metrics.swarm_quality_score ?? null;
    if (baseline !== null && swarm !== null) {
      qualityDeltas.push(swarm - baseline);
    }
  }
  const qualityDelta = mean(qualityDeltas);

  const asrBaseline = armAsr(runs, "baseline");
  const asrSwarm = armAsr(runs, "swarm");

  return {
    benchmark_version: benchmarkVersion,
    task_count: n,
    baseline_metrics: {
      success_rate: roundTo(successRateBaseline, RATE_DIGITS),
      // No run is ever retried, so first-pass success equals success rate.
      fps: roundTo(successRateBaseline, RATE_DIGITS),
      avg_tokens_used: roundOrNull(avgBaselineTokens, TOKEN_DIGITS),
      asr: roundTo(asrBaseline, RATE_DIGITS),
    },
    swarm_metrics: {
      success_rate: roundTo(successRateSwarm, RATE_DIGITS),
      fps: roundTo(successRateSwarm, RATE_DIGITS),
      avg_tokens_used: roundOrNull(avgSwarmTokens, TOKEN_DIGITS),
      asr: roundTo(asrSwarm, RATE_DIGITS),
    },
    deltas: {
      quality_delta: roundOrNull(qualityDelta, RATE_DIGITS),
      token_cost_delta: roundOrNull(tokenDelta, TOKEN_DIGITS),
    },
    wall_time_seconds: {
      p50: roundOrNull(p50, RATE_DIGITS),
      p95: roundOrNull(p95, RATE_DIGITS),
    },
    // Token delta only: run files record a single combined wall time, so there
    // is no per-arm time to compare.
    coordination_overhead:
      tokenDelta === null ? null : { token_delta: roundTo(tokenDelta, TOKEN_DIGITS) },
    vpd_asr: roundTo(asrSwarm - asrBaseline, RATE_DIGITS),
    notable_failures: failureHistogram(runs),
  };
};

export const writeSummary = (filePath: string, summary: SummaryDocument): void => {
  writeJson(filePath, summary);
};
