import { readJsonLines } from "./jsonFiles.js";
import { runSummarySchema } from "./schemas.js";
import { wilsonInterval } from "./stats.js";
import type { Arm, RunSummary } from "./types.js";

// Derived metrics are computed on read from persisted run summaries; nothing
// here writes or caches.

export type SummaryFilter = {
  arm?: Arm;
  taskBucket?: string;
  firstPassOnly?: boolean;
};

export const loadSummaries = (filePath: string): RunSummary[] =>
  readJsonLines(filePath, runSummarySchema);

export const filterSummaries = (
  summaries: RunSummary[],
  { arm, taskBucket, firstPassOnly = false }: SummaryFilter = {},
): RunSummary[] =>
  summaries.filter(
    (summary) =>
      (arm === undefined || summary.arm === arm) &&
      (taskBucket === undefined || summary.task_bucket === taskBucket) &&
      (!firstPassOnly || summary.retry_count === 0),
  );

const average = (values: number[]): number =>
  values.length === 0
    ? 0
    : values.reduce((sum, value) => sum + value, 0) / values.length;

const ratio = (count: number, total: number): number =>
  total === 0 ? 0 : count / total;

const succeeded = (summary: RunSummary): boolean => summary.outcome.success;

export const successRate = (
  summaries: RunSummary[],
  filter: SummaryFilter = {},
): number => {
  const data = filterSummaries(summaries, filter);
  return ratio(data.filter(succeeded).length, data.length);
};

export const firstPassSuccess = (
  summaries: RunSummary[],
  filter: Omit<SummaryFilter, "firstPassOnly"> = {},
): number => successRate(summaries, { ...filter, firstPassOnly: true });

export const tokensPerSuccess = (
  summaries: RunSummary[],
  filter: SummaryFilter = {},
): number =>
  average(
    filterSummaries(summaries, filter)
      .filter(succeeded)
      .map((summary) => summary.usage.tokens_in + summary.usage.tokens_out),
  );

export const costPerSuccess = (
  summaries: RunSummary[],
  filter: SummaryFilter = {},
): number =>
  average(
    filterSummaries(summaries, filter)
      .filter(succeeded)
      .map((summary) => summary.cost_usd.total),
  );

const averageOfPresent = (values: (number | null)[]): number | null => {
  const present = values.filter((value): value is number => value !== null);
  return present.length === 0 ? null : average(present);
};

export const averageQuality = (
  summaries: RunSummary[],
  filter: SummaryFilter = {},
): number | null =>
  averageOfPresent(
    filterSummaries(summaries, filter).map((summary) => summary.scores.quality),
  );

export const averageConstraintAdherence = (
  summaries: RunSummary[],
  filter: SummaryFilter = {},
): number | null =>
  averageOfPresent(
    filterSummaries(summaries, filter).map(
      (summary) => summary.scores.constraint_adherence,
    ),
  );

export const toolCorrectness = (
  summaries: RunSummary[],
  filter: SummaryFilter = {},
): number | null => {
  const data = filterSummaries(summaries, filter);
  const total = data.reduce((sum, summary) => sum + summary.usage.tool_calls, 0);
  if (total === 0) {
    return null;
  }
  const ok = data.reduce((sum, summary) => sum + summary.usage.tool_calls_ok, 0);
  return ok / total;
};

export const policyViolationRate = (
  summaries: RunSummary[],
  filter: SummaryFilter = {},
): number => {
  const data = filterSummaries(summaries, filter);
  return ratio(
    data.filter((summary) => summary.outcome.policy_violation).length,
    data.length,
  );
};

export const criticalHallucinationRate = (
  summaries: RunSummary[],
  filter: SummaryFilter = {},
): number => {
  const data = filterSummaries(summaries, filter);
  return ratio(
    data.filter((summary) => summary.outcome.critical_hallucination).length,
    data.length,
  );
};

export type MetricsRow = {
  arm: Arm;
  runs: number;
  successRate: number;
  successInterval: { low: number; high: number };
  firstPassSuccess: number;
  tokensPerSuccess: number;
  costPerSuccess: number;
  averageQuality: number | null;
  averageConstraintAdherence: number | null;
  toolCorrectness: number | null;
  policyViolationRate: number;
  criticalHallucinationRate: number;
};

const arms: Arm[] = ["monolith", "swarm"];

export const metricsReport = (
  summaries: RunSummary[],
  filter: Omit<SummaryFilter, "arm"> = {},
): MetricsRow[] =>
  arms.map((arm) => {
    const scoped = { ...filter, arm };
    const data = filterSummaries(summaries, scoped);
    const { low, high } = wilsonInterval(
      data.filter(succeeded).length,
      data.length,
    );
    return {
      arm,
      runs: data.length,
      successRate: successRate(summaries, scoped),
      successInterval: { low, high },
      firstPassSuccess: firstPassSuccess(summaries, {
        arm,
        taskBucket: filter.taskBucket,
      }),
      tokensPerSuccess: tokensPerSuccess(summaries, scoped),
      costPerSuccess: costPerSuccess(summaries, scoped),
      averageQuality: averageQuality(summaries, scoped),
      averageConstraintAdherence: averageConstraintAdherence(summaries, scoped),
      toolCorrectness: toolCorrectness(summaries, scoped),
      policyViolationRate: policyViolationRate(summaries, scoped),
      criticalHallucinationRate: criticalHallucinationRate(summaries, scoped),
    };
  });
