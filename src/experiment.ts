import { randomUUID } from "node:crypto";
import type { Pricing } from "./config.js";
import { BudgetExceededError } from "./errors.js";
import { costUsd } from "./modelClient.js";
import { type ArmContext, type ArmResult, runBaseline, runSwarm, swarmRoles } from "./pipeline.js";
import { writeRunFile } from "./runFiles.js";
import {
  type EventLogWriter,
  type RunSummaryWriter,
  errorTypeOf,
  mapErrorToFailureReason,
} from "./runLogging.js";
import { roundTo } from "./stats.js";
import type { Arm, BenchmarkTask, ModelCaller, RunFile } from "./types.js";

export type ExperimentDeps = {
  caller: ModelCaller;
  events: EventLogWriter;
  summaries: RunSummaryWriter;
  runsDir: string;
  pricing: Pricing;
  debug?: boolean;
  newRunId?: () => string;
};

type ArmOutcome =
  | { ok: true; result: ArmResult; seconds: number }
  | {
      ok: false;
      errorType: string;
      seconds: number;
      tokensIn: number;
      tokensOut: number;
    };

const formatError = (error: unknown): Record<string, unknown> => {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }
  const extra = error as Error & {
    status?: number;
    code?: string | number;
    cause?: unknown;
  };
  return {
    name: error.name,
    message: error.message,
    status: extra.status ?? null,
    code: extra.code ?? null,
    stack: error.stack ?? null,
    cause: extra.cause ?? null,
  };
};

// Both arms of every task, in order. An arm that throws is recorded as a
// failed run and the batch carries on.
export class ExperimentRunner {
  constructor(private readonly deps: ExperimentDeps) {}

  async run(tasks: BenchmarkTask[]): Promise<RunFile[]> {
    const runs: RunFile[] = [];
    for (const task of tasks) {
      const run = await this.runTask(task);
      const filePath = writeRunFile(this.deps.runsDir, run);
      console.log(`[bench] wrote ${filePath} (success=${run.metrics.success})`);
      runs.push(run);
    }
    return runs;
  }

  async runTask(task: BenchmarkTask): Promise<RunFile> {
    const runId = (this.deps.newRunId ?? randomUUID)();
    const ctx: ArmContext = {
      runId,
      taskId: task.id,
      taskBucket: task.task_bucket,
      seed: task.seed,
      maxTokens: task.max_tokens,
      events: this.deps.events,
    };

    const baseline = await this.runArm("monolith", task, ctx, () =>
      runBaseline(this.deps.caller, task.prompt, ctx),
    );
    const swarm = await this.runArm("swarm", task, ctx, () =>
      runSwarm(this.deps.caller, task.prompt, ctx),
    );

    this.recordSummary("monolith", task, runId, baseline);
    this.recordSummary("swarm", task, runId, swarm);

    const baselineTokens = baseline.ok
      ? baseline.result.tokensIn + baseline.result.tokensOut
      : null;
    const swarmTokens = swarm.ok ? swarm.result.tokensIn + swarm.result.tokensOut : null;

    return {
      task_id: task.id,
      task_bucket: task.task_bucket,
      baseline_output: baseline.ok ? baseline.result.output : null,
      swarm_output: swarm.ok ? swarm.result.output : null,
      metrics: {
        success: baseline.ok && swarm.ok,
        baseline_quality_score: null,
        swarm_quality_score: null,
        baseline_constraint_adherence: null,
        swarm_constraint_adherence: null,
        wall_time_seconds: roundTo(baseline.seconds + swarm.seconds, 4),
        tokens_used: (baselineTokens ?? 0) + (swarmTokens ?? 0),
        baseline_tokens_used: baselineTokens,
        swarm_tokens_used: swarmTokens,
        error_type:
          (baseline.ok ? null : baseline.errorType) ??
          (swarm.ok ? null : swarm.errorType),
      },
    };
  }

  private async runArm(
    arm: Arm,
    task: BenchmarkTask,
    ctx: ArmContext,
    attempt: () => Promise<ArmResult>,
  ): Promise<ArmOutcome> {
    const start = Date.now();
    if (this.deps.debug) {
      console.log(
        "[bench] arm start",
        JSON.stringify({ runId: ctx.runId, taskId: task.id, arm }, null, 2),
      );
    }
    try {
      const result = await attempt();
      return { ok: true, result, seconds: (Date.now() - start) / 1000 };
    } catch (error) {
      const seconds = (Date.now() - start) / 1000;
      console.log(
        `[bench] ${task.id} ${arm} failed: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      if (this.deps.debug) {
        console.log(
          "[bench] arm error",
          JSON.stringify({ taskId: task.id, arm, error: formatError(error) }, null, 2),
        );
      }
      const spent =
        error instanceof BudgetExceededError
          ? { tokensIn: error.tokensIn, tokensOut: error.tokensOut }
          : { tokensIn: 0, tokensOut: 0 };
      return { ok: false, errorType: errorTypeOf(error), seconds, ...spent };
    }
  }

  private recordSummary(
    arm: Arm,
    task: BenchmarkTask,
    runId: string,
    outcome: ArmOutcome,
  ): void {
    const { tokensIn, tokensOut } = outcome.ok ? outcome.result : outcome;
    this.deps.summaries.append({
      runId,
      taskId: task.id,
      arm,
      seed: task.seed,
      taskBucket: task.task_bucket,
      nAgents: arm === "swarm" ? swarmRoles.length : 1,
      maxTokens: task.max_tokens,
      maxSeconds: task.max_seconds,
      success: outcome.ok,
      failureReason: outcome.ok ? null : mapErrorToFailureReason(outcome.errorType),
      wallSeconds: outcome.seconds,
      tokensIn,
      tokensOut,
      // Neither arm calls tools.
      toolCalls: 0,
      toolCallsOk: 0,
      swarm:
        arm === "swarm" && outcome.ok
          ? { handoffs: outcome.result.handoffs }
          : undefined,
      modelCostUsd: costUsd(tokensIn, tokensOut, this.deps.pricing),
      retryCount: 0,
    });
  }
}
