import "dotenv/config";
import { setDefaultOpenAIKey, setTraceProcessors } from "@openai/agents";
import { aggregate, writeSummary } from "./aggregate.js";
import { type CliArgs, parseArgs } from "./cli.js";
import { type BenchConfig, loadConfig } from "./config.js";
import { generateArtifact, renderNarrative, writeArtifact } from "./evaluationArtifact.js";
import { ExperimentRunner } from "./experiment.js";
import { loadSummaries, metricsReport } from "./metrics.js";
import { buildModel, createModelCaller } from "./modelClient.js";
import { scoreRunFiles } from "./qualityScorer.js";
import { loadRunFiles } from "./runFiles.js";
import { EventLogWriter, RunSummaryWriter } from "./runLogging.js";
import { filterTasks, getBenchmarkVersion, loadBenchmark, taskPromptsById } from "./tasks.js";
import { TraceCollector } from "./traceCollector.js";
import type { ModelCaller } from "./types.js";

const requireProviderKey = (config: BenchConfig): void => {
  const provider = config.modelProvider === "aisdk" ? config.aiSdkProvider : "openai";
  if (provider === "openai") {
    if (!process.env.OPENAI_API_KEY) {
      throw new Error("OPENAI_API_KEY is required.");
    }
    setDefaultOpenAIKey(process.env.OPENAI_API_KEY);
    return;
  }
  if (provider === "anthropic" && !process.env.ANTHROPIC_API_KEY) {
    throw new Error("ANTHROPIC_API_KEY is required for AI SDK anthropic.");
  }
  if (provider === "google" && !process.env.GOOGLE_GENERATIVE_AI_API_KEY) {
    throw new Error("GOOGLE_GENERATIVE_AI_API_KEY is required for AI SDK google.");
  }
};

const modelCaller = (config: BenchConfig): ModelCaller => {
  requireProviderKey(config);
  const { model, modelId } = buildModel(config);
  if (config.debug) {
    console.log("[bench] model", JSON.stringify({ modelId }, null, 2));
  }
  return createModelCaller(model, {
    temperature: config.temperature,
    debug: config.debug,
  });
};

const runBenchmark = async (config: BenchConfig, args: CliArgs): Promise<void> => {
  const benchmarkPath = args.benchmarkPath ?? config.benchmarkPath;
  const benchmark = loadBenchmark(benchmarkPath);
  const tasks = filterTasks(benchmark.tasks, args.taskFilter);
  // Traces stay local: printed when TRACE_LOG is on, never exported to OpenAI.
  setTraceProcessors(
    config.traceLog ? [new TraceCollector({ format: config.traceLogFormat })] : [],
  );

  const runner = new ExperimentRunner({
    caller: modelCaller(config),
    events: new EventLogWriter(config.eventsPath),
    summaries: new RunSummaryWriter(config.summariesPath),
    runsDir: config.runsDir,
    pricing: config.pricing,
    debug: config.debug,
  });
  console.log(
    `[bench] ${benchmark.benchmark_version}: running ${tasks.length} task(s)`,
  );
  await runner.run(tasks);
};

const scoreRuns = async (config: BenchConfig, args: CliArgs): Promise<void> => {
  // Grading calls carry no run metadata; keep their traces local too.
  setTraceProcessors([]);
  const prompts = taskPromptsById(args.benchmarkPath ?? config.benchmarkPath);
  const updated = await scoreRunFiles(config.runsDir, prompts, modelCaller(config));
  console.log(
    `[score] updated quality/constraint_adherence in ${updated} run file(s) under ${config.runsDir}`,
  );
};

const aggregateRuns = (config: BenchConfig, args: CliArgs): void => {
  const summary = aggregate(
    loadRunFiles(config.runsDir),
    getBenchmarkVersion(args.benchmarkPath ?? config.benchmarkPath),
  );
  writeSummary(config.summaryPath, summary);
  console.log(
    `[aggregate] wrote ${config.summaryPath} (task_count=${summary.task_count})`,
  );
};

const evaluateRuns = (config: BenchConfig): void => {
  const artifact = generateArtifact(config.summaryPath, config.runsDir);
  if (!artifact) {
    console.log(
      `[evaluate] no summary at ${config.summaryPath}; run "run" then "aggregate" first.`,
    );
    return;
  }
  writeArtifact(config.artifactJsonPath, config.artifactTextPath, artifact);
  if (config.debug) {
    console.log(renderNarrative(artifact));
  }
  console.log(
    `[evaluate] wrote ${config.artifactJsonPath} and ${config.artifactTextPath}`,
  );
};

const printMetrics = (config: BenchConfig, args: CliArgs): void => {
  const summaries = loadSummaries(args.summariesPath ?? config.summariesPath);
  const rows = metricsReport(summaries, {
    taskBucket: args.taskBucket,
    firstPassOnly: args.firstPassOnly,
  });
  const selected = args.arm ? rows.filter((row) => row.arm === args.arm) : rows;
  console.log(JSON.stringify(selected, null, 2));
};

const main = async (): Promise<void> => {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  if (config.debug) {
    console.log("[bench] config", JSON.stringify({ args, config }, null, 2));
  }

  switch (args.command) {
    case "run":
      await runBenchmark(config, args);
      return;
    case "score":
      await scoreRuns(config, args);
      return;
    case "aggregate":
      aggregateRuns(config, args);
      return;
    case "evaluate":
      evaluateRuns(config);
      return;
    case "metrics":
      printMetrics(config, args);
      return;
  }
};

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
