import path from "node:path";

export type ModelProvider = "openai" | "aisdk";

export type AiSdkProvider = "openai" | "anthropic" | "google";

export type Pricing = {
  inputPer1M: number;
  outputPer1M: number;
};

export type BenchConfig = {
  eventsPath: string;
  summariesPath: string;
  runsDir: string;
  resultsDir: string;
  benchmarkPath: string;
  summaryPath: string;
  artifactJsonPath: string;
  artifactTextPath: string;
  model: string;
  modelProvider: ModelProvider;
  aiSdkProvider: AiSdkProvider;
  aiSdkBaseUrl?: string;
  temperature?: number;
  pricing: Pricing;
  debug: boolean;
  traceLog: boolean;
  traceLogFormat: "json" | "pretty";
};

export const defaultModel = "gpt-5-mini";

export const defaultBenchmarkVersion = "sv-v1";

const defaultPricing: Pricing = { inputPer1M: 0.05, outputPer1M: 0.1 };

const nonEmpty = (value?: string): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const parseNumber = (value: string | undefined, fallback: number): number => {
  const raw = nonEmpty(value);
  if (raw === undefined) {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
};

const parseOptionalNumber = (value?: string): number | undefined => {
  const raw = nonEmpty(value);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const parseModelProvider = (value?: string): ModelProvider => {
  const normalized = (value ?? "openai").toLowerCase();
  return normalized === "aisdk" || normalized === "ai-sdk" ? "aisdk" : "openai";
};

const parseAiSdkProvider = (value?: string): AiSdkProvider => {
  const normalized = (value ?? "openai").toLowerCase();
  if (normalized === "anthropic" || normalized === "google") {
    return normalized;
  }
  return "openai";
};

export const loadConfig = (
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): BenchConfig => {
  const resolve = (value: string | undefined, fallback: string): string =>
    path.resolve(cwd, nonEmpty(value) ?? fallback);

  const resultsDir = resolve(env.SWARM_RESULTS_DIR, "results");

  return {
    eventsPath: resolve(env.SWARM_EVENTS_PATH, path.join("logs", "events.jsonl")),
    summariesPath: resolve(
      env.SWARM_SUMMARIES_PATH,
      path.join("logs", "run_summaries.jsonl"),
    ),
    runsDir: resolve(env.SWARM_RUNS_DIR, "runs"),
    resultsDir,
    benchmarkPath: resolve(env.SWARM_BENCHMARK_PATH, "benchmark_v1.json"),
    summaryPath: path.join(resultsDir, "summary_v1.json"),
    artifactJsonPath: path.join(resultsDir, "internal_evaluation.json"),
    artifactTextPath: path.join(resultsDir, "internal_evaluation.txt"),
    model: nonEmpty(env.SWARM_MODEL) ?? nonEmpty(env.OPENAI_MODEL) ?? defaultModel,
    modelProvider: parseModelProvider(env.MODEL_PROVIDER),
    aiSdkProvider: parseAiSdkProvider(env.AI_SDK_PROVIDER),
    aiSdkBaseUrl: nonEmpty(env.AI_SDK_BASE_URL) ?? nonEmpty(env.AI_SDK_HOST),
    temperature: parseOptionalNumber(env.SWARM_TEMPERATURE),
    pricing: {
      inputPer1M: parseNumber(
        env.SWARM_COST_INPUT_PER_1M,
        defaultPricing.inputPer1M,
      ),
      outputPer1M: parseNumber(
        env.SWARM_COST_OUTPUT_PER_1M,
        defaultPricing.outputPer1M,
      ),
    },
    debug: env.DEBUG_BENCH === "1",
    // Trace logging is on by default; set TRACE_LOG=0 to disable.
    traceLog: env.TRACE_LOG !== "0",
    traceLogFormat: env.TRACE_LOG_FORMAT === "json" ? "json" : "pretty",
  };
};
