import { describe, expect, it } from "vitest";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("resolves default paths against the working directory", () => {
    const config = loadConfig({}, "/work");

    expect(config.eventsPath).toBe("/work/logs/events.jsonl");
    expect(config.summariesPath).toBe("/work/logs/run_summaries.jsonl");
    expect(config.runsDir).toBe("/work/runs");
    expect(config.resultsDir).toBe("/work/results");
    expect(config.benchmarkPath).toBe("/work/benchmark_v1.json");
    expect(config.summaryPath).toBe("/work/results/summary_v1.json");
    expect(config.artifactJsonPath).toBe("/work/results/internal_evaluation.json");
    expect(config.artifactTextPath).toBe("/work/results/internal_evaluation.txt");
  });

  it("uses default model settings", () => {
    const config = loadConfig({}, "/work");

    expect(config.model).toBe("gpt-5-mini");
    expect(config.modelProvider).toBe("openai");
    expect(config.aiSdkProvider).toBe("openai");
    expect(config.aiSdkBaseUrl).toBeUndefined();
    expect(config.temperature).toBeUndefined();
    expect(config.pricing).toEqual({ inputPer1M: 0.05, outputPer1M: 0.1 });
    expect(config.debug).toBe(false);
    expect(config.traceLog).toBe(true);
    expect(config.traceLogFormat).toBe("pretty");
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig(
      {
        SWARM_EVENTS_PATH: "/data/events.jsonl",
        SWARM_RUNS_DIR: "out/runs",
        SWARM_RESULTS_DIR: "out/results",
        SWARM_MODEL: "model-a",
        OPENAI_MODEL: "model-b",
        MODEL_PROVIDER: "AI-SDK",
        AI_SDK_PROVIDER: "anthropic",
        AI_SDK_BASE_URL: "http://localhost:8080/v1",
        SWARM_TEMPERATURE: "0.2",
        SWARM_COST_INPUT_PER_1M: "1.5",
        DEBUG_BENCH: "1",
        TRACE_LOG: "0",
        TRACE_LOG_FORMAT: "json",
      },
      "/work",
    );

    expect(config.eventsPath).toBe("/data/events.jsonl");
    expect(config.runsDir).toBe("/work/out/runs");
    expect(config.summaryPath).toBe("/work/out/results/summary_v1.json");
    expect(config.model).toBe("model-a");
    expect(config.modelProvider).toBe("aisdk");
    expect(config.aiSdkProvider).toBe("anthropic");
    expect(config.aiSdkBaseUrl).toBe("http://localhost:8080/v1");
    expect(config.temperature).toBe(0.2);
    expect(config.pricing).toEqual({ inputPer1M: 1.5, outputPer1M: 0.1 });
    expect(config.debug).toBe(true);
    expect(config.traceLog).toBe(false);
    expect(config.traceLogFormat).toBe("json");
  });

  it("falls back on blank or invalid values", () => {
    const config = loadConfig(
      {
        SWARM_MODEL: "  ",
        OPENAI_MODEL: "model-b",
        AI_SDK_PROVIDER: "mistral",
        SWARM_TEMPERATURE: "warm",
        SWARM_COST_INPUT_PER_1M: "abc",
        SWARM_COST_OUTPUT_PER_1M: "-2",
      },
      "/work",
    );

    expect(config.model).toBe("model-b");
    expect(config.aiSdkProvider).toBe("openai");
    expect(config.temperature).toBeUndefined();
    expect(config.pricing).toEqual({ inputPer1M: 0.05, outputPer1M: 0.1 });
  });
});
