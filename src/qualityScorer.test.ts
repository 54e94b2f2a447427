import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildScoringMessages, parseScores, scoreRun, scoreRunFiles } from "./qualityScorer.js";
import { readRunFile, writeRunFile } from "./runFiles.js";
import type { ChatMessage, ModelCaller, RunFile } from "./types.js";

const fixedCaller = (content: string): ModelCaller =>
  vi.fn(async () => ({ content, tokensIn: 30, tokensOut: 4 }));

const runFile = (overrides: Partial<RunFile>): RunFile => ({
  task_id: "write.memo",
  task_bucket: "writing",
  baseline_output: "Baseline memo.",
  swarm_output: "Swarm memo.",
  metrics: {
    success: true,
    baseline_quality_score: null,
    swarm_quality_score: null,
    baseline_constraint_adherence: null,
    swarm_constraint_adherence: null,
    wall_time_seconds: 2.5,
    tokens_used: 300,
    baseline_tokens_used: 100,
    swarm_tokens_used: 200,
    error_type: null,
  },
  ...overrides,
});

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseScores", () => {
  it("reads the first two numbers", () => {
    expect(parseScores("4.0 0.95")).toEqual({ quality: 4, constraintAdherence: 0.95 });
    expect(parseScores("quality 3, adherence 0.5, confidence 0.2")).toEqual({
      quality: 3,
      constraintAdherence: 0.5,
    });
  });

  it("clamps and rounds to two decimals", () => {
    expect(parseScores("7 1.4")).toEqual({ quality: 5, constraintAdherence: 1 });
    expect(parseScores("4.567 0.123")).toEqual({ quality: 4.57, constraintAdherence: 0.12 });
  });

  it("returns null with fewer than two numbers", () => {
    expect(parseScores("")).toBeNull();
    expect(parseScores("excellent")).toBeNull();
    expect(parseScores("4")).toBeNull();
  });
});

describe("buildScoringMessages", () => {
  it("truncates the task and the output", () => {
    const [system, user] = buildScoringMessages("p".repeat(2500), "o".repeat(5000), "swarm");

    expect(system.role).toBe("system");
    expect(user.content.startsWith(`Task:\n${"p".repeat(2000)}\n\nOutput (swarm):\n`)).toBe(true);
    expect(user.content).toContain(`${"o".repeat(4000)}\n\nScore quality`);
    expect(user.content).not.toContain("o".repeat(4001));
  });
});

describe("scoreRun", () => {
  it("scores every arm that produced output", async () => {
    const scored = await scoreRun(runFile({}), "Write a memo.", fixedCaller("4 0.9"));

    expect(scored.metrics).toMatchObject({
      baseline_quality_score: 4,
      baseline_constraint_adherence: 0.9,
      swarm_quality_score: 4,
      swarm_constraint_adherence: 0.9,
      tokens_used: 300,
    });
  });

  it("skips arms without output", async () => {
    const caller = fixedCaller("4 0.9");
    const scored = await scoreRun(
      runFile({ swarm_output: null, baseline_output: "   " }),
      "Write a memo.",
      caller,
    );

    expect(caller).not.toHaveBeenCalled();
    expect(scored.metrics.baseline_quality_score).toBeNull();
    expect(scored.metrics.swarm_quality_score).toBeNull();
  });

  it("keeps earlier scores when grading fails", async () => {
    const run = runFile({
      metrics: {
        success: true,
        baseline_quality_score: 3,
        baseline_constraint_adherence: 0.7,
        wall_time_seconds: 1,
      },
    });
    const failing: ModelCaller = async () => {
      throw new Error("rate limited");
    };

    const unparsed = await scoreRun(run, "Write a memo.", fixedCaller("no idea"));
    const failed = await scoreRun(run, "Write a memo.", failing);

    expect(unparsed.metrics.baseline_quality_score).toBe(3);
    expect(failed.metrics.baseline_quality_score).toBe(3);
    expect(failed.metrics.baseline_constraint_adherence).toBe(0.7);
    expect(failed.metrics.swarm_quality_score).toBeUndefined();
  });
});

describe("scoreRunFiles", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "versonality-score-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("rewrites run files in place with the task prompt", async () => {
    const filePath = writeRunFile(dir, { ...runFile({}), judge_notes: "kept" });
    const seen: ChatMessage[][] = [];
    const caller: ModelCaller = async (messages) => {
      seen.push(messages);
      return { content: "5 1", tokensIn: 1, tokensOut: 1 };
    };

    const updated = await scoreRunFiles(dir, new Map([["write.memo", "Write a memo."]]), caller);

    expect(updated).toBe(1);
    expect(seen).toHaveLength(2);
    expect(seen[0][1].content.startsWith("Task:\nWrite a memo.\n\nOutput (baseline):\nBaseline memo.")).toBe(true);
    const stored = readRunFile(filePath);
    expect(stored?.metrics.swarm_quality_score).toBe(5);
    expect(stored?.metrics.swarm_constraint_adherence).toBe(1);
    expect(stored?.judge_notes).toBe("kept");
  });

  it("produces the same files when run twice with a deterministic grader", async () => {
    const filePath = writeRunFile(dir, runFile({}));
    const prompts = new Map([["write.memo", "Write a memo."]]);

    await scoreRunFiles(dir, prompts, fixedCaller("4.5 0.8"));
    const first = fs.readFileSync(filePath, "utf8");
    await scoreRunFiles(dir, prompts, fixedCaller("4.5 0.8"));

    expect(fs.readFileSync(filePath, "utf8")).toBe(first);
  });

  it("does nothing for a missing directory", async () => {
    const caller = fixedCaller("4 1");
    expect(await scoreRunFiles(path.join(dir, "absent"), new Map(), caller)).toBe(0);
    expect(caller).not.toHaveBeenCalled();
  });
});
