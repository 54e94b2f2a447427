import { writeJson } from "./jsonFiles.js";
import { loadStoredRunFiles } from "./runFiles.js";
import { roundTo } from "./stats.js";
import type { ChatMessage, ModelCaller, RunFile } from "./types.js";

export const EVAL_SYSTEM_PROMPT = `You are an evaluator. Reply with exactly two numbers on one line: quality constraint_adherence.
- quality: 0 to 5 (5 = excellent, correct, complete; 0 = wrong or empty).
- constraint_adherence: 0 to 1 (1 = fully followed instructions/constraints; 0 = ignored).
Output format: two numbers separated by a space, e.g. 4.0 0.95`;

const TASK_PROMPT_LIMIT = 2000;
const OUTPUT_LIMIT = 4000;

export type Scores = {
  quality: number;
  constraintAdherence: number;
};

type ScoredArm = "baseline" | "swarm";

const clamp = (value: number, min: number, max: number): number =>
  Math.max(min, Math.min(max, value));

export const parseScores = (reply: string): Scores | null => {
  const numbers: string[] = reply.trim().match(/[0-9]+\.?[0-9]*/g) ?? [];
  if (numbers.length < 2) {
    return null;
  }
  const quality = Number.parseFloat(numbers[0]);
  const constraintAdherence = Number.parseFloat(numbers[1]);
  if (!Number.isFinite(quality) || !Number.isFinite(constraintAdherence)) {
    return null;
  }
  return {
    quality: roundTo(clamp(quality, 0, 5), 2),
    constraintAdherence: roundTo(clamp(constraintAdherence, 0, 1), 2),
  };
};

export const buildScoringMessages = (
  taskPrompt: string,
  output: string,
  arm: ScoredArm,
): ChatMessage[] => [
  { role: "system", content: EVAL_SYSTEM_PROMPT },
  {
    role: "user",
    content:
      `Task:\n${taskPrompt.slice(0, TASK_PROMPT_LIMIT)}\n\n` +
      `Output (${arm}):\n${output.slice(0, OUTPUT_LIMIT)}\n\n` +
      "Score quality 0-5 and constraint_adherence 0-1. One line: quality constraint_adherence",
  },
];

export const scoreOutput = async (
  caller: ModelCaller,
  taskPrompt: string,
  output: string,
  arm: ScoredArm,
): Promise<Scores | null> => {
  if (!output.trim()) {
    return null;
  }
  let reply: string;
  try {
    reply = (await caller(buildScoringMessages(taskPrompt, output, arm))).content;
  } catch (error) {
    console.log(
      `[score] ${arm} grading call failed: ${
        error instanceof Error ? error.message : String(error)
      }`,
    );
    return null;
  }
  return parseScores(reply);
};

// Arms that could not be scored keep their previous values.
export const scoreRun = async (
  run: RunFile,
  taskPrompt: string,
  caller: ModelCaller,
): Promise<RunFile> => {
  const metrics = { ...run.metrics };

  if (run.baseline_output !== null && run.baseline_output !== undefined) {
    const scores = await scoreOutput(caller, taskPrompt, run.baseline_output, "baseline");
    if (scores) {
      metrics.baseline_quality_score = scores.quality;
      metrics.baseline_constraint_adherence = scores.constraintAdherence;
    }
  }

  if (run.swarm_output !== null && run.swarm_output !== undefined) {
    const scores = await scoreOutput(caller, taskPrompt, run.swarm_output, "swarm");
    if (scores) {
      metrics.swarm_quality_score = scores.quality;
      metrics.swarm_constraint_adherence = scores.constraintAdherence;
    }
  }

  return { ...run, metrics };
};

export const scoreRunFiles = async (
  runsDir: string,
  promptsById: Map<string, string>,
  caller: ModelCaller,
): Promise<number> => {
  let updated = 0;
  for (const { filePath, run } of loadStoredRunFiles(runsDir)) {
    const scored = await scoreRun(run, promptsById.get(run.task_id) ?? "", caller);
    writeJson(filePath, scored);
    updated += 1;
  }
  return updated;
};
