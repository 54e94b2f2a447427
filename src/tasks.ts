import fs from "node:fs";
import { defaultBenchmarkVersion } from "./config.js";
import { readJsonFile } from "./jsonFiles.js";
import { benchmarkSchema } from "./schemas.js";
import type { Benchmark, BenchmarkTask } from "./types.js";

export const loadBenchmark = (filePath: string): Benchmark =>
  benchmarkSchema.parse(JSON.parse(fs.readFileSync(filePath, "utf8")));

export const getBenchmarkVersion = (filePath: string): string =>
  readJsonFile(filePath, benchmarkSchema)?.benchmark_version ??
  defaultBenchmarkVersion;

export const filterTasks = (
  tasks: BenchmarkTask[],
  ids?: string[],
): BenchmarkTask[] =>
  ids && ids.length > 0 ? tasks.filter((task) => ids.includes(task.id)) : tasks;

export const taskPromptsById = (filePath: string): Map<string, string> => {
  const benchmark = readJsonFile(filePath, benchmarkSchema);
  return new Map((benchmark?.tasks ?? []).map((task) => [task.id, task.prompt]));
};
