import fs from "node:fs";
import path from "node:path";
import { readJsonFile, writeJson } from "./jsonFiles.js";
import { runFileSchema } from "./schemas.js";
import type { RunFile } from "./types.js";

export const sanitizeLabel = (value: string): string =>
  value.replace(/[^a-z0-9._-]+/gi, "_");

export const runFilePath = (runsDir: string, taskId: string): string =>
  path.join(runsDir, `${sanitizeLabel(taskId)}.json`);

const listRunFileNames = (runsDir: string): string[] => {
  if (!fs.existsSync(runsDir)) {
    return [];
  }
  return fs
    .readdirSync(runsDir)
    .filter((name) => name.endsWith(".json"))
    .sort();
};

export type StoredRunFile = {
  filePath: string;
  run: RunFile;
};

export const loadStoredRunFiles = (runsDir: string): StoredRunFile[] => {
  const stored: StoredRunFile[] = [];
  for (const name of listRunFileNames(runsDir)) {
    const filePath = path.join(runsDir, name);
    const run = readJsonFile(filePath, runFileSchema);
    if (run) {
      stored.push({ filePath, run });
    }
  }
  return stored;
};

export const loadRunFiles = (runsDir: string): RunFile[] =>
  loadStoredRunFiles(runsDir).map(({ run }) => run);

export const readRunFile = (filePath: string): RunFile | null =>
  readJsonFile(filePath, runFileSchema);

export const writeRunFile = (runsDir: string, run: RunFile): string => {
  const filePath = runFilePath(runsDir, run.task_id);
  writeJson(filePath, run);
  return filePath;
};
