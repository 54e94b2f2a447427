import fs from "node:fs";
import path from "node:path";
import type { z } from "zod";

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export const ensureDir = (dir: string): void => {
  fs.mkdirSync(dir, { recursive: true });
};

// Open-append-close on every call, so one writer per file.
export const appendJsonLine = (filePath: string, record: unknown): void => {
  ensureDir(path.dirname(filePath));
  fs.appendFileSync(filePath, `${JSON.stringify(record)}\n`, "utf8");
};

const parseJson = (text: string): { ok: true; value: unknown } | { ok: false } => {
  try {
    return { ok: true, value: JSON.parse(text) as unknown };
  } catch {
    return { ok: false };
  }
};

export const readJsonLines = <T>(filePath: string, schema: Schema<T>): T[] => {
  if (!fs.existsSync(filePath)) {
    return [];
  }
  const records: T[] = [];
  for (const line of fs.readFileSync(filePath, "utf8").split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }
    const parsed = parseJson(trimmed);
    if (!parsed.ok) {
      continue;
    }
    const result = schema.safeParse(parsed.value);
    if (result.success) {
      records.push(result.data);
    }
  }
  return records;
};

export const readJsonFile = <T>(filePath: string, schema: Schema<T>): T | null => {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch {
    return null;
  }
  const parsed = parseJson(text);
  if (!parsed.ok) {
    return null;
  }
  const result = schema.safeParse(parsed.value);
  return result.success ? result.data : null;
};

export const writeJson = (filePath: string, data: unknown): void => {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, `${JSON.stringify(data, null, 2)}\n`, "utf8");
};

export const writeText = (filePath: string, text: string): void => {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, text, "utf8");
};
