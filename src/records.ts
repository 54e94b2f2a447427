// Narrowing helpers for loosely shaped SDK objects.

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

export const getRecordProp = (value: unknown, key: string): unknown =>
  isRecord(value) ? value[key] : undefined;

export const getStringProp = (value: unknown, key: string): string | undefined => {
  const prop = getRecordProp(value, key);
  return typeof prop === "string" ? prop : undefined;
};

export const getNumberProp = (value: unknown, key: string): number | undefined => {
  const prop = getRecordProp(value, key);
  return typeof prop === "number" && Number.isFinite(prop) ? prop : undefined;
};
