import { armSchema } from "./schemas.js";
import type { Arm } from "./types.js";

export const commands = ["run", "score", "aggregate", "evaluate", "metrics"] as const;

export type Command = (typeof commands)[number];

export type CliArgs = {
  command: Command;
  taskFilter?: string[];
  benchmarkPath?: string;
  summariesPath?: string;
  arm?: Arm;
  taskBucket?: string;
  firstPassOnly: boolean;
};

const isCommand = (value: string | undefined): value is Command =>
  commands.some((command) => command === value);

const parseList = (value?: string): string[] => {
  if (!value) {
    return [];
  }
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
};

export const parseArgs = (argv: string[]): CliArgs => {
  const [command, ...rest] = argv;
  if (!isCommand(command)) {
    throw new Error(
      `Unknown command: ${command ?? "(none)"}. Expected one of: ${commands.join(", ")}.`,
    );
  }

  const args = new Map<string, string>();
  for (let i = 0; i < rest.length; i += 1) {
    const key = rest[i];
    const value = rest[i + 1];
    if (!key || !key.startsWith("--")) {
      continue;
    }
    if (!value || value.startsWith("--")) {
      args.set(key, "true");
      continue;
    }
    args.set(key, value);
    i += 1;
  }

  const taskFilter = parseList(args.get("--tasks"));
  const armValue = args.get("--arm");
  const arm = armValue === undefined ? undefined : armSchema.parse(armValue);

  return {
    command,
    taskFilter: taskFilter.length > 0 ? taskFilter : undefined,
    benchmarkPath: args.get("--benchmark"),
    summariesPath: args.get("--path"),
    arm,
    taskBucket: args.get("--bucket"),
    firstPassOnly: args.get("--first-pass") === "true",
  };
};
