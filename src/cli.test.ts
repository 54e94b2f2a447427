import { describe, expect, it } from "vitest";
import { parseArgs } from "./cli.js";

describe("parseArgs", () => {
  it("parses a bare command", () => {
    expect(parseArgs(["aggregate"])).toEqual({
      command: "aggregate",
      taskFilter: undefined,
      benchmarkPath: undefined,
      summariesPath: undefined,
      arm: undefined,
      taskBucket: undefined,
      firstPassOnly: false,
    });
  });

  it("parses run flags", () => {
    const args = parseArgs(["run", "--tasks", "write.memo, plan.trip,", "--benchmark", "b.json"]);

    expect(args.command).toBe("run");
    expect(args.taskFilter).toEqual(["write.memo", "plan.trip"]);
    expect(args.benchmarkPath).toBe("b.json");
  });

  it("parses metrics filters", () => {
    const args = parseArgs(["metrics", "--path", "logs/x.jsonl", "--arm", "swarm", "--bucket", "coding"]);

    expect(args.summariesPath).toBe("logs/x.jsonl");
    expect(args.arm).toBe("swarm");
    expect(args.taskBucket).toBe("coding");
  });

  it("parses the first-pass switch anywhere in the flags", () => {
    expect(parseArgs(["metrics", "--first-pass", "--arm", "swarm"])).toMatchObject({
      firstPassOnly: true,
      arm: "swarm",
    });
    expect(parseArgs(["metrics", "--arm", "swarm", "--first-pass"]).firstPassOnly).toBe(true);
    expect(parseArgs(["metrics", "--arm", "swarm"]).firstPassOnly).toBe(false);
  });

  it("reads a flag without a value as true", () => {
    expect(parseArgs(["metrics", "--bucket", "--arm", "monolith"]).taskBucket).toBe("true");
  });

  it("rejects unknown commands and arms", () => {
    expect(() => parseArgs([])).toThrow("Unknown command: (none)");
    expect(() => parseArgs(["plot"])).toThrow("Unknown command: plot");
    expect(() => parseArgs(["metrics", "--arm", "duo"])).toThrow();
  });
});
