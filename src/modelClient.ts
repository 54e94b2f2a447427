import { anthropic, createAnthropic } from "@ai-sdk/anthropic";
import { createGoogleGenerativeAI, google } from "@ai-sdk/google";
import { createOpenAI, openai } from "@ai-sdk/openai";
import {
  Agent,
  type AgentInputItem,
  type Model,
  Runner,
  assistant,
  user,
} from "@openai/agents";
import { aisdk } from "@openai/agents-extensions";
import type { AiSdkProvider, BenchConfig, Pricing } from "./config.js";
import { getNumberProp } from "./records.js";
import type { CallContext, ChatMessage, ModelCaller } from "./types.js";

export type TokenUsage = {
  tokensIn: number;
  tokensOut: number;
};

export const normalizeUsage = (usage: unknown): TokenUsage => ({
  tokensIn:
    getNumberProp(usage, "inputTokens") ?? getNumberProp(usage, "promptTokens") ?? 0,
  tokensOut:
    getNumberProp(usage, "outputTokens") ??
    getNumberProp(usage, "completionTokens") ??
    0,
});

export const costUsd = (
  tokensIn: number,
  tokensOut: number,
  pricing: Pricing,
): number =>
  (tokensIn * pricing.inputPer1M + tokensOut * pricing.outputPer1M) / 1e6;

export const toAgentInput = (
  messages: ChatMessage[],
): { instructions: string; input: AgentInputItem[] } => {
  const instructions = messages
    .filter((message) => message.role === "system")
    .map((message) => message.content)
    .join("\n\n");
  const input = messages
    .filter((message) => message.role !== "system")
    .map((message) =>
      message.role === "assistant" ? assistant(message.content) : user(message.content),
    );
  return { instructions, input };
};

const buildAiSdkModel = (
  provider: AiSdkProvider,
  modelName: string,
  baseURL?: string,
): Model => {
  switch (provider) {
    case "openai":
      return aisdk((baseURL ? createOpenAI({ baseURL }) : openai)(modelName));
    case "anthropic":
      return aisdk((baseURL ? createAnthropic({ baseURL }) : anthropic)(modelName));
    case "google":
      return aisdk(
        (baseURL ? createGoogleGenerativeAI({ baseURL }) : google)(modelName),
      );
  }
};

export const buildModel = (
  config: Pick<
    BenchConfig,
    "model" | "modelProvider" | "aiSdkProvider" | "aiSdkBaseUrl"
  >,
): { model: string | Model; modelId: string } => {
  if (config.modelProvider === "aisdk") {
    return {
      model: buildAiSdkModel(config.aiSdkProvider, config.model, config.aiSdkBaseUrl),
      modelId: `aisdk:${config.aiSdkProvider}:${config.model}`,
    };
  }
  return { model: config.model, modelId: config.model };
};

const traceMetadata = (context?: CallContext): Record<string, string> | undefined =>
  context
    ? {
        run_id: context.runId,
        task_id: context.taskId,
        arm: context.arm,
        agent_id: context.agentId,
      }
    : undefined;

export const createModelCaller = (
  model: string | Model,
  options: { temperature?: number; debug?: boolean } = {},
): ModelCaller => {
  return async (messages, context) => {
    const { instructions, input } = toAgentInput(messages);
    const agent = new Agent({
      name: context ? `${context.arm}:${context.agentId}` : "evaluator",
      instructions,
      model,
      modelSettings:
        options.temperature === undefined
          ? undefined
          : { temperature: options.temperature },
    });
    const runner = new Runner({
      workflowName: context
        ? `versonality-bench:${context.taskId}:${context.arm}:${context.agentId}`
        : "versonality-bench:judge",
      traceMetadata: traceMetadata(context),
    });
    if (options.debug) {
      console.log(
        "[bench] model call",
        JSON.stringify({ context: context ?? null, messages: messages.length }),
      );
    }
    const result = await runner.run(agent, input);
    let tokensIn = 0;
    let tokensOut = 0;
    for (const response of result.rawResponses) {
      const usage = normalizeUsage(response.usage);
      tokensIn += usage.tokensIn;
      tokensOut += usage.tokensOut;
    }
    return {
      content: result.finalOutput ?? "",
      tokensIn,
      tokensOut,
    };
  };
};
