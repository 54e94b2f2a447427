import { BudgetExceededError } from "./errors.js";
import type { EventLogWriter } from "./runLogging.js";
import type { Arm, ChatMessage, ModelCaller, ModelReply, Phase } from "./types.js";

export const SWARM_SYSTEM_PROMPT = `You are part of a Swarm Versonalities v1 workflow. Follow these rules strictly:

1. Use exactly ONE versonality at a time
2. Do NOT skip roles in the sequence
3. Planner: Create a plan but do NOT solve the task
4. Analyst: Analyze requirements but do NOT draft output
5. Builder: Create the actual output
6. Critic: Review and provide feedback but do NOT rewrite
7. Editor: Produce the final clean artifact

Current role will be specified in each message.`;

export type SwarmRole = {
  agentId: string;
  phase: Phase;
  roleName: string;
  instruction: string;
};

export const swarmRoles: SwarmRole[] = [
  {
    agentId: "planner",
    phase: "plan",
    roleName: "PLANNER",
    instruction: "Create a plan for completing this task. Do NOT solve it.",
  },
  {
    agentId: "analyst",
    phase: "decide",
    roleName: "ANALYST",
    instruction: "Analyze the requirements and plan. Do NOT draft any output.",
  },
  {
    agentId: "builder",
    phase: "act",
    roleName: "BUILDER",
    instruction: "Create the actual output based on the plan and analysis.",
  },
  {
    agentId: "critic",
    phase: "verify",
    roleName: "CRITIC",
    instruction: "Review the output and provide feedback. Do NOT rewrite it.",
  },
  {
    agentId: "builder2",
    phase: "act",
    roleName: "BUILDER",
    instruction: "Revise the output based on the critic's feedback.",
  },
  {
    agentId: "editor",
    phase: "finalize",
    roleName: "EDITOR",
    instruction:
      "Produce the final clean artifact. Output ONLY the final result, no meta-commentary.",
  },
];

export type ArmContext = {
  runId: string;
  taskId: string;
  taskBucket: string;
  seed?: number;
  maxTokens?: number;
  events?: EventLogWriter;
};

export type ArmResult = {
  output: string;
  tokensIn: number;
  tokensOut: number;
  handoffs: number;
};

type Step = {
  arm: Arm;
  agentId: string;
  versonality: string;
  phase: Phase;
  handoffTo?: string;
};

const logStep = (
  ctx: ArmContext,
  step: Step,
  event: "message" | "end" | "error",
  usage: { tokensIn?: number; tokensOut?: number; handoffTo?: string } = {},
): void => {
  ctx.events?.append({
    runId: ctx.runId,
    taskId: ctx.taskId,
    arm: step.arm,
    agentId: step.agentId,
    versonality: step.versonality,
    phase: step.phase,
    event,
    taskBucket: ctx.taskBucket,
    seed: ctx.seed,
    ...usage,
  });
};

type Spent = { tokensIn: number; tokensOut: number };

// A reply that takes the arm over its token budget is logged as the step's
// error event in place of its end event.
const callStep = async (
  caller: ModelCaller,
  messages: ChatMessage[],
  ctx: ArmContext,
  step: Step,
  spent: Spent = { tokensIn: 0, tokensOut: 0 },
): Promise<ModelReply> => {
  logStep(ctx, step, "message");
  let reply: ModelReply;
  try {
    reply = await caller(messages, {
      runId: ctx.runId,
      taskId: ctx.taskId,
      arm: step.arm,
      agentId: step.agentId,
    });
  } catch (error) {
    logStep(ctx, step, "error");
    throw error;
  }
  const tokensIn = spent.tokensIn + reply.tokensIn;
  const tokensOut = spent.tokensOut + reply.tokensOut;
  if (ctx.maxTokens !== undefined && tokensIn + tokensOut > ctx.maxTokens) {
    logStep(ctx, step, "error", {
      tokensIn: reply.tokensIn,
      tokensOut: reply.tokensOut,
    });
    throw new BudgetExceededError(ctx.maxTokens, tokensIn, tokensOut);
  }
  logStep(ctx, step, "end", {
    tokensIn: reply.tokensIn,
    tokensOut: reply.tokensOut,
    handoffTo: step.handoffTo,
  });
  return reply;
};

export const runBaseline = async (
  caller: ModelCaller,
  prompt: string,
  ctx: ArmContext,
): Promise<ArmResult> => {
  const reply = await callStep(caller, [{ role: "user", content: prompt }], ctx, {
    arm: "monolith",
    agentId: "monolith",
    versonality: "monolith",
    phase: "act",
  });
  return {
    output: reply.content,
    tokensIn: reply.tokensIn,
    tokensOut: reply.tokensOut,
    handoffs: 0,
  };
};

const roleMessage = (role: SwarmRole, task: string): string => {
  if (role.agentId === "planner") {
    return `Role: ${role.roleName}\n\nTask: ${task}\n\n${role.instruction}`;
  }
  return `Role: ${role.roleName}\n\n${role.instruction}`;
};

export const runSwarm = async (
  caller: ModelCaller,
  prompt: string,
  ctx: ArmContext,
  roles: SwarmRole[] = swarmRoles,
): Promise<ArmResult> => {
  const conversation: ChatMessage[] = [
    { role: "system", content: SWARM_SYSTEM_PROMPT },
  ];
  let tokensIn = 0;
  let tokensOut = 0;
  let output = "";
  let handoffs = 0;

  for (const [index, role] of roles.entries()) {
    const next = index + 1 < roles.length ? roles[index + 1] : undefined;
    conversation.push({ role: "user", content: roleMessage(role, prompt) });
    const reply = await callStep(
      caller,
      [...conversation],
      ctx,
      {
        arm: "swarm",
        agentId: role.agentId,
        versonality: role.roleName.toLowerCase(),
        phase: role.phase,
        handoffTo: next?.agentId,
      },
      { tokensIn, tokensOut },
    );
    tokensIn += reply.tokensIn;
    tokensOut += reply.tokensOut;
    conversation.push({ role: "assistant", content: reply.content });
    output = reply.content;
    if (next) {
      handoffs += 1;
    }
  }

  return { output, tokensIn, tokensOut, handoffs };
};
