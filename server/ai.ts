// OpenAI access: coaching replies, session titles, goal roadmap extraction and JSON completions for judges/agents.
import OpenAI from "openai";
import { getConfig } from "./config.js";
import { serviceUnavailable } from "./errors.js";
import { logger } from "./logger.js";
import { fillTemplate, loadPrompt, TITLE_SUMMARY_SYSTEM } from "./prompts.js";
import {
  GOAL_CATEGORIES,
  TASK_PRIORITIES,
  pickEnum,
  type ExtractedGoal,
  type ExtractedMilestone,
  type ExtractedTask,
  type MessageRole,
} from "./types.js";

type ChatTurn = { role: MessageRole; content: string };
type MessageParam = OpenAI.Chat.ChatCompletionMessageParam;

export const GREETING =
  "Hi! I'm your AI goal coach. Tell me about a goal you'd like to achieve. " +
  "It could be a New Year resolution, a short-term target, or a long-term dream. " +
  "What's on your mind?";

export const FALLBACK_REPLY =
  "I'm having trouble connecting to my AI brain right now. " +
  "Please try again in a moment, or describe your goal and I'll help once I'm back online.";

export const DEFAULT_TITLE = "Goal Discussion";

let client: OpenAI | null | undefined;

/** Shared client; null when OPENAI_API_KEY is not set. */
export function getOpenAI() {
  if (client !== undefined) return client;
  const { openaiApiKey } = getConfig();
  client = openaiApiKey ? new OpenAI({ apiKey: openaiApiKey }) : null;
  return client;
}

export function resetOpenAI() {
  client = undefined;
}

export function aiConfigured() {
  return getOpenAI() !== null;
}

function requireClient() {
  const c = getOpenAI();
  if (!c) throw serviceUnavailable("AI service not configured");
  return c;
}

function toParams(messages: ChatTurn[]): MessageParam[] {
  return messages.map((m) => {
    if (m.role === "assistant") return { role: "assistant", content: m.content };
    if (m.role === "system") return { role: "system", content: m.content };
    return { role: "user", content: m.content };
  });
}

export type ChatReply = { content: string; tokensUsed: number; fallback: boolean };

/**
 * Coach reply for a conversation. Without an API key the fallback text is
 * returned; any API failure propagates.
 */
export async function generateChatResponse(history: ChatTurn[]): Promise<ChatReply> {
  const c = getOpenAI();
  if (!c) return { content: FALLBACK_REPLY, tokensUsed: 0, fallback: true };

  const system = await loadPrompt("goal_coach_system");
  const response = await c.chat.completions.create({
    model: getConfig().aiModel,
    messages: [{ role: "system", content: system }, ...toParams(history)],
    max_tokens: 1000,
    temperature: 0.7,
  });

  return {
    content: response.choices[0]?.message?.content ?? "",
    tokensUsed: response.usage?.total_tokens ?? 0,
    fallback: false,
  };
}

/** Short title for a session; never throws. */
export async function summarizeConversation(history: ChatTurn[]) {
  const c = getOpenAI();
  if (!c) return DEFAULT_TITLE;

  const context = history
    .slice(0, 5)
    .map((m) => `${m.role}: ${m.content.slice(0, 200)}`)
    .join("\n");

  try {
    const response = await c.chat.completions.create({
      model: getConfig().aiModel,
      messages: [
        { role: "system", content: TITLE_SUMMARY_SYSTEM },
        { role: "user", content: context },
      ],
      max_tokens: 20,
      temperature: 0.3,
    });
    const title = (response.choices[0]?.message?.content ?? "").trim().replace(/^["']|["']$/g, "");
    return title ? title.slice(0, 200) : DEFAULT_TITLE;
  } catch (err) {
    logger.warn("Title summary failed", { error: String(err) });
    return DEFAULT_TITLE;
  }
}

export const GOAL_ROADMAP_FUNCTION = "create_goal_roadmap";

export const GOAL_EXTRACTION_TOOL: OpenAI.Chat.ChatCompletionTool = {
  type: "function",
  function: {
    name: GOAL_ROADMAP_FUNCTION,
    description: "Extract a structured goal with milestones and tasks from the conversation",
    parameters: {
      type: "object",
      properties: {
        title: {
          type: "string",
          description: "A concise, action-oriented title for the goal (e.g., 'Learn Spanish to conversational level')",
        },
        description: { type: "string", description: "A 1-2 sentence description of the goal and why it matters" },
        category: {
          type: "string",
          enum: [...GOAL_CATEGORIES],
          description: "The category that best fits this goal",
        },
        target_date: { type: "string", description: "Target completion date in YYYY-MM-DD format" },
        milestones: {
          type: "array",
          description: "3-7 major checkpoints to achieve the goal",
          items: {
            type: "object",
            properties: {
              title: { type: "string", description: "Milestone title" },
              description: { type: "string", description: "Brief description of what this milestone involves" },
              target_date: { type: "string", description: "Target date for this milestone in YYYY-MM-DD format" },
              tasks: {
                type: "array",
                description: "2-5 specific, actionable tasks for this milestone",
                items: {
                  type: "object",
                  properties: {
                    title: { type: "string", description: "Task title - should be specific and actionable" },
                    description: { type: "string", description: "Optional details about the task" },
                    priority: { type: "string", enum: [...TASK_PRIORITIES], description: "Task priority level" },
                  },
                  required: ["title"],
                },
              },
            },
            required: ["title", "tasks"],
          },
        },
      },
      required: ["title", "description", "category", "milestones"],
    },
  },
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function text(v: unknown) {
  return typeof v === "string" ? v.trim() : "";
}

function textOrNull(v: unknown) {
  return text(v) || null;
}

/** YYYY-MM-DD that is also a real calendar date, else null. */
export function validDateOrNull(v: unknown) {
  const s = text(v);
  if (!/^\d{4}-\d{2}-\d{2}$/.test(s)) return null;
  const d = new Date(`${s}T00:00:00.000Z`);
  if (Number.isNaN(d.getTime()) || d.toISOString().slice(0, 10) !== s) return null;
  return s;
}

function parseTasks(v: unknown): ExtractedTask[] {
  if (!Array.isArray(v)) return [];
  const out: ExtractedTask[] = [];
  for (const t of v) {
    if (!isRecord(t) || !text(t.title)) continue;
    out.push({
      title: text(t.title),
      description: textOrNull(t.description),
      priority: pickEnum(TASK_PRIORITIES, t.priority, "medium"),
    });
  }
  return out;
}

/** Turns a tool call into a goal tree; null for anything that is not a usable create_goal_roadmap call. */
export function parseExtraction(call: { name: string; arguments: string } | null | undefined): ExtractedGoal | null {
  if (!call || call.name !== GOAL_ROADMAP_FUNCTION) return null;

  let data: unknown;
  try {
    data = JSON.parse(call.arguments);
  } catch {
    return null;
  }
  if (!isRecord(data)) return null;

  const milestones: ExtractedMilestone[] = [];
  if (Array.isArray(data.milestones)) {
    for (const m of data.milestones) {
      if (!isRecord(m) || !text(m.title)) continue;
      milestones.push({
        title: text(m.title),
        description: textOrNull(m.description),
        targetDate: validDateOrNull(m.target_date),
        tasks: parseTasks(m.tasks),
      });
    }
  }

  return {
    title: text(data.title) || "My Goal",
    description: textOrNull(data.description),
    category: pickEnum(GOAL_CATEGORIES, data.category, "other"),
    targetDate: validDateOrNull(data.target_date),
    milestones,
  };
}

export function formatConversation(history: ChatTurn[]) {
  return history.map((m) => `${m.role.toUpperCase()}: ${m.content}`).join("\n");
}

export type Extraction = { goal: ExtractedGoal | null; tokensUsed: number };

/** Forced function call over the whole conversation. Throws 503 without an API key. */
export async function extractGoal(history: ChatTurn[], today: string): Promise<Extraction> {
  const c = requireClient();
  const [system, template] = await Promise.all([
    loadPrompt("goal_extraction_system"),
    loadPrompt("goal_extraction_template"),
  ]);

  const response = await c.chat.completions.create({
    model: getConfig().aiModel,
    messages: [
      { role: "system", content: system },
      { role: "user", content: fillTemplate(template, { date: today, conversation: formatConversation(history) }) },
    ],
    tools: [GOAL_EXTRACTION_TOOL],
    tool_choice: { type: "function", function: { name: GOAL_ROADMAP_FUNCTION } },
    max_tokens: 2000,
    temperature: 0.3,
  });

  const toolCall = response.choices[0]?.message?.tool_calls?.[0];
  return {
    goal: parseExtraction(toolCall ? toolCall.function : null),
    tokensUsed: response.usage?.total_tokens ?? 0,
  };
}

export type JsonCompletion = { data: unknown; raw: string; tokensUsed: number };

/**
 * JSON-mode completion used by the judges and agents. `data` is null when the
 * model's text is not valid JSON.
 */
export async function completeJson(
  system: string,
  user: string,
  opts: { temperature: number; maxTokens?: number },
): Promise<JsonCompletion> {
  const c = requireClient();
  const response = await c.chat.completions.create({
    model: getConfig().aiModel,
    messages: [
      { role: "system", content: system },
      { role: "user", content: user },
    ],
    response_format: { type: "json_object" },
    temperature: opts.temperature,
    max_tokens: opts.maxTokens ?? 1500,
  });

  const raw = response.choices[0]?.message?.content ?? "";
  let data: unknown = null;
  try {
    data = JSON.parse(raw);
  } catch {
    data = null;
  }
  return { data, raw, tokensUsed: response.usage?.total_tokens ?? 0 };
}
