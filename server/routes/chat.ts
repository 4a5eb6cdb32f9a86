import type { Express, Request } from "express";
import { z } from "zod";
import { authOf, requireAuth } from "../auth.js";
import {
  extractGoal,
  formatConversation,
  generateChatResponse,
  GREETING,
  summarizeConversation,
  type ChatReply,
  type Extraction,
} from "../ai.js";
import { dayKeyFromIso, nowIso } from "../db.js";
import {
  badRequest,
  forbidden,
  HttpError,
  notFound,
  serviceUnavailable,
  tooManyRequests,
  validationError,
  wrap,
} from "../errors.js";
import { evaluateCoaching, evaluateFrustration, evaluateGoalExtraction, judgeInBackground } from "../evaluation.js";
import { createGoalFromExtraction, getGoalWithMilestones } from "../goals.js";
import { errorContext, logger } from "../logger.js";
import { chatMessageJson, chatSessionJson, chatSessionSummaryJson, goalDetailJson } from "../serializers.js";
import {
  addChatMessage,
  addTokensUsed,
  createChatSession,
  deleteChatSession,
  getChatSession,
  getUserById,
  listChatMessages,
  listChatSessions,
  setChatSessionTitle,
  touchChatSession,
} from "../storage.js";
import type { ChatMessage } from "../types.js";

const MessageSchema = z.object({
  content: z.string().trim().min(1).max(5000),
});

const AI_UNAVAILABLE = "AI service temporarily unavailable. Please try again.";

/** Session by id, only for its owner. */
async function ownedSession(req: Request) {
  const session = await getChatSession(String(req.params.id));
  if (!session) throw notFound("Chat session not found");
  if (session.userId !== authOf(req).userId) throw forbidden();
  return session;
}

function lastOfRole(messages: ChatMessage[], role: ChatMessage["role"]) {
  for (let i = messages.length - 1; i >= 0; i--) {
    const m = messages[i];
    if (m && m.role === role) return m;
  }
  return null;
}

export function registerChatRoutes(app: Express) {
  app.post(
    "/api/chat/start",
    requireAuth,
    wrap(async (req, res) => {
      const session = await createChatSession(authOf(req).userId);
      const greeting = await addChatMessage(session.id, "assistant", GREETING);
      return res.status(201).json({ ...chatSessionJson(session), messages: [chatMessageJson(greeting)] });
    }),
  );

  app.get(
    "/api/chat/sessions",
    requireAuth,
    wrap(async (req, res) => {
      const sessions = await listChatSessions(authOf(req).userId);
      return res.json({ sessions: sessions.map(chatSessionSummaryJson) });
    }),
  );

  app.get(
    "/api/chat/:id",
    requireAuth,
    wrap(async (req, res) => {
      const session = await ownedSession(req);
      const messages = await listChatMessages(session.id);
      return res.json({ ...chatSessionJson(session), messages: messages.map(chatMessageJson) });
    }),
  );

  app.post(
    "/api/chat/:id/message",
    requireAuth,
    wrap(async (req, res) => {
      const parsed = MessageSchema.safeParse(req.body);
      if (!parsed.success) throw validationError(parsed.error);

      const session = await ownedSession(req);
      if (session.status !== "active") throw badRequest("Chat session is not active");

      const user = await getUserById(session.userId);
      if (!user) throw notFound("User not found");
      if (user.tokensUsed >= user.tokenLimit) throw tooManyRequests("Token quota exceeded");

      const prior = await listChatMessages(session.id);
      const userMessage = await addChatMessage(session.id, "user", parsed.data.content);
      const history = [...prior, userMessage];

      let reply: ChatReply;
      try {
        reply = await generateChatResponse(history);
      } catch (err) {
        logger.error("Chat completion failed", { sessionId: session.id, ...errorContext(err) });
        throw serviceUnavailable(AI_UNAVAILABLE);
      }

      const assistantMessage = await addChatMessage(session.id, "assistant", reply.content);
      await touchChatSession(session.id);
      await addTokensUsed(user.id, reply.tokensUsed);

      if (!reply.fallback) {
        const scope = { userId: user.id, sessionId: session.id };
        judgeInBackground("coaching_quality", () => evaluateCoaching(scope, userMessage.content, reply.content));

        const previousReply = lastOfRole(prior, "assistant");
        const firstUserMessage = prior.find((m) => m.role === "user");
        if (previousReply && firstUserMessage) {
          judgeInBackground("frustration", () =>
            evaluateFrustration(scope, {
              originalUserInput: firstUserMessage.content,
              previousAiResponse: previousReply.content,
              currentUserReply: userMessage.content,
            }),
          );
        }
      }

      let title = session.title;
      if (!title && history.length + 1 >= 3) {
        title = await summarizeConversation([...history, assistantMessage]);
        await setChatSessionTitle(session.id, title);
      }

      return res.json({
        user_message: chatMessageJson(userMessage),
        assistant_message: chatMessageJson(assistantMessage),
        session_title: title,
      });
    }),
  );

  app.post(
    "/api/chat/:id/finalize",
    requireAuth,
    wrap(async (req, res) => {
      const session = await ownedSession(req);
      if (session.status !== "active") throw badRequest("Session already finalized");

      const messages = await listChatMessages(session.id);
      if (messages.length < 2) throw badRequest("Not enough conversation to extract a goal");

      let extraction: Extraction;
      try {
        extraction = await extractGoal(messages, dayKeyFromIso(nowIso()));
      } catch (err) {
        if (err instanceof HttpError) throw err;
        logger.error("Goal extraction failed", { sessionId: session.id, ...errorContext(err) });
        throw serviceUnavailable(AI_UNAVAILABLE);
      }

      const extracted = extraction.goal;
      if (!extracted) throw new HttpError(422, "Could not extract a goal from this conversation");

      const userId = authOf(req).userId;
      const created = await createGoalFromExtraction(userId, session.id, extracted);
      await addTokensUsed(userId, extraction.tokensUsed);
      logger.info("Goal created from chat", { goalId: created.id, milestones: extracted.milestones.length });

      judgeInBackground("goal_extraction_quality", () =>
        evaluateGoalExtraction({ userId, sessionId: session.id }, formatConversation(messages), extracted),
      );

      const goal = await getGoalWithMilestones(created.id, userId);
      if (!goal) throw notFound("Goal not found");
      return res.status(201).json({
        goal: goalDetailJson(goal),
        message: `Goal '${goal.title}' created with roadmap!`,
      });
    }),
  );

  app.delete(
    "/api/chat/:id",
    requireAuth,
    wrap(async (req, res) => {
      const session = await ownedSession(req);
      await deleteChatSession(session.id);
      return res.status(204).end();
    }),
  );
}
