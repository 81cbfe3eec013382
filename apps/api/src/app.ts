import { Hono, type Context } from "hono";
import { ZodError } from "zod";
import {
  idempotencyKeySchema,
  leaderboardMetricSchema,
  leaderboardPeriodSchema,
  leaderboardQuerySchema,
  quizHistoryQuerySchema,
  quizSubmissionSchema,
  selectAvatarSchema,
  sessionAnswerSchema,
  startSessionSchema
} from "@quizrank/shared";
import type { ApiDatabase } from "./db/types";
import type { RuntimeEnv } from "./env";
import { createUserAuth, type ApiVariables } from "./middleware/userAuth";
import { createEngineContext, type EngineContext } from "./services/context";
import { EngineError } from "./services/errors";
import { listAchievements, listEarnedAchievements } from "./services/achievementService";
import { getAvatarStats, listAvatars, listUnlockedAvatars, selectAvatar } from "./services/avatarService";
import { getLeaderboard, getUserRanks } from "./services/leaderboardService";
import { getProfileSummary } from "./services/profileService";
import { getAttemptDetails, getQuizHistory, getQuizStats } from "./services/quizHistoryService";
import {
  abandonSession,
  getActiveSession,
  startSession,
  submitAnswer
} from "./services/sessionService";
import { submitFullAttempt } from "./services/submissionService";
import type { QuestionStore } from "./services/questionStore";
import { createLogger, log, makeRequestId, safeError, type Logger } from "./utils/logger";
import type { RandomSource } from "./utils/random";

export type ApiDependencies = {
  env: RuntimeEnv;
  db: ApiDatabase;
  logger?: Logger;
  questionStore?: QuestionStore;
  now?: () => Date;
  random?: RandomSource;
};

export type ApiEnv = { Variables: ApiVariables };

const requireUser = (c: Context<ApiEnv>) => {
  const user = c.get("user");
  if (!user) {
    throw new Error("Authenticated route reached without a user");
  }
  return user;
};

export const createApiApp = ({ env, db, logger: baseLogger, questionStore, now, random }: ApiDependencies) => {
  const app = new Hono<ApiEnv>();
  const logger = baseLogger ?? createLogger({ service: "api" });
  const userAuth = createUserAuth(env, db);

  const contextFor = (c: Context<ApiEnv>, endpoint: string): EngineContext =>
    createEngineContext({
      db,
      settings: env,
      logger: logger.child({ requestId: c.get("requestId"), endpoint }),
      questionStore,
      now,
      random
    });

  app.use(async (c, next) => {
    const requestId = c.req.header("x-request-id") ?? makeRequestId();
    c.set("requestId", requestId);
    c.set("user", null);
    c.header("x-request-id", requestId);
    const start = Date.now();
    log("info", "request.start", {
      requestId,
      method: c.req.method,
      path: c.req.path
    });
    try {
      await next();
    } finally {
      log("info", "request.end", {
        requestId,
        status: c.res.status,
        duration_ms: Date.now() - start,
        userId: c.get("user")?.id ?? null
      });
    }
  });

  app.onError((error, c) => {
    const requestId = c.get("requestId");
    if (error instanceof EngineError) {
      log("warn", "request.rejected", {
        requestId,
        code: error.code,
        ...error.logFields
      });
      return c.json({ error: error.message, code: error.code }, error.status);
    }
    if (error instanceof ZodError) {
      return c.json({ error: "Invalid request", details: error.flatten() }, 400);
    }
    if (error instanceof SyntaxError) {
      return c.json({ error: "Invalid JSON body" }, 400);
    }
    log("error", "request.error", { requestId, error: safeError(error) });
    return c.json({ error: "Internal server error", requestId }, 500);
  });

  app.get("/api/v1/health", (c) => c.json({ status: "ok" }));

  // Catalogue and leaderboards are public; a token, when sent, personalises them.
  app.use("/api/v1/achievements", async (c, next) =>
    c.req.header("Authorization") ? userAuth(c, next) : next()
  );
  app.use("/api/v1/avatars", async (c, next) =>
    c.req.header("Authorization") ? userAuth(c, next) : next()
  );
  app.use("/api/v1/leaderboard/:metric", async (c, next) =>
    c.req.header("Authorization") ? userAuth(c, next) : next()
  );
  app.use("/api/v1/me", userAuth);
  app.use("/api/v1/sessions", userAuth);
  app.use("/api/v1/sessions/*", userAuth);
  app.use("/api/v1/quiz/*", userAuth);
  app.use("/api/v1/achievements/earned", userAuth);
  app.use("/api/v1/avatars/*", userAuth);
  app.use("/api/v1/leaderboard/me/*", userAuth);

  app.get("/api/v1/me", async (c) => {
    const user = requireUser(c);
    return c.json(await getProfileSummary(contextFor(c, "me"), user.id));
  });

  app.post("/api/v1/sessions", async (c) => {
    const user = requireUser(c);
    const data = startSessionSchema.parse(await c.req.json());
    const session = await startSession(contextFor(c, "sessions_start"), {
      userId: user.id,
      examType: data.exam_type,
      mode: data.mode,
      count: data.count,
      domain: data.domain ?? null,
      seed: data.seed ?? null
    });
    return c.json(session, 201);
  });

  app.get("/api/v1/sessions/active", async (c) => {
    const user = requireUser(c);
    const session = await getActiveSession(contextFor(c, "sessions_active"), user.id);
    if (!session) {
      return c.json({ error: "No active session" }, 404);
    }
    return c.json(session);
  });

  app.post("/api/v1/sessions/:id/answers", async (c) => {
    const user = requireUser(c);
    const data = sessionAnswerSchema.parse(await c.req.json());
    const feedback = await submitAnswer(contextFor(c, "sessions_answer"), {
      userId: user.id,
      sessionId: c.req.param("id"),
      questionId: data.question_id,
      userAnswer: data.user_answer
    });
    return c.json(feedback);
  });

  app.delete("/api/v1/sessions/:id", async (c) => {
    const user = requireUser(c);
    await abandonSession(contextFor(c, "sessions_abandon"), {
      userId: user.id,
      sessionId: c.req.param("id")
    });
    return c.body(null, 204);
  });

  app.post("/api/v1/quiz/submit", async (c) => {
    const user = requireUser(c);
    const data = quizSubmissionSchema.parse(await c.req.json());
    const keyHeader = c.req.header("Idempotency-Key");
    const idempotencyKey = keyHeader === undefined ? null : idempotencyKeySchema.parse(keyHeader);
    const result = await submitFullAttempt(contextFor(c, "quiz_submit"), {
      userId: user.id,
      examType: data.exam_type,
      totalQuestions: data.total_questions,
      answers: data.answers,
      timeTakenSeconds: data.time_taken_seconds ?? null,
      idempotencyKey
    });
    return c.json(result, result.replayed ? 200 : 201);
  });

  app.get("/api/v1/quiz/history", async (c) => {
    const user = requireUser(c);
    const query = quizHistoryQuerySchema.parse(c.req.query());
    return c.json(
      await getQuizHistory(contextFor(c, "quiz_history"), user.id, {
        limit: query.limit,
        offset: query.offset,
        examType: query.exam_type ?? null
      })
    );
  });

  app.get("/api/v1/quiz/stats", async (c) => {
    const user = requireUser(c);
    return c.json(await getQuizStats(contextFor(c, "quiz_stats"), user.id));
  });

  app.get("/api/v1/quiz/attempts/:id", async (c) => {
    const user = requireUser(c);
    return c.json(await getAttemptDetails(contextFor(c, "quiz_attempt"), user.id, c.req.param("id")));
  });

  app.get("/api/v1/achievements", async (c) => {
    const user = c.get("user");
    return c.json(await listAchievements(contextFor(c, "achievements_list"), user?.id ?? null));
  });

  app.get("/api/v1/achievements/earned", async (c) => {
    const user = requireUser(c);
    return c.json(await listEarnedAchievements(contextFor(c, "achievements_earned"), user.id));
  });

  app.get("/api/v1/avatars", async (c) => {
    const user = c.get("user");
    return c.json(await listAvatars(contextFor(c, "avatars_list"), user?.id ?? null));
  });

  app.get("/api/v1/avatars/unlocked", async (c) => {
    const user = requireUser(c);
    return c.json(await listUnlockedAvatars(contextFor(c, "avatars_unlocked"), user.id));
  });

  app.get("/api/v1/avatars/stats", async (c) => {
    const user = requireUser(c);
    return c.json(await getAvatarStats(contextFor(c, "avatars_stats"), user.id));
  });

  app.put("/api/v1/avatars/selected", async (c) => {
    const user = requireUser(c);
    const data = selectAvatarSchema.parse(await c.req.json());
    return c.json(
      await selectAvatar(contextFor(c, "avatars_select"), { userId: user.id, avatarId: data.avatar_id })
    );
  });

  app.get("/api/v1/leaderboard/me/ranks", async (c) => {
    const user = requireUser(c);
    const period = leaderboardPeriodSchema.default("all_time").parse(c.req.query("period"));
    return c.json(await getUserRanks(contextFor(c, "leaderboard_ranks"), user.id, period));
  });

  app.get("/api/v1/leaderboard/:metric", async (c) => {
    const metric = leaderboardMetricSchema.parse(c.req.param("metric"));
    const query = leaderboardQuerySchema.parse(c.req.query());
    const user = c.get("user");
    const board = await getLeaderboard(
      contextFor(c, "leaderboard"),
      metric,
      {
        period: query.period,
        limit: query.limit,
        minimumQuizzes: query.minimum_quizzes,
        examType: query.exam_type ?? null
      },
      user?.id ?? null
    );
    return c.json(board);
  });

  return app;
};
