import { and, asc, eq, gt, gte, lte, or, sql, type SQL } from "drizzle-orm";
import type {
  ExamType,
  LeaderboardEntry,
  LeaderboardMetric,
  LeaderboardPeriod,
  LeaderboardResponse,
  UserLeaderboardRanks
} from "@quizrank/shared";
import { quizAttempts, userProfiles, users } from "../db/schema";
import type { EngineContext } from "./context";
import { InvalidLeaderboardQueryError } from "./errors";

export type LeaderboardQuery = {
  period: LeaderboardPeriod;
  limit?: number;
  minimumQuizzes?: number;
  examType?: ExamType | null;
};

const DAY_MS = 24 * 60 * 60 * 1000;

const PERIOD_DAYS: Record<LeaderboardPeriod, number | null> = {
  all_time: null,
  monthly: 30,
  weekly: 7
};

export const periodStart = (period: LeaderboardPeriod, now: Date) => {
  const days = PERIOD_DAYS[period];
  return days === null ? null : now.getTime() - days * DAY_MS;
};

export const buildDisplayName = (email: string | null) => {
  if (!email) {
    return "Anonymous";
  }
  const [prefix, domain] = email.split("@");
  if (!domain) {
    return prefix || "Anonymous";
  }
  if (prefix.length >= 3) {
    return prefix;
  }
  return `${prefix.padEnd(3, "*")}@${domain}`;
};

type RankingInput = {
  metric: LeaderboardMetric;
  period: LeaderboardPeriod;
  minimumQuizzes: number;
  examType: ExamType | null;
};

/**
 * Every qualifying user with a 1-based position: score desc, then user id asc.
 * Positions come from the full set, so a page and the requester's own row agree.
 * The id is aliased apart from `users.id` and `user_profiles.user_id`, which the
 * outer query joins and which drizzle would otherwise leave ambiguous.
 */
const buildRankedSubquery = (ctx: EngineContext, input: RankingInput, now: Date) => {
  if (input.metric === "streak") {
    return ctx.db
      .select({
        user_id: sql<string>`${userProfiles.user_id}`.as("ranked_user_id"),
        score: sql<number>`${userProfiles.streak_current}`.as("score"),
        position: sql<number>`row_number() over (order by ${userProfiles.streak_current} desc, ${userProfiles.user_id} asc)`.as(
          "position"
        )
      })
      .from(userProfiles)
      .where(gt(userProfiles.streak_current, 0))
      .as("ranked");
  }

  const filters: SQL[] = [];
  const since = periodStart(input.period, now);
  if (since !== null) {
    filters.push(gte(quizAttempts.created_at, since));
  }
  if (input.metric === "exam_specific" && input.examType) {
    filters.push(eq(quizAttempts.exam_type, input.examType));
  }

  const score =
    input.metric === "xp"
      ? sql<number>`coalesce(sum(${quizAttempts.xp_earned}), 0)`
      : input.metric === "accuracy"
        ? sql<number>`avg(${quizAttempts.score_percentage})`
        : sql<number>`count(*)`;

  return ctx.db
    .select({
      user_id: sql<string>`${quizAttempts.user_id}`.as("ranked_user_id"),
      score: score.as("score"),
      position: sql<number>`row_number() over (order by ${score} desc, ${quizAttempts.user_id} asc)`.as(
        "position"
      )
    })
    .from(quizAttempts)
    .where(filters.length ? and(...filters) : undefined)
    .groupBy(quizAttempts.user_id)
    .having(input.metric === "accuracy" ? sql`count(*) >= ${input.minimumQuizzes}` : undefined)
    .as("ranked");
};

const resolveRankingInput = (
  ctx: EngineContext,
  metric: LeaderboardMetric,
  query: LeaderboardQuery
): RankingInput => {
  const examType = query.examType ?? null;
  if (metric === "exam_specific" && !examType) {
    throw new InvalidLeaderboardQueryError("exam_type is required for the exam_specific leaderboard.");
  }
  return {
    metric,
    period: query.period,
    minimumQuizzes: query.minimumQuizzes ?? ctx.settings.leaderboardMinQuizzes,
    examType
  };
};

export const getLeaderboard = async (
  ctx: EngineContext,
  metric: LeaderboardMetric,
  query: LeaderboardQuery,
  requesterId: string | null = null
): Promise<LeaderboardResponse> => {
  const input = resolveRankingInput(ctx, metric, query);
  const limit = query.limit ?? ctx.settings.leaderboardDefaultLimit;
  const ranked = buildRankedSubquery(ctx, input, ctx.now());

  const visible = requesterId
    ? or(lte(ranked.position, limit), eq(ranked.user_id, requesterId))
    : lte(ranked.position, limit);

  const rows = ctx.db
    .select({
      user_id: ranked.user_id,
      score: ranked.score,
      position: ranked.position,
      display_name: users.display_name,
      email: users.email,
      level: userProfiles.level
    })
    .from(ranked)
    .leftJoin(users, eq(users.id, ranked.user_id))
    .leftJoin(userProfiles, eq(userProfiles.user_id, ranked.user_id))
    .where(visible)
    .orderBy(asc(ranked.position))
    .all();

  const count = ctx.db.select({ total: sql<number>`count(*)` }).from(ranked).get();

  const toEntry = (row: (typeof rows)[number]): LeaderboardEntry => {
    const rawScore = Number(row.score ?? 0);
    return {
      rank: Number(row.position),
      user_id: row.user_id,
      display_name: row.display_name ?? buildDisplayName(row.email),
      score: metric === "accuracy" ? Math.round(rawScore) : rawScore,
      level: row.level ?? 1,
      is_current_user: row.user_id === requesterId
    };
  };

  const entries = rows.filter((row) => Number(row.position) <= limit).map(toEntry);
  const requesterRow = requesterId ? rows.find((row) => row.user_id === requesterId) : undefined;

  return {
    metric,
    period: metric === "streak" ? "current" : input.period,
    total_users: Number(count?.total ?? 0),
    entries,
    current_user_entry: requesterRow ? toEntry(requesterRow) : null,
    ...(metric === "accuracy" ? { minimum_quizzes: input.minimumQuizzes } : {}),
    ...(metric === "exam_specific" && input.examType ? { exam_type: input.examType } : {})
  };
};

const findPosition = (
  ctx: EngineContext,
  metric: LeaderboardMetric,
  period: LeaderboardPeriod,
  userId: string,
  now: Date
) => {
  const ranked = buildRankedSubquery(
    ctx,
    resolveRankingInput(ctx, metric, { period }),
    now
  );
  const row = ctx.db
    .select({ position: ranked.position })
    .from(ranked)
    .where(eq(ranked.user_id, userId))
    .get();
  return row ? Number(row.position) : null;
};

export const getUserRanks = async (
  ctx: EngineContext,
  userId: string,
  period: LeaderboardPeriod
): Promise<UserLeaderboardRanks> => {
  const now = ctx.now();
  return {
    period,
    xp_rank: findPosition(ctx, "xp", period, userId, now),
    quiz_count_rank: findPosition(ctx, "quiz_count", period, userId, now),
    accuracy_rank: findPosition(ctx, "accuracy", period, userId, now),
    streak_rank: findPosition(ctx, "streak", period, userId, now)
  };
};
