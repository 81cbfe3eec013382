export { createApiApp } from "./app";
export type { ApiDependencies, ApiEnv } from "./app";
export type { ApiDatabase, DbExecutor } from "./db/types";
export { resolveEnv, resolveNodeEnv } from "./env";
export type { RuntimeEnv, NodeRuntimeEnv, EnvBindings } from "./env";
export { createEngineContext } from "./services/context";
export type { EngineContext, EngineSettings } from "./services/context";
export * from "./services/errors";
export { startSession, getActiveSession, submitAnswer, abandonSession, expireStaleSessions } from "./services/sessionService";
export { submitFullAttempt } from "./services/submissionService";
export { evaluateAchievements, listAchievements, listEarnedAchievements } from "./services/achievementService";
export { getLeaderboard, getUserRanks } from "./services/leaderboardService";
export { getQuizHistory, getQuizStats, getAttemptDetails } from "./services/quizHistoryService";
export { getProfileSummary } from "./services/profileService";
export { listAvatars, listUnlockedAvatars, selectAvatar, getAvatarStats } from "./services/avatarService";
export type { QuestionStore } from "./services/questionStore";
