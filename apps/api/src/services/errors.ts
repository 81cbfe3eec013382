import type { LogFields } from "../utils/logger";

export const ACTIVE_SESSION_EXISTS = "ACTIVE_SESSION_EXISTS";
export const SESSION_NOT_FOUND = "SESSION_NOT_FOUND";
export const INVALID_ANSWER_REFERENCE = "INVALID_ANSWER_REFERENCE";
export const QUESTIONS_UNAVAILABLE = "QUESTIONS_UNAVAILABLE";
export const INVALID_SUBMISSION = "INVALID_SUBMISSION";
export const ATTEMPT_NOT_FOUND = "ATTEMPT_NOT_FOUND";
export const INVALID_LEADERBOARD_QUERY = "INVALID_LEADERBOARD_QUERY";
export const AVATAR_NOT_FOUND = "AVATAR_NOT_FOUND";
export const AVATAR_LOCKED = "AVATAR_LOCKED";

export class EngineError extends Error {
  readonly code: string;
  readonly status: 400 | 403 | 404 | 409 | 422;
  readonly logFields: LogFields;

  constructor(code: string, status: EngineError["status"], message: string, logFields: LogFields = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.logFields = logFields;
  }
}

export class ActiveSessionConflictError extends EngineError {
  readonly activeSessionId: string;

  constructor(activeSessionId: string) {
    super(
      ACTIVE_SESSION_EXISTS,
      409,
      "You have an active session. Complete or abandon it first.",
      { activeSessionId }
    );
    this.activeSessionId = activeSessionId;
  }
}

export type SessionNotFoundReason = "missing" | "completed" | "abandoned" | "expired";

export class SessionNotFoundError extends EngineError {
  readonly reason: SessionNotFoundReason;

  constructor(sessionId: string, reason: SessionNotFoundReason = "missing") {
    super(SESSION_NOT_FOUND, 404, `Session not found (${reason}).`, { sessionId, reason });
    this.reason = reason;
  }
}

export class InvalidAnswerReferenceError extends EngineError {
  constructor(params: { sessionId: string; expectedQuestionId: string; receivedQuestionId: string }) {
    super(
      INVALID_ANSWER_REFERENCE,
      400,
      "Question is not the current question of this session.",
      params
    );
  }
}

export class QuestionsUnavailableError extends EngineError {
  constructor(examType: string, domain: string | null) {
    super(
      QUESTIONS_UNAVAILABLE,
      404,
      domain
        ? `No questions found for exam type '${examType}' and domain '${domain}'.`
        : `No questions found for exam type '${examType}'.`,
      { examType, domain }
    );
  }
}

export class SubmissionValidationError extends EngineError {
  constructor(message: string, logFields: LogFields = {}) {
    super(INVALID_SUBMISSION, 422, message, logFields);
  }
}

export class AttemptNotFoundError extends EngineError {
  constructor(attemptId: string) {
    super(ATTEMPT_NOT_FOUND, 404, "Quiz attempt not found.", { attemptId });
  }
}

export class InvalidLeaderboardQueryError extends EngineError {
  constructor(message: string) {
    super(INVALID_LEADERBOARD_QUERY, 400, message);
  }
}

export class AvatarNotFoundError extends EngineError {
  constructor(avatarId: string) {
    super(AVATAR_NOT_FOUND, 404, "Avatar not found.", { avatarId });
  }
}

export class AvatarLockedError extends EngineError {
  constructor(avatarId: string) {
    super(
      AVATAR_LOCKED,
      403,
      "Avatar not unlocked. Earn the required achievement to unlock it.",
      { avatarId }
    );
  }
}

export const isUniqueConstraintError = (error: unknown) =>
  error instanceof Error && error.message.includes("UNIQUE constraint failed");
