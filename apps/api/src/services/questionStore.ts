import { and, asc, eq, inArray } from "drizzle-orm";
import type { ExamType, Question, QuestionView } from "@quizrank/shared";
import { questions } from "../db/schema";
import type { DbExecutor } from "../db/types";

/** Read-only access to the question bank. Synchronous so it can run inside a write transaction. */
export type QuestionStore = {
  listQuestionIds: (examType: ExamType, domain?: string | null) => string[];
  getQuestions: (ids: readonly string[]) => Question[];
};

type QuestionRow = typeof questions.$inferSelect;

const toQuestion = (row: QuestionRow): Question => ({
  id: row.id,
  exam_type: row.exam_type,
  domain: row.domain,
  question_text: row.question_text,
  correct_answer: row.correct_answer,
  options: row.options
});

export const createQuestionStore = (db: DbExecutor): QuestionStore => ({
  listQuestionIds: (examType, domain) => {
    const filters = [eq(questions.exam_type, examType)];
    if (domain) {
      filters.push(eq(questions.domain, domain));
    }
    return db
      .select({ id: questions.id })
      .from(questions)
      .where(and(...filters))
      .orderBy(asc(questions.id))
      .all()
      .map((row) => row.id);
  },
  getQuestions: (ids) => {
    if (!ids.length) return [];
    return db
      .select()
      .from(questions)
      .where(inArray(questions.id, [...ids]))
      .all()
      .map(toQuestion);
  }
});

export const indexQuestions = (list: Question[]) => new Map(list.map((question) => [question.id, question]));

/** Strips the correct answer and explanations before a question is shown. */
export const toQuestionView = (question: Question): QuestionView => ({
  question_id: question.id,
  question_text: question.question_text,
  domain: question.domain,
  options: {
    A: { text: question.options.A.text },
    B: { text: question.options.B.text },
    C: { text: question.options.C.text },
    D: { text: question.options.D.text }
  }
});
