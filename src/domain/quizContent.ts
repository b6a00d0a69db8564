import { randomUUID } from "crypto";

/**
 * Quiz content: packs of timed multiple-choice questions.
 * Everything here is immutable once built; the game engine only reads it.
 */

// ============================================
// Types
// ============================================

export interface AnswerOption {
  readonly id: string;
  readonly text: string;
  readonly isCorrect: boolean;
}

export interface Question {
  readonly id: string;
  readonly questionText: string;
  readonly answers: readonly AnswerOption[];
  readonly timeLimit: number; // seconds
  readonly pointsBase: number;
  readonly imageName?: string; // optional icon shown with the question
}

export interface QuizPack {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly category: string;
  readonly icon: string;
  readonly color: string;
  readonly questions: readonly Question[];
}

export interface AnswerOptionInput {
  id?: string;
  text: string;
  isCorrect: boolean;
}

export interface QuestionInput {
  id?: string;
  questionText: string;
  answers: AnswerOptionInput[];
  timeLimit?: number;
  pointsBase?: number;
  imageName?: string;
}

export interface QuizPackInput {
  id?: string;
  title: string;
  description: string;
  category: string;
  icon?: string;
  color?: string;
  questions: QuestionInput[];
}

export const DEFAULT_TIME_LIMIT = 20;
export const DEFAULT_POINTS_BASE = 1000;

// ============================================
// Construction
// ============================================

export function createAnswerOption(input: AnswerOptionInput): AnswerOption {
  return Object.freeze({
    id: input.id || randomUUID(),
    text: input.text,
    isCorrect: input.isCorrect,
  });
}

export function createQuestion(input: QuestionInput): Question {
  return Object.freeze({
    id: input.id || randomUUID(),
    questionText: input.questionText,
    answers: Object.freeze(input.answers.map(createAnswerOption)),
    timeLimit: input.timeLimit ?? DEFAULT_TIME_LIMIT,
    pointsBase: input.pointsBase ?? DEFAULT_POINTS_BASE,
    imageName: input.imageName,
  });
}

/**
 * Build a quiz pack, filling in ids and defaults.
 * Throws if the resulting pack is not playable (see validateQuizPack).
 */
export function createQuizPack(input: QuizPackInput): QuizPack {
  const pack: QuizPack = Object.freeze({
    id: input.id || randomUUID(),
    title: input.title,
    description: input.description,
    category: input.category,
    icon: input.icon || "questionmark",
    color: input.color || "purple",
    questions: Object.freeze(input.questions.map(createQuestion)),
  });

  const problems = validateQuizPack(pack);
  if (problems.length > 0) {
    throw new Error(`Invalid quiz pack "${pack.title}": ${problems.join("; ")}`);
  }

  return pack;
}

// ============================================
// Validation
// ============================================

/**
 * List everything that makes a pack unplayable. Empty means valid.
 * Each question must have exactly one correct option.
 */
export function validateQuizPack(pack: QuizPack): string[] {
  const problems: string[] = [];

  if (!pack.title || pack.title.trim().length === 0) {
    problems.push("title is required");
  }
  if (pack.questions.length === 0) {
    problems.push("pack has no questions");
  }

  pack.questions.forEach((question, index) => {
    const label = `question ${index + 1}`;

    if (question.answers.length === 0) {
      problems.push(`${label} has no answers`);
    }

    const correctCount = question.answers.filter((a) => a.isCorrect).length;
    if (question.answers.length > 0 && correctCount !== 1) {
      problems.push(`${label} has ${correctCount} correct answers (expected 1)`);
    }

    if (!Number.isInteger(question.timeLimit) || question.timeLimit <= 0) {
      problems.push(`${label} time limit must be a positive whole number of seconds`);
    }
    if (!Number.isFinite(question.pointsBase) || question.pointsBase < 0) {
      problems.push(`${label} base points cannot be negative`);
    }

    const ids = new Set(question.answers.map((a) => a.id));
    if (ids.size !== question.answers.length) {
      problems.push(`${label} has duplicate answer ids`);
    }
  });

  return problems;
}

// ============================================
// Read accessors
// ============================================

export function questionCount(pack: QuizPack): number {
  return pack.questions.length;
}

export function isLastQuestionIndex(pack: QuizPack, index: number): boolean {
  return index >= pack.questions.length - 1;
}

export function findAnswer(question: Question, answerId: string): AnswerOption | undefined {
  return question.answers.find((a) => a.id === answerId);
}

export function correctAnswerFor(question: Question): AnswerOption | undefined {
  return question.answers.find((a) => a.isCorrect);
}

// ============================================
// Answer styles (classic four-shape layout)
// ============================================

export type AnswerShape = "triangle" | "diamond" | "circle" | "square";

export interface AnswerStyle {
  shape: AnswerShape;
  color: string; // hex
  label: string;
}

export const ANSWER_STYLES: readonly AnswerStyle[] = [
  { shape: "triangle", color: "#E32E2E", label: "▲" },
  { shape: "diamond", color: "#266BD6", label: "◆" },
  { shape: "circle", color: "#D98C00", label: "●" },
  { shape: "square", color: "#26AD40", label: "■" },
];

/**
 * Style for the answer at a given position. Wraps for questions with more than four options.
 */
export function answerStyleFor(index: number): AnswerStyle {
  return ANSWER_STYLES[((index % ANSWER_STYLES.length) + ANSWER_STYLES.length) % ANSWER_STYLES.length];
}
