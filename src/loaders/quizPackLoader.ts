import fs from "fs";
import path from "path";
import { Question, QuizPack, QuizPackInput, createQuizPack } from "../domain/quizContent";

// Resolved from the repo root so it works from both src/ and compiled dist/
export const QUIZ_PACKS_DIR =
  process.env.QUIZ_PACKS_DIR || path.join(__dirname, "../../src/data/quizPacks");

/**
 * Quiz Pack Loader - loads the built-in quiz packs from JSON files.
 *
 * Every file goes through createQuizPack, so anything returned here
 * has been validated and can be handed straight to a game engine.
 */

export interface QuizPackSummary {
  id: string;
  title: string;
  description: string;
  category: string;
  icon: string;
  color: string;
  questionCount: number;
}

// ============================================
// Core loading
// ============================================

/**
 * Load a single quiz pack by filename. Throws if the file is missing or invalid.
 */
export function loadQuizPack(fileName: string): QuizPack {
  const filePath = path.join(QUIZ_PACKS_DIR, fileName);
  const rawData = fs.readFileSync(filePath, "utf-8");
  const input: QuizPackInput = JSON.parse(rawData);
  return createQuizPack(input);
}

/**
 * Get all valid quiz packs, sorted by title
 */
export function getAllQuizPacks(): QuizPack[] {
  if (!fs.existsSync(QUIZ_PACKS_DIR)) {
    return [];
  }

  const files = fs.readdirSync(QUIZ_PACKS_DIR).filter((f) => f.endsWith(".json"));
  const packs: QuizPack[] = [];

  for (const file of files) {
    try {
      packs.push(loadQuizPack(file));
    } catch (error) {
      console.warn(`Skipping quiz pack ${file}:`, error instanceof Error ? error.message : error);
    }
  }

  return packs.sort((a, b) => a.title.localeCompare(b.title));
}

export function loadQuizPackById(packId: string): QuizPack | null {
  return getAllQuizPacks().find((p) => p.id === packId) || null;
}

export function getQuizPacksByCategory(category: string): QuizPack[] {
  return getAllQuizPacks().filter(
    (p) => p.category.toLowerCase() === category.toLowerCase()
  );
}

export function getAvailableCategories(): string[] {
  const categories = new Set<string>();
  for (const pack of getAllQuizPacks()) {
    categories.add(pack.category);
  }
  return Array.from(categories).sort();
}

// ============================================
// Views
// ============================================

export function summarizeQuizPack(pack: QuizPack): QuizPackSummary {
  return {
    id: pack.id,
    title: pack.title,
    description: pack.description,
    category: pack.category,
    icon: pack.icon,
    color: pack.color,
    questionCount: pack.questions.length,
  };
}

export interface StudentAnswerOption {
  id: string;
  text: string;
}

export interface StudentQuestion {
  id: string;
  questionText: string;
  answers: StudentAnswerOption[];
  timeLimit: number;
  pointsBase: number;
  imageName?: string;
}

export interface StudentQuizPack extends QuizPackSummary {
  questions: StudentQuestion[];
}

/**
 * Strip correctness flags so a pack can be sent to players before they answer.
 */
export function sanitizeQuestionForStudent(question: Question): StudentQuestion {
  return {
    id: question.id,
    questionText: question.questionText,
    answers: question.answers.map((a) => ({ id: a.id, text: a.text })),
    timeLimit: question.timeLimit,
    pointsBase: question.pointsBase,
    imageName: question.imageName,
  };
}

export function sanitizeQuizPackForStudent(pack: QuizPack): StudentQuizPack {
  return {
    ...summarizeQuizPack(pack),
    questions: pack.questions.map(sanitizeQuestionForStudent),
  };
}
