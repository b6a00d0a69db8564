import fs from "fs";
import path from "path";
import { QuizPack, QuizPackInput, createQuizPack } from "../domain/quizContent";
import { QUIZ_PACKS_DIR } from "../loaders/quizPackLoader";

// Saved packs go beside the built-in ones so the loader picks them up

export interface SavedQuizPack {
  quizPack: QuizPack;
  filePath: string;
}

function ensureQuizPacksDir(): void {
  if (!fs.existsSync(QUIZ_PACKS_DIR)) {
    fs.mkdirSync(QUIZ_PACKS_DIR, { recursive: true });
  }
}

/**
 * Generate a URL-safe quiz pack ID from a title
 */
export function generateQuizPackId(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .substring(0, 50);
}

export function quizPackExists(id: string): boolean {
  return fs.existsSync(path.join(QUIZ_PACKS_DIR, `${id}.json`));
}

/**
 * Generate a unique quiz pack ID (appends a number if the ID is taken)
 */
export function getUniqueQuizPackId(title: string): string {
  const baseId = generateQuizPackId(title) || "quiz-pack";

  if (!quizPackExists(baseId)) {
    return baseId;
  }

  let counter = 2;
  while (quizPackExists(`${baseId}-${counter}`)) {
    counter++;
  }

  return `${baseId}-${counter}`;
}

/**
 * Save a quiz pack as {id}.json.
 * Returns the file path of the saved pack.
 */
export function saveQuizPack(pack: QuizPack): string {
  ensureQuizPacksDir();

  const filePath = path.join(QUIZ_PACKS_DIR, `${pack.id}.json`);
  fs.writeFileSync(filePath, JSON.stringify(pack, null, 2), "utf-8");

  return filePath;
}

/**
 * Validate and save a pack from user input (an edited or generated pack).
 * The id is made file-safe and unique; the requested id, or the title, seeds it.
 * Throws if the pack is not playable.
 */
export function saveNewQuizPack(input: QuizPackInput): SavedQuizPack {
  const requestedId = input.id || input.title;
  const quizPack = createQuizPack({ ...input, id: getUniqueQuizPackId(requestedId) });
  const filePath = saveQuizPack(quizPack);
  return { quizPack, filePath };
}
