import readline from "readline";
import { LastAnswer } from "../domain/quizGameEngine";
import { Question, answerStyleFor, correctAnswerFor } from "../domain/quizContent";
import { RoundSummary } from "../domain/roundSummary";
import { RoundResultStore } from "../stores/roundResultStore";

/**
 * Ask the player's name. Returning players are greeted with their round count.
 */
export async function askForPlayerName(rl: readline.Interface): Promise<string> {
  const store = new RoundResultStore();

  return new Promise((resolve) => {
    rl.question("What is your name?\n> ", (name: string) => {
      const trimmedName = name.trim() || "Player";
      const pastRounds = store.getByPlayerName(trimmedName);

      if (pastRounds.length > 0) {
        const best = Math.max(...pastRounds.map((r) => r.summary.totalScore));
        console.log(`\nWelcome back, ${trimmedName}!`);
        console.log(`You have played ${pastRounds.length} round(s). Best score: ${best}\n`);
      } else {
        console.log(`\nWelcome, ${trimmedName}!\n`);
      }
      resolve(trimmedName);
    });
  });
}

/**
 * Ask the user to choose from a menu of options (1-based)
 */
export async function askMenu(
  rl: readline.Interface,
  options: string[]
): Promise<number> {
  return new Promise((resolve) => {
    console.log("What would you like to do?\n");
    options.forEach((opt, i) => {
      console.log(`  ${i + 1}. ${opt}`);
    });
    console.log("");

    const askChoice = () => {
      rl.question("> ", (answer: string) => {
        const choice = parseInt(answer, 10);
        if (choice >= 1 && choice <= options.length) {
          resolve(choice);
        } else {
          console.log(`Please enter a number between 1 and ${options.length}`);
          askChoice();
        }
      });
    };
    askChoice();
  });
}

/**
 * Simple yes/no question
 */
export async function askYesNo(rl: readline.Interface, question: string): Promise<boolean> {
  return new Promise((resolve) => {
    rl.question(`${question} (yes/no): `, (answer) => {
      const lower = answer.toLowerCase().trim();
      resolve(lower === "yes" || lower === "y");
    });
  });
}

// ============================================
// Formatting
// ============================================

export function formatAnswerOptions(question: Question): string[] {
  return question.answers.map((answer, index) => {
    const style = answerStyleFor(index);
    return `  ${index + 1}. ${style.label} ${answer.text}`;
  });
}

/**
 * Map typed input ("1".."n") to an answer id, or null if it is not a valid choice.
 */
export function parseAnswerChoice(input: string, question: Question): string | null {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) return null;

  const choice = parseInt(trimmed, 10);
  if (choice < 1 || choice > question.answers.length) return null;
  return question.answers[choice - 1].id;
}

export function formatRevealBanner(question: Question, lastAnswer: LastAnswer | null, streak: number): string[] {
  const correct = correctAnswerFor(question);
  const lines: string[] = [];

  if (!lastAnswer || lastAnswer.timedOut) {
    lines.push("⏰ Time's up!");
  } else if (lastAnswer.isCorrect) {
    const bonus = lastAnswer.streakBonus > 0 ? ` (+${lastAnswer.streakBonus} streak bonus)` : "";
    lines.push(`✅ Correct! +${lastAnswer.pointsAwarded}${bonus}`);
    if (streak > 1) {
      lines.push(`🔥 ${streak} streak!`);
    }
  } else {
    lines.push("❌ Incorrect");
  }

  if (correct && !lastAnswer?.isCorrect) {
    lines.push(`The answer was: ${correct.text}`);
  }

  return lines;
}

export function formatStars(starRating: number): string {
  return "★".repeat(starRating) + "☆".repeat(3 - starRating);
}

export function formatRoundSummary(summary: RoundSummary): string[] {
  return [
    `Quiz complete! ${formatStars(summary.starRating)}`,
    `Total score:  ${summary.totalScore}`,
    `Correct:      ${summary.correctCount}/${summary.totalQuestions}`,
    `Accuracy:     ${Math.floor(summary.accuracy)}%`,
    `Best streak:  ${summary.bestStreak}`,
    `Avg time:     ${summary.averageTime.toFixed(1)}s`,
  ];
}
