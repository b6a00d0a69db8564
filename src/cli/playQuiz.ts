#!/usr/bin/env node
import "dotenv/config";
import readline from "readline";
import { randomUUID } from "crypto";
import { getTickIntervalMs } from "../config";
import { GamePhase } from "../domain/gamePhase";
import { PlayerResult } from "../domain/playerResult";
import { QuizPack } from "../domain/quizContent";
import { GameStateSnapshot, QuizGameEngine } from "../domain/quizGameEngine";
import { summarizeRound } from "../domain/roundSummary";
import { getAllQuizPacks } from "../loaders/quizPackLoader";
import { RoundResultStore } from "../stores/roundResultStore";
import {
  askForPlayerName,
  askMenu,
  askYesNo,
  formatAnswerOptions,
  formatRevealBanner,
  formatRoundSummary,
  parseAnswerChoice,
} from "./helpers";

const rl = readline.createInterface({
  input: process.stdin,
  output: process.stdout
});

/**
 * Whether to print the remaining time on this tick
 */
function shouldAnnounceTime(timeRemaining: number): boolean {
  return timeRemaining > 0 && (timeRemaining <= 3 || timeRemaining % 5 === 0);
}

/**
 * Render engine state changes to the terminal
 */
function createRenderer() {
  let lastPhase: GamePhase | null = null;
  let lastCountdown = -1;
  let lastTime = -1;

  return (state: GameStateSnapshot) => {
    const enteredPhase = state.phase !== lastPhase;
    lastPhase = state.phase;
    const question = state.currentQuestion;
    const total = state.quizPack?.questions.length ?? 0;

    switch (state.phase) {
      case "countdown":
        if (enteredPhase) {
          console.log(`\n--- Question ${state.currentQuestionIndex + 1} of ${total} ---`);
          lastCountdown = -1;
        }
        if (state.countdownValue !== lastCountdown) {
          lastCountdown = state.countdownValue;
          console.log(`  ${state.countdownValue}...`);
        }
        break;

      case "question":
        if (enteredPhase && question) {
          console.log(`\n${question.questionText}  (${question.timeLimit}s)\n`);
          formatAnswerOptions(question).forEach((line) => console.log(line));
          console.log("\nType the number of your answer:");
          lastTime = state.timeRemaining;
        } else if (state.timeRemaining !== lastTime) {
          lastTime = state.timeRemaining;
          if (shouldAnnounceTime(state.timeRemaining)) {
            console.log(`  ⏱  ${state.timeRemaining}s left`);
          }
        }
        break;

      case "answerReveal":
        if (enteredPhase && question) {
          console.log("");
          formatRevealBanner(question, state.lastAnswer, state.playerResult.streak).forEach((line) =>
            console.log(line)
          );
          console.log(`Score: ${state.playerResult.totalScore}`);
          console.log(
            state.isLastQuestion
              ? "\nPress enter to see your results ('l' for the leaderboard)"
              : "\nPress enter for the next question ('l' for the leaderboard)"
          );
        }
        break;

      case "leaderboard":
        if (enteredPhase) {
          const result = state.playerResult;
          console.log("\n🏆 Standings");
          console.log(`  Score: ${result.totalScore}   Correct: ${result.correctCount}   Streak: ${result.streak}`);
          console.log("\nPress enter to continue");
        }
        break;

      default:
        break;
    }
  };
}

/**
 * Play one round and resolve with the final result
 */
function playRound(pack: QuizPack): Promise<PlayerResult> {
  const engine = new QuizGameEngine({ tickIntervalMs: getTickIntervalMs() });

  return new Promise((resolve, reject) => {
    const render = createRenderer();

    const onLine = (input: string) => {
      const question = engine.currentQuestion;

      switch (engine.phase) {
        case "question": {
          if (!question) return;
          const answerId = parseAnswerChoice(input, question);
          if (!answerId) {
            console.log(`Enter a number from 1 to ${question.answers.length}`);
            return;
          }
          engine.submitAnswer(answerId);
          return;
        }
        case "answerReveal":
          if (input.trim().toLowerCase() === "l") {
            engine.showLeaderboard();
          } else {
            engine.nextQuestion();
          }
          return;
        case "leaderboard":
          engine.nextQuestion();
          return;
        default:
          return;
      }
    };

    const unsubscribe = engine.subscribe((state) => {
      render(state);
      if (state.phase === "results") {
        rl.off("line", onLine);
        unsubscribe();
        engine.dispose();
        resolve(state.playerResult);
      }
    });

    rl.on("line", onLine);

    const started = engine.startGame(pack);
    if (!started.success) {
      rl.off("line", onLine);
      engine.dispose();
      reject(new Error(started.error.message));
    }
  });
}

async function main() {
  console.log("\n🎮 Live Quiz\n");

  const packs = getAllQuizPacks();
  if (packs.length === 0) {
    console.log("No quiz packs available.");
    rl.close();
    return;
  }

  const playerName = await askForPlayerName(rl);
  const store = new RoundResultStore();

  for (;;) {
    console.log("Choose a quiz:\n");
    const options = packs.map((p) => `${p.title} (${p.category}, ${p.questions.length} questions)`);
    const choice = await askMenu(rl, [...options, "Quit"]);

    if (choice === options.length + 1) {
      break;
    }

    const pack = packs[choice - 1];
    console.log(`\n${pack.title}: ${pack.description}`);

    const result = await playRound(pack);
    const summary = summarizeRound(result, pack.questions.length);

    console.log("");
    formatRoundSummary(summary).forEach((line) => console.log(line));

    store.save({
      id: randomUUID(),
      gameId: "cli",
      playerId: playerName.toLowerCase(),
      playerName,
      quizPackId: pack.id,
      quizPackTitle: pack.title,
      summary,
      answerTimes: result.answerTimes,
      completedAt: new Date().toISOString(),
    });

    const again = await askYesNo(rl, "\nPlay another quiz?");
    if (!again) {
      break;
    }
    console.log("");
  }

  console.log("\nThanks for playing!");
  rl.close();
}

main().catch((error) => {
  console.error("Error:", error);
  rl.close();
  process.exit(1);
});
