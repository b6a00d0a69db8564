import { createQuestion } from "../domain/quizContent";
import { LastAnswer } from "../domain/quizGameEngine";
import {
  formatAnswerOptions,
  formatRevealBanner,
  formatRoundSummary,
  formatStars,
  parseAnswerChoice,
} from "./helpers";

describe("cli helpers", () => {
  const question = createQuestion({
    id: "q1",
    questionText: "What is 7 × 8?",
    answers: [
      { id: "q1-a", text: "54", isCorrect: false },
      { id: "q1-b", text: "56", isCorrect: true },
      { id: "q1-c", text: "58", isCorrect: false },
    ],
  });

  const createLastAnswer = (overrides: Partial<LastAnswer> = {}): LastAnswer => ({
    questionId: "q1",
    answerId: "q1-b",
    isCorrect: true,
    pointsAwarded: 1000,
    streakBonus: 0,
    timedOut: false,
    ...overrides,
  });

  describe("formatAnswerOptions", () => {
    it("numbers each answer with its shape", () => {
      expect(formatAnswerOptions(question)).toEqual(["  1. ▲ 54", "  2. ◆ 56", "  3. ● 58"]);
    });
  });

  describe("parseAnswerChoice", () => {
    it("maps a number to the answer id", () => {
      expect(parseAnswerChoice("2", question)).toBe("q1-b");
      expect(parseAnswerChoice(" 3 ", question)).toBe("q1-c");
    });

    it("rejects anything that is not a listed number", () => {
      expect(parseAnswerChoice("0", question)).toBeNull();
      expect(parseAnswerChoice("4", question)).toBeNull();
      expect(parseAnswerChoice("1.5", question)).toBeNull();
      expect(parseAnswerChoice("b", question)).toBeNull();
      expect(parseAnswerChoice("", question)).toBeNull();
    });
  });

  describe("formatRevealBanner", () => {
    it("shows points for a correct answer", () => {
      expect(formatRevealBanner(question, createLastAnswer(), 1)).toEqual(["✅ Correct! +1000"]);
    });

    it("shows the streak bonus and streak", () => {
      const lastAnswer = createLastAnswer({ pointsAwarded: 875, streakBonus: 100 });

      expect(formatRevealBanner(question, lastAnswer, 2)).toEqual([
        "✅ Correct! +875 (+100 streak bonus)",
        "🔥 2 streak!",
      ]);
    });

    it("shows the right answer after a wrong one", () => {
      const lastAnswer = createLastAnswer({ answerId: "q1-a", isCorrect: false, pointsAwarded: 0 });

      expect(formatRevealBanner(question, lastAnswer, 0)).toEqual(["❌ Incorrect", "The answer was: 56"]);
    });

    it("shows a timeout", () => {
      const lastAnswer = createLastAnswer({ answerId: null, isCorrect: false, pointsAwarded: 0, timedOut: true });

      expect(formatRevealBanner(question, lastAnswer, 0)).toEqual(["⏰ Time's up!", "The answer was: 56"]);
    });
  });

  describe("formatStars", () => {
    it("fills stars out of three", () => {
      expect(formatStars(1)).toBe("★☆☆");
      expect(formatStars(3)).toBe("★★★");
    });
  });

  describe("formatRoundSummary", () => {
    it("lists the final numbers", () => {
      const lines = formatRoundSummary({
        totalScore: 2975,
        correctCount: 2,
        incorrectCount: 1,
        totalQuestions: 3,
        accuracy: (2 / 3) * 100,
        starRating: 2,
        bestStreak: 2,
        averageTime: 7.5,
      });

      expect(lines).toEqual([
        "Quiz complete! ★★☆",
        "Total score:  2975",
        "Correct:      2/3",
        "Accuracy:     66%",
        "Best streak:  2",
        "Avg time:     7.5s",
      ]);
    });
  });
});
