import { createQuestion } from "./quizContent";
import {
  calculateAnswerPoints,
  calculateStreakBonus,
  calculateTimeBonusFraction,
  scoreCorrectAnswer,
} from "./scoring";

describe("scoring", () => {
  describe("calculateTimeBonusFraction", () => {
    it("is 1 with the full time left", () => {
      expect(calculateTimeBonusFraction(20, 20)).toBe(1);
    });

    it("is 0 at the buzzer", () => {
      expect(calculateTimeBonusFraction(0, 20)).toBe(0);
    });

    it("clamps negative time to 0", () => {
      expect(calculateTimeBonusFraction(-3, 20)).toBe(0);
    });

    it("is 0 for a non-positive time limit", () => {
      expect(calculateTimeBonusFraction(5, 0)).toBe(0);
    });
  });

  describe("calculateAnswerPoints", () => {
    it("awards the full base for an instant answer", () => {
      expect(calculateAnswerPoints(1000, 1)).toBe(1000);
    });

    it("awards half the base at the buzzer", () => {
      expect(calculateAnswerPoints(1000, calculateTimeBonusFraction(0, 20))).toBe(500);
    });

    it("scales linearly in between", () => {
      expect(calculateAnswerPoints(1000, calculateTimeBonusFraction(15, 20))).toBe(875);
      expect(calculateAnswerPoints(1000, calculateTimeBonusFraction(10, 20))).toBe(750);
    });

    it("rounds to the nearest point", () => {
      // 0.5 + 0.5 * (7/30) = 0.61666...
      expect(calculateAnswerPoints(1000, calculateTimeBonusFraction(7, 30))).toBe(617);
    });

    it("awards nothing when the base is zero", () => {
      expect(calculateAnswerPoints(0, 1)).toBe(0);
    });
  });

  describe("calculateStreakBonus", () => {
    it("is zero with no streak", () => {
      expect(calculateStreakBonus(0)).toBe(0);
    });

    it("adds 100 per streak step", () => {
      expect(calculateStreakBonus(1)).toBe(100);
      expect(calculateStreakBonus(3)).toBe(300);
    });

    it("caps at five steps", () => {
      expect(calculateStreakBonus(5)).toBe(500);
      expect(calculateStreakBonus(7)).toBe(500);
    });
  });

  describe("scoreCorrectAnswer", () => {
    it("combines time points and streak bonus", () => {
      const question = createQuestion({
        questionText: "Q",
        timeLimit: 20,
        pointsBase: 1000,
        answers: [{ text: "A", isCorrect: true }],
      });

      expect(scoreCorrectAnswer(question, 15, 2)).toEqual({
        pointsAwarded: 875,
        streakBonus: 200,
        total: 1075,
      });
    });

    it("uses the question's own base and limit", () => {
      const question = createQuestion({
        questionText: "Q",
        timeLimit: 10,
        pointsBase: 2000,
        answers: [{ text: "A", isCorrect: true }],
      });

      expect(scoreCorrectAnswer(question, 5, 0)).toEqual({
        pointsAwarded: 1500,
        streakBonus: 0,
        total: 1500,
      });
    });
  });
});
