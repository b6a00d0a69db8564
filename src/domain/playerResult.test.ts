import {
  calculateAverageTime,
  copyPlayerResult,
  createPlayerResult,
  recordCorrectAnswer,
  recordIncorrectAnswer,
} from "./playerResult";

describe("playerResult", () => {
  describe("createPlayerResult", () => {
    it("starts with everything at zero", () => {
      expect(createPlayerResult()).toEqual({
        totalScore: 0,
        correctCount: 0,
        incorrectCount: 0,
        streak: 0,
        bestStreak: 0,
        averageTime: 0,
        answerTimes: [],
      });
    });
  });

  describe("calculateAverageTime", () => {
    it("returns 0 for no answers", () => {
      expect(calculateAverageTime([])).toBe(0);
    });

    it("averages answer times", () => {
      expect(calculateAverageTime([2, 4, 9])).toBe(5);
    });
  });

  describe("recordCorrectAnswer", () => {
    it("adds points and extends the streak", () => {
      const result = recordCorrectAnswer(createPlayerResult(), 875, 5);

      expect(result).toEqual({
        totalScore: 875,
        correctCount: 1,
        incorrectCount: 0,
        streak: 1,
        bestStreak: 1,
        averageTime: 5,
        answerTimes: [5],
      });
    });

    it("does not change the previous result", () => {
      const before = createPlayerResult();

      recordCorrectAnswer(before, 1000, 1);

      expect(before.totalScore).toBe(0);
      expect(before.answerTimes).toEqual([]);
    });
  });

  describe("recordIncorrectAnswer", () => {
    it("breaks the streak but keeps the best streak and score", () => {
      let result = recordCorrectAnswer(createPlayerResult(), 1000, 2);
      result = recordCorrectAnswer(result, 1100, 4);

      result = recordIncorrectAnswer(result, 6);

      expect(result).toEqual({
        totalScore: 2100,
        correctCount: 2,
        incorrectCount: 1,
        streak: 0,
        bestStreak: 2,
        averageTime: 4,
        answerTimes: [2, 4, 6],
      });
    });

    it("keeps one answer time per answered question", () => {
      let result = createPlayerResult();
      result = recordIncorrectAnswer(result, 20);
      result = recordCorrectAnswer(result, 500, 3);
      result = recordIncorrectAnswer(result, 1);

      expect(result.answerTimes.length).toBe(result.correctCount + result.incorrectCount);
    });
  });

  describe("copyPlayerResult", () => {
    it("copies the answer times array", () => {
      const original = recordCorrectAnswer(createPlayerResult(), 1000, 2);

      const copy = copyPlayerResult(original);
      copy.answerTimes.push(10);

      expect(original.answerTimes).toEqual([2]);
      expect(copy).not.toBe(original);
    });
  });
});
