import {
  DEFAULT_POINTS_BASE,
  DEFAULT_TIME_LIMIT,
  QuizPack,
  answerStyleFor,
  correctAnswerFor,
  createQuestion,
  createQuizPack,
  findAnswer,
  isLastQuestionIndex,
  questionCount,
  validateQuizPack,
} from "./quizContent";

describe("quizContent", () => {
  const createPackInput = () => ({
    id: "pack-1",
    title: "Capitals",
    description: "World capitals",
    category: "Geography",
    questions: [
      {
        id: "q1",
        questionText: "Capital of Peru?",
        answers: [
          { id: "q1-a", text: "Lima", isCorrect: true },
          { id: "q1-b", text: "Quito", isCorrect: false },
        ],
      },
      {
        id: "q2",
        questionText: "Capital of Kenya?",
        timeLimit: 15,
        pointsBase: 500,
        answers: [
          { id: "q2-a", text: "Kampala", isCorrect: false },
          { id: "q2-b", text: "Nairobi", isCorrect: true },
        ],
      },
    ],
  });

  describe("createQuestion", () => {
    it("fills in defaults", () => {
      const question = createQuestion({
        questionText: "Q",
        answers: [{ text: "A", isCorrect: true }],
      });

      expect(question.timeLimit).toBe(DEFAULT_TIME_LIMIT);
      expect(question.pointsBase).toBe(DEFAULT_POINTS_BASE);
      expect(question.id).toEqual(expect.any(String));
      expect(question.id.length).toBeGreaterThan(0);
      expect(question.answers[0].id.length).toBeGreaterThan(0);
    });

    it("returns a frozen question", () => {
      const question = createQuestion({
        questionText: "Q",
        answers: [{ text: "A", isCorrect: true }],
      });

      expect(Object.isFrozen(question)).toBe(true);
      expect(Object.isFrozen(question.answers)).toBe(true);
    });
  });

  describe("createQuizPack", () => {
    it("builds a pack with default icon and color", () => {
      const pack = createQuizPack(createPackInput());

      expect(pack.id).toBe("pack-1");
      expect(pack.icon).toBe("questionmark");
      expect(pack.color).toBe("purple");
      expect(pack.questions.map((q) => q.id)).toEqual(["q1", "q2"]);
      expect(pack.questions[1].timeLimit).toBe(15);
      expect(pack.questions[1].pointsBase).toBe(500);
    });

    it("throws when a question has two correct answers", () => {
      const input = createPackInput();
      input.questions[0].answers[1].isCorrect = true;

      expect(() => createQuizPack(input)).toThrow(
        'Invalid quiz pack "Capitals": question 1 has 2 correct answers (expected 1)'
      );
    });

    it("throws for a pack without questions", () => {
      expect(() =>
        createQuizPack({ title: "Empty", description: "", category: "None", questions: [] })
      ).toThrow('Invalid quiz pack "Empty": pack has no questions');
    });
  });

  describe("validateQuizPack", () => {
    const basePack = (): QuizPack => createQuizPack(createPackInput());

    it("returns no problems for a valid pack", () => {
      expect(validateQuizPack(basePack())).toEqual([]);
    });

    it("lists every problem it finds", () => {
      const pack = basePack();
      const broken: QuizPack = {
        ...pack,
        title: " ",
        questions: [
          { ...pack.questions[0], answers: [], timeLimit: 0 },
          {
            ...pack.questions[1],
            pointsBase: -1,
            answers: [
              { id: "dup", text: "A", isCorrect: true },
              { id: "dup", text: "B", isCorrect: false },
            ],
          },
        ],
      };

      expect(validateQuizPack(broken)).toEqual([
        "title is required",
        "question 1 has no answers",
        "question 1 time limit must be a positive whole number of seconds",
        "question 2 base points cannot be negative",
        "question 2 has duplicate answer ids",
      ]);
    });

    it("rejects a fractional time limit", () => {
      const pack = basePack();
      const broken: QuizPack = {
        ...pack,
        questions: [{ ...pack.questions[0], timeLimit: 2.5 }],
      };

      expect(validateQuizPack(broken)).toEqual([
        "question 1 time limit must be a positive whole number of seconds",
      ]);
    });

    it("reports a question with no correct answer", () => {
      const pack = basePack();
      const broken: QuizPack = {
        ...pack,
        questions: [
          {
            ...pack.questions[0],
            answers: pack.questions[0].answers.map((a) => ({ ...a, isCorrect: false })),
          },
        ],
      };

      expect(validateQuizPack(broken)).toEqual(["question 1 has 0 correct answers (expected 1)"]);
    });
  });

  describe("accessors", () => {
    it("counts questions and finds the last one", () => {
      const pack = createQuizPack(createPackInput());

      expect(questionCount(pack)).toBe(2);
      expect(isLastQuestionIndex(pack, 0)).toBe(false);
      expect(isLastQuestionIndex(pack, 1)).toBe(true);
    });

    it("finds answers by id", () => {
      const question = createQuizPack(createPackInput()).questions[1];

      expect(findAnswer(question, "q2-a")?.text).toBe("Kampala");
      expect(findAnswer(question, "missing")).toBeUndefined();
      expect(correctAnswerFor(question)?.id).toBe("q2-b");
    });
  });

  describe("answerStyleFor", () => {
    it("uses the four classic shapes in order", () => {
      expect([0, 1, 2, 3].map((i) => answerStyleFor(i).shape)).toEqual([
        "triangle",
        "diamond",
        "circle",
        "square",
      ]);
    });

    it("wraps past the fourth answer", () => {
      expect(answerStyleFor(4)).toEqual(answerStyleFor(0));
      expect(answerStyleFor(5).label).toBe("◆");
    });
  });
});
