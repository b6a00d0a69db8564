import OpenAI from "openai";
import { generateQuizPack, QuizPackParams, toQuizPackInput } from "./quizPackGenerator";

// Mock OpenAI
jest.mock("openai");

const MockedOpenAI = OpenAI as jest.MockedClass<typeof OpenAI>;
const mockCreate = jest.fn();

MockedOpenAI.mockImplementation(
  () =>
    ({
      chat: {
        completions: {
          create: mockCreate,
        },
      },
    }) as unknown as OpenAI
);

describe("quizPackGenerator", () => {
  const originalEnv = process.env.OPENAI_API_KEY;

  const params: QuizPackParams = {
    topic: "Volcanoes",
    questionCount: 2,
    timeLimit: 15,
  };

  const generatedPack = {
    title: "Volcano Quiz",
    description: "Hot questions about volcanoes",
    questions: [
      {
        questionText: "What comes out of a volcano?",
        answers: [
          { text: "Lava", isCorrect: true },
          { text: "Snow", isCorrect: false },
        ],
      },
      {
        questionText: "Where is magma found?",
        answers: [
          { text: "In the clouds", isCorrect: false },
          { text: "Underground", isCorrect: true },
        ],
      },
    ],
  };

  const respondWith = (content: string | null) => {
    mockCreate.mockResolvedValue({ choices: [{ message: { content } }] });
  };

  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    mockCreate.mockReset();
    process.env.OPENAI_API_KEY = "test-key";
    logSpy = jest.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    process.env.OPENAI_API_KEY = originalEnv;
    logSpy.mockRestore();
    errorSpy.mockRestore();
  });

  describe("generateQuizPack", () => {
    it("returns null when OPENAI_API_KEY is not set", async () => {
      delete process.env.OPENAI_API_KEY;
      jest.resetModules();

      const { generateQuizPack: generateWithoutKey } = await import("./quizPackGenerator");

      const result = await generateWithoutKey(params);
      expect(result).toBeNull();
      expect(logSpy).toHaveBeenCalledWith("(Quiz generation requires OPENAI_API_KEY)");
    });

    it("builds a playable pack from the model's JSON", async () => {
      respondWith(JSON.stringify(generatedPack));

      const pack = await generateQuizPack(params);

      expect(pack).not.toBeNull();
      expect(pack?.title).toBe("Volcano Quiz");
      expect(pack?.category).toBe("Volcanoes");
      expect(pack?.icon).toBe("sparkles");
      expect(pack?.questions).toHaveLength(2);
      expect(pack?.questions[0].timeLimit).toBe(15);
      expect(pack?.questions[1].answers.find((a) => a.isCorrect)?.text).toBe("Underground");
    });

    it("asks for JSON output from the configured model", async () => {
      respondWith(JSON.stringify(generatedPack));

      await generateQuizPack(params);

      expect(mockCreate).toHaveBeenCalledWith(
        expect.objectContaining({
          model: "gpt-4o-mini",
          response_format: { type: "json_object" },
        })
      );
      const request = mockCreate.mock.calls[0][0];
      expect(request.messages[1].content).toContain('Create a quiz about "Volcanoes"');
      expect(request.messages[1].content).toContain("Generate exactly 2 questions.");
    });

    it("returns null when the model sends no content", async () => {
      respondWith(null);

      const result = await generateQuizPack(params);

      expect(result).toBeNull();
      expect(logSpy).toHaveBeenCalledWith("No response from AI. Please try again.");
    });

    it("returns null when the JSON is missing questions", async () => {
      respondWith(JSON.stringify({ title: "Half a quiz", description: "Oops" }));

      const result = await generateQuizPack(params);

      expect(result).toBeNull();
      expect(logSpy).toHaveBeenCalledWith("AI response was incomplete. Please try again.");
    });

    it("returns null when a question has two correct answers", async () => {
      const broken = {
        ...generatedPack,
        questions: [
          {
            questionText: "Pick one",
            answers: [
              { text: "A", isCorrect: true },
              { text: "B", isCorrect: true },
            ],
          },
        ],
      };
      respondWith(JSON.stringify(broken));

      const result = await generateQuizPack(params);

      expect(result).toBeNull();
      expect(errorSpy).toHaveBeenCalledWith("Error generating quiz pack:", expect.any(Error));
    });

    it("returns null when the API call fails", async () => {
      mockCreate.mockRejectedValue(new Error("rate limited"));

      const result = await generateQuizPack(params);

      expect(result).toBeNull();
      expect(errorSpy).toHaveBeenCalledWith("Error generating quiz pack:", expect.any(Error));
    });
  });

  describe("toQuizPackInput", () => {
    it("uses the requested category when given", () => {
      const input = toQuizPackInput(generatedPack, { ...params, category: "Earth Science" });

      expect(input?.category).toBe("Earth Science");
      expect(input?.questions[0].answers).toEqual([
        { text: "Lava", isCorrect: true },
        { text: "Snow", isCorrect: false },
      ]);
    });

    it("returns null when a question has no answers", () => {
      const input = toQuizPackInput(
        { ...generatedPack, questions: [{ questionText: "Empty?", answers: [] }] },
        params
      );

      expect(input).toBeNull();
    });

    it("treats a missing isCorrect flag as wrong", () => {
      const input = toQuizPackInput(
        {
          ...generatedPack,
          questions: [{ questionText: "Q", answers: [{ text: "A" }, { text: "B", isCorrect: true }] }],
        },
        params
      );

      expect(input?.questions[0].answers.map((a) => a.isCorrect)).toEqual([false, true]);
    });
  });
});
