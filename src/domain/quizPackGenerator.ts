import OpenAI from "openai";
import { QuizPack, QuizPackInput, createQuizPack } from "./quizContent";

export interface QuizPackParams {
  topic: string;
  questionCount: number;
  gradeLevel?: string;
  category?: string;
  timeLimit?: number; // seconds per question
}

let openaiClient: OpenAI | null = null;

function getClient(): OpenAI | null {
  if (!process.env.OPENAI_API_KEY) {
    return null;
  }
  if (!openaiClient) {
    openaiClient = new OpenAI({
      apiKey: process.env.OPENAI_API_KEY
    });
  }
  return openaiClient;
}

function getSystemPrompt(gradeLevel: string): string {
  return `You write fast-paced multiple-choice quiz questions for ${gradeLevel} students playing a live classroom quiz game.

Your questions should:
- Be answerable in a few seconds by a student who knows the material
- Use age-appropriate vocabulary
- Have exactly 4 short answer options with exactly ONE correct option
- Use plausible wrong options, not joke answers

You MUST respond with valid JSON matching this exact structure:
{
  "title": "Quiz Title",
  "description": "One short, upbeat sentence describing the quiz",
  "questions": [
    {
      "questionText": "The question students will see",
      "answers": [
        { "text": "Option A", "isCorrect": false },
        { "text": "Option B", "isCorrect": true },
        { "text": "Option C", "isCorrect": false },
        { "text": "Option D", "isCorrect": false }
      ]
    }
  ]
}`;
}

function buildUserPrompt(params: QuizPackParams): string {
  return `Create a quiz about "${params.topic}".

Generate exactly ${params.questionCount} questions.
Vary the position of the correct answer between questions.`;
}

interface GeneratedQuizPack {
  title?: string;
  description?: string;
  questions?: {
    questionText?: string;
    answers?: { text?: string; isCorrect?: boolean }[];
  }[];
}

/**
 * Turn the model's JSON into pack input, or null if pieces are missing.
 */
export function toQuizPackInput(
  generated: GeneratedQuizPack,
  params: QuizPackParams
): QuizPackInput | null {
  if (!generated.title || !generated.description || !generated.questions?.length) {
    return null;
  }

  const questions: QuizPackInput["questions"] = [];
  for (const q of generated.questions) {
    if (!q.questionText || !q.answers?.length) {
      return null;
    }
    questions.push({
      questionText: q.questionText,
      timeLimit: params.timeLimit,
      answers: q.answers.map((a) => ({
        text: a.text ?? "",
        isCorrect: a.isCorrect === true,
      })),
    });
  }

  return {
    title: generated.title,
    description: generated.description,
    category: params.category || params.topic,
    icon: "sparkles",
    color: "purple",
    questions,
  };
}

/**
 * Generate a quiz pack with AI. Returns null when generation is unavailable
 * or the result is not a playable pack.
 */
export async function generateQuizPack(params: QuizPackParams): Promise<QuizPack | null> {
  const client = getClient();

  if (!client) {
    console.log("(Quiz generation requires OPENAI_API_KEY)");
    return null;
  }

  const gradeLevel = params.gradeLevel || "middle school";

  try {
    const completion = await client.chat.completions.create({
      model: "gpt-4o-mini",
      messages: [
        { role: "system", content: getSystemPrompt(gradeLevel) },
        { role: "user", content: buildUserPrompt(params) }
      ],
      temperature: 0.7,
      response_format: { type: "json_object" }
    });

    const content = completion.choices[0]?.message?.content;

    if (!content) {
      console.log("No response from AI. Please try again.");
      return null;
    }

    const generated: GeneratedQuizPack = JSON.parse(content);
    const input = toQuizPackInput(generated, params);

    if (!input) {
      console.log("AI response was incomplete. Please try again.");
      return null;
    }

    return createQuizPack(input);
  } catch (error) {
    console.error("Error generating quiz pack:", error);
    return null;
  }
}
