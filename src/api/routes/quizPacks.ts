import { Router } from "express";
import { QuizPackInput } from "../../domain/quizContent";
import { generateQuizPack } from "../../domain/quizPackGenerator";
import {
  getAllQuizPacks,
  getAvailableCategories,
  getQuizPacksByCategory,
  loadQuizPackById,
  sanitizeQuizPackForStudent,
  summarizeQuizPack,
} from "../../loaders/quizPackLoader";
import { SavedQuizPack, saveNewQuizPack } from "../../stores/quizPackStore";

const router = Router();

const MAX_GENERATED_QUESTIONS = 20;

// GET /api/quiz-packs - List pack summaries (optionally ?category=)
router.get("/", (req, res) => {
  try {
    const { category } = req.query;
    const packs =
      category && typeof category === "string"
        ? getQuizPacksByCategory(category)
        : getAllQuizPacks();

    res.json(packs.map(summarizeQuizPack));
  } catch (error) {
    console.error("Error fetching quiz packs:", error);
    res.status(500).json({ error: "Failed to fetch quiz packs" });
  }
});

// GET /api/quiz-packs/categories - Category names
router.get("/categories", (req, res) => {
  try {
    res.json(getAvailableCategories());
  } catch (error) {
    console.error("Error fetching categories:", error);
    res.status(500).json({ error: "Failed to fetch categories" });
  }
});

// GET /api/quiz-packs/:id - Full pack
// Use ?audience=student to hide which answers are correct
router.get("/:id", (req, res) => {
  try {
    const pack = loadQuizPackById(req.params.id);
    if (!pack) {
      return res.status(404).json({ error: "Quiz pack not found" });
    }

    if (req.query.audience === "student") {
      return res.json(sanitizeQuizPackForStudent(pack));
    }
    res.json(pack);
  } catch (error) {
    console.error("Error fetching quiz pack:", error);
    res.status(500).json({ error: "Failed to fetch quiz pack" });
  }
});

// POST /api/quiz-packs - Save a pack (e.g. one returned by /generate)
router.post("/", (req, res) => {
  try {
    const input: QuizPackInput = req.body;

    if (!input || typeof input.title !== "string" || !Array.isArray(input.questions)) {
      return res.status(400).json({ error: "title and questions are required" });
    }

    let saved: SavedQuizPack;
    try {
      saved = saveNewQuizPack(input);
    } catch (error) {
      return res.status(400).json({ error: error instanceof Error ? error.message : "Invalid quiz pack" });
    }

    const { quizPack, filePath } = saved;
    console.log(`[quiz-packs] Saved "${quizPack.title}" as ${quizPack.id}`);
    res.status(201).json({ quizPack, filePath });
  } catch (error) {
    console.error("Error saving quiz pack:", error);
    res.status(500).json({ error: "Failed to save quiz pack" });
  }
});

// POST /api/quiz-packs/generate - Generate a pack with AI
router.post("/generate", async (req, res) => {
  try {
    const { topic, questionCount = 5, gradeLevel, category } = req.body;

    if (!topic || typeof topic !== "string") {
      return res.status(400).json({ error: "topic is required" });
    }
    const count = Number(questionCount);
    if (!Number.isInteger(count) || count < 1 || count > MAX_GENERATED_QUESTIONS) {
      return res.status(400).json({
        error: `questionCount must be between 1 and ${MAX_GENERATED_QUESTIONS}`,
      });
    }

    if (!process.env.OPENAI_API_KEY) {
      return res.status(503).json({ error: "Quiz generation is not configured (OPENAI_API_KEY missing)" });
    }

    const pack = await generateQuizPack({
      topic,
      questionCount: count,
      gradeLevel: typeof gradeLevel === "string" ? gradeLevel : undefined,
      category: typeof category === "string" ? category : undefined,
    });

    if (!pack) {
      return res.status(502).json({ error: "Quiz generation failed. Please try again." });
    }

    res.status(201).json(pack);
  } catch (error) {
    console.error("Error generating quiz pack:", error);
    res.status(500).json({ error: "Failed to generate quiz pack" });
  }
});

export default router;
