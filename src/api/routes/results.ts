import { Router } from "express";
import { RoundResultStore } from "../../stores/roundResultStore";

const router = Router();
const roundResultStore = new RoundResultStore();

// GET /api/results - Finished rounds, newest first
// Filter with ?playerName= or ?quizPackId=
router.get("/", (req, res) => {
  try {
    const { playerName, quizPackId } = req.query;

    let records =
      playerName && typeof playerName === "string"
        ? roundResultStore.getByPlayerName(playerName)
        : roundResultStore.getAll();

    if (quizPackId && typeof quizPackId === "string") {
      records = records.filter((r) => r.quizPackId === quizPackId);
    }

    res.json(records);
  } catch (error) {
    console.error("Error fetching round results:", error);
    res.status(500).json({ error: "Failed to fetch round results" });
  }
});

// GET /api/results/:id - One round record
router.get("/:id", (req, res) => {
  try {
    const record = roundResultStore.load(req.params.id);
    if (!record) {
      return res.status(404).json({ error: "Round result not found" });
    }
    res.json(record);
  } catch (error) {
    console.error("Error fetching round result:", error);
    res.status(500).json({ error: "Failed to fetch round result" });
  }
});

export default router;
