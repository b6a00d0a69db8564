import fs from "fs";
import path from "path";
import { RoundRecord } from "../domain/roundSummary";

const DATA_DIR = path.join(__dirname, "../../data/round-results");

/**
 * RoundResultStore saves finished rounds as JSON files: {recordId}.json
 *
 * The game engine keeps nothing once a round ends; anything worth
 * showing later (history, class reports) is read from here.
 */
export class RoundResultStore {
  constructor() {
    // Ensure the results directory exists
    if (!fs.existsSync(DATA_DIR)) {
      fs.mkdirSync(DATA_DIR, { recursive: true });
    }
  }

  /**
   * Save a round record to disk
   */
  save(record: RoundRecord): void {
    const filePath = path.join(DATA_DIR, `${record.id}.json`);
    fs.writeFileSync(filePath, JSON.stringify(record, null, 2));
  }

  /**
   * Load a round record by ID
   */
  load(recordId: string): RoundRecord | null {
    const filePath = path.join(DATA_DIR, `${recordId}.json`);
    if (!fs.existsSync(filePath)) {
      return null;
    }
    const data = fs.readFileSync(filePath, "utf-8");
    return JSON.parse(data) as RoundRecord;
  }

  /**
   * Get all records, newest first
   */
  getAll(): RoundRecord[] {
    const records: RoundRecord[] = [];

    for (const file of this.listRecordFiles()) {
      const record = this.loadFromFile(file);
      if (record) {
        records.push(record);
      }
    }

    return records.sort(
      (a, b) => new Date(b.completedAt).getTime() - new Date(a.completedAt).getTime()
    );
  }

  getByPlayerName(playerName: string): RoundRecord[] {
    const name = playerName.trim().toLowerCase();
    return this.getAll().filter((r) => r.playerName.toLowerCase() === name);
  }

  getByQuizPack(quizPackId: string): RoundRecord[] {
    return this.getAll().filter((r) => r.quizPackId === quizPackId);
  }

  private listRecordFiles(): string[] {
    if (!fs.existsSync(DATA_DIR)) {
      return [];
    }
    return fs.readdirSync(DATA_DIR).filter((f) => f.endsWith(".json"));
  }

  private loadFromFile(filename: string): RoundRecord | null {
    try {
      const filePath = path.join(DATA_DIR, filename);
      const data = fs.readFileSync(filePath, "utf-8");
      return JSON.parse(data) as RoundRecord;
    } catch (error) {
      console.error(`Error loading round record ${filename}:`, error);
      return null;
    }
  }
}
