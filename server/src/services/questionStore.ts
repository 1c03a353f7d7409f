// server/src/services/questionStore.ts
import type { Pool } from "pg";
import type { QuestionRecord } from "../schemas/questionRecordSchemas";
import type { Logger } from "../utils/logger";

export type SaveSummary = { inserted: number; duplicates: number; skipped: number };

export interface QuestionStore {
  /** Saves one imported test; `source` is the test's display name. */
  saveImported(records: readonly QuestionRecord[], source: string): Promise<SaveSummary>;
}

export type InsertQuestion = {
  topic: string;
  question_text: string;
  options: string[]; // exactly 4
  correct_answer: number; // 0..3
  difficulty: number; // 1..5
  tags: string[];
  explanation: string[] | null;
};

const DEFAULT_DIFFICULTY = 3;

/** null when the record has no usable answer (the questions table needs 0..3). */
export function toInsertQuestion(r: QuestionRecord, source: string): InsertQuestion | null {
  if (r.correctAnswer < 0) return null;
  return {
    topic: r.topic,
    question_text: r.text,
    options: [...r.options],
    correct_answer: r.correctAnswer,
    difficulty: DEFAULT_DIFFICULTY,
    tags: [r.subject, source],
    explanation: [r.explanation],
  };
}

const INSERT_SQL = `
  INSERT INTO questions
    (topic, question_text, options, correct_answer, difficulty, tags, explanation, status, type)
  VALUES
    ($1,    $2,           $3::jsonb, $4,            $5,         $6::text[], $7::text[], 'draft', 'MCQ')
  ON CONFLICT ON CONSTRAINT questions_topic_question_text_key DO NOTHING
  RETURNING id
`;

export class PgQuestionStore implements QuestionStore {
  constructor(private readonly pool: Pool, private readonly logger: Logger = console) {}

  async saveImported(records: readonly QuestionRecord[], source: string): Promise<SaveSummary> {
    const summary: SaveSummary = { inserted: 0, duplicates: 0, skipped: 0 };
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      for (const r of records) {
        const row = toInsertQuestion(r, source);
        if (!row) {
          this.logger.warn(`⚠️ Q${r.id} of ${source} has no answer, not stored`);
          summary.skipped++;
          continue;
        }
        const { rows } = await client.query<{ id: number }>(INSERT_SQL, [
          row.topic,
          row.question_text,
          JSON.stringify(row.options),
          row.correct_answer,
          row.difficulty,
          row.tags,
          row.explanation,
        ]);
        // rows.length === 0 => duplicate skipped
        if (rows.length > 0) summary.inserted++;
        else summary.duplicates++;
      }
      await client.query("COMMIT");
      return summary;
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }
}
