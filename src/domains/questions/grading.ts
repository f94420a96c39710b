/**
 * Automatic grading of submitted answers
 */
import type { QuestionOption, QuestionRecord } from "../../persistence/schemas.js";

const NUMERIC_TOLERANCE = 0.01;

export type GradeResult =
  | {
      ok: true;
      answerText?: string;
      optionKeys: string[];
      /** 0-100, null while ungraded */
      score: number | null;
      graded: boolean;
    }
  | { ok: false; error: string };

type Gradable = Pick<QuestionRecord, "qtype" | "expectedAnswer" | "allowMultipleSelections">;

function normalize(answer: string): string {
  return answer.trim().toLowerCase();
}

function parseNumber(value: string): number | null {
  const text = value.trim().replace(/,/g, ".");
  if (text === "") return null;
  const n = Number(text);
  return Number.isFinite(n) ? n : null;
}

function numericMatches(given: string, expected: string): boolean {
  const a = parseNumber(given);
  const b = parseNumber(expected);
  return a !== null && b !== null && Math.abs(a - b) <= NUMERIC_TOLERANCE;
}

/**
 * `parts` are the words after the question id. Option keys compare
 * case-insensitively and repeated keys count once.
 */
export function gradeAnswer(
  question: Gradable,
  options: QuestionOption[],
  parts: string[],
): GradeResult {
  const answerText = parts.join(" ");
  const byKey = new Map(options.map((option) => [option.key.toUpperCase(), option]));
  const available = [...byKey.keys()].join(", ");
  const keys = [...new Set(parts.map((part) => part.toUpperCase()))];

  switch (question.qtype) {
    case "essay":
      return { ok: true, answerText, optionKeys: [], score: null, graded: false };

    case "poll": {
      const selected = keys.flatMap((key) => {
        const option = byKey.get(key);
        return option ? [option.key] : [];
      });
      if (selected.length === 0) {
        return { ok: false, error: `❌ Invalid option(s). Available options: ${available}` };
      }
      return { ok: true, optionKeys: selected, score: null, graded: false };
    }

    case "multiple_choice":
    case "true_false": {
      const invalid = keys.filter((key) => !byKey.has(key));
      if (invalid.length > 0) {
        return {
          ok: false,
          error: `❌ Invalid option(s): ${invalid.join(", ")}. Available options: ${available}`,
        };
      }
      if (keys.length > 1 && !question.allowMultipleSelections) {
        return { ok: false, error: "❌ This question allows only one option." };
      }

      const selected = keys.flatMap((key) => {
        const option = byKey.get(key);
        return option ? [option] : [];
      });
      const totalCorrect = options.filter((option) => option.isCorrect).length;
      const right = selected.filter((option) => option.isCorrect).length;
      const wrong = selected.length - right;

      let score: number;
      if (!question.allowMultipleSelections) {
        score = right === 1 ? 100 : 0;
      } else if (totalCorrect > 0) {
        score = Math.max(0, Math.min(1, (right - wrong) / totalCorrect)) * 100;
      } else {
        score = wrong === 0 ? 100 : 0;
      }
      return {
        ok: true,
        optionKeys: selected.map((option) => option.key),
        score,
        graded: true,
      };
    }

    case "short_answer":
    case "numeric": {
      const expected = question.expectedAnswer;
      // Without an expected answer a teacher grades it by hand
      if (expected === undefined) {
        return { ok: true, answerText, optionKeys: [], score: null, graded: false };
      }
      const correct =
        question.qtype === "numeric"
          ? numericMatches(answerText, expected)
          : normalize(answerText) === normalize(expected);
      return { ok: true, answerText, optionKeys: [], score: correct ? 100 : 0, graded: true };
    }
  }
}
