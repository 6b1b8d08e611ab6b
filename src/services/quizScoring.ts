import { AnswerChoice, QuizAttempt } from '../types/entities';
import { AttemptResult } from '../types/api';

export interface AttemptScore {
  score: number;
  total: number;
}

/**
 * Count the answers that match the key at the same position. Each question
 * is worth one point; an unanswered question scores nothing.
 */
export const scoreAnswers = (
  answerKey: readonly AnswerChoice[],
  answers: readonly (AnswerChoice | null)[]
): AttemptScore => {
  const score = answerKey.reduce(
    (correct, expected, index) => (answers[index] === expected ? correct + 1 : correct),
    0
  );
  return { score, total: answerKey.length };
};

export const toPercentage = (score: number, total: number): number => {
  return total === 0 ? 0 : Math.round((score / total) * 100);
};

export const toAttemptResult = (attempt: QuizAttempt): AttemptResult => ({
  ...attempt,
  percentage: toPercentage(attempt.score, attempt.total),
});
