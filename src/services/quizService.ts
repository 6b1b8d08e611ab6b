import { ContentRepository } from '../store/types';
import { AnswerChoice, Identity, Quiz, UserRole } from '../types/entities';
import { ANSWER_CHOICES, assertNever } from '../types/enums';
import { MAX_QUIZ_QUESTIONS } from '../types/constants';
import {
  AttemptResult,
  AttemptWithStudent,
  CreateQuizRequest,
  QuizDetail,
  QuizQuestionView,
  QuizSummary,
} from '../types/api';
import {
  AuthorizationError,
  ConflictError,
  NotFoundError,
  ValidationError,
} from '../middleware/errorHandler';
import { logger } from '../utils/logger';
import { AccountService } from './accountService';
import { requireRole } from './authService';
import { scoreAnswers, toAttemptResult } from './quizScoring';

const validateQuestions = (input: CreateQuizRequest): void => {
  if (input.questions.length === 0) {
    throw new ValidationError('A quiz needs at least one question');
  }
  if (input.questions.length > MAX_QUIZ_QUESTIONS) {
    throw new ValidationError(`A quiz can have at most ${MAX_QUIZ_QUESTIONS} questions`);
  }

  input.questions.forEach((question, index) => {
    const label = `Question ${index + 1}`;
    if (!question.prompt.trim()) {
      throw new ValidationError(`${label} needs a prompt`);
    }
    for (const choice of ANSWER_CHOICES) {
      if (!question.choices[choice].trim()) {
        throw new ValidationError(`${label} needs text for choice ${choice}`);
      }
    }
  });
};

/**
 * Quiz Service
 * Teachers author multiple-choice quizzes; each student gets one scored attempt
 */
export class QuizService {
  constructor(
    private readonly content: ContentRepository,
    private readonly accounts: AccountService
  ) {}

  async create(identity: Identity, input: CreateQuizRequest): Promise<QuizDetail> {
    requireRole(identity, UserRole.TEACHER);
    validateQuestions(input);

    const quiz = await this.content.insertQuiz({
      title: input.title.trim() || 'Untitled Quiz',
      created_by: identity.userId,
      questions: input.questions.map((question) => ({
        prompt: question.prompt.trim(),
        choices: {
          [AnswerChoice.A]: question.choices[AnswerChoice.A].trim(),
          [AnswerChoice.B]: question.choices[AnswerChoice.B].trim(),
          [AnswerChoice.C]: question.choices[AnswerChoice.C].trim(),
          [AnswerChoice.D]: question.choices[AnswerChoice.D].trim(),
        },
        correct: question.correct,
      })),
    });

    logger.info('Quiz created', {
      quizId: quiz.id,
      userId: identity.userId,
      questionCount: quiz.questions.length,
    });
    return this.toDetail(identity, quiz, identity.name, null);
  }

  async list(identity: Identity): Promise<QuizSummary[]> {
    const quizzes = await this.content.listQuizzes();
    const names = await this.accounts.namesById(quizzes.map((quiz) => quiz.created_by));

    const summaries: QuizSummary[] = quizzes.map((quiz) => ({
      id: quiz.id,
      title: quiz.title,
      created_by: quiz.created_by,
      author_name: names.get(quiz.created_by) ?? null,
      created_at: quiz.created_at,
      question_count: quiz.questions.length,
    }));

    switch (identity.role) {
      case UserRole.TEACHER:
        return summaries;
      case UserRole.STUDENT: {
        const attempts = await this.content.listAttempts({ studentId: identity.userId });
        const byQuiz = new Map(attempts.map((attempt) => [attempt.quiz_id, attempt]));
        return summaries.map((summary) => {
          const attempt = byQuiz.get(summary.id);
          return { ...summary, attempt: attempt ? toAttemptResult(attempt) : null };
        });
      }
      default:
        return assertNever(identity.role);
    }
  }

  async get(identity: Identity, quizId: string): Promise<QuizDetail> {
    const quiz = await this.requireQuiz(quizId);
    const names = await this.accounts.namesById([quiz.created_by]);

    const attempt =
      identity.role === UserRole.STUDENT
        ? await this.content.findAttemptFor(quiz.id, identity.userId)
        : null;

    return this.toDetail(
      identity,
      quiz,
      names.get(quiz.created_by) ?? null,
      attempt ? toAttemptResult(attempt) : null
    );
  }

  /**
   * Record and score a student's single attempt. Answers are matched to
   * questions by position; missing trailing answers count as unanswered.
   */
  async attempt(
    identity: Identity,
    quizId: string,
    answers: (AnswerChoice | null)[]
  ): Promise<AttemptResult> {
    requireRole(identity, UserRole.STUDENT);
    const quiz = await this.requireQuiz(quizId);

    if (answers.length > quiz.questions.length) {
      throw new ValidationError(
        `Quiz has ${quiz.questions.length} questions but ${answers.length} answers were submitted`
      );
    }

    const existing = await this.content.findAttemptFor(quiz.id, identity.userId);
    if (existing) {
      throw new ConflictError('You already submitted this quiz');
    }

    const padded = quiz.questions.map((_, index) => answers[index] ?? null);
    const { score, total } = scoreAnswers(
      quiz.questions.map((question) => question.correct),
      padded
    );

    const attempt = await this.content.insertAttempt({
      quiz_id: quiz.id,
      student_id: identity.userId,
      answers: padded,
      score,
      total,
    });

    const result = toAttemptResult(attempt);
    logger.info('Quiz submitted', {
      quizId: quiz.id,
      userId: identity.userId,
      score,
      total,
      percentage: result.percentage,
    });
    return result;
  }

  /**
   * All attempts on a quiz, for the teacher who wrote it
   */
  async results(identity: Identity, quizId: string): Promise<AttemptWithStudent[]> {
    requireRole(identity, UserRole.TEACHER);
    const quiz = await this.requireQuiz(quizId);
    if (quiz.created_by !== identity.userId) {
      throw new AuthorizationError('Only the quiz owner can view its results');
    }

    const attempts = await this.content.listAttempts({ quizId: quiz.id });
    const names = await this.accounts.namesById(attempts.map((attempt) => attempt.student_id));
    return attempts.map((attempt) => ({
      ...toAttemptResult(attempt),
      student_name: names.get(attempt.student_id) ?? null,
    }));
  }

  private async requireQuiz(id: string): Promise<Quiz> {
    const quiz = await this.content.findQuiz(id);
    if (!quiz) {
      throw new NotFoundError('Quiz');
    }
    return quiz;
  }

  private toDetail(
    identity: Identity,
    quiz: Quiz,
    authorName: string | null,
    attempt: AttemptResult | null
  ): QuizDetail {
    const showKey = identity.role === UserRole.TEACHER && quiz.created_by === identity.userId;
    const questions: QuizQuestionView[] = quiz.questions.map((question) => ({
      id: question.id,
      position: question.position,
      prompt: question.prompt,
      choices: { ...question.choices },
      ...(showKey ? { correct: question.correct } : {}),
    }));

    return {
      id: quiz.id,
      title: quiz.title,
      created_by: quiz.created_by,
      author_name: authorName,
      created_at: quiz.created_at,
      questions,
      attempt,
    };
  }
}
