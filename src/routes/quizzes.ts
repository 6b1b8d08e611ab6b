import { Router, Request, Response } from 'express';
import { AnswerChoice, QuizChoices, UserRole } from '../types/entities';
import { parseAnswerChoice } from '../types/enums';
import { CreateQuizQuestionInput } from '../types/api';
import { ValidationError, asyncHandler } from '../middleware/errorHandler';
import { requireIdentity } from '../middleware/auth';
import { requireRoles } from '../middleware/authorization';
import { asBody, readString } from '../utils/validation';
import { RouteContext } from './context';

const toChoice = (value: unknown): AnswerChoice | null =>
  typeof value === 'string' ? parseAnswerChoice(value.trim().toUpperCase()) : null;

const parseQuestion = (value: unknown, index: number): CreateQuizQuestionInput => {
  const label = `questions[${index}]`;
  const question = asBody(value);
  const choices = asBody(question.choices);

  const choiceText = (choice: AnswerChoice): string =>
    readString(choices, choice) ?? '';
  const parsedChoices: QuizChoices = {
    [AnswerChoice.A]: choiceText(AnswerChoice.A),
    [AnswerChoice.B]: choiceText(AnswerChoice.B),
    [AnswerChoice.C]: choiceText(AnswerChoice.C),
    [AnswerChoice.D]: choiceText(AnswerChoice.D),
  };

  const correct = toChoice(question.correct);
  if (!correct) {
    throw new ValidationError(`${label}.correct must be one of A, B, C, D`);
  }

  return {
    prompt: readString(question, 'prompt') ?? '',
    choices: parsedChoices,
    correct,
  };
};

const parseQuestions = (value: unknown): CreateQuizQuestionInput[] => {
  if (!Array.isArray(value)) {
    throw new ValidationError('questions must be an array');
  }
  return value.map((entry: unknown, index) => parseQuestion(entry, index));
};

// Blank entries are unanswered questions
const parseAnswers = (value: unknown): (AnswerChoice | null)[] => {
  if (!Array.isArray(value)) {
    throw new ValidationError('answers must be an array');
  }
  return value.map((entry: unknown, index) => {
    if (entry === null || entry === undefined || entry === '') {
      return null;
    }
    const choice = toChoice(entry);
    if (!choice) {
      throw new ValidationError(`answers[${index}] must be one of A, B, C, D or null`);
    }
    return choice;
  });
};

export const createQuizRouter = ({ services, auth }: RouteContext): Router => {
  const router = Router();

  router.use('/quizzes', auth.authenticateToken);

  /**
   * GET /quizzes
   * All quizzes; students also get their own attempt per quiz
   */
  router.get(
    '/quizzes',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await services.quizzes.list(requireIdentity(req)));
    })
  );

  /**
   * POST /quizzes
   * Author a multiple-choice quiz (teacher only)
   */
  router.post(
    '/quizzes',
    requireRoles([UserRole.TEACHER]),
    asyncHandler(async (req: Request, res: Response) => {
      const body = asBody(req.body);
      const quiz = await services.quizzes.create(requireIdentity(req), {
        title: readString(body, 'title') ?? '',
        questions: parseQuestions(body.questions),
      });
      res.status(201).json(quiz);
    })
  );

  /**
   * GET /quizzes/:id
   * Questions without the answer key, unless the caller wrote the quiz
   */
  router.get(
    '/quizzes/:id',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await services.quizzes.get(requireIdentity(req), req.params.id));
    })
  );

  /**
   * POST /quizzes/:id/attempts
   * Submit answers once and get the score back (student only)
   */
  router.post(
    '/quizzes/:id/attempts',
    requireRoles([UserRole.STUDENT]),
    asyncHandler(async (req: Request, res: Response) => {
      const body = asBody(req.body);
      const result = await services.quizzes.attempt(
        requireIdentity(req),
        req.params.id,
        parseAnswers(body.answers)
      );
      res.status(201).json(result);
    })
  );

  /**
   * GET /quizzes/:id/attempts
   * Every attempt on the quiz (owning teacher only)
   */
  router.get(
    '/quizzes/:id/attempts',
    requireRoles([UserRole.TEACHER]),
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await services.quizzes.results(requireIdentity(req), req.params.id));
    })
  );

  return router;
};
