import { createClient, SupabaseClient, PostgrestError } from '@supabase/supabase-js';
import { validate as isUuid } from 'uuid';
import {
  User,
  Announcement,
  Assignment,
  Submission,
  Discussion,
  DiscussionPost,
  Quiz,
  QuizQuestion,
  QuizAttempt,
  AnswerChoice,
} from '../types/entities';
import { parseAnswerChoice, parseUserRole } from '../types/enums';
import {
  ConflictError,
  DatabaseError,
  DuplicateEmailError,
  NotFoundError,
} from '../middleware/errorHandler';
import { logger } from '../utils/logger';
import { SupabaseConfig } from '../config/env';
import {
  AccountRepository,
  ContentRepository,
  DataStore,
  NewUser,
  NewAnnouncement,
  NewAssignment,
  NewSubmission,
  SubmissionGrade,
  NewDiscussion,
  NewDiscussionPost,
  NewQuiz,
  NewQuizAttempt,
  SubmissionQuery,
  AttemptQuery,
} from './types';

// Postgres unique_violation
const UNIQUE_VIOLATION = '23505';

interface UserRow {
  id: string;
  name: string;
  email: string;
  password_hash: string;
  role: string;
  created_at: string;
}

interface QuizQuestionRow {
  id: string;
  quiz_id: string;
  position: number;
  prompt: string;
  choice_a: string;
  choice_b: string;
  choice_c: string;
  choice_d: string;
  correct: string;
}

interface QuizRow {
  id: string;
  title: string;
  created_by: string;
  created_at: string;
  quiz_questions?: QuizQuestionRow[];
}

interface QuizAttemptRow {
  id: string;
  quiz_id: string;
  student_id: string;
  answers: unknown;
  score: number;
  total: number;
  submitted_at: string;
}

const QUIZ_SELECT = 'id, title, created_by, created_at, quiz_questions(*)';

const failure = (operation: string, error: PostgrestError): DatabaseError => {
  logger.error(`Supabase ${operation} failed`, {
    code: error.code,
    error: error.message,
  });
  return new DatabaseError(`Failed to ${operation}`);
};

const toUser = (row: UserRow): User => {
  const role = parseUserRole(row.role);
  if (!role) {
    throw new DatabaseError(`Unknown role "${row.role}" for user ${row.id}`);
  }
  return { ...row, role };
};

const toQuestion = (row: QuizQuestionRow): QuizQuestion => {
  const correct = parseAnswerChoice(row.correct);
  if (!correct) {
    throw new DatabaseError(`Invalid answer key for question ${row.id}`);
  }
  return {
    id: row.id,
    quiz_id: row.quiz_id,
    position: row.position,
    prompt: row.prompt,
    choices: {
      [AnswerChoice.A]: row.choice_a,
      [AnswerChoice.B]: row.choice_b,
      [AnswerChoice.C]: row.choice_c,
      [AnswerChoice.D]: row.choice_d,
    },
    correct,
  };
};

const toQuiz = (row: QuizRow): Quiz => ({
  id: row.id,
  title: row.title,
  created_by: row.created_by,
  created_at: row.created_at,
  questions: (row.quiz_questions ?? [])
    .map(toQuestion)
    .sort((a, b) => a.position - b.position),
});

const toAttempt = (row: QuizAttemptRow): QuizAttempt => ({
  ...row,
  answers: Array.isArray(row.answers) ? row.answers.map(parseAnswerChoice) : [],
});

export class SupabaseAccountRepository implements AccountRepository {
  constructor(private readonly supabase: SupabaseClient) {}

  async insertUser(input: NewUser): Promise<User> {
    const { data, error } = await this.supabase
      .from('users')
      .insert({ ...input, created_at: new Date().toISOString() })
      .select('*')
      .single();

    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        throw new DuplicateEmailError();
      }
      throw failure('create user', error);
    }
    return toUser(data);
  }

  async findUserByEmail(email: string): Promise<User | null> {
    const { data, error } = await this.supabase
      .from('users')
      .select('*')
      .eq('email', email)
      .maybeSingle();

    if (error) {
      throw failure('look up user by email', error);
    }
    return data ? toUser(data) : null;
  }

  async findUserById(id: string): Promise<User | null> {
    const { data, error } = await this.supabase
      .from('users')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) {
      throw failure('look up user', error);
    }
    return data ? toUser(data) : null;
  }

  async findUsersByIds(ids: string[]): Promise<User[]> {
    if (ids.length === 0) {
      return [];
    }
    const { data, error } = await this.supabase
      .from('users')
      .select('*')
      .in('id', [...new Set(ids)]);

    if (error) {
      throw failure('look up users', error);
    }
    const rows: UserRow[] = data ?? [];
    return rows.map(toUser);
  }

  async countUsers(): Promise<number> {
    const { count, error } = await this.supabase
      .from('users')
      .select('*', { count: 'exact', head: true });

    if (error) {
      throw failure('count users', error);
    }
    return count ?? 0;
  }
}

export class SupabaseContentRepository implements ContentRepository {
  constructor(private readonly supabase: SupabaseClient) {}

  async insertAnnouncement(input: NewAnnouncement): Promise<Announcement> {
    return this.insertRow<Announcement>('announcements', 'create announcement', {
      ...input,
      created_at: new Date().toISOString(),
    });
  }

  async listAnnouncements(limit?: number): Promise<Announcement[]> {
    let query = this.supabase
      .from('announcements')
      .select('*')
      .order('created_at', { ascending: false });
    if (limit !== undefined) {
      query = query.limit(limit);
    }

    const { data, error } = await query;
    if (error) {
      throw failure('list announcements', error);
    }
    return data ?? [];
  }

  async countAnnouncements(): Promise<number> {
    return this.countRows('announcements');
  }

  async insertAssignment(input: NewAssignment): Promise<Assignment> {
    return this.insertRow<Assignment>('assignments', 'create assignment', {
      ...input,
      created_at: new Date().toISOString(),
    });
  }

  async findAssignment(id: string): Promise<Assignment | null> {
    return this.findRow<Assignment>('assignments', 'look up assignment', id);
  }

  async listAssignments(createdBy?: string): Promise<Assignment[]> {
    let query = this.supabase
      .from('assignments')
      .select('*')
      .order('created_at', { ascending: false });
    if (createdBy !== undefined) {
      query = query.eq('created_by', createdBy);
    }

    const { data, error } = await query;
    if (error) {
      throw failure('list assignments', error);
    }
    return data ?? [];
  }

  async countAssignments(): Promise<number> {
    return this.countRows('assignments');
  }

  async insertSubmission(input: NewSubmission): Promise<Submission> {
    const { data, error } = await this.supabase
      .from('submissions')
      .insert({ ...input, submitted_at: new Date().toISOString() })
      .select('*')
      .single();

    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        throw new ConflictError('A submission already exists for this assignment');
      }
      throw failure('create submission', error);
    }
    return data;
  }

  async updateSubmissionContent(id: string, content: string): Promise<Submission> {
    return this.updateUngradedSubmission(id, {
      content,
      submitted_at: new Date().toISOString(),
    });
  }

  async gradeSubmission(id: string, grade: SubmissionGrade): Promise<Submission> {
    return this.updateUngradedSubmission(id, {
      ...grade,
      graded_at: new Date().toISOString(),
    });
  }

  async findSubmission(id: string): Promise<Submission | null> {
    return this.findRow<Submission>('submissions', 'look up submission', id);
  }

  async findSubmissionFor(assignmentId: string, studentId: string): Promise<Submission | null> {
    if (!isUuid(assignmentId) || !isUuid(studentId)) {
      return null;
    }
    const { data, error } = await this.supabase
      .from('submissions')
      .select('*')
      .eq('assignment_id', assignmentId)
      .eq('student_id', studentId)
      .maybeSingle();

    if (error) {
      throw failure('look up submission', error);
    }
    return data;
  }

  async listSubmissions(query: SubmissionQuery): Promise<Submission[]> {
    if (query.assignmentIds && query.assignmentIds.length === 0) {
      return [];
    }
    if (query.assignmentId !== undefined && !isUuid(query.assignmentId)) {
      return [];
    }

    let builder = this.supabase
      .from('submissions')
      .select('*')
      .order('submitted_at', { ascending: false });
    if (query.assignmentId !== undefined) {
      builder = builder.eq('assignment_id', query.assignmentId);
    }
    if (query.assignmentIds) {
      builder = builder.in('assignment_id', query.assignmentIds);
    }
    if (query.studentId !== undefined) {
      builder = builder.eq('student_id', query.studentId);
    }

    const { data, error } = await builder;
    if (error) {
      throw failure('list submissions', error);
    }
    return data ?? [];
  }

  async insertDiscussion(input: NewDiscussion): Promise<Discussion> {
    return this.insertRow<Discussion>('discussions', 'create discussion', {
      ...input,
      created_at: new Date().toISOString(),
    });
  }

  async findDiscussion(id: string): Promise<Discussion | null> {
    return this.findRow<Discussion>('discussions', 'look up discussion', id);
  }

  async listDiscussions(): Promise<Discussion[]> {
    const { data, error } = await this.supabase
      .from('discussions')
      .select('*')
      .order('created_at', { ascending: false });

    if (error) {
      throw failure('list discussions', error);
    }
    return data ?? [];
  }

  async insertPost(input: NewDiscussionPost): Promise<DiscussionPost> {
    return this.insertRow<DiscussionPost>('discussion_posts', 'create post', {
      ...input,
      created_at: new Date().toISOString(),
    });
  }

  async listPosts(discussionId: string): Promise<DiscussionPost[]> {
    const { data, error } = await this.supabase
      .from('discussion_posts')
      .select('*')
      .eq('discussion_id', discussionId)
      .order('created_at', { ascending: true });

    if (error) {
      throw failure('list posts', error);
    }
    return data ?? [];
  }

  async insertQuiz(input: NewQuiz): Promise<Quiz> {
    const { data: quiz, error } = await this.supabase
      .from('quizzes')
      .insert({
        title: input.title,
        created_by: input.created_by,
        created_at: new Date().toISOString(),
      })
      .select('id')
      .single();

    if (error) {
      throw failure('create quiz', error);
    }

    const questionRows = input.questions.map((question, position) => ({
      quiz_id: quiz.id,
      position,
      prompt: question.prompt,
      choice_a: question.choices[AnswerChoice.A],
      choice_b: question.choices[AnswerChoice.B],
      choice_c: question.choices[AnswerChoice.C],
      choice_d: question.choices[AnswerChoice.D],
      correct: question.correct,
    }));

    const { error: questionsError } = await this.supabase
      .from('quiz_questions')
      .insert(questionRows);

    if (questionsError) {
      // Remove the quiz so a failed create leaves no question-less quiz behind
      const { error: cleanupError } = await this.supabase
        .from('quizzes')
        .delete()
        .eq('id', quiz.id);
      if (cleanupError) {
        logger.error('Failed to remove quiz after question insert failure', {
          quizId: quiz.id,
          error: cleanupError.message,
        });
      }
      throw failure('create quiz questions', questionsError);
    }

    const created = await this.findQuiz(quiz.id);
    if (!created) {
      throw new NotFoundError('Quiz');
    }
    return created;
  }

  async findQuiz(id: string): Promise<Quiz | null> {
    if (!isUuid(id)) {
      return null;
    }
    const { data, error } = await this.supabase
      .from('quizzes')
      .select(QUIZ_SELECT)
      .eq('id', id)
      .maybeSingle();

    if (error) {
      throw failure('look up quiz', error);
    }
    return data ? toQuiz(data) : null;
  }

  async listQuizzes(createdBy?: string): Promise<Quiz[]> {
    let query = this.supabase
      .from('quizzes')
      .select(QUIZ_SELECT)
      .order('created_at', { ascending: false });
    if (createdBy !== undefined) {
      query = query.eq('created_by', createdBy);
    }

    const { data, error } = await query;
    if (error) {
      throw failure('list quizzes', error);
    }
    const rows: QuizRow[] = data ?? [];
    return rows.map(toQuiz);
  }

  async countQuizzes(): Promise<number> {
    return this.countRows('quizzes');
  }

  async insertAttempt(input: NewQuizAttempt): Promise<QuizAttempt> {
    const { data, error } = await this.supabase
      .from('quiz_attempts')
      .insert({ ...input, submitted_at: new Date().toISOString() })
      .select('*')
      .single();

    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        throw new ConflictError('You already submitted this quiz');
      }
      throw failure('record quiz attempt', error);
    }
    return toAttempt(data);
  }

  async findAttemptFor(quizId: string, studentId: string): Promise<QuizAttempt | null> {
    if (!isUuid(quizId) || !isUuid(studentId)) {
      return null;
    }
    const { data, error } = await this.supabase
      .from('quiz_attempts')
      .select('*')
      .eq('quiz_id', quizId)
      .eq('student_id', studentId)
      .maybeSingle();

    if (error) {
      throw failure('look up quiz attempt', error);
    }
    return data ? toAttempt(data) : null;
  }

  async listAttempts(query: AttemptQuery): Promise<QuizAttempt[]> {
    let builder = this.supabase
      .from('quiz_attempts')
      .select('*')
      .order('submitted_at', { ascending: false });
    if (query.quizId !== undefined) {
      builder = builder.eq('quiz_id', query.quizId);
    }
    if (query.studentId !== undefined) {
      builder = builder.eq('student_id', query.studentId);
    }

    const { data, error } = await builder;
    if (error) {
      throw failure('list quiz attempts', error);
    }
    const rows: QuizAttemptRow[] = data ?? [];
    return rows.map(toAttempt);
  }

  // The score filter makes the graded check part of the update itself
  private async updateUngradedSubmission(
    id: string,
    patch: Partial<Submission>
  ): Promise<Submission> {
    if (!isUuid(id)) {
      throw new NotFoundError('Submission');
    }

    const { data, error } = await this.supabase
      .from('submissions')
      .update(patch)
      .eq('id', id)
      .is('score', null)
      .select('*')
      .maybeSingle();

    if (error) {
      throw failure('update submission', error);
    }
    if (!data) {
      const existing = await this.findSubmission(id);
      if (!existing) {
        throw new NotFoundError('Submission');
      }
      throw new ConflictError('Submission has already been graded');
    }
    return data;
  }

  private async insertRow<T>(table: string, operation: string, row: object): Promise<T> {
    const { data, error } = await this.supabase.from(table).insert(row).select('*').single();
    if (error) {
      throw failure(operation, error);
    }
    return data;
  }

  private async findRow<T>(table: string, operation: string, id: string): Promise<T | null> {
    // Ids are uuid columns; anything else cannot match a row
    if (!isUuid(id)) {
      return null;
    }
    const { data, error } = await this.supabase
      .from(table)
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) {
      throw failure(operation, error);
    }
    return data;
  }

  private async countRows(table: string): Promise<number> {
    const { count, error } = await this.supabase
      .from(table)
      .select('*', { count: 'exact', head: true });

    if (error) {
      throw failure(`count ${table}`, error);
    }
    return count ?? 0;
  }
}

export const createSupabaseClient = (config: SupabaseConfig): SupabaseClient => {
  return createClient(config.url, config.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
};

export const createSupabaseStore = (supabase: SupabaseClient): DataStore => ({
  kind: 'supabase',
  accounts: new SupabaseAccountRepository(supabase),
  content: new SupabaseContentRepository(supabase),
});
