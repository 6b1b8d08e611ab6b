import { v4 as uuidv4 } from 'uuid';
import {
  User,
  Announcement,
  Assignment,
  Submission,
  Discussion,
  DiscussionPost,
  Quiz,
  QuizAttempt,
} from '../types/entities';
import {
  ConflictError,
  DuplicateEmailError,
  NotFoundError,
} from '../middleware/errorHandler';
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

export type Clock = () => Date;

interface Timestamped {
  created_at: string;
}

// Newest first; rows created in the same instant keep reverse insertion order
const newestFirst = <T extends Timestamped>(rows: Iterable<T>): T[] => {
  return [...rows].reverse().sort((a, b) => b.created_at.localeCompare(a.created_at));
};

const pairKey = (left: string, right: string): string => `${left}:${right}`;

/**
 * In-memory account storage. Every method body runs without awaiting, so a
 * uniqueness check and the insert that follows it cannot interleave with
 * another request.
 */
export class MemoryAccountRepository implements AccountRepository {
  private users = new Map<string, User>();
  private userIdsByEmail = new Map<string, string>();

  constructor(private readonly now: Clock = () => new Date()) {}

  async insertUser(input: NewUser): Promise<User> {
    if (this.userIdsByEmail.has(input.email)) {
      throw new DuplicateEmailError();
    }

    const user: User = {
      id: uuidv4(),
      ...input,
      created_at: this.now().toISOString(),
    };
    this.users.set(user.id, user);
    this.userIdsByEmail.set(user.email, user.id);
    return { ...user };
  }

  async findUserByEmail(email: string): Promise<User | null> {
    const id = this.userIdsByEmail.get(email);
    return id ? this.copy(id) : null;
  }

  async findUserById(id: string): Promise<User | null> {
    return this.copy(id);
  }

  async findUsersByIds(ids: string[]): Promise<User[]> {
    const users: User[] = [];
    for (const id of new Set(ids)) {
      const user = this.copy(id);
      if (user) {
        users.push(user);
      }
    }
    return users;
  }

  async countUsers(): Promise<number> {
    return this.users.size;
  }

  private copy(id: string): User | null {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }
}

/**
 * In-memory content storage, indexed by id with composite keys for the
 * one-submission and one-attempt rules.
 */
export class MemoryContentRepository implements ContentRepository {
  private announcements = new Map<string, Announcement>();
  private assignments = new Map<string, Assignment>();
  private submissions = new Map<string, Submission>();
  private discussions = new Map<string, Discussion>();
  private posts = new Map<string, DiscussionPost>();
  private quizzes = new Map<string, Quiz>();
  private attempts = new Map<string, QuizAttempt>();

  private submissionIdByStudent = new Map<string, string>();
  private attemptIdByStudent = new Map<string, string>();

  constructor(private readonly now: Clock = () => new Date()) {}

  async insertAnnouncement(input: NewAnnouncement): Promise<Announcement> {
    const announcement: Announcement = {
      id: uuidv4(),
      ...input,
      created_at: this.timestamp(),
    };
    this.announcements.set(announcement.id, announcement);
    return { ...announcement };
  }

  async listAnnouncements(limit?: number): Promise<Announcement[]> {
    const rows = newestFirst(this.announcements.values());
    return (limit === undefined ? rows : rows.slice(0, limit)).map((row) => ({ ...row }));
  }

  async countAnnouncements(): Promise<number> {
    return this.announcements.size;
  }

  async insertAssignment(input: NewAssignment): Promise<Assignment> {
    const assignment: Assignment = {
      id: uuidv4(),
      ...input,
      created_at: this.timestamp(),
    };
    this.assignments.set(assignment.id, assignment);
    return { ...assignment };
  }

  async findAssignment(id: string): Promise<Assignment | null> {
    const assignment = this.assignments.get(id);
    return assignment ? { ...assignment } : null;
  }

  async listAssignments(createdBy?: string): Promise<Assignment[]> {
    return newestFirst(this.assignments.values())
      .filter((row) => createdBy === undefined || row.created_by === createdBy)
      .map((row) => ({ ...row }));
  }

  async countAssignments(): Promise<number> {
    return this.assignments.size;
  }

  async insertSubmission(input: NewSubmission): Promise<Submission> {
    const key = pairKey(input.assignment_id, input.student_id);
    if (this.submissionIdByStudent.has(key)) {
      throw new ConflictError('A submission already exists for this assignment');
    }

    const submission: Submission = {
      id: uuidv4(),
      ...input,
      submitted_at: this.timestamp(),
      score: null,
      feedback: null,
      graded_by: null,
      graded_at: null,
    };
    this.submissions.set(submission.id, submission);
    this.submissionIdByStudent.set(key, submission.id);
    return { ...submission };
  }

  async updateSubmissionContent(id: string, content: string): Promise<Submission> {
    const submission = this.requireUngradedSubmission(id);
    const updated: Submission = {
      ...submission,
      content,
      submitted_at: this.timestamp(),
    };
    this.submissions.set(id, updated);
    return { ...updated };
  }

  async gradeSubmission(id: string, grade: SubmissionGrade): Promise<Submission> {
    const submission = this.requireUngradedSubmission(id);
    const updated: Submission = {
      ...submission,
      ...grade,
      graded_at: this.timestamp(),
    };
    this.submissions.set(id, updated);
    return { ...updated };
  }

  async findSubmission(id: string): Promise<Submission | null> {
    const submission = this.submissions.get(id);
    return submission ? { ...submission } : null;
  }

  async findSubmissionFor(assignmentId: string, studentId: string): Promise<Submission | null> {
    const id = this.submissionIdByStudent.get(pairKey(assignmentId, studentId));
    return id ? this.findSubmission(id) : null;
  }

  async listSubmissions(query: SubmissionQuery): Promise<Submission[]> {
    const assignmentIds = query.assignmentIds ? new Set(query.assignmentIds) : null;
    return [...this.submissions.values()]
      .filter(
        (row) =>
          (query.assignmentId === undefined || row.assignment_id === query.assignmentId) &&
          (assignmentIds === null || assignmentIds.has(row.assignment_id)) &&
          (query.studentId === undefined || row.student_id === query.studentId)
      )
      .reverse()
      .sort((a, b) => b.submitted_at.localeCompare(a.submitted_at))
      .map((row) => ({ ...row }));
  }

  async insertDiscussion(input: NewDiscussion): Promise<Discussion> {
    const discussion: Discussion = {
      id: uuidv4(),
      ...input,
      created_at: this.timestamp(),
    };
    this.discussions.set(discussion.id, discussion);
    return { ...discussion };
  }

  async findDiscussion(id: string): Promise<Discussion | null> {
    const discussion = this.discussions.get(id);
    return discussion ? { ...discussion } : null;
  }

  async listDiscussions(): Promise<Discussion[]> {
    return newestFirst(this.discussions.values()).map((row) => ({ ...row }));
  }

  async insertPost(input: NewDiscussionPost): Promise<DiscussionPost> {
    if (!this.discussions.has(input.discussion_id)) {
      throw new NotFoundError('Discussion');
    }

    const post: DiscussionPost = {
      id: uuidv4(),
      ...input,
      created_at: this.timestamp(),
    };
    this.posts.set(post.id, post);
    return { ...post };
  }

  async listPosts(discussionId: string): Promise<DiscussionPost[]> {
    // Map iteration follows insertion order, which is oldest first
    return [...this.posts.values()]
      .filter((row) => row.discussion_id === discussionId)
      .map((row) => ({ ...row }));
  }

  async insertQuiz(input: NewQuiz): Promise<Quiz> {
    const quizId = uuidv4();
    const quiz: Quiz = {
      id: quizId,
      title: input.title,
      created_by: input.created_by,
      created_at: this.timestamp(),
      questions: input.questions.map((question, position) => ({
        id: uuidv4(),
        quiz_id: quizId,
        position,
        prompt: question.prompt,
        choices: { ...question.choices },
        correct: question.correct,
      })),
    };
    this.quizzes.set(quiz.id, quiz);
    return structuredClone(quiz);
  }

  async findQuiz(id: string): Promise<Quiz | null> {
    const quiz = this.quizzes.get(id);
    return quiz ? structuredClone(quiz) : null;
  }

  async listQuizzes(createdBy?: string): Promise<Quiz[]> {
    return newestFirst(this.quizzes.values())
      .filter((row) => createdBy === undefined || row.created_by === createdBy)
      .map((row) => structuredClone(row));
  }

  async countQuizzes(): Promise<number> {
    return this.quizzes.size;
  }

  async insertAttempt(input: NewQuizAttempt): Promise<QuizAttempt> {
    const key = pairKey(input.quiz_id, input.student_id);
    if (this.attemptIdByStudent.has(key)) {
      throw new ConflictError('You already submitted this quiz');
    }

    const attempt: QuizAttempt = {
      id: uuidv4(),
      ...input,
      answers: [...input.answers],
      submitted_at: this.timestamp(),
    };
    this.attempts.set(attempt.id, attempt);
    this.attemptIdByStudent.set(key, attempt.id);
    return { ...attempt, answers: [...attempt.answers] };
  }

  async findAttemptFor(quizId: string, studentId: string): Promise<QuizAttempt | null> {
    const id = this.attemptIdByStudent.get(pairKey(quizId, studentId));
    const attempt = id ? this.attempts.get(id) : undefined;
    return attempt ? { ...attempt, answers: [...attempt.answers] } : null;
  }

  async listAttempts(query: AttemptQuery): Promise<QuizAttempt[]> {
    return [...this.attempts.values()]
      .filter(
        (row) =>
          (query.quizId === undefined || row.quiz_id === query.quizId) &&
          (query.studentId === undefined || row.student_id === query.studentId)
      )
      .reverse()
      .sort((a, b) => b.submitted_at.localeCompare(a.submitted_at))
      .map((row) => ({ ...row, answers: [...row.answers] }));
  }

  private requireUngradedSubmission(id: string): Submission {
    const submission = this.submissions.get(id);
    if (!submission) {
      throw new NotFoundError('Submission');
    }
    if (submission.score !== null) {
      throw new ConflictError('Submission has already been graded');
    }
    return submission;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

export const createMemoryStore = (now?: Clock): DataStore => ({
  kind: 'memory',
  accounts: new MemoryAccountRepository(now),
  content: new MemoryContentRepository(now),
});
