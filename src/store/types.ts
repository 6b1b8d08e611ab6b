import {
  User,
  UserRole,
  AnswerChoice,
  Announcement,
  Assignment,
  Submission,
  Discussion,
  DiscussionPost,
  Quiz,
  QuizChoices,
  QuizAttempt,
} from '../types/entities';

export interface NewUser {
  name: string;
  email: string;
  password_hash: string;
  role: UserRole;
}

export type NewAnnouncement = Omit<Announcement, 'id' | 'created_at'>;
export type NewAssignment = Omit<Assignment, 'id' | 'created_at'>;
export type NewDiscussion = Omit<Discussion, 'id' | 'created_at'>;
export type NewDiscussionPost = Omit<DiscussionPost, 'id' | 'created_at'>;

export interface NewSubmission {
  assignment_id: string;
  student_id: string;
  content: string;
}

export interface SubmissionGrade {
  score: number;
  feedback: string | null;
  graded_by: string;
}

export interface NewQuiz {
  title: string;
  created_by: string;
  questions: Array<{
    prompt: string;
    choices: QuizChoices;
    correct: AnswerChoice;
  }>;
}

export type NewQuizAttempt = Omit<QuizAttempt, 'id' | 'submitted_at'>;

export interface SubmissionQuery {
  assignmentId?: string;
  assignmentIds?: string[];
  studentId?: string;
}

export interface AttemptQuery {
  quizId?: string;
  studentId?: string;
}

/**
 * Persistence for user accounts.
 * insertUser must reject an existing email with DuplicateEmailError.
 */
export interface AccountRepository {
  insertUser(input: NewUser): Promise<User>;
  findUserByEmail(email: string): Promise<User | null>;
  findUserById(id: string): Promise<User | null>;
  findUsersByIds(ids: string[]): Promise<User[]>;
  countUsers(): Promise<number>;
}

/**
 * Persistence for classroom content.
 * Lists of announcements, assignments, discussions and quizzes are newest
 * first; posts are oldest first. insertSubmission and insertAttempt reject a
 * second row for the same student with ConflictError. updateSubmissionContent
 * and gradeSubmission only touch an ungraded row and throw ConflictError once
 * a score is set; the check and the write happen together.
 */
export interface ContentRepository {
  insertAnnouncement(input: NewAnnouncement): Promise<Announcement>;
  listAnnouncements(limit?: number): Promise<Announcement[]>;
  countAnnouncements(): Promise<number>;

  insertAssignment(input: NewAssignment): Promise<Assignment>;
  findAssignment(id: string): Promise<Assignment | null>;
  listAssignments(createdBy?: string): Promise<Assignment[]>;
  countAssignments(): Promise<number>;

  insertSubmission(input: NewSubmission): Promise<Submission>;
  updateSubmissionContent(id: string, content: string): Promise<Submission>;
  gradeSubmission(id: string, grade: SubmissionGrade): Promise<Submission>;
  findSubmission(id: string): Promise<Submission | null>;
  findSubmissionFor(assignmentId: string, studentId: string): Promise<Submission | null>;
  listSubmissions(query: SubmissionQuery): Promise<Submission[]>;

  insertDiscussion(input: NewDiscussion): Promise<Discussion>;
  findDiscussion(id: string): Promise<Discussion | null>;
  listDiscussions(): Promise<Discussion[]>;
  insertPost(input: NewDiscussionPost): Promise<DiscussionPost>;
  listPosts(discussionId: string): Promise<DiscussionPost[]>;

  insertQuiz(input: NewQuiz): Promise<Quiz>;
  findQuiz(id: string): Promise<Quiz | null>;
  listQuizzes(createdBy?: string): Promise<Quiz[]>;
  countQuizzes(): Promise<number>;

  insertAttempt(input: NewQuizAttempt): Promise<QuizAttempt>;
  findAttemptFor(quizId: string, studentId: string): Promise<QuizAttempt | null>;
  listAttempts(query: AttemptQuery): Promise<QuizAttempt[]>;
}

export interface DataStore {
  kind: 'memory' | 'supabase';
  accounts: AccountRepository;
  content: ContentRepository;
}
