import {
  UserRole,
  AnswerChoice,
  PublicUser,
  Identity,
  Announcement,
  Assignment,
  Submission,
  Discussion,
  DiscussionPost,
  QuizChoices,
  QuizAttempt,
} from "./entities";

// Error response format
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
  timestamp: string;
  path: string;
  requestId?: string;
}

// Auth API types
export interface RegisterRequest {
  name?: string;
  email: string;
  password: string;
  role: UserRole;
}

export interface RegisterResponse {
  success: boolean;
  message: string;
  user: PublicUser;
  redirectTo: string;
}

export interface LoginResponse {
  success: boolean;
  message: string;
  user: Identity;
  redirectTo: string;
}

// Announcement API types
export interface CreateAnnouncementRequest {
  title: string;
  body: string;
}

export interface AnnouncementWithAuthor extends Announcement {
  author_name: string | null;
}

// Assignment API types
export interface CreateAssignmentRequest {
  title: string;
  description?: string;
  due_date?: string | null;
}

export interface AssignmentWithAuthor extends Assignment {
  author_name: string | null;
}

export interface GradeSubmissionRequest {
  score: number;
  feedback?: string | null;
}

export interface SubmissionWithStudent extends Submission {
  student_name: string | null;
}

export interface AssignmentDetail {
  assignment: AssignmentWithAuthor;
  // The student's own submission (students only)
  submission: Submission | null;
  // All submissions (owning teacher only)
  submissions: SubmissionWithStudent[];
}

export interface ListAssignmentsFilters {
  mine?: boolean;
}

export interface ListSubmissionsFilters {
  assignmentId?: string;
}

// Discussion API types
export interface CreateDiscussionRequest {
  title: string;
}

export interface DiscussionWithAuthor extends Discussion {
  author_name: string | null;
}

export interface PostWithAuthor extends DiscussionPost {
  author_name: string | null;
}

export interface DiscussionDetail {
  discussion: DiscussionWithAuthor;
  posts: PostWithAuthor[];
}

// Quiz API types
export interface CreateQuizQuestionInput {
  prompt: string;
  choices: QuizChoices;
  correct: AnswerChoice;
}

export interface CreateQuizRequest {
  title: string;
  questions: CreateQuizQuestionInput[];
}

// Question as shown to students - no answer key
export interface QuizQuestionView {
  id: string;
  position: number;
  prompt: string;
  choices: QuizChoices;
  correct?: AnswerChoice;
}

export interface QuizSummary {
  id: string;
  title: string;
  created_by: string;
  author_name: string | null;
  created_at: string;
  question_count: number;
  // The requesting student's attempt, if any
  attempt?: AttemptResult | null;
}

export interface QuizDetail {
  id: string;
  title: string;
  created_by: string;
  author_name: string | null;
  created_at: string;
  questions: QuizQuestionView[];
  attempt: AttemptResult | null;
}

export interface AttemptResult extends QuizAttempt {
  percentage: number;
}

export interface AttemptWithStudent extends AttemptResult {
  student_name: string | null;
}

// Dashboard API types
export interface ContentCounts {
  announcements: number;
  assignments: number;
  quizzes: number;
}

export interface TeacherDashboard {
  role: UserRole.TEACHER;
  user: PublicUser;
  counts: ContentCounts;
  myAssignments: number;
  myQuizzes: number;
  ungradedSubmissions: number;
}

export interface StudentDashboard {
  role: UserRole.STUDENT;
  user: PublicUser;
  counts: ContentCounts;
  averageScore: number | null;
  pendingAssignments: number;
  quizzesAttempted: number;
}

export type DashboardSummary = TeacherDashboard | StudentDashboard;
