import { UserRole, AnswerChoice } from "./enums";

// Re-export enums for convenience
export { UserRole, AnswerChoice };

// User entity
export interface User {
  id: string;
  name: string;
  email: string; // unique, stored trimmed and lower-cased
  password_hash: string;
  role: UserRole;
  created_at: string;
}

// User without credentials, safe to return from the API
export type PublicUser = Omit<User, "password_hash">;

// Authenticated user for the current session
export interface Identity {
  userId: string;
  email: string;
  name: string;
  role: UserRole;
}

// Announcement entity (immutable once posted)
export interface Announcement {
  id: string;
  title: string;
  body: string;
  created_by: string;
  created_at: string;
}

// Assignment entity
export interface Assignment {
  id: string;
  title: string;
  description: string;
  due_date: string | null; // YYYY-MM-DD
  created_by: string;
  created_at: string;
}

// Submission entity - at most one per (assignment, student)
export interface Submission {
  id: string;
  assignment_id: string;
  student_id: string;
  content: string;
  submitted_at: string;
  score: number | null;
  feedback: string | null;
  graded_by: string | null;
  graded_at: string | null;
}

// Discussion thread entity
export interface Discussion {
  id: string;
  title: string;
  created_by: string;
  created_at: string;
}

// Discussion post entity (append-only)
export interface DiscussionPost {
  id: string;
  discussion_id: string;
  author_id: string;
  body: string;
  created_at: string;
}

export type QuizChoices = Record<AnswerChoice, string>;

// Quiz question - position is zero-based within the quiz
export interface QuizQuestion {
  id: string;
  quiz_id: string;
  position: number;
  prompt: string;
  choices: QuizChoices;
  correct: AnswerChoice;
}

// Quiz entity with its ordered questions
export interface Quiz {
  id: string;
  title: string;
  created_by: string;
  created_at: string;
  questions: QuizQuestion[];
}

// Quiz attempt - one per (quiz, student), score fixed at submission time
export interface QuizAttempt {
  id: string;
  quiz_id: string;
  student_id: string;
  answers: (AnswerChoice | null)[];
  score: number;
  total: number;
  submitted_at: string;
}
