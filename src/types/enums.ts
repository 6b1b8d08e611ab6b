// User roles enum
export enum UserRole {
  TEACHER = "teacher",
  STUDENT = "student",
}

// Multiple-choice answer letters
export enum AnswerChoice {
  A = "A",
  B = "B",
  C = "C",
  D = "D",
}

export const USER_ROLES: readonly UserRole[] = Object.values(UserRole);
export const ANSWER_CHOICES: readonly AnswerChoice[] = Object.values(AnswerChoice);

export const parseUserRole = (value: unknown): UserRole | null => {
  return USER_ROLES.find((role) => role === value) ?? null;
};

export const parseAnswerChoice = (value: unknown): AnswerChoice | null => {
  return ANSWER_CHOICES.find((choice) => choice === value) ?? null;
};

/**
 * Compile-time exhaustiveness check for switches over closed enums
 */
export const assertNever = (value: never): never => {
  throw new Error(`Unexpected value: ${String(value)}`);
};
