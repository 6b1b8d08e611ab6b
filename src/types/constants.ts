export const APP_NAME = "ClassHub";

export const SESSION_COOKIE_NAME = "classhub.sid";
export const SESSION_MAX_AGE_MS = 24 * 60 * 60 * 1000; // 24 hours

export const RECENT_ANNOUNCEMENTS_LIMIT = 4;
export const MAX_QUIZ_QUESTIONS = 20;

export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 128;

export const DEFAULT_SALT_ROUNDS = 12;
