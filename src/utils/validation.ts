import { ValidationError } from '../middleware/errorHandler';

type Body = Record<string, unknown>;

/**
 * Narrow an unknown request body to a plain object
 */
export const asBody = (value: unknown): Body => {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {};
  }
  const body: Body = {};
  for (const [key, entry] of Object.entries(value)) {
    body[key] = entry;
  }
  return body;
};

export const readString = (body: Body, field: string): string | undefined => {
  const value = body[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string`);
  }
  return value.trim();
};

export const requireString = (body: Body, field: string): string => {
  const value = readString(body, field);
  if (!value) {
    throw new ValidationError(`${field} is required`);
  }
  return value;
};

/**
 * Accept JSON numbers and numeric form strings
 */
export const requireNumber = (body: Body, field: string): number => {
  const raw = body[field];
  const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`${field} must be a valid number`);
  }
  return value;
};

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const readDate = (body: Body, field: string): string | null => {
  const value = readString(body, field);
  if (!value) {
    return null;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  if (!DATE_PATTERN.test(value) || Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== value) {
    throw new ValidationError(`${field} must be a date in YYYY-MM-DD format`);
  }
  return value;
};
