import bcrypt from 'bcrypt';
import {
  DEFAULT_SALT_ROUNDS,
  PASSWORD_MAX_LENGTH,
  PASSWORD_MIN_LENGTH,
} from '../types/constants';

export interface ValidationResult {
  valid: boolean;
  message?: string;
}

// Deliberately loose: one "@" with text on both sides and a dot in the domain
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export class PasswordService {
  constructor(private readonly saltRounds: number = DEFAULT_SALT_ROUNDS) {}

  /**
   * Hash a password using bcrypt (the salt is generated per call and
   * embedded in the hash)
   */
  async hash(password: string): Promise<string> {
    return bcrypt.hash(password, this.saltRounds);
  }

  /**
   * Verify a password against a bcrypt hash
   */
  async verify(password: string, hash: string): Promise<boolean> {
    return bcrypt.compare(password, hash);
  }

  validatePasswordStrength(password: string): ValidationResult {
    if (!password) {
      return { valid: false, message: 'Password is required' };
    }
    if (password.length < PASSWORD_MIN_LENGTH) {
      return { valid: false, message: `Password must be at least ${PASSWORD_MIN_LENGTH} characters` };
    }
    if (password.length > PASSWORD_MAX_LENGTH) {
      return { valid: false, message: `Password must be less than ${PASSWORD_MAX_LENGTH} characters` };
    }
    return { valid: true };
  }

  validateEmail(email: string): ValidationResult {
    if (!email) {
      return { valid: false, message: 'Email is required' };
    }
    if (!EMAIL_PATTERN.test(email)) {
      return { valid: false, message: 'Email address is not valid' };
    }
    return { valid: true };
  }
}
