import { AccountRepository } from '../store/types';
import { Identity, PublicUser, User } from '../types/entities';
import { RegisterRequest } from '../types/api';
import {
  InvalidCredentialsError,
  ValidationError,
} from '../middleware/errorHandler';
import { logger } from '../utils/logger';
import { PasswordService } from './passwordService';

export const normalizeEmail = (email: string): string => email.trim().toLowerCase();

export const toPublicUser = (user: User): PublicUser => ({
  id: user.id,
  name: user.name,
  email: user.email,
  role: user.role,
  created_at: user.created_at,
});

export const toIdentity = (user: User): Identity => ({
  userId: user.id,
  email: user.email,
  name: user.name,
  role: user.role,
});

/**
 * Account Service
 * Registers users and verifies their credentials
 */
export class AccountService {
  constructor(
    private readonly accounts: AccountRepository,
    private readonly passwords: PasswordService
  ) {}

  /**
   * Create a user with a salted password hash.
   * Throws DuplicateEmailError when the email is already registered.
   */
  async register(input: RegisterRequest): Promise<PublicUser> {
    const email = normalizeEmail(input.email);

    const emailValidation = this.passwords.validateEmail(email);
    if (!emailValidation.valid) {
      throw new ValidationError(emailValidation.message || 'Invalid email');
    }

    const passwordValidation = this.passwords.validatePasswordStrength(input.password);
    if (!passwordValidation.valid) {
      throw new ValidationError(passwordValidation.message || 'Invalid password');
    }

    const name = input.name?.trim() || email.split('@')[0];
    const passwordHash = await this.passwords.hash(input.password);

    const user = await this.accounts.insertUser({
      name,
      email,
      password_hash: passwordHash,
      role: input.role,
    });

    logger.info('User registered', { userId: user.id, email, role: user.role });
    return toPublicUser(user);
  }

  /**
   * Verify an email and password pair.
   * Unknown emails and wrong passwords fail the same way.
   */
  async authenticate(email: string, password: string): Promise<Identity> {
    const user = await this.accounts.findUserByEmail(normalizeEmail(email));
    if (!user || !(await this.passwords.verify(password, user.password_hash))) {
      throw new InvalidCredentialsError();
    }
    return toIdentity(user);
  }

  async findById(id: string): Promise<User | null> {
    return this.accounts.findUserById(id);
  }

  /**
   * Map of user id to display name, for attaching author names to content
   */
  async namesById(ids: string[]): Promise<Map<string, string>> {
    const users = await this.accounts.findUsersByIds(ids);
    return new Map(users.map((user) => [user.id, user.name]));
  }
}
