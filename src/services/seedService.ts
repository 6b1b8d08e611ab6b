import { DataStore, NewQuiz } from '../store/types';
import { AnswerChoice, User, UserRole } from '../types/entities';
import { APP_NAME } from '../types/constants';
import { DuplicateEmailError } from '../middleware/errorHandler';
import { logger } from '../utils/logger';
import { PasswordService } from './passwordService';

export const DEMO_PASSWORD = 'password123';

export const DEMO_ACCOUNTS: ReadonlyArray<{ name: string; email: string; role: UserRole }> = [
  { name: 'Teacher Demo', email: 'teacher@classhub.local', role: UserRole.TEACHER },
  { name: 'Student Demo', email: 'student@classhub.local', role: UserRole.STUDENT },
];

const SAMPLE_QUIZ_QUESTIONS: NewQuiz['questions'] = [
  {
    prompt: `What is ${APP_NAME} for?`,
    choices: {
      [AnswerChoice.A]: 'Banking',
      [AnswerChoice.B]: 'Running a class',
      [AnswerChoice.C]: 'Gaming',
      [AnswerChoice.D]: 'Shopping',
    },
    correct: AnswerChoice.B,
  },
  {
    prompt: 'Who posts assignments?',
    choices: {
      [AnswerChoice.A]: 'Parents',
      [AnswerChoice.B]: 'Students',
      [AnswerChoice.C]: 'Teachers',
      [AnswerChoice.D]: 'Guests',
    },
    correct: AnswerChoice.C,
  },
  {
    prompt: 'How many times can you submit a quiz?',
    choices: {
      [AnswerChoice.A]: 'Once',
      [AnswerChoice.B]: 'Twice',
      [AnswerChoice.C]: 'Until you get full marks',
      [AnswerChoice.D]: 'Never',
    },
    correct: AnswerChoice.A,
  },
];

export interface SeedResult {
  usersCreated: number;
  contentCreated: boolean;
}

const daysFromNow = (now: Date, days: number): string => {
  const date = new Date(now.getTime() + days * 24 * 60 * 60 * 1000);
  return date.toISOString().slice(0, 10);
};

const ensureAccount = async (
  store: DataStore,
  passwords: PasswordService,
  account: (typeof DEMO_ACCOUNTS)[number]
): Promise<{ user: User; created: boolean }> => {
  const existing = await store.accounts.findUserByEmail(account.email);
  if (existing) {
    return { user: existing, created: false };
  }

  try {
    const user = await store.accounts.insertUser({
      ...account,
      password_hash: await passwords.hash(DEMO_PASSWORD),
    });
    return { user, created: true };
  } catch (error) {
    // Another process seeded the same account between the lookup and the insert
    if (error instanceof DuplicateEmailError) {
      const user = await store.accounts.findUserByEmail(account.email);
      if (user) {
        return { user, created: false };
      }
    }
    throw error;
  }
};

/**
 * Make sure the demo accounts and sample content exist. Every insert is
 * preceded by a lookup, so running this on every startup is safe.
 */
export const seedDemoData = async (
  store: DataStore,
  passwords: PasswordService,
  now: Date = new Date()
): Promise<SeedResult> => {
  let usersCreated = 0;
  let teacher: User | null = null;

  for (const account of DEMO_ACCOUNTS) {
    const { user, created } = await ensureAccount(store, passwords, account);
    if (created) {
      usersCreated += 1;
    }
    if (user.role === UserRole.TEACHER && !teacher) {
      teacher = user;
    }
  }

  if (!teacher) {
    throw new Error('Demo teacher account is missing after seeding');
  }

  let contentCreated = false;
  if ((await store.content.countAnnouncements()) === 0) {
    await store.content.insertAnnouncement({
      title: `Welcome to ${APP_NAME}`,
      body: 'Explore assignments, discussions, and quizzes.',
      created_by: teacher.id,
    });
    await store.content.insertAssignment({
      title: 'Sample Assignment',
      description: 'Submit a paragraph or a link.',
      due_date: daysFromNow(now, 7),
      created_by: teacher.id,
    });
    await store.content.insertDiscussion({
      title: 'Introduce yourself',
      created_by: teacher.id,
    });
    await store.content.insertQuiz({
      title: 'Orientation Quiz',
      created_by: teacher.id,
      questions: SAMPLE_QUIZ_QUESTIONS,
    });
    contentCreated = true;
  }

  logger.info('Demo data ensured', { usersCreated, contentCreated });
  return { usersCreated, contentCreated };
};
