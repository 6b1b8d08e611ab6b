import { DataStore } from '../store/types';
import { AccountService } from './accountService';
import { AnnouncementService } from './announcementService';
import { AssignmentService } from './assignmentService';
import { AuthService } from './authService';
import { DashboardService } from './dashboardService';
import { DiscussionService } from './discussionService';
import { PasswordService } from './passwordService';
import { QuizService } from './quizService';
import { SessionConfig, SessionManagementService } from './session';

export interface AppServices {
  store: DataStore;
  passwords: PasswordService;
  accounts: AccountService;
  sessions: SessionManagementService;
  auth: AuthService;
  announcements: AnnouncementService;
  assignments: AssignmentService;
  discussions: DiscussionService;
  quizzes: QuizService;
  dashboard: DashboardService;
}

export interface ServiceOptions {
  saltRounds?: number;
  session?: Partial<SessionConfig>;
}

/**
 * Wire every service to one data store
 */
export const createServices = (store: DataStore, options: ServiceOptions = {}): AppServices => {
  const passwords = new PasswordService(options.saltRounds);
  const accounts = new AccountService(store.accounts, passwords);
  const sessions = new SessionManagementService(options.session);

  return {
    store,
    passwords,
    accounts,
    sessions,
    auth: new AuthService(accounts, sessions),
    announcements: new AnnouncementService(store.content, accounts),
    assignments: new AssignmentService(store.content, accounts),
    discussions: new DiscussionService(store.content, accounts),
    quizzes: new QuizService(store.content, accounts),
    dashboard: new DashboardService(store.content, accounts),
  };
};

export { AccountService } from './accountService';
export { AuthService, requireRole } from './authService';
export { PasswordService } from './passwordService';
export { SessionManagementService, SessionManagementError } from './session';
export { seedDemoData } from './seedService';
