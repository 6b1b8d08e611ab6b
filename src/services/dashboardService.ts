import { ContentRepository } from '../store/types';
import { Identity, UserRole } from '../types/entities';
import { assertNever } from '../types/enums';
import { ContentCounts, DashboardSummary } from '../types/api';
import { AuthenticationError } from '../middleware/errorHandler';
import { AccountService, toPublicUser } from './accountService';

const average = (values: number[]): number | null => {
  if (values.length === 0) {
    return null;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
};

/**
 * Role-specific landing summary
 */
export class DashboardService {
  constructor(
    private readonly content: ContentRepository,
    private readonly accounts: AccountService
  ) {}

  async summarize(identity: Identity): Promise<DashboardSummary> {
    const user = await this.accounts.findById(identity.userId);
    if (!user) {
      throw new AuthenticationError('User not found');
    }

    const [announcements, assignments, quizzes] = await Promise.all([
      this.content.countAnnouncements(),
      this.content.countAssignments(),
      this.content.countQuizzes(),
    ]);
    const counts: ContentCounts = { announcements, assignments, quizzes };

    switch (identity.role) {
      case UserRole.TEACHER: {
        const [ownAssignments, ownQuizzes] = await Promise.all([
          this.content.listAssignments(identity.userId),
          this.content.listQuizzes(identity.userId),
        ]);
        const submissions = await this.content.listSubmissions({
          assignmentIds: ownAssignments.map((row) => row.id),
        });
        return {
          role: UserRole.TEACHER,
          user: toPublicUser(user),
          counts,
          myAssignments: ownAssignments.length,
          myQuizzes: ownQuizzes.length,
          ungradedSubmissions: submissions.filter((row) => row.score === null).length,
        };
      }
      case UserRole.STUDENT: {
        const [submissions, attempts] = await Promise.all([
          this.content.listSubmissions({ studentId: identity.userId }),
          this.content.listAttempts({ studentId: identity.userId }),
        ]);
        const graded = submissions.flatMap((row) => (row.score === null ? [] : [row.score]));
        return {
          role: UserRole.STUDENT,
          user: toPublicUser(user),
          counts,
          averageScore: average(graded),
          pendingAssignments: Math.max(assignments - submissions.length, 0),
          quizzesAttempted: attempts.length,
        };
      }
      default:
        return assertNever(identity.role);
    }
  }
}
