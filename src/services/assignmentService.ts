import { ContentRepository } from '../store/types';
import { Assignment, Identity, Submission, UserRole } from '../types/entities';
import { assertNever } from '../types/enums';
import {
  AssignmentDetail,
  AssignmentWithAuthor,
  CreateAssignmentRequest,
  GradeSubmissionRequest,
  ListAssignmentsFilters,
  ListSubmissionsFilters,
  SubmissionWithStudent,
} from '../types/api';
import {
  AuthorizationError,
  ConflictError,
  NotFoundError,
  ValidationError,
} from '../middleware/errorHandler';
import { logger } from '../utils/logger';
import { AccountService } from './accountService';
import { requireRole } from './authService';

export interface SubmitResult {
  submission: Submission;
  created: boolean;
}

/**
 * Assignment Service
 * Teachers create and grade; students submit one deliverable per assignment
 */
export class AssignmentService {
  constructor(
    private readonly content: ContentRepository,
    private readonly accounts: AccountService
  ) {}

  async create(identity: Identity, input: CreateAssignmentRequest): Promise<AssignmentWithAuthor> {
    requireRole(identity, UserRole.TEACHER);

    const assignment = await this.content.insertAssignment({
      title: input.title.trim() || 'Untitled',
      description: input.description ?? '',
      due_date: input.due_date ?? null,
      created_by: identity.userId,
    });

    logger.info('Assignment created', { assignmentId: assignment.id, userId: identity.userId });
    return { ...assignment, author_name: identity.name };
  }

  /**
   * Students see every assignment; teachers may narrow the list to their own
   */
  async list(identity: Identity, filters: ListAssignmentsFilters = {}): Promise<AssignmentWithAuthor[]> {
    const ownOnly = filters.mine === true && identity.role === UserRole.TEACHER;
    const assignments = await this.content.listAssignments(ownOnly ? identity.userId : undefined);
    return this.withAuthors(assignments);
  }

  async get(identity: Identity, assignmentId: string): Promise<AssignmentDetail> {
    const assignment = await this.requireAssignment(assignmentId);
    const [withAuthor] = await this.withAuthors([assignment]);

    switch (identity.role) {
      case UserRole.STUDENT:
        return {
          assignment: withAuthor,
          submission: await this.content.findSubmissionFor(assignment.id, identity.userId),
          submissions: [],
        };
      case UserRole.TEACHER: {
        const submissions =
          assignment.created_by === identity.userId
            ? await this.withStudents(
                await this.content.listSubmissions({ assignmentId: assignment.id })
              )
            : [];
        return { assignment: withAuthor, submission: null, submissions };
      }
      default:
        return assertNever(identity.role);
    }
  }

  /**
   * Create the student's submission, or replace its content while it is
   * still ungraded
   */
  async submit(identity: Identity, assignmentId: string, content: string): Promise<SubmitResult> {
    requireRole(identity, UserRole.STUDENT);
    const assignment = await this.requireAssignment(assignmentId);

    const existing = await this.content.findSubmissionFor(assignment.id, identity.userId);
    if (existing) {
      if (existing.score !== null) {
        throw new ConflictError('Submission has already been graded');
      }
      const submission = await this.content.updateSubmissionContent(existing.id, content);
      logger.info('Submission updated', { submissionId: submission.id, userId: identity.userId });
      return { submission, created: false };
    }

    const submission = await this.content.insertSubmission({
      assignment_id: assignment.id,
      student_id: identity.userId,
      content,
    });
    logger.info('Submission saved', { submissionId: submission.id, userId: identity.userId });
    return { submission, created: true };
  }

  /**
   * Students get their own submissions; teachers get the submissions made
   * to assignments they own
   */
  async listSubmissions(
    identity: Identity,
    filters: ListSubmissionsFilters = {}
  ): Promise<SubmissionWithStudent[]> {
    switch (identity.role) {
      case UserRole.STUDENT:
        return this.withStudents(
          await this.content.listSubmissions({
            assignmentId: filters.assignmentId,
            studentId: identity.userId,
          })
        );
      case UserRole.TEACHER: {
        if (filters.assignmentId !== undefined) {
          const assignment = await this.requireAssignment(filters.assignmentId);
          if (assignment.created_by !== identity.userId) {
            throw new AuthorizationError('Only the assignment owner can view its submissions');
          }
          return this.withStudents(
            await this.content.listSubmissions({ assignmentId: assignment.id })
          );
        }
        const own = await this.content.listAssignments(identity.userId);
        return this.withStudents(
          await this.content.listSubmissions({ assignmentIds: own.map((row) => row.id) })
        );
      }
      default:
        return assertNever(identity.role);
    }
  }

  /**
   * Grade a submission once. Only the teacher who owns the assignment may
   * grade it.
   */
  async grade(identity: Identity, submissionId: string, input: GradeSubmissionRequest): Promise<Submission> {
    requireRole(identity, UserRole.TEACHER);

    if (!Number.isFinite(input.score) || input.score < 0) {
      throw new ValidationError('Score must be a non-negative number');
    }

    const submission = await this.content.findSubmission(submissionId);
    if (!submission) {
      throw new NotFoundError('Submission');
    }

    const assignment = await this.requireAssignment(submission.assignment_id);
    if (assignment.created_by !== identity.userId) {
      throw new AuthorizationError('Only the assignment owner can grade its submissions');
    }

    if (submission.score !== null) {
      throw new ConflictError('Submission has already been graded');
    }

    const graded = await this.content.gradeSubmission(submission.id, {
      score: input.score,
      feedback: input.feedback?.trim() || null,
      graded_by: identity.userId,
    });

    logger.info('Submission graded', {
      submissionId: graded.id,
      assignmentId: assignment.id,
      userId: identity.userId,
    });
    return graded;
  }

  private async requireAssignment(id: string): Promise<Assignment> {
    const assignment = await this.content.findAssignment(id);
    if (!assignment) {
      throw new NotFoundError('Assignment');
    }
    return assignment;
  }

  private async withAuthors(assignments: Assignment[]): Promise<AssignmentWithAuthor[]> {
    const names = await this.accounts.namesById(assignments.map((row) => row.created_by));
    return assignments.map((row) => ({ ...row, author_name: names.get(row.created_by) ?? null }));
  }

  private async withStudents(submissions: Submission[]): Promise<SubmissionWithStudent[]> {
    const names = await this.accounts.namesById(submissions.map((row) => row.student_id));
    return submissions.map((row) => ({ ...row, student_name: names.get(row.student_id) ?? null }));
  }
}
