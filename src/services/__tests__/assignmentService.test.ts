jest.mock('../../utils/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

import { AppServices } from '../index';
import { DataStore } from '../../store/types';
import { Identity, UserRole } from '../../types/entities';
import {
  AuthorizationError,
  ConflictError,
  NotFoundError,
  ValidationError,
} from '../../middleware/errorHandler';
import { createIdentity, createTestServices } from '../../__tests__/helpers/testApp';

describe('AssignmentService', () => {
  let services: AppServices;
  let store: DataStore;
  let teacher: Identity;
  let otherTeacher: Identity;
  let student: Identity;

  beforeEach(async () => {
    ({ services, store } = createTestServices());
    teacher = await createIdentity(services, 'Teacher One', UserRole.TEACHER);
    otherTeacher = await createIdentity(services, 'Teacher Two', UserRole.TEACHER);
    student = await createIdentity(services, 'Student One', UserRole.STUDENT);
  });

  const createAssignment = (owner: Identity = teacher, title = 'Essay') =>
    services.assignments.create(owner, { title, description: 'Write it', due_date: '2026-11-01' });

  describe('create', () => {
    it('stores the assignment with its author', async () => {
      const assignment = await createAssignment();

      expect(assignment).toMatchObject({
        title: 'Essay',
        description: 'Write it',
        due_date: '2026-11-01',
        created_by: teacher.userId,
        author_name: 'Teacher One',
      });
    });

    it('defaults a blank title', async () => {
      const assignment = await services.assignments.create(teacher, { title: '  ' });
      expect(assignment.title).toBe('Untitled');
      expect(assignment.due_date).toBeNull();
    });

    it('is forbidden to students', async () => {
      await expect(createAssignment(student)).rejects.toThrow(
        new AuthorizationError('Teacher role required')
      );
    });
  });

  it('narrows the list to the teacher\'s own assignments on request', async () => {
    await createAssignment(teacher, 'Mine');
    await createAssignment(otherTeacher, 'Theirs');

    const all = await services.assignments.list(teacher);
    const mine = await services.assignments.list(teacher, { mine: true });
    const forStudent = await services.assignments.list(student, { mine: true });

    expect(all.map((row) => row.title)).toEqual(['Theirs', 'Mine']);
    expect(mine.map((row) => row.title)).toEqual(['Mine']);
    expect(forStudent).toHaveLength(2);
  });

  describe('submit', () => {
    it('creates the submission, then updates it while ungraded', async () => {
      const assignment = await createAssignment();

      const first = await services.assignments.submit(student, assignment.id, 'draft');
      const second = await services.assignments.submit(student, assignment.id, 'final');

      expect(first.created).toBe(true);
      expect(second.created).toBe(false);
      expect(second.submission.id).toBe(first.submission.id);
      expect(second.submission.content).toBe('final');
    });

    it('rejects an unknown assignment', async () => {
      await expect(services.assignments.submit(student, 'missing', 'x')).rejects.toThrow(
        new NotFoundError('Assignment')
      );
    });

    it('is forbidden to teachers', async () => {
      const assignment = await createAssignment();
      await expect(services.assignments.submit(teacher, assignment.id, 'x')).rejects.toBeInstanceOf(
        AuthorizationError
      );
    });

    it('does not change a submission graded while the resubmission was in flight', async () => {
      const assignment = await createAssignment();
      const { submission } = await services.assignments.submit(student, assignment.id, 'original');

      // The resubmission reads the row before the grade lands
      const findSubmissionFor = jest.spyOn(store.content, 'findSubmissionFor');
      findSubmissionFor.mockImplementationOnce(async () => {
        const stale = await store.content.findSubmission(submission.id);
        await services.assignments.grade(teacher, submission.id, { score: 50 });
        return stale;
      });

      await expect(
        services.assignments.submit(student, assignment.id, 'changed after grading')
      ).rejects.toThrow(new ConflictError('Submission has already been graded'));

      const stored = await store.content.findSubmission(submission.id);
      expect(stored).toMatchObject({ score: 50, content: 'original' });
    });

    it('rejects a resubmission after grading', async () => {
      const assignment = await createAssignment();
      const { submission } = await services.assignments.submit(student, assignment.id, 'x');
      await services.assignments.grade(teacher, submission.id, { score: 7 });

      await expect(services.assignments.submit(student, assignment.id, 'y')).rejects.toBeInstanceOf(
        ConflictError
      );
    });
  });

  describe('grade', () => {
    it('records score, feedback and grader', async () => {
      const assignment = await createAssignment();
      const { submission } = await services.assignments.submit(student, assignment.id, 'x');

      const graded = await services.assignments.grade(teacher, submission.id, {
        score: 8.5,
        feedback: '  Nice work ',
      });

      expect(graded).toMatchObject({ score: 8.5, feedback: 'Nice work', graded_by: teacher.userId });
      expect(graded.graded_at).not.toBeNull();
    });

    it('stores blank feedback as null', async () => {
      const assignment = await createAssignment();
      const { submission } = await services.assignments.submit(student, assignment.id, 'x');

      const graded = await services.assignments.grade(teacher, submission.id, { score: 0, feedback: ' ' });
      expect(graded.feedback).toBeNull();
    });

    it('rejects a negative score', async () => {
      const assignment = await createAssignment();
      const { submission } = await services.assignments.submit(student, assignment.id, 'x');

      await expect(
        services.assignments.grade(teacher, submission.id, { score: -1 })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('is limited to the assignment owner', async () => {
      const assignment = await createAssignment();
      const { submission } = await services.assignments.submit(student, assignment.id, 'x');

      await expect(
        services.assignments.grade(otherTeacher, submission.id, { score: 5 })
      ).rejects.toThrow(new AuthorizationError('Only the assignment owner can grade its submissions'));
    });

    it('grades a submission only once', async () => {
      const assignment = await createAssignment();
      const { submission } = await services.assignments.submit(student, assignment.id, 'x');
      await services.assignments.grade(teacher, submission.id, { score: 5 });

      await expect(
        services.assignments.grade(teacher, submission.id, { score: 9 })
      ).rejects.toThrow(new ConflictError('Submission has already been graded'));
    });

    it('accepts only one of two grades sent at the same time', async () => {
      const assignment = await createAssignment();
      const { submission } = await services.assignments.submit(student, assignment.id, 'x');

      const results = await Promise.allSettled([
        services.assignments.grade(teacher, submission.id, { score: 90 }),
        services.assignments.grade(teacher, submission.id, { score: 10 }),
      ]);

      expect(results.map((result) => result.status).sort()).toEqual(['fulfilled', 'rejected']);
      const rejected = results.find((result) => result.status === 'rejected');
      expect(rejected?.status === 'rejected' && rejected.reason).toBeInstanceOf(ConflictError);

      const fulfilled = results.find((result) => result.status === 'fulfilled');
      const stored = await store.content.findSubmission(submission.id);
      expect(fulfilled?.status === 'fulfilled' && fulfilled.value.score).toBe(stored?.score);
    });

    it('rejects an unknown submission', async () => {
      await expect(services.assignments.grade(teacher, 'missing', { score: 5 })).rejects.toThrow(
        new NotFoundError('Submission')
      );
    });
  });

  describe('visibility', () => {
    it('shows a student only their own submission', async () => {
      const assignment = await createAssignment();
      const otherStudent = await createIdentity(services, 'Student Two', UserRole.STUDENT);
      await services.assignments.submit(student, assignment.id, 'mine');
      await services.assignments.submit(otherStudent, assignment.id, 'theirs');

      const detail = await services.assignments.get(student, assignment.id);
      expect(detail.submission?.content).toBe('mine');
      expect(detail.submissions).toEqual([]);

      const listed = await services.assignments.listSubmissions(student);
      expect(listed.map((row) => row.content)).toEqual(['mine']);
    });

    it('shows the owning teacher every submission with student names', async () => {
      const assignment = await createAssignment();
      await services.assignments.submit(student, assignment.id, 'mine');

      const detail = await services.assignments.get(teacher, assignment.id);
      expect(detail.submissions).toHaveLength(1);
      expect(detail.submissions[0].student_name).toBe('Student One');

      const otherDetail = await services.assignments.get(otherTeacher, assignment.id);
      expect(otherDetail.submissions).toEqual([]);
    });

    it('lists only submissions to the teacher\'s own assignments', async () => {
      const mine = await createAssignment(teacher, 'Mine');
      const theirs = await createAssignment(otherTeacher, 'Theirs');
      await services.assignments.submit(student, mine.id, 'a');
      await services.assignments.submit(student, theirs.id, 'b');

      const listed = await services.assignments.listSubmissions(teacher);
      expect(listed.map((row) => row.assignment_id)).toEqual([mine.id]);

      await expect(
        services.assignments.listSubmissions(teacher, { assignmentId: theirs.id })
      ).rejects.toBeInstanceOf(AuthorizationError);
    });
  });
});
