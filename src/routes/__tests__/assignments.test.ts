jest.mock('../../utils/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

import { UserRole } from '../../types/entities';
import { TestAgent, TestContext, createTestContext, loginAs } from '../../__tests__/helpers/testApp';

describe('Assignment and Submission Routes', () => {
  let ctx: TestContext;
  let teacher: TestAgent;
  let student: TestAgent;

  beforeEach(async () => {
    ctx = createTestContext();
    ({ agent: teacher } = await loginAs(ctx, 'Route Teacher', UserRole.TEACHER));
    ({ agent: student } = await loginAs(ctx, 'Route Student', UserRole.STUDENT));
  });

  const createAssignment = async (agent: TestAgent = teacher): Promise<string> => {
    const response = await agent
      .post('/api/assignments')
      .send({ title: 'Lab 1', description: 'Measure things', due_date: '2026-11-02' })
      .expect(201);
    return response.body.id;
  };

  describe('POST /api/assignments', () => {
    it('should create an assignment', async () => {
      const response = await teacher
        .post('/api/assignments')
        .send({ title: 'Lab 1', description: 'Measure things', due_date: '2026-11-02' });

      expect(response.status).toBe(201);
      expect(response.body).toMatchObject({
        title: 'Lab 1',
        description: 'Measure things',
        due_date: '2026-11-02',
        author_name: 'Route Teacher',
      });
    });

    it('should reject a malformed due date', async () => {
      const response = await teacher
        .post('/api/assignments')
        .send({ title: 'Lab 1', due_date: '2026-02-30' });

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('due_date must be a date in YYYY-MM-DD format');
    });

    it('should forbid students', async () => {
      await student.post('/api/assignments').send({ title: 'Mine' }).expect(403);
    });
  });

  describe('submitting', () => {
    it('should create, then update, a submission', async () => {
      const assignmentId = await createAssignment();

      const first = await student
        .post(`/api/assignments/${assignmentId}/submissions`)
        .send({ content: 'draft' });
      expect(first.status).toBe(201);
      expect(first.body).toMatchObject({ content: 'draft', score: null });

      const second = await student
        .post(`/api/assignments/${assignmentId}/submissions`)
        .send({ content: 'final' });
      expect(second.status).toBe(200);
      expect(second.body.id).toBe(first.body.id);
      expect(second.body.content).toBe('final');
    });

    it('should return 404 for an unknown assignment', async () => {
      const response = await student.post('/api/assignments/missing/submissions').send({ content: 'x' });

      expect(response.status).toBe(404);
      expect(response.body.error.message).toBe('Assignment not found');
    });

    it('should forbid teachers from submitting', async () => {
      const assignmentId = await createAssignment();
      await teacher.post(`/api/assignments/${assignmentId}/submissions`).send({ content: 'x' }).expect(403);
    });
  });

  describe('grading', () => {
    let assignmentId: string;
    let submissionId: string;

    beforeEach(async () => {
      assignmentId = await createAssignment();
      const response = await student
        .post(`/api/assignments/${assignmentId}/submissions`)
        .send({ content: 'answer' })
        .expect(201);
      submissionId = response.body.id;
    });

    it('should list submissions for the owning teacher', async () => {
      const response = await teacher.get('/api/submissions');

      expect(response.status).toBe(200);
      expect(response.body).toHaveLength(1);
      expect(response.body[0]).toMatchObject({
        id: submissionId,
        student_name: 'Route Student',
      });

      const byAssignment = await teacher.get(`/api/assignments/${assignmentId}/submissions`);
      expect(byAssignment.body.map((row: { id: string }) => row.id)).toEqual([submissionId]);
    });

    it('should grade once and show the grade to the student', async () => {
      const graded = await teacher
        .post(`/api/submissions/${submissionId}/grade`)
        .send({ score: '9.5', feedback: 'Solid' });

      expect(graded.status).toBe(200);
      expect(graded.body).toMatchObject({ score: 9.5, feedback: 'Solid' });

      const again = await teacher.post(`/api/submissions/${submissionId}/grade`).send({ score: 10 });
      expect(again.status).toBe(409);
      expect(again.body.error.message).toBe('Submission has already been graded');

      const detail = await student.get(`/api/assignments/${assignmentId}`);
      expect(detail.body.submission).toMatchObject({ score: 9.5, feedback: 'Solid' });
      expect(detail.body.submissions).toEqual([]);

      const resubmit = await student
        .post(`/api/assignments/${assignmentId}/submissions`)
        .send({ content: 'late change' });
      expect(resubmit.status).toBe(409);
    });

    it('should reject a non-numeric score', async () => {
      const response = await teacher.post(`/api/submissions/${submissionId}/grade`).send({ score: 'ten' });

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('score must be a valid number');
    });

    it('should forbid other teachers and students', async () => {
      const { agent: otherTeacher } = await loginAs(ctx, 'Other Teacher', UserRole.TEACHER);

      const byOther = await otherTeacher.post(`/api/submissions/${submissionId}/grade`).send({ score: 5 });
      expect(byOther.status).toBe(403);
      expect(byOther.body.error.message).toBe('Only the assignment owner can grade its submissions');

      await otherTeacher.get(`/api/assignments/${assignmentId}/submissions`).expect(403);
      await student.post(`/api/submissions/${submissionId}/grade`).send({ score: 5 }).expect(403);
    });

    it('should show students only their own submissions', async () => {
      const response = await student.get('/api/submissions');

      expect(response.body).toHaveLength(1);
      expect(response.body[0].id).toBe(submissionId);
    });
  });

  it('should filter the list to the teacher\'s own assignments', async () => {
    const { agent: otherTeacher } = await loginAs(ctx, 'Other Teacher', UserRole.TEACHER);
    await createAssignment();
    await createAssignment(otherTeacher);

    const all = await teacher.get('/api/assignments');
    const mine = await teacher.get('/api/assignments?mine=true');

    expect(all.body).toHaveLength(2);
    expect(mine.body).toHaveLength(1);
    expect(mine.body[0].author_name).toBe('Route Teacher');
  });

  it('should return 404 for an unknown assignment', async () => {
    await student.get('/api/assignments/missing').expect(404);
  });
});
