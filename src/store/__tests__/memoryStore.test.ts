import { AnswerChoice, UserRole } from '../../types/entities';
import {
  ConflictError,
  DuplicateEmailError,
  NotFoundError,
} from '../../middleware/errorHandler';
import { MemoryAccountRepository, MemoryContentRepository } from '../memoryStore';

// Each call advances one second so ordering by timestamp is deterministic
const steppingClock = (start = '2026-01-01T00:00:00.000Z') => {
  let current = Date.parse(start);
  return () => {
    current += 1000;
    return new Date(current);
  };
};

const choices = {
  [AnswerChoice.A]: 'one',
  [AnswerChoice.B]: 'two',
  [AnswerChoice.C]: 'three',
  [AnswerChoice.D]: 'four',
};

describe('MemoryAccountRepository', () => {
  let accounts: MemoryAccountRepository;

  beforeEach(() => {
    accounts = new MemoryAccountRepository(steppingClock());
  });

  const newUser = (email: string) => ({
    name: 'Test User',
    email,
    password_hash: 'hash',
    role: UserRole.STUDENT,
  });

  it('stores a user and finds it by email and id', async () => {
    const user = await accounts.insertUser(newUser('a@example.com'));

    expect(user.created_at).toBe('2026-01-01T00:00:01.000Z');
    expect(await accounts.findUserByEmail('a@example.com')).toEqual(user);
    expect(await accounts.findUserById(user.id)).toEqual(user);
    expect(await accounts.countUsers()).toBe(1);
  });

  it('rejects a second user with the same email', async () => {
    await accounts.insertUser(newUser('a@example.com'));

    await expect(accounts.insertUser(newUser('a@example.com'))).rejects.toBeInstanceOf(
      DuplicateEmailError
    );
    expect(await accounts.countUsers()).toBe(1);
  });

  it('admits exactly one of two concurrent registrations for an email', async () => {
    const results = await Promise.allSettled([
      accounts.insertUser(newUser('race@example.com')),
      accounts.insertUser(newUser('race@example.com')),
    ]);

    expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1);
    expect(await accounts.countUsers()).toBe(1);
  });

  it('returns null for unknown users', async () => {
    expect(await accounts.findUserByEmail('nobody@example.com')).toBeNull();
    expect(await accounts.findUserById('missing')).toBeNull();
  });

  it('looks up several users, skipping duplicates and unknown ids', async () => {
    const first = await accounts.insertUser(newUser('a@example.com'));
    const second = await accounts.insertUser(newUser('b@example.com'));

    const users = await accounts.findUsersByIds([first.id, second.id, first.id, 'missing']);

    expect(users.map((user) => user.id)).toEqual([first.id, second.id]);
  });

  it('returns copies that do not alias stored rows', async () => {
    const user = await accounts.insertUser(newUser('a@example.com'));
    user.name = 'Changed';

    const stored = await accounts.findUserById(user.id);
    expect(stored?.name).toBe('Test User');
  });
});

describe('MemoryContentRepository', () => {
  let content: MemoryContentRepository;

  beforeEach(() => {
    content = new MemoryContentRepository(steppingClock());
  });

  it('lists announcements newest first and honours the limit', async () => {
    for (const title of ['first', 'second', 'third']) {
      await content.insertAnnouncement({ title, body: '', created_by: 'teacher-1' });
    }

    const all = await content.listAnnouncements();
    expect(all.map((row) => row.title)).toEqual(['third', 'second', 'first']);

    const limited = await content.listAnnouncements(2);
    expect(limited.map((row) => row.title)).toEqual(['third', 'second']);
    expect(await content.countAnnouncements()).toBe(3);
  });

  it('orders rows created in the same instant by insertion, newest first', async () => {
    const fixed = new MemoryContentRepository(() => new Date('2026-01-01T00:00:00.000Z'));
    await fixed.insertAssignment({ title: 'older', description: '', due_date: null, created_by: 't' });
    await fixed.insertAssignment({ title: 'newer', description: '', due_date: null, created_by: 't' });

    const rows = await fixed.listAssignments();
    expect(rows.map((row) => row.title)).toEqual(['newer', 'older']);
  });

  it('filters assignments by creator', async () => {
    await content.insertAssignment({ title: 'mine', description: '', due_date: null, created_by: 't1' });
    await content.insertAssignment({ title: 'theirs', description: '', due_date: null, created_by: 't2' });

    const rows = await content.listAssignments('t1');
    expect(rows.map((row) => row.title)).toEqual(['mine']);
  });

  describe('submissions', () => {
    it('allows one submission per student and assignment', async () => {
      await content.insertSubmission({ assignment_id: 'a1', student_id: 's1', content: 'x' });

      await expect(
        content.insertSubmission({ assignment_id: 'a1', student_id: 's1', content: 'y' })
      ).rejects.toBeInstanceOf(ConflictError);

      await content.insertSubmission({ assignment_id: 'a1', student_id: 's2', content: 'z' });
      expect(await content.listSubmissions({ assignmentId: 'a1' })).toHaveLength(2);
    });

    it('starts ungraded and records a grade', async () => {
      const submission = await content.insertSubmission({
        assignment_id: 'a1',
        student_id: 's1',
        content: 'answer',
      });
      expect(submission.score).toBeNull();
      expect(submission.graded_at).toBeNull();

      const graded = await content.gradeSubmission(submission.id, {
        score: 9,
        feedback: 'Good',
        graded_by: 't1',
      });

      expect(graded).toMatchObject({ score: 9, feedback: 'Good', graded_by: 't1' });
      expect(graded.graded_at).toBe('2026-01-01T00:00:02.000Z');
      expect(await content.findSubmissionFor('a1', 's1')).toEqual(graded);
    });

    it('refuses to regrade or edit a graded submission', async () => {
      const submission = await content.insertSubmission({
        assignment_id: 'a1',
        student_id: 's1',
        content: 'answer',
      });
      await content.gradeSubmission(submission.id, { score: 9, feedback: null, graded_by: 't1' });

      await expect(
        content.gradeSubmission(submission.id, { score: 1, feedback: null, graded_by: 't1' })
      ).rejects.toThrow(new ConflictError('Submission has already been graded'));
      await expect(content.updateSubmissionContent(submission.id, 'edited')).rejects.toBeInstanceOf(
        ConflictError
      );

      const stored = await content.findSubmission(submission.id);
      expect(stored).toMatchObject({ score: 9, content: 'answer' });
    });

    it('throws NotFoundError when grading an unknown submission', async () => {
      await expect(
        content.gradeSubmission('missing', { score: 1, feedback: null, graded_by: 't1' })
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('filters by a set of assignments and by student', async () => {
      await content.insertSubmission({ assignment_id: 'a1', student_id: 's1', content: '' });
      await content.insertSubmission({ assignment_id: 'a2', student_id: 's1', content: '' });
      await content.insertSubmission({ assignment_id: 'a3', student_id: 's2', content: '' });

      const bySet = await content.listSubmissions({ assignmentIds: ['a1', 'a3'] });
      expect(bySet.map((row) => row.assignment_id)).toEqual(['a3', 'a1']);

      const byStudent = await content.listSubmissions({ studentId: 's1' });
      expect(byStudent.map((row) => row.assignment_id)).toEqual(['a2', 'a1']);

      expect(await content.listSubmissions({ assignmentIds: [] })).toEqual([]);
    });
  });

  describe('discussions', () => {
    it('lists posts oldest first', async () => {
      const discussion = await content.insertDiscussion({ title: 'Thread', created_by: 't1' });
      await content.insertPost({ discussion_id: discussion.id, author_id: 's1', body: 'first' });
      await content.insertPost({ discussion_id: discussion.id, author_id: 's2', body: 'second' });

      const posts = await content.listPosts(discussion.id);
      expect(posts.map((post) => post.body)).toEqual(['first', 'second']);
    });

    it('rejects a post to an unknown discussion', async () => {
      await expect(
        content.insertPost({ discussion_id: 'missing', author_id: 's1', body: 'hello' })
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('quizzes', () => {
    it('numbers questions by position and isolates stored copies', async () => {
      const quiz = await content.insertQuiz({
        title: 'Quiz',
        created_by: 't1',
        questions: [
          { prompt: 'Q1', choices, correct: AnswerChoice.A },
          { prompt: 'Q2', choices, correct: AnswerChoice.D },
        ],
      });

      expect(quiz.questions.map((question) => question.position)).toEqual([0, 1]);
      expect(quiz.questions.every((question) => question.quiz_id === quiz.id)).toBe(true);

      quiz.questions[0].choices[AnswerChoice.A] = 'changed';
      const stored = await content.findQuiz(quiz.id);
      expect(stored?.questions[0].choices[AnswerChoice.A]).toBe('one');
    });

    it('allows one attempt per student and quiz', async () => {
      const attempt = {
        quiz_id: 'q1',
        student_id: 's1',
        answers: [AnswerChoice.A, null],
        score: 1,
        total: 2,
      };
      await content.insertAttempt(attempt);

      await expect(content.insertAttempt(attempt)).rejects.toBeInstanceOf(ConflictError);
      expect(await content.findAttemptFor('q1', 's1')).toMatchObject({ score: 1, total: 2 });
      expect(await content.listAttempts({ studentId: 's1' })).toHaveLength(1);
    });
  });
});
