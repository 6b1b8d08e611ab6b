import { ContentRepository } from '../store/types';
import { Identity, UserRole } from '../types/entities';
import {
  CreateDiscussionRequest,
  DiscussionDetail,
  DiscussionWithAuthor,
  PostWithAuthor,
} from '../types/api';
import { NotFoundError, ValidationError } from '../middleware/errorHandler';
import { logger } from '../utils/logger';
import { AccountService } from './accountService';
import { requireRole } from './authService';

export class DiscussionService {
  constructor(
    private readonly content: ContentRepository,
    private readonly accounts: AccountService
  ) {}

  async create(identity: Identity, input: CreateDiscussionRequest): Promise<DiscussionWithAuthor> {
    requireRole(identity, UserRole.TEACHER);

    const discussion = await this.content.insertDiscussion({
      title: input.title.trim() || 'Untitled',
      created_by: identity.userId,
    });

    logger.info('Discussion created', { discussionId: discussion.id, userId: identity.userId });
    return { ...discussion, author_name: identity.name };
  }

  async list(): Promise<DiscussionWithAuthor[]> {
    const discussions = await this.content.listDiscussions();
    const names = await this.accounts.namesById(discussions.map((row) => row.created_by));
    return discussions.map((row) => ({ ...row, author_name: names.get(row.created_by) ?? null }));
  }

  /**
   * Thread with its posts, oldest post first
   */
  async get(discussionId: string): Promise<DiscussionDetail> {
    const discussion = await this.content.findDiscussion(discussionId);
    if (!discussion) {
      throw new NotFoundError('Discussion');
    }

    const posts = await this.content.listPosts(discussion.id);
    const names = await this.accounts.namesById([
      discussion.created_by,
      ...posts.map((post) => post.author_id),
    ]);

    return {
      discussion: { ...discussion, author_name: names.get(discussion.created_by) ?? null },
      posts: posts.map((post) => ({ ...post, author_name: names.get(post.author_id) ?? null })),
    };
  }

  /**
   * Any signed-in user may reply
   */
  async post(identity: Identity, discussionId: string, body: string): Promise<PostWithAuthor> {
    const text = body.trim();
    if (!text) {
      throw new ValidationError('body is required');
    }

    const discussion = await this.content.findDiscussion(discussionId);
    if (!discussion) {
      throw new NotFoundError('Discussion');
    }

    const post = await this.content.insertPost({
      discussion_id: discussion.id,
      author_id: identity.userId,
      body: text,
    });
    return { ...post, author_name: identity.name };
  }
}
