import { ContentRepository } from '../store/types';
import { Identity, UserRole } from '../types/entities';
import { AnnouncementWithAuthor, CreateAnnouncementRequest } from '../types/api';
import { logger } from '../utils/logger';
import { AccountService } from './accountService';
import { requireRole } from './authService';

export class AnnouncementService {
  constructor(
    private readonly content: ContentRepository,
    private readonly accounts: AccountService
  ) {}

  async create(identity: Identity, input: CreateAnnouncementRequest): Promise<AnnouncementWithAuthor> {
    requireRole(identity, UserRole.TEACHER);

    const announcement = await this.content.insertAnnouncement({
      title: input.title.trim() || 'Untitled',
      body: input.body,
      created_by: identity.userId,
    });

    logger.info('Announcement posted', { announcementId: announcement.id, userId: identity.userId });
    return { ...announcement, author_name: identity.name };
  }

  /**
   * Announcements are readable by everyone, newest first
   */
  async list(limit?: number): Promise<AnnouncementWithAuthor[]> {
    const announcements = await this.content.listAnnouncements(limit);
    const names = await this.accounts.namesById(announcements.map((row) => row.created_by));
    return announcements.map((row) => ({
      ...row,
      author_name: names.get(row.created_by) ?? null,
    }));
  }
}
