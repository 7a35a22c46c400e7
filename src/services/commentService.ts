import { eq } from 'drizzle-orm';
import debug from 'debug';
import type { Database } from '../db/index';
import { blogPosts, comments } from '../db/schema';
import { NotFoundError, UnauthenticatedError } from '../errors';
import type { Identity } from '../types/blog';

const log = debug('blog:comments');

export class CommentService {
  constructor(private readonly db: Database) {}

  async addComment(postId: number, text: string, identity: Identity): Promise<number> {
    if (identity.kind === 'anonymous') {
      throw new UnauthenticatedError('You need to be logged in to comment.');
    }

    const post = await this.db
      .select({ id: blogPosts.id })
      .from(blogPosts)
      .where(eq(blogPosts.id, postId))
      .limit(1);
    if (post.length === 0) {
      throw new NotFoundError(`Post ${postId} not found`);
    }

    const [created] = await this.db
      .insert(comments)
      .values({ text, authorId: identity.user.id, postId })
      .returning({ id: comments.id });

    log(`Comment ${created.id} added to post ${postId} by ${identity.user.id}`);
    return created.id;
  }
}
