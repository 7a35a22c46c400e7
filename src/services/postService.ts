import { and, asc, eq, ne } from 'drizzle-orm';
import debug from 'debug';
import { isUniqueViolation } from '../db/errors';
import type { Database } from '../db/index';
import { blogPosts, comments, users } from '../db/schema';
import { NotFoundError, ValidationError } from '../errors';
import type { Post, PostInput, PostSummary, PostWithComments, UserSummary } from '../types/blog';
import { formatPostDate } from '../utils/dates';
import { gravatarUrl } from '../utils/gravatar';

const log = debug('blog:posts');

function titleTakenError(): ValidationError {
  return new ValidationError({ title: ['A post with this title already exists'] });
}

const postColumns = {
  id: blogPosts.id,
  title: blogPosts.title,
  subtitle: blogPosts.subtitle,
  date: blogPosts.date,
  body: blogPosts.body,
  imgUrl: blogPosts.imgUrl,
  authorId: users.id,
  authorName: users.name,
};

type PostRow = {
  id: number;
  title: string;
  subtitle: string;
  date: string;
  body: string;
  imgUrl: string;
  authorId: string;
  authorName: string;
};

function toPost(row: PostRow): Post {
  return {
    id: row.id,
    title: row.title,
    subtitle: row.subtitle,
    date: row.date,
    body: row.body,
    imgUrl: row.imgUrl,
    author: { id: row.authorId, name: row.authorName },
  };
}

export class PostService {
  constructor(
    private readonly db: Database,
    private readonly now: () => Date = () => new Date(),
  ) {}

  // All posts, oldest first
  async listPosts(): Promise<PostSummary[]> {
    const rows = await this.db
      .select(postColumns)
      .from(blogPosts)
      .innerJoin(users, eq(blogPosts.authorId, users.id))
      .orderBy(asc(blogPosts.id));

    return rows.map(row => ({
      id: row.id,
      title: row.title,
      subtitle: row.subtitle,
      date: row.date,
      author: { id: row.authorId, name: row.authorName },
    }));
  }

  async getPost(id: number): Promise<Post> {
    const result = await this.db
      .select(postColumns)
      .from(blogPosts)
      .innerJoin(users, eq(blogPosts.authorId, users.id))
      .where(eq(blogPosts.id, id))
      .limit(1);

    if (!result[0]) {
      throw new NotFoundError(`Post ${id} not found`);
    }
    return toPost(result[0]);
  }

  // Post with its comments in the order they were written
  async getPostWithComments(id: number): Promise<PostWithComments> {
    const post = await this.getPost(id);

    const rows = await this.db
      .select({
        id: comments.id,
        text: comments.text,
        authorId: users.id,
        authorName: users.name,
        authorEmail: users.email,
      })
      .from(comments)
      .innerJoin(users, eq(comments.authorId, users.id))
      .where(eq(comments.postId, id))
      .orderBy(asc(comments.id));

    return {
      post,
      comments: rows.map(row => ({
        id: row.id,
        text: row.text,
        author: { id: row.authorId, name: row.authorName },
        avatarUrl: gravatarUrl(row.authorEmail),
      })),
    };
  }

  async createPost(input: PostInput, author: UserSummary): Promise<Post> {
    await this.assertTitleAvailable(input.title);

    const [created] = await this.rejectingTitleClash(this.db
      .insert(blogPosts)
      .values({
        title: input.title,
        subtitle: input.subtitle,
        body: input.body,
        imgUrl: input.imgUrl,
        authorId: author.id,
        date: formatPostDate(this.now()),
      })
      .returning({ id: blogPosts.id }));

    log(`Post ${created.id} created by ${author.id}`);
    return this.getPost(created.id);
  }

  /**
   * Overwrites the editable fields. The editor becomes the post's author;
   * the original publish date is kept.
   */
  async updatePost(id: number, input: PostInput, editor: UserSummary): Promise<Post> {
    await this.assertTitleAvailable(input.title, id);

    const updated = await this.rejectingTitleClash(this.db
      .update(blogPosts)
      .set({
        title: input.title,
        subtitle: input.subtitle,
        body: input.body,
        imgUrl: input.imgUrl,
        authorId: editor.id,
      })
      .where(eq(blogPosts.id, id))
      .returning({ id: blogPosts.id }));

    if (updated.length === 0) {
      throw new NotFoundError(`Post ${id} not found`);
    }

    log(`Post ${id} edited by ${editor.id}`);
    return this.getPost(id);
  }

  // Comments on the post are removed by the foreign key cascade
  async deletePost(id: number): Promise<void> {
    const deleted = await this.db
      .delete(blogPosts)
      .where(eq(blogPosts.id, id))
      .returning({ id: blogPosts.id });

    if (deleted.length === 0) {
      throw new NotFoundError(`Post ${id} not found`);
    }
    log(`Post ${id} deleted`);
  }

  private async assertTitleAvailable(title: string, exceptId?: number): Promise<void> {
    const condition = exceptId === undefined
      ? eq(blogPosts.title, title)
      : and(eq(blogPosts.title, title), ne(blogPosts.id, exceptId));

    const clash = await this.db
      .select({ id: blogPosts.id })
      .from(blogPosts)
      .where(condition)
      .limit(1);

    if (clash.length > 0) {
      throw titleTakenError();
    }
  }

  // A concurrent write can take the title between the check and the write
  private async rejectingTitleClash<T>(write: PromiseLike<T>): Promise<T> {
    try {
      return await write;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw titleTakenError();
      }
      throw error;
    }
  }
}
