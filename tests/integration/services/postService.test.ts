import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { NotFoundError, UnauthenticatedError, ValidationError } from '../../../src/errors';
import { CommentService } from '../../../src/services/commentService';
import { PostService } from '../../../src/services/postService';
import { UserService } from '../../../src/services/userService';
import { ANONYMOUS, type UserSummary } from '../../../src/types/blog';
import { countRows, createTestDatabase, insertUser, type TestDatabase } from '../../helpers/db';

const input = {
  title: 'Spring notes',
  subtitle: 'What grew',
  imgUrl: 'https://images.example.com/spring.jpg',
  body: '<p>Tulips.</p>',
};

describe('PostService', () => {
  let database: TestDatabase;
  let posts: PostService;
  let commentService: CommentService;
  let owner: UserSummary;
  let guest: UserSummary;

  beforeAll(async () => {
    database = await createTestDatabase();
    posts = new PostService(database.db, () => new Date(Date.UTC(2026, 2, 7, 12)));
    commentService = new CommentService(database.db);
  });

  beforeEach(async () => {
    await database.reset();
    owner = await insertUser(database.db, { id: 'u-owner', name: 'Owner', email: 'owner@example.com' });
    guest = await insertUser(database.db, { id: 'u-guest', name: 'Guest', email: 'guest@example.com' });
  });

  afterAll(async () => {
    await database.close();
  });

  it('stamps new posts with a display date', async () => {
    const post = await posts.createPost(input, owner);

    expect(post).toEqual({
      id: 1,
      ...input,
      date: 'March 7, 2026',
      author: { id: 'u-owner', name: 'Owner' },
    });
  });

  it('lists posts in id order', async () => {
    await posts.createPost(input, owner);
    await posts.createPost({ ...input, title: 'Summer notes' }, owner);

    const listing = await posts.listPosts();

    expect(listing.map(p => p.title)).toEqual(['Spring notes', 'Summer notes']);
    expect(listing[0]).not.toHaveProperty('body');
  });

  it('keeps the date and moves authorship to the editor on update', async () => {
    const created = await posts.createPost(input, owner);

    const updated = await posts.updatePost(created.id, { ...input, subtitle: 'Revised' }, guest);

    expect(updated.subtitle).toBe('Revised');
    expect(updated.date).toBe('March 7, 2026');
    expect(updated.author).toEqual({ id: 'u-guest', name: 'Guest' });
  });

  it('allows an update that keeps its own title', async () => {
    const created = await posts.createPost(input, owner);

    await expect(posts.updatePost(created.id, input, owner)).resolves.toMatchObject({ title: input.title });
  });

  it('rejects the loser of two concurrent creates with the same title as a field error', async () => {
    const results = await Promise.allSettled([
      posts.createPost(input, owner),
      posts.createPost(input, guest),
    ]);

    const fulfilled = results.filter(result => result.status === 'fulfilled');
    const rejected = results.filter(
      (result): result is PromiseRejectedResult => result.status === 'rejected'
    );
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toBeInstanceOf(ValidationError);
    expect(rejected[0].reason.fields).toEqual({ title: ['A post with this title already exists'] });
    expect(await countRows(database.client, 'blog_posts')).toBe(1);
  });

  it('refuses to take another post\'s title', async () => {
    await posts.createPost(input, owner);
    const other = await posts.createPost({ ...input, title: 'Other' }, owner);

    await expect(posts.updatePost(other.id, input, owner)).rejects.toBeInstanceOf(ValidationError);
  });

  it('throws NotFound for missing posts', async () => {
    await expect(posts.getPost(3)).rejects.toBeInstanceOf(NotFoundError);
    await expect(posts.updatePost(3, input, owner)).rejects.toBeInstanceOf(NotFoundError);
    await expect(posts.deletePost(3)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('cascades comment deletion with the post', async () => {
    const kept = await posts.createPost({ ...input, title: 'Kept' }, owner);
    const doomed = await posts.createPost(input, owner);
    await commentService.addComment(doomed.id, 'gone soon', { kind: 'user', user: guest });
    await commentService.addComment(kept.id, 'stays', { kind: 'user', user: guest });

    await posts.deletePost(doomed.id);

    expect(await countRows(database.client, 'comments')).toBe(1);
    const { comments } = await posts.getPostWithComments(kept.id);
    expect(comments.map(c => c.text)).toEqual(['stays']);
  });
});

describe('CommentService', () => {
  let database: TestDatabase;

  beforeAll(async () => {
    database = await createTestDatabase();
  });

  afterAll(async () => {
    await database.close();
  });

  it('refuses anonymous comments before touching the store', async () => {
    const service = new CommentService(database.db);

    await expect(service.addComment(1, 'hi', ANONYMOUS)).rejects.toBeInstanceOf(UnauthenticatedError);
    expect(await countRows(database.client, 'comments')).toBe(0);
  });
});

describe('UserService', () => {
  let database: TestDatabase;

  beforeAll(async () => {
    database = await createTestDatabase();
    await insertUser(database.db, { id: 'u-1', name: 'Alice', email: 'a@x.com' });
  });

  afterAll(async () => {
    await database.close();
  });

  it('finds users by email regardless of case', async () => {
    const users = new UserService(database.db);

    expect(await users.findByEmail('A@X.com')).toEqual({ id: 'u-1', name: 'Alice', email: 'a@x.com' });
    expect(await users.findByEmail('b@x.com')).toBeNull();
  });
});
