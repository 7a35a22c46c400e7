import { createHash } from 'crypto';
import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import request from 'supertest';
import { ADMIN, ALICE, HELLO_POST, createTestApp, signedInAgent, type TestApp } from '../helpers/app';
import { countRows } from '../helpers/db';

describe('Comments on a post', () => {
  let testApp: TestApp;

  beforeAll(async () => {
    testApp = await createTestApp();
  });

  beforeEach(async () => {
    await testApp.database.reset();
    const admin = await signedInAgent(testApp.app, ADMIN);
    await admin.post('/new-post').type('form').send(HELLO_POST);
  });

  afterAll(async () => {
    await testApp.database.close();
  });

  it('adds a comment from a signed-in user', async () => {
    const alice = await signedInAgent(testApp.app, ALICE);

    const response = await alice.post('/post/1').type('form').send({ comment: '  Nice post!  ' });

    expect(response.status).toBe(302);
    expect(response.headers.location).toBe('/post/1');

    const page = await alice.get('/post/1');
    const avatarHash = createHash('md5').update('a@x.com').digest('hex');
    expect(page.body.comments).toEqual([
      {
        id: 1,
        text: 'Nice post!',
        author: { id: expect.any(String), name: 'Alice' },
        avatarUrl: `https://www.gravatar.com/avatar/${avatarHash}?s=100&d=retro&r=g`,
      },
    ]);
  });

  it('lists comments in the order they were written', async () => {
    const alice = await signedInAgent(testApp.app, ALICE);
    await alice.post('/post/1').type('form').send({ comment: 'one' });
    await alice.post('/post/1').type('form').send({ comment: 'two' });

    const page = await request(testApp.app).get('/post/1');

    expect(page.body.comments.map((c: { text: string }) => c.text)).toEqual(['one', 'two']);
  });

  it('never stores a comment from an anonymous visitor', async () => {
    const visitor = request.agent(testApp.app);

    const response = await visitor.post('/post/1').type('form').send({ comment: 'Drive-by' });

    expect(response.status).toBe(302);
    expect(response.headers.location).toBe('/post/1');
    expect(await countRows(testApp.database.client, 'comments')).toBe(0);

    const page = await visitor.get('/post/1');
    expect(page.status).toBe(200);
    expect(page.body.messages).toEqual(['You need to be logged in to comment.']);
    expect(page.body.comments).toEqual([]);
  });

  it('shows the flash message only once', async () => {
    const visitor = request.agent(testApp.app);
    await visitor.post('/post/1').type('form').send({ comment: 'Drive-by' });

    await visitor.get('/post/1');
    const second = await visitor.get('/post/1');

    expect(second.body.messages).toEqual([]);
  });

  it('rejects an empty comment with a field error', async () => {
    const alice = await signedInAgent(testApp.app, ALICE);

    const response = await alice.post('/post/1').type('form').send({ comment: '' });

    expect(response.status).toBe(400);
    expect(response.body.error).toMatchObject({
      code: 'VALIDATION_ERROR',
      fields: { comment: ['Comment is required'] },
    });
    expect(await countRows(testApp.database.client, 'comments')).toBe(0);
  });

  it('returns 404 when commenting on a missing post', async () => {
    const alice = await signedInAgent(testApp.app, ALICE);

    const response = await alice.post('/post/5').type('form').send({ comment: 'Hello?' });

    expect(response.status).toBe(404);
    expect(await countRows(testApp.database.client, 'comments')).toBe(0);
  });
});
