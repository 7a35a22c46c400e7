import express from 'express';
import { NotFoundError, UnauthenticatedError } from '../errors';
import { identityOf, type AuthenticatedRequest } from '../middleware/auth';
import { flash } from '../middleware/flash';
import type { CommentService } from '../services/commentService';
import type { PostService } from '../services/postService';
import type { Identity, UserSummary } from '../types/blog';
import { commentFormSchema, postFormSchema } from '../validators/blog';
import { idParamSchema, parseForm } from '../validators/form';
import { render, viewerOf } from './view';

function postIdOf(req: express.Request): number {
  const parsed = idParamSchema.safeParse(req.params.id);
  if (!parsed.success) {
    throw new NotFoundError(`Post ${req.params.id} not found`);
  }
  return parsed.data;
}

// Guarded routes only reach the handler with a signed-in identity
function signedInUser(identity: Identity): UserSummary {
  if (identity.kind === 'anonymous') {
    throw new UnauthenticatedError();
  }
  return identity.user;
}

export class PostsController {
  constructor(
    private readonly posts: PostService,
    private readonly comments: CommentService,
    private readonly adminEmail: string,
  ) {}

  // GET /
  async index(req: AuthenticatedRequest, res: express.Response, next: express.NextFunction) {
    try {
      const posts = await this.posts.listPosts();
      render(req, res, viewerOf(identityOf(req), this.adminEmail), { posts });
    } catch (error) {
      next(error);
    }
  }

  // GET /post/:id
  async show(req: AuthenticatedRequest, res: express.Response, next: express.NextFunction) {
    try {
      const { post, comments } = await this.posts.getPostWithComments(postIdOf(req));
      render(req, res, viewerOf(identityOf(req), this.adminEmail), { post, comments });
    } catch (error) {
      next(error);
    }
  }

  // POST /post/:id
  async addComment(req: AuthenticatedRequest, res: express.Response, next: express.NextFunction) {
    try {
      const postId = postIdOf(req);
      const { comment } = parseForm(commentFormSchema, req.body);

      try {
        await this.comments.addComment(postId, comment, identityOf(req));
      } catch (error) {
        if (error instanceof UnauthenticatedError) {
          flash(res, error.message);
          res.redirect(`/post/${postId}`);
          return;
        }
        throw error;
      }

      res.redirect(`/post/${postId}`);
    } catch (error) {
      next(error);
    }
  }

  // GET /new-post
  newPostForm(req: AuthenticatedRequest, res: express.Response) {
    render(req, res, viewerOf(identityOf(req), this.adminEmail), {
      form: 'new-post',
      values: { title: '', subtitle: '', img_url: '', body: '' },
    });
  }

  // POST /new-post
  async createPost(req: AuthenticatedRequest, res: express.Response, next: express.NextFunction) {
    try {
      const author = signedInUser(identityOf(req));
      const input = parseForm(postFormSchema, req.body);
      await this.posts.createPost(input, author);
      res.redirect('/');
    } catch (error) {
      next(error);
    }
  }

  // GET /edit-post/:id
  async editPostForm(req: AuthenticatedRequest, res: express.Response, next: express.NextFunction) {
    try {
      const post = await this.posts.getPost(postIdOf(req));
      render(req, res, viewerOf(identityOf(req), this.adminEmail), {
        form: 'edit-post',
        postId: post.id,
        values: { title: post.title, subtitle: post.subtitle, img_url: post.imgUrl, body: post.body },
      });
    } catch (error) {
      next(error);
    }
  }

  // POST /edit-post/:id
  async updatePost(req: AuthenticatedRequest, res: express.Response, next: express.NextFunction) {
    try {
      const editor = signedInUser(identityOf(req));
      const postId = postIdOf(req);
      const input = parseForm(postFormSchema, req.body);
      await this.posts.updatePost(postId, input, editor);
      res.redirect(`/post/${postId}`);
    } catch (error) {
      next(error);
    }
  }

  // GET /delete/:id
  async deletePost(req: AuthenticatedRequest, res: express.Response, next: express.NextFunction) {
    try {
      await this.posts.deletePost(postIdOf(req));
      res.redirect('/');
    } catch (error) {
      next(error);
    }
  }
}
