import express, { Router } from 'express';
import type { PostsController } from '../controllers/postsController';
import { guard, requireAdmin, requireIdentity } from '../middleware/guards';

export function createBlogRouter(controller: PostsController, adminEmail: string): Router {
  const router: Router = express.Router();

  // Signed in first, then admin
  const adminOnly = guard(requireIdentity, requireAdmin(adminEmail));

  // Public routes
  router.get('/', async (req, res, next) => {
    await controller.index(req, res, next);
  });

  router.get('/post/:id', async (req, res, next) => {
    await controller.show(req, res, next);
  });

  router.post('/post/:id', async (req, res, next) => {
    await controller.addComment(req, res, next);
  });

  // Admin routes
  router.get('/new-post', adminOnly, (req, res) => controller.newPostForm(req, res));

  router.post('/new-post', adminOnly, async (req, res, next) => {
    await controller.createPost(req, res, next);
  });

  router.get('/edit-post/:id', adminOnly, async (req, res, next) => {
    await controller.editPostForm(req, res, next);
  });

  router.post('/edit-post/:id', adminOnly, async (req, res, next) => {
    await controller.updatePost(req, res, next);
  });

  router.get('/delete/:id', adminOnly, async (req, res, next) => {
    await controller.deletePost(req, res, next);
  });

  return router;
}
