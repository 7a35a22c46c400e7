import express, { Router } from 'express';
import type { AuthController } from '../controllers/authController';

export function createAuthRouter(controller: AuthController): Router {
  const router: Router = express.Router();

  router.get('/register', (req, res) => controller.registerForm(req, res));
  router.post('/register', async (req, res, next) => {
    await controller.register(req, res, next);
  });

  router.get('/login', (req, res) => controller.loginForm(req, res));
  router.post('/login', async (req, res, next) => {
    await controller.login(req, res, next);
  });

  router.get('/logout', async (req, res, next) => {
    await controller.logout(req, res, next);
  });

  return router;
}
