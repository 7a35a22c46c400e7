import express, { Router } from 'express';
import { identityOf, type AuthenticatedRequest } from '../middleware/auth';
import { render, viewerOf } from '../controllers/view';

const pages = {
  about: {
    title: 'About Me',
    subtitle: 'This is what I do.',
  },
  contact: {
    title: 'Contact Me',
    subtitle: 'Have questions? I have answers.',
  },
} as const;

export function createIndexRouter(adminEmail: string): Router {
  const router: Router = express.Router();

  /* GET about page. */
  router.get('/about', (req: AuthenticatedRequest, res) => {
    render(req, res, viewerOf(identityOf(req), adminEmail), { page: 'about', ...pages.about });
  });

  /* GET contact page. */
  router.get('/contact', (req: AuthenticatedRequest, res) => {
    render(req, res, viewerOf(identityOf(req), adminEmail), { page: 'contact', ...pages.contact });
  });

  return router;
}
