import express, { Application } from 'express';
import cookieParser from 'cookie-parser';
import logger from 'morgan';
import cors from 'cors';

import type { Auth } from './auth';
import type { AppConfig } from './config';
import type { Database } from './db/index';
import { AuthController } from './controllers/authController';
import { PostsController } from './controllers/postsController';
import { createIndexRouter } from './routes/index';
import { createAuthRouter } from './routes/auth';
import { createBlogRouter } from './routes/blog';
import { AuthService } from './services/authService';
import { CommentService } from './services/commentService';
import { PostService } from './services/postService';
import { UserService } from './services/userService';

import { errorHandler, loadIdentity, notFoundHandler } from './middleware/auth';

export interface AppDependencies {
  config: AppConfig;
  db: Database;
  auth: Auth;
}

export function createApp({ config, db, auth }: AppDependencies): Application {
  const app: Application = express();

  const authService = new AuthService(auth, new UserService(db));
  const postsController = new PostsController(new PostService(db), new CommentService(db), config.adminEmail);
  const authController = new AuthController(authService, config.adminEmail);

  // CORS configuration
  app.use(cors({
    origin: [config.baseUrl, config.frontendUrl].filter((url): url is string => Boolean(url)),
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Cookie'],
  }));

  // Basic middleware
  if (config.nodeEnv !== 'test') {
    app.use(logger('dev'));
  }
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.use(cookieParser());

  // Session identity for every request
  app.use(loadIdentity(authService));

  // Routes
  app.use('/', createIndexRouter(config.adminEmail));
  app.use('/', createAuthRouter(authController));
  app.use('/', createBlogRouter(postsController, config.adminEmail));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler(config.nodeEnv));

  return app;
}
