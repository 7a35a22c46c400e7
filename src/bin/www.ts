#!/usr/bin/env node

/**
 * Module dependencies.
 */

import dotenv from 'dotenv';
import debug from 'debug';
import http from 'http';
import { createApp } from '../app';
import { createAuth } from '../auth';
import { loadConfig } from '../config';
import { createDatabase } from '../db/index';

/**
 * Load environment variables; .env.local wins over .env.
 */

dotenv.config({ path: '.env.local' });
dotenv.config();

const debugLog = debug('blog:server');

const config = loadConfig();
const { db, pool } = createDatabase(config.databaseUrl);
const app = createApp({ config, db, auth: createAuth(db, config) });
app.set('port', config.port);

/**
 * Create HTTP server.
 */

const server = http.createServer(app);

/**
 * Listen on provided port, on all network interfaces.
 */

server.listen(config.port);
server.on('error', onError);
server.on('listening', onListening);

console.log(`Environment: ${config.nodeEnv}`);

/**
 * Event listener for HTTP server "error" event.
 */

function onError(error: NodeJS.ErrnoException): void {
  if (error.syscall !== 'listen') {
    throw error;
  }

  const bind = 'Port ' + config.port;

  // handle specific listen errors with friendly messages
  switch (error.code) {
    case 'EACCES':
      console.error(bind + ' requires elevated privileges');
      process.exit(1);
      break;
    case 'EADDRINUSE':
      console.error(bind + ' is already in use');
      process.exit(1);
      break;
    default:
      throw error;
  }
}

/**
 * Event listener for HTTP server "listening" event.
 */

function onListening(): void {
  const addr = server.address();
  const bind = typeof addr === 'string'
    ? 'pipe ' + addr
    : 'port ' + addr?.port;
  debugLog('Listening on ' + bind);
  console.log(`Server is running and listening on ${bind}`);
}

/**
 * Graceful shutdown: stop accepting requests, then close the pool.
 */

process.on('SIGTERM', () => {
  debugLog('SIGTERM received, closing server...');
  server.close(() => {
    pool.end().then(
      () => debugLog('Pool closed'),
      (err: unknown) => console.error('Error closing pool', err)
    );
  });
});
