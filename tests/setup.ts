/**
 * Vitest Global Setup
 */

process.env.NODE_ENV = 'test';
