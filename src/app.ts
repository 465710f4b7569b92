/**
 * @fileoverview Express application factory.
 *
 * Kept separate from the entry point so tests can mount the same routes
 * without starting the server or the scheduler.
 */

import express from 'express';
import { createAutomationRouter, type AutomationRouterDeps } from './routes/automation.js';
import { healthHandler } from './routes/health.js';

export function createApp(deps: AutomationRouterDeps): express.Application {
  const app = express();

  app.use(express.json());

  app.get('/health', healthHandler);

  app.use(createAutomationRouter(deps));

  return app;
}
