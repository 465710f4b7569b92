/**
 * @fileoverview Operational routes for email automation.
 *
 * Routes:
 * - GET  /api/v1/email-automation/users/:userId/status  - config summary + pending-job probes
 * - POST /api/v1/email-automation/users/:userId/trigger - enqueue an immediate run
 *
 * Both require `X-API-Key` to match AUTOMATION_API_TOKEN. With no token
 * configured the routes answer 503 rather than run unauthenticated.
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import { timingSafeEqual } from 'crypto';
import type { EmailConfigStore } from '../services/email-config/types.js';
import type { EmailScheduler } from '../services/scheduler/scheduler.js';
import type { JobStatusInspector } from '../services/scheduler/types.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger, createRequestId, redactEmail, withLogContext } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'automation-routes' });

export interface AutomationRouterDeps {
  configStore: EmailConfigStore;
  scheduler: EmailScheduler;
  inspector: JobStatusInspector;
  apiToken: string | undefined;
}

type UserParams = { userId: string };

function tokensMatch(expected: string, provided: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && timingSafeEqual(a, b);
}

function parseUserId(raw: string): number | null {
  return /^\d+$/.test(raw) ? Number(raw) : null;
}

export function createAutomationRouter(deps: AutomationRouterDeps): Router {
  const router = Router();

  router.use('/api/v1/email-automation', (req: Request, res: Response, next: NextFunction) => {
    if (!deps.apiToken) {
      res.status(503).json({ error: 'Automation API is not configured' });
      return;
    }
    const provided = req.header('X-API-Key');
    if (!provided || !tokensMatch(deps.apiToken, provided)) {
      res.status(401).json({ error: 'Invalid API key' });
      return;
    }
    withLogContext({ requestId: createRequestId() }, next);
  });

  router.get('/api/v1/email-automation/users/:userId/status', async (req: Request<UserParams>, res: Response) => {
    const userId = parseUserId(req.params.userId);
    if (userId === null) {
      res.status(400).json({ error: 'userId must be a positive integer' });
      return;
    }

    try {
      const config = await deps.configStore.get(userId);
      if (!config) {
        res.json({ status: 'not_configured' });
        return;
      }
      const jobs = await deps.inspector.getUserJobStatus(userId);
      res.json({
        status: config.isEnabled ? 'enabled' : 'disabled',
        lastCheck: config.lastCheckTime ? config.lastCheckTime.toISOString() : null,
        pollingInterval: config.pollingInterval,
        emailAddress: redactEmail(config.emailAddress),
        jobs,
      });
    } catch (error) {
      logger.error('automation_status_failed', { userId, error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to load automation status' });
    }
  });

  router.post('/api/v1/email-automation/users/:userId/trigger', async (req: Request<UserParams>, res: Response) => {
    const userId = parseUserId(req.params.userId);
    if (userId === null) {
      res.status(400).json({ error: 'userId must be a positive integer' });
      return;
    }

    try {
      const result = await deps.scheduler.triggerUserJob(userId);
      if (result.queued) {
        res.json({ success: true, jobId: result.jobId });
        return;
      }
      if (result.reason === 'already_pending') {
        res.status(409).json({ error: 'A job is already pending for this user', jobStatus: result.status });
        return;
      }
      res.status(400).json({ error: 'Email automation is not configured or is disabled' });
    } catch (error) {
      logger.error('automation_trigger_failed', { userId, error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to queue email processing' });
    }
  });

  return router;
}
