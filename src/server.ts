import { timingSafeEqual } from 'crypto';
import express from 'express';
import { z } from 'zod';
import type { Config } from './config.js';
import type { Logger } from './logger.js';
import type { Reconciler } from './reconciler.js';
import { extractIssueKey } from './routing/classify.js';
import type { Workflow } from './workflow.js';

const webhookSchema = z.object({
  key: z.string().optional(),
  issue: z.object({ key: z.string() }).optional(),
});

/** Constant-time comparison of a presented secret against the expected one. */
export function isValidSecret(presented: string | undefined, expected: string): boolean {
  if (!presented) return false;
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function createServer(
  config: Config['webhook'],
  log: Logger,
  workflow: Workflow,
  reconciler: Reconciler
): express.Application {
  const app = express();
  app.use(express.json({ limit: '256kb' }));

  // ── Shared-secret verification ──────────────────────────────

  function verifySecret(req: express.Request, res: express.Response, next: express.NextFunction): void {
    if (!config.secret) {
      next();
      return;
    }

    if (!isValidSecret(req.get('x-webhook-secret'), config.secret)) {
      res.status(401).json({ error: 'Invalid or missing secret' });
      return;
    }

    next();
  }

  // ── Routes ─────────────────────────────────────────────────

  app.post('/webhook/tracker', verifySecret, (req, res) => {
    const parsed = webhookSchema.safeParse(req.body);
    const key = parsed.success ? extractIssueKey(parsed.data.key ?? parsed.data.issue?.key) : null;
    if (!key) {
      res.status(400).json({ error: 'Body must carry an issue key' });
      return;
    }

    log.debug(`Webhook received for ${key}`);

    // Respond immediately, reconcile async
    res.status(202).json({ received: true, key });

    reconciler.reconcileKeys([key]).catch((error) => {
      log.error(`Webhook reconciliation of ${key} failed: ${error instanceof Error ? error.message : String(error)}`);
    });
  });

  // ── Status & Health ─────────────────────────────────────

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/status', (req, res) => {
    const token = config.statusApiToken;
    if (!token) {
      res.status(403).json({ error: 'Status endpoint not configured' });
      return;
    }

    const auth = req.get('authorization');
    const presented = auth?.startsWith('Bearer ') ? auth.slice('Bearer '.length) : undefined;
    if (!isValidSecret(presented, token)) {
      res.status(403).json({ error: 'Invalid or missing token' });
      return;
    }

    res.json({ status: 'ok', timestamp: new Date().toISOString(), ...workflow.getStatus() });
  });

  return app;
}
