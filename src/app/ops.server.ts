import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import { metricsRegistry } from '../metrics/agents.metrics';
import { logger } from '../utils/logger';
import type { RuntimeHealth } from './composition-root';

/** What the operations endpoints need from the running agents. */
export interface OpsTarget {
  health(): RuntimeHealth;
  requestErrorAnalysis(studentId: string, studentName?: string): Promise<boolean>;
}

const analysisRequestSchema = z
  .object({
    studentName: z.string().max(200).optional(),
  })
  .strict();

const studentIdSchema = z.string().trim().min(1).max(64);

export function createOpsApp(target: OpsTarget): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '16kb' }));

  app.get('/health', (_req, res) => {
    const health = target.health();
    res.status(health.status === 'ok' ? 200 : 503).json(health);
  });

  app.get('/metrics', async (_req, res, next) => {
    try {
      res.set('Content-Type', metricsRegistry.contentType);
      res.end(await metricsRegistry.metrics());
    } catch (err) {
      next(err);
    }
  });

  app.post('/students/:studentId/analysis', async (req, res, next) => {
    const studentId = studentIdSchema.safeParse(req.params.studentId);
    const body = analysisRequestSchema.safeParse(req.body ?? {});
    if (!studentId.success || !body.success) {
      const issues = [
        ...(studentId.success ? [] : studentId.error.issues),
        ...(body.success ? [] : body.error.issues),
      ].map((i) => `${i.path.join('.') || 'studentId'}: ${i.message}`);
      res.status(400).json({ error: 'invalid_request', issues });
      return;
    }
    try {
      const sent = await target.requestErrorAnalysis(studentId.data, body.data.studentName);
      if (!sent) {
        res.status(503).json({ error: 'dispatch_failed' });
        return;
      }
      res.status(202).json({ requested: true });
    } catch (err) {
      next(err);
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'not_found' });
  });

  // express identifies error handlers by arity
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('ops-request-failed', err);
    const status = err instanceof SyntaxError ? 400 : 500;
    res.status(status).json({ error: status === 400 ? 'invalid_json' : 'internal_error' });
  });

  return app;
}
