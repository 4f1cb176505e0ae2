import express from 'express';
import cors from 'cors';
import compression from 'compression';
import { createMentorRouter } from './routes/mentor.js';
import type { Mentor } from './lib/mentor.js';

export interface AppOptions {
  mentor: Mentor;
  roles: string[];
  /** Reachability probe for GET /api/status. */
  checkLlm: () => Promise<{ ok: boolean; error?: string }>;
}

export function createApp({ mentor, roles, checkLlm }: AppOptions): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(compression());
  app.use(express.json());

  app.use('/api', createMentorRouter(mentor, roles));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * GET /api/status
   * Check system status including LLM connectivity.
   */
  app.get('/api/status', async (_req, res) => {
    const llm = await checkLlm();
    res.json({
      status: 'ok',
      llm,
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}
