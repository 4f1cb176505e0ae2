import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { describeError, toHttpError } from '../lib/errors.js';
import type { Credentials, Mentor } from '../lib/mentor.js';

// Credentials are compared exactly as sent: no trimming.
const credentialsSchema = z.object({
  username: z.string().min(1, 'Username is required.').max(100),
  password: z.string().min(1, 'Password is required.').max(200),
});

const chatSchema = credentialsSchema.extend({
  message: z
    .string({ required_error: 'Message is required.' })
    .trim()
    .min(1, 'Message is required.')
    .max(5000, 'Message too long. Keep it under 5000 characters.'),
  // Clients send "" or null before the first turn. Any id the store does not
  // know, for this user, starts a new session rather than failing the request.
  sessionId: z
    .string()
    .nullish()
    .transform((id) => id?.trim() || undefined),
});

const startSessionSchema = credentialsSchema.extend({
  role: z.string().trim().min(1, 'Role is required.').max(100),
  learningGoal: z.string().trim().min(1).max(500).optional(),
  skills: z.array(z.string().trim().min(1).max(100)).max(20).optional(),
  difficulty: z.string().trim().min(1).max(50).optional(),
});

const topicSchema = credentialsSchema.extend({
  topic: z.string().trim().min(1, 'Topic is required.').max(200),
});

/** Credentials from an `Authorization: Basic ...` header. */
export function parseBasicAuth(header: string | undefined): Credentials | undefined {
  if (!header) return undefined;
  const match = /^Basic\s+(\S+)$/i.exec(header);
  if (!match) return undefined;

  const decoded = Buffer.from(match[1], 'base64').toString('utf-8');
  const colon = decoded.indexOf(':');
  if (colon <= 0) return undefined;
  return { username: decoded.slice(0, colon), password: decoded.slice(colon + 1) };
}

function badRequest(res: Response, error: z.ZodError) {
  return res.status(400).json({ error: error.issues[0]?.message ?? 'Invalid request.' });
}

function fail(res: Response, context: string, error: unknown) {
  console.error(`${context} error:`, describeError(error));
  const { status, body } = toHttpError(error);
  return res.status(status).json(body);
}

function requireBasicAuth(req: Request, res: Response): Credentials | undefined {
  const credentials = parseBasicAuth(req.headers.authorization);
  if (!credentials) {
    res.setHeader('WWW-Authenticate', 'Basic realm="mentor"');
    res.status(401).json({ error: 'Login failed.' });
  }
  return credentials;
}

export function createMentorRouter(mentor: Mentor, roles: string[]): Router {
  const router = Router();

  /**
   * POST /api/login
   * Body: { username, password }
   */
  router.post('/login', async (req: Request, res: Response) => {
    const parsed = credentialsSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(res, parsed.error);

    try {
      const user = await mentor.login(parsed.data);
      res.json({ user });
    } catch (error: unknown) {
      fail(res, 'Login', error);
    }
  });

  /**
   * POST /api/chat
   * Send a message and get the mentor's reply.
   *
   * Body: { username, password, message, sessionId? }
   * Response: { reply, sessionId }
   */
  router.post('/chat', async (req: Request, res: Response) => {
    const parsed = chatSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(res, parsed.error);

    try {
      const result = await mentor.handle(parsed.data);
      res.json(result);
    } catch (error: unknown) {
      fail(res, 'Chat', error);
    }
  });

  /**
   * POST /api/sessions
   * Save learning preferences and start a new session.
   *
   * Body: { username, password, role, learningGoal?, skills?, difficulty? }
   * Response: { sessionId, title, intro, topics, currentTopic, suggestions }
   */
  router.post('/sessions', async (req: Request, res: Response) => {
    const parsed = startSessionSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(res, parsed.error);

    const { username, password, ...preferences } = parsed.data;
    try {
      const session = await mentor.startSession({ username, password }, preferences);
      res.status(201).json(session);
    } catch (error: unknown) {
      fail(res, 'Start session', error);
    }
  });

  /**
   * GET /api/sessions
   * List the caller's sessions, newest first. Basic auth.
   */
  router.get('/sessions', async (req: Request, res: Response) => {
    const credentials = requireBasicAuth(req, res);
    if (!credentials) return;

    try {
      const sessions = await mentor.listSessions(credentials);
      res.json({ sessions });
    } catch (error: unknown) {
      fail(res, 'List sessions', error);
    }
  });

  /**
   * GET /api/sessions/:id/messages
   * Full history of one of the caller's sessions. Basic auth.
   */
  router.get('/sessions/:id/messages', async (req: Request, res: Response) => {
    const credentials = requireBasicAuth(req, res);
    if (!credentials) return;

    try {
      const transcript = await mentor.transcript(credentials, req.params.id);
      res.json(transcript);
    } catch (error: unknown) {
      fail(res, 'Transcript', error);
    }
  });

  /**
   * POST /api/topic-prompts
   * Suggested starter questions for a topic.
   *
   * Body: { username, password, topic }
   */
  router.post('/topic-prompts', async (req: Request, res: Response) => {
    const parsed = topicSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(res, parsed.error);

    const { topic, ...credentials } = parsed.data;
    try {
      const prompts = await mentor.suggestPrompts(credentials, topic);
      res.json({ prompts });
    } catch (error: unknown) {
      fail(res, 'Topic prompts', error);
    }
  });

  /**
   * GET /api/roles
   * Mentoring personas the prompt configuration knows about.
   */
  router.get('/roles', (_req: Request, res: Response) => {
    res.json({ roles });
  });

  return router;
}
