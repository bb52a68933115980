/**
 * Collaborative Specification Chat Routes
 *
 * POST   /api/chat/sessions                     - Start a session (welcome message)
 * GET    /api/chat/sessions/:id                 - Session state and offered actions
 * DELETE /api/chat/sessions/:id                 - Drop a session
 * POST   /api/chat/sessions/:id/messages        - Send a user message
 * POST   /api/chat/sessions/:id/actions         - Click an offered action
 * PUT    /api/chat/sessions/:id/settings        - Update org URL, PAT, code agent
 * GET    /api/chat/sessions/:id/files/:fileId   - Download an exported file
 */

import express, { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { CollaborativeSpecService } from '../services/spec/CollaborativeSpecService';
import { describeSession } from '../services/spec/ProjectSession';
import { SessionStore } from '../services/spec/SessionStore';
import { ChatMessage, ChatSession } from '../types/chat';
import { ApiResponse } from '../utils/ApiResponse';

const SettingsSchema = z.object({
  orgUrl: z.string().trim().optional(),
  pat: z.string().trim().optional(),
  codeAgent: z.enum(['claude-code', 'codex']).optional(),
});

const MessageSchema = z.object({
  text: z.string().trim().min(1, 'text is required'),
});

const ActionSchema = z.object({
  name: z.string().min(1, 'name is required'),
});

function validationDetails(error: z.ZodError) {
  return error.errors.map((issue) => ({ field: issue.path.join('.'), message: issue.message }));
}

function turnResult(session: ChatSession, messages: ChatMessage[]) {
  return { session: describeSession(session), messages };
}

export function createChatRouter(store: SessionStore, chat: CollaborativeSpecService): Router {
  const router = Router();
  router.use(express.json({ limit: '1mb' }));

  /**
   * Resolves :id or answers 404.
   */
  function findSession(req: Request, res: Response): ChatSession | undefined {
    const session = store.get(req.params.id);
    if (!session) {
      ApiResponse.notFound(res, 'Session');
    }
    return session;
  }

  router.post('/sessions', (req: Request, res: Response) => {
    const settings = SettingsSchema.safeParse(req.body ?? {});
    if (!settings.success) {
      ApiResponse.badRequest(res, 'Invalid settings', validationDetails(settings.error));
      return;
    }

    const session = store.create(settings.data);
    ApiResponse.created(res, turnResult(session, [chat.welcome()]));
  });

  router.get('/sessions/:id', (req: Request, res: Response) => {
    const session = findSession(req, res);
    if (session) {
      ApiResponse.success(res, describeSession(session));
    }
  });

  router.delete('/sessions/:id', (req: Request, res: Response) => {
    if (!store.delete(req.params.id)) {
      ApiResponse.notFound(res, 'Session');
      return;
    }
    ApiResponse.noContent(res);
  });

  router.post('/sessions/:id/messages', async (req: Request, res: Response, next: NextFunction) => {
    const session = findSession(req, res);
    if (!session) return;

    const body = MessageSchema.safeParse(req.body);
    if (!body.success) {
      ApiResponse.badRequest(res, 'Invalid message', validationDetails(body.error));
      return;
    }

    try {
      const messages = await chat.handleMessage(session, body.data.text);
      ApiResponse.success(res, turnResult(session, messages));
    } catch (error) {
      next(error);
    }
  });

  router.post('/sessions/:id/actions', async (req: Request, res: Response, next: NextFunction) => {
    const session = findSession(req, res);
    if (!session) return;

    const body = ActionSchema.safeParse(req.body);
    if (!body.success) {
      ApiResponse.badRequest(res, 'Invalid action', validationDetails(body.error));
      return;
    }

    try {
      const messages = await chat.handleAction(session, body.data.name);
      ApiResponse.success(res, turnResult(session, messages));
    } catch (error) {
      next(error);
    }
  });

  router.put('/sessions/:id/settings', (req: Request, res: Response) => {
    const session = findSession(req, res);
    if (!session) return;

    const body = SettingsSchema.safeParse(req.body ?? {});
    if (!body.success) {
      ApiResponse.badRequest(res, 'Invalid settings', validationDetails(body.error));
      return;
    }

    const { orgUrl, pat, codeAgent } = body.data;
    if (orgUrl !== undefined) session.settings.orgUrl = orgUrl;
    if (pat !== undefined) session.settings.pat = pat;
    if (codeAgent !== undefined) session.settings.codeAgent = codeAgent;

    ApiResponse.success(res, describeSession(session), 'Settings updated');
  });

  router.get('/sessions/:id/files/:fileId', (req: Request, res: Response) => {
    const session = findSession(req, res);
    if (!session) return;

    const file = session.files.get(req.params.fileId);
    if (!file) {
      ApiResponse.notFound(res, 'File');
      return;
    }

    res.status(200).type(file.mimeType).attachment(file.name).send(file.content);
  });

  return router;
}
