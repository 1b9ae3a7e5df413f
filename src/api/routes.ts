import type { Request, Response, Router } from 'express';
import express from 'express';
import type pino from 'pino';
import { z } from 'zod';
import type { Dispatcher } from '../core/dispatcher.js';
import { GOOGLE_CHAT_WELCOME, GoogleChatEvent, extractChatRequest } from '../platforms/google_chat.js';
import {
  LINE_SIGNATURE_HEADER,
  LineWebhookBody,
  extractTextRequests,
  verifyLineSignature,
  type LineMessenger,
  type LineTextRequest,
} from '../platforms/line.js';

export const GENERIC_FAILURE_MESSAGE = 'Sorry, I could not complete your request. Please try again.';

export const ChatInput = z.object({
  userId: z.string().min(1).max(128),
  conversationId: z.string().min(1).max(128).optional(),
  message: z.string().min(1).max(2000),
});

export interface LineRouteDeps {
  readonly channelSecret: string;
  readonly messenger: LineMessenger;
}

export interface RouterDeps {
  readonly dispatcher: Dispatcher;
  readonly log: pino.Logger;
  /** Omitted when LINE credentials are not configured. */
  readonly line?: LineRouteDeps;
}

/**
 * Aborts when the client goes away before the response is written, so an
 * abandoned turn stops generating and saves nothing.
 */
function requestSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort(new Error('client_disconnected'));
  });
  return controller.signal;
}

/**
 * Replies go out through the push API, so delivery runs after the webhook is
 * acknowledged and does not depend on LINE keeping the connection open.
 */
async function deliverLineReplies(
  requests: readonly LineTextRequest[],
  dispatcher: Dispatcher,
  messenger: LineMessenger,
  log: pino.Logger,
): Promise<void> {
  for (const request of requests) {
    let reply: string;
    try {
      reply = await dispatcher.handle(request.userId, request.conversationId, request.text);
    } catch (err: unknown) {
      log.error({ err }, 'line dispatch failed');
      reply = GENERIC_FAILURE_MESSAGE;
    }
    try {
      await messenger.push(request.conversationId, reply);
    } catch (err: unknown) {
      log.error({ err }, 'line push failed');
    }
  }
}

export const router = ({ dispatcher, log, line }: RouterDeps): Router => {
  const r = express.Router();

  r.post('/chat', express.json({ limit: '64kb' }), async (req: Request, res: Response) => {
    const parsed = ChatInput.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    const { userId, message } = parsed.data;
    const conversationId = parsed.data.conversationId ?? userId;
    try {
      const reply = await dispatcher.handle(userId, conversationId, message, { signal: requestSignal(res) });
      return res.json({ reply });
    } catch (err: unknown) {
      log.error({ err }, 'chat failed');
      return res.status(502).json({ error: 'dispatch_failed', message: GENERIC_FAILURE_MESSAGE });
    }
  });

  r.post('/google-chat-webhook', express.json({ limit: '256kb' }), async (req: Request, res: Response) => {
    const parsed = GoogleChatEvent.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'invalid_event' });
    }
    const request = extractChatRequest(parsed.data);
    if (!request) {
      return res.json({ text: GOOGLE_CHAT_WELCOME });
    }
    try {
      const text = await dispatcher.handle(request.userId, request.conversationId, request.text, {
        signal: requestSignal(res),
      });
      return res.json({ text });
    } catch (err: unknown) {
      log.error({ err }, 'google chat dispatch failed');
      return res.json({ text: GENERIC_FAILURE_MESSAGE });
    }
  });

  r.post('/line-webhook', express.raw({ type: '*/*', limit: '1mb' }), (req: Request, res: Response) => {
    if (!line) {
      return res.status(503).json({ error: 'line_not_configured' });
    }
    const signature = req.get(LINE_SIGNATURE_HEADER);
    if (!signature) {
      return res.status(400).json({ error: 'missing_signature' });
    }
    const raw: unknown = req.body;
    const body = Buffer.isBuffer(raw) ? raw : Buffer.alloc(0);
    if (!verifyLineSignature(body, signature, line.channelSecret)) {
      return res.status(400).json({ error: 'invalid_signature' });
    }

    let json: unknown;
    try {
      json = JSON.parse(body.toString('utf-8'));
    } catch {
      return res.status(400).json({ error: 'invalid_body' });
    }
    const parsed = LineWebhookBody.safeParse(json);
    if (!parsed.success) {
      return res.status(400).json({ error: 'invalid_body' });
    }

    const requests = extractTextRequests(parsed.data);
    res.status(200).send('OK');
    deliverLineReplies(requests, dispatcher, line.messenger, log).catch((err: unknown) => {
      log.error({ err }, 'line delivery failed');
    });
  });

  return r;
};
