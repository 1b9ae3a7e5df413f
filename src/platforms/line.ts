import { createHmac, timingSafeEqual } from 'node:crypto';
import type { Logger } from 'pino';
import { fetch, type Dispatcher as HttpDispatcher } from 'undici';
import { z } from 'zod';
import type { LineConfig } from '../config/app.js';

export const LINE_SIGNATURE_HEADER = 'x-line-signature';

/** LINE rejects text messages longer than this. */
export const LINE_TEXT_LIMIT = 5000;

const LineSource = z.object({
  type: z.string(),
  userId: z.string().optional(),
  groupId: z.string().optional(),
  roomId: z.string().optional(),
});

const LineEvent = z
  .object({
    type: z.string(),
    replyToken: z.string().optional(),
    source: LineSource.optional(),
    message: z
      .object({
        type: z.string(),
        text: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const LineWebhookBody = z.object({
  destination: z.string().optional(),
  events: z.array(LineEvent),
});
export type LineWebhookBodyT = z.infer<typeof LineWebhookBody>;

export interface LineTextRequest {
  readonly userId: string;
  readonly conversationId: string;
  readonly text: string;
}

export function computeLineSignature(body: string | Buffer, channelSecret: string): string {
  return createHmac('sha256', channelSecret).update(body).digest('base64');
}

export function verifyLineSignature(body: string | Buffer, signature: string, channelSecret: string): boolean {
  const expected = Buffer.from(computeLineSignature(body, channelSecret));
  const actual = Buffer.from(signature);
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}

/**
 * Text message events with a known sender. Group and room chats share one
 * conversation per group/room; 1:1 chats use the user id as the conversation.
 */
export function extractTextRequests(body: LineWebhookBodyT): LineTextRequest[] {
  const requests: LineTextRequest[] = [];
  for (const event of body.events) {
    if (event.type !== 'message' || event.message?.type !== 'text') continue;
    const text = event.message.text?.trim();
    const userId = event.source?.userId;
    if (!text || !userId) continue;
    requests.push({
      userId,
      conversationId: event.source?.groupId ?? event.source?.roomId ?? userId,
      text,
    });
  }
  return requests;
}

/** Cuts by code point so an emoji is never split into a lone surrogate. */
export function truncateText(text: string, limit: number = LINE_TEXT_LIMIT): string {
  const chars = Array.from(text);
  return chars.length <= limit ? text : chars.slice(0, limit).join('');
}

export interface LineMessenger {
  push(to: string, text: string): Promise<void>;
}

export class LineApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'LineApiError';
  }
}

export function createLineMessenger(
  config: LineConfig,
  deps: { dispatcher?: HttpDispatcher; log?: Logger } = {},
): LineMessenger {
  const url = `${config.apiBaseUrl.replace(/\/$/, '')}/v2/bot/message/push`;

  return {
    async push(to: string, text: string): Promise<void> {
      const res = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${config.channelAccessToken}`,
        },
        body: JSON.stringify({
          to,
          messages: [{ type: 'text', text: truncateText(text) }],
        }),
        dispatcher: deps.dispatcher,
      });
      if (!res.ok) {
        const body = await res.text().catch(() => '');
        deps.log?.debug({ status: res.status }, 'line:push_failed');
        throw new LineApiError(res.status, `LINE push failed (${res.status}): ${body.slice(0, 200)}`);
      }
      // Drain the body so the connection can be reused.
      await res.text();
    },
  };
}
