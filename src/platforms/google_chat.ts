import { z } from 'zod';

export const GoogleChatEvent = z
  .object({
    type: z.string(),
    message: z
      .object({
        text: z.string().optional(),
        argumentText: z.string().optional(),
      })
      .passthrough()
      .optional(),
    user: z.object({ name: z.string().optional() }).passthrough().optional(),
    space: z.object({ name: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();
export type GoogleChatEventT = z.infer<typeof GoogleChatEvent>;

export const GOOGLE_CHAT_WELCOME = 'Thank you for adding me!';

export interface GoogleChatRequest {
  readonly userId: string;
  readonly conversationId: string;
  readonly text: string;
}

/**
 * `argumentText` is the message without the bot @-mention; direct messages
 * may only carry `text`.
 */
export function extractChatRequest(event: GoogleChatEventT): GoogleChatRequest | null {
  if (event.type !== 'MESSAGE') return null;
  const text = event.message?.argumentText?.trim() || event.message?.text?.trim() || '';
  const userId = event.user?.name;
  if (!text || !userId) return null;
  return {
    userId,
    conversationId: event.space?.name ?? userId,
    text,
  };
}
