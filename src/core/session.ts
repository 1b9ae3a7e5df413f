import type { Context } from './context.js';
import type { SessionIdentity } from './errors.js';

export type { SessionIdentity } from './errors.js';

export interface Session {
  readonly identity: SessionIdentity;
  readonly context: Context;
  readonly createdAt: number;
  readonly lastActive: number;
}

/**
 * Sessions are keyed by the pair, so 'a:b'/'c' and 'a'/'b:c' never collide.
 */
export function sessionKey(identity: SessionIdentity): string {
  return JSON.stringify([identity.userId, identity.conversationId]);
}
