/**
 * Redaction utilities for logs. Masks credentials and chat-platform user
 * identifiers. Redaction is disabled when LOG_LEVEL=debug to aid local debugging.
 */

function scrubString(input: string): string {
  let out = input;
  // Bearer tokens in headers or error text
  out = out.replace(/\bBearer\s+[A-Za-z0-9._~+/=-]+/g, 'Bearer [REDACTED]');
  // API keys passed as query params
  out = out.replace(/([?&](?:key|api_key|access_token)=)[^&\s]+/gi, '$1[REDACTED]');
  // LINE user/group/room ids: U, C or R followed by 32 hex chars
  out = out.replace(/\b[UCR][0-9a-f]{32}\b/g, '[REDACTED_LINE_ID]');
  // Google Chat resource names
  out = out.replace(/\busers\/[A-Za-z0-9]+/g, 'users/[REDACTED]');
  return out;
}

function scrubDeep(value: unknown, seen = new WeakSet<object>()): unknown {
  if (typeof value === 'string') return scrubString(value);
  if (typeof value !== 'object' || value === null) return value;
  // Errors keep their type for pino's err serializer; its output is scrubbed separately.
  if (value instanceof Error) return value;
  if (seen.has(value)) return value;
  seen.add(value);
  if (Array.isArray(value)) {
    return value.map((v) => scrubDeep(v, seen));
  }
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = scrubDeep(v, seen);
  }
  return out;
}

/**
 * Scrub identifiers and secrets from a log argument.
 */
export function scrubPII(arg: unknown, enabled: boolean): unknown {
  if (!enabled) return arg;
  return scrubDeep(arg);
}

/**
 * Scrub every value of a log record, keeping the record shape.
 */
export function scrubRecord(record: Record<string, unknown>, enabled: boolean): Record<string, unknown> {
  if (!enabled) return record;
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(record)) {
    out[k] = scrubDeep(v);
  }
  return out;
}
