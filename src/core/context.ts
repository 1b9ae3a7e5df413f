/**
 * Accumulated key/value state threaded through one pipeline run.
 */
export type Context = Readonly<Record<string, string>>;

export function copyContext(context: Context): Record<string, string> {
  return { ...context };
}

export function withEntry(context: Context, key: string, value: string): Context {
  return { ...context, [key]: value };
}

export function hasKey(context: Context, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(context, key);
}
