const REDACTED = '***';

function shouldRedactKey(key: string): boolean {
  const k = key.toLowerCase();

  // Short keys should match exactly to reduce false positives.
  if (k === 'pass' || k === 'pwd') return true;

  return (
    k.includes('password') ||
    k.includes('secret') ||
    k.includes('token') ||
    k.includes('cookie') ||
    k.includes('session_id') ||
    k.includes('session-id') ||
    k === 'authorization'
  );
}

export function redactJsonSecrets(input: unknown): unknown {
  if (Array.isArray(input)) return input.map((v) => redactJsonSecrets(v));
  if (!input || typeof input !== 'object') return input;

  const out: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(input)) {
    out[key] = shouldRedactKey(key) ? REDACTED : redactJsonSecrets(value);
  }

  return out;
}
