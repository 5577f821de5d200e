/**
 * Redaction helpers for logs, error envelopes and command echoes.
 *
 * Keys on the denylist are recursively masked before any data leaves
 * the process boundary (structured logs, CLI output). Known secrets,
 * such as the upload key passed on the command line, are masked
 * literally with `maskSecret` / `maskArg`.
 */

/** Default key patterns that must never appear in output. */
export const REDACT_DENYLIST_KEYS: readonly string[] = [
  'password',
  'secret',
  'token',
  'key',
  'authorization',
  'credential',
];

/** Regex patterns that match sensitive values regardless of key name. */
const REDACT_VALUE_PATTERNS: readonly RegExp[] = [
  /AKIA[0-9A-Z]{16}/,                    // AWS Access Key
  /-----BEGIN (?:RSA |EC )?PRIVATE KEY-----/,
  /ghp_[0-9a-zA-Z]{36}/,                 // GitHub PAT
];

const REDACTED = '[REDACTED]';

function keyMatchesDenylist(key: string): boolean {
  const lower = key.toLowerCase();
  return REDACT_DENYLIST_KEYS.some((dk) => lower.includes(dk));
}

function valueMatchesPattern(value: string): boolean {
  return REDACT_VALUE_PATTERNS.some((p) => p.test(value));
}

/**
 * Deep-redact a value: any key on the denylist is replaced with
 * `[REDACTED]`, any string matching a sensitive pattern is replaced
 * with `[REDACTED]`. Returns a new value (never mutates).
 */
export function redact(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;

  if (typeof obj === 'string') {
    return valueMatchesPattern(obj) ? REDACTED : obj;
  }

  if (typeof obj !== 'object') return obj;

  if (Array.isArray(obj)) {
    return obj.map((item: unknown) => redact(item));
  }

  return redactRecord(obj);
}

/** `redact` for a plain record, keeping its type. */
export function redactRecord(obj: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    out[key] = keyMatchesDenylist(key) ? REDACTED : redact(value);
  }
  return out;
}

/**
 * Redact a string by replacing inline secret patterns.
 */
export function redactString(input: string): string {
  let result = input;
  result = result.replace(/AKIA[0-9A-Z]{16}/g, REDACTED);
  result = result.replace(/-----BEGIN (?:RSA |EC )?PRIVATE KEY-----/g, REDACTED);
  result = result.replace(/ghp_[0-9a-zA-Z]{36}/g, REDACTED);
  result = result.replace(/[a-zA-Z0-9_]+_key\s*[:=]\s*['"]?[a-zA-Z0-9_-]{16,}['"]?/gi, REDACTED);
  result = result.replace(/[a-zA-Z0-9_]+_token\s*[:=]\s*['"]?[a-zA-Z0-9_-]{16,}['"]?/gi, REDACTED);
  return result;
}

/** Replace every literal occurrence of `secret` in `text`. */
export function maskSecret(text: string, secret: string, placeholder = REDACTED): string {
  if (secret === '') return text;
  return text.split(secret).join(placeholder);
}

/** Copy of `args` with the entry at `index` replaced. */
export function maskArg(args: readonly string[], index: number, placeholder = REDACTED): string[] {
  return args.map((arg, i) => (i === index ? placeholder : arg));
}
