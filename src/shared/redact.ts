import { createHash } from 'node:crypto';

// Patterns that indicate secret values (never log these)
const SECRET_PATTERNS = [
  /bearer\s+\S+/gi,
  /authorization:\s*\S+/gi,
  /xi-api-key['":\s]+['"]?\S+['"]?/gi,
  /token['":\s]+['"]?[A-Za-z0-9_\-./]{20,}['"]?/gi,
  /secret['":\s]+['"]?[A-Za-z0-9_\-./]{8,}['"]?/gi,
  /key['":\s]+['"]?[A-Za-z0-9_\-./]{16,}['"]?/gi,
];

const SECRET_KEYS = /^(token|access_token|secret|password|api_?key|apikey|authorization|bearer)$/i;

/**
 * Redact potential secret values from a string for safe logging.
 */
export function redact(input: string): string {
  let output = input;
  for (const pattern of SECRET_PATTERNS) {
    output = output.replace(pattern, '[REDACTED]');
  }
  return output;
}

/**
 * SHA-256 hash of a canonical JSON representation (object keys sorted at every level).
 */
export function jsonHash(obj: unknown): string {
  return createHash('sha256').update(canonicalJson(obj)).digest('hex');
}

function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

/**
 * Stringify for display, replacing values under secret-looking keys.
 */
export function safeStringify(obj: unknown, space?: number): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(
    obj,
    (key, value: unknown) => {
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) return '[Circular]';
        seen.add(value);
      }
      if (typeof value === 'string' && SECRET_KEYS.test(key)) {
        return '[REDACTED]';
      }
      return value;
    },
    space,
  );
}
