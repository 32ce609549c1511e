// packages/transform/src/redact.ts

export const DEFAULT_SENSITIVE_FIELDS = [
  "password",
  "token_secret",
  "internal_flag",
  "secret_key",
  "private_key",
  "api_key",
  "auth_token",
  "session_id",
];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep copy of `value` with every object key in `fields` removed.
 * Keys are compared case-insensitively.
 */
export function redactSensitiveFields(
  value: unknown,
  fields: Iterable<string> = DEFAULT_SENSITIVE_FIELDS
): unknown {
  const lowered = new Set([...fields].map((f) => f.toLowerCase()));

  const walk = (node: unknown): unknown => {
    if (Array.isArray(node)) return node.map(walk);
    if (!isPlainObject(node)) return node;

    const out: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(node)) {
      if (lowered.has(key.toLowerCase())) continue;
      out[key] = walk(child);
    }
    return out;
  };

  return walk(value);
}

export function isJsonContentType(contentType: string | undefined): boolean {
  if (!contentType) return false;
  const mime = contentType.split(";")[0].trim().toLowerCase();
  return mime === "application/json" || mime.endsWith("+json");
}

/**
 * Redact a JSON response body. Bodies that are not JSON, or do not parse,
 * pass through untouched.
 */
export function sanitizeJsonBody(
  body: Buffer,
  contentType: string | undefined,
  fields: Iterable<string> = DEFAULT_SENSITIVE_FIELDS
): Buffer {
  if (!isJsonContentType(contentType) || body.length === 0) return body;

  let parsed: unknown;
  try {
    parsed = JSON.parse(body.toString("utf8"));
  } catch {
    return body;
  }
  return Buffer.from(JSON.stringify(redactSensitiveFields(parsed, fields)), "utf8");
}
