/**
 * Redaction rules for lineage extraction logs
 *
 * Audit records carry principal emails, service credentials travel through
 * client options, and query text can embed literal values. All of these are
 * masked before they reach a log line.
 *
 * SECURITY: Explicit path enumeration instead of wildcards so that new
 * fields are not exposed by accident.
 */

/**
 * Standard paths to redact in log objects
 */
export const REDACTION_PATHS: string[] = [
  // Authentication/credentials
  'password',
  'token',
  'accessToken',
  'access_token',
  'refreshToken',
  'refresh_token',
  'apiKey',
  'api_key',
  'secret',
  'clientSecret',
  'client_secret',
  'privateKey',
  'private_key',
  'credentials',
  'keyFilename',
  'authorization',

  // Client options handed to audit sources
  'clientOptions.credentials',
  'clientOptions.keyFilename',

  // Audit record identity
  'actorEmail',
  'principalEmail',
  'authenticationInfo.principalEmail',
  'protoPayload.authenticationInfo.principalEmail',

  // Full raw payloads retained in debug mode
  'payload',
  'event.payload',
];

/**
 * Create redaction censor function
 * Returns a masked value that indicates redaction occurred
 */
export function createCensor(_value: unknown, path: string[]): string {
  const fieldName = path[path.length - 1] ?? 'unknown';
  return `[REDACTED:${fieldName}]`;
}

/**
 * Patterns for runtime detection of sensitive values in string content
 */
export const SENSITIVE_PATTERNS = {
  // JWT tokens (Bearer tokens in logs)
  jwtToken: /\beyJ[A-Za-z0-9_-]*\.eyJ[A-Za-z0-9_-]*\.[A-Za-z0-9_-]*/g,

  // Bearer authorization values
  bearer: /Bearer\s+[A-Za-z0-9._~+/-]+=*/g,

  // Email addresses (principals, service accounts)
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,

  // Single-quoted SQL string literals, with '' and \' escapes
  singleQuotedLiteral: /'(?:[^'\\]|\\.|'')*'/g,

  // Double-quoted SQL string literals
  doubleQuotedLiteral: /"(?:[^"\\]|\\.)*"/g,
} as const;

/**
 * Redact sensitive patterns from a string value
 *
 * SECURITY: Tokens first, so an email-like fragment inside a token is not
 * partially matched.
 */
export function redactString(value: string): string {
  let result = value;

  result = result.replace(SENSITIVE_PATTERNS.jwtToken, '[REDACTED:token]');
  result = result.replace(SENSITIVE_PATTERNS.bearer, '[REDACTED:bearer]');
  result = result.replace(SENSITIVE_PATTERNS.email, '[REDACTED:email]');

  return result;
}

/**
 * Redact SQL text for logging
 * String literals are replaced by a placeholder; identifiers stay readable
 * so a failing statement can still be located.
 *
 * @example
 * redactSql("SELECT * FROM `p.d.t` WHERE email = 'a@b.co'")
 * // returns "SELECT * FROM `p.d.t` WHERE email = '?'"
 */
export function redactSql(sql: string): string {
  const withoutLiterals = sql
    .replace(SENSITIVE_PATTERNS.singleQuotedLiteral, "'?'")
    .replace(SENSITIVE_PATTERNS.doubleQuotedLiteral, '"?"');
  return redactString(withoutLiterals);
}

/**
 * Deep redact an object, applying redaction to all string values
 * Useful for sanitizing raw audit records before logging
 */
export function deepRedactObject<T>(obj: T): T {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    return redactString(obj) as T;
  }

  if (Array.isArray(obj)) {
    return obj.map((item: unknown) => deepRedactObject(item)) as T;
  }

  if (typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (shouldRedactPath(key)) {
        result[key] = `[REDACTED:${key}]`;
      } else {
        result[key] = deepRedactObject(value);
      }
    }
    return result as T;
  }

  return obj;
}

/**
 * Check if a path should be redacted
 */
export function shouldRedactPath(path: string): boolean {
  const normalizedPath = path.toLowerCase();
  return REDACTION_PATHS.some((redactPath) => {
    const normalizedRedact = redactPath.toLowerCase();
    // Exact match or ends with the field name
    return normalizedPath === normalizedRedact || normalizedPath.endsWith(`.${normalizedRedact}`);
  });
}
