/**
 * Patterns that might contain secrets
 */
const SECRET_PATTERNS = [
  // API keys
  /\b(sk-[a-zA-Z0-9_\-]{8,})/g,
  /api[_-]?key[_-]?[=:]\s*['"]?([a-zA-Z0-9_\-]{8,})['"]?/gi,
  /bearer\s+([a-zA-Z0-9_\-\.]{8,})/gi,

  // Fernet tokens
  /\b(gAAAAA[a-zA-Z0-9_\-]{40,}={0,2})/g,

  // Generic secret patterns
  /secret[_-]?[=:]\s*['"]?([^'"\s]{8,})['"]?/gi,
  /password[_-]?[=:]\s*['"]?([^'"\s]{8,})['"]?/gi,
];

const REDACTED = '[REDACTED]';

/**
 * Redact potential secrets from diagnostic text.
 * Any value in `known` is removed verbatim before the patterns run.
 */
export function redactSecrets(text: string, known: string[] = []): string {
  let redacted = text;

  for (const secret of known) {
    if (secret) {
      redacted = redacted.split(secret).join(REDACTED);
    }
  }

  for (const pattern of SECRET_PATTERNS) {
    redacted = redacted.replace(pattern, (match: string, secret: string) =>
      secret === REDACTED ? match : match.replace(secret, REDACTED)
    );
  }

  return redacted;
}
