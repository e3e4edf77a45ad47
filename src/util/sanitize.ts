/** Secret name patterns that trigger redaction (case-insensitive suffix match) */
export const SECRET_PATTERNS: RegExp[] = [
  /KEY$/i,
  /TOKEN$/i,
  /SECRET$/i,
  /PASSWORD$/i,
  /CREDENTIAL$/i,
];

/** Default cap in bytes for text written by reporters */
export const MAX_OUTPUT_BYTES = 50 * 1024;

/** Cap for a verification log passed to the fixer as a single argument */
export const MAX_PROMPT_BYTES = 100 * 1024;

/**
 * Redact secrets from output.
 * 1. By name: env vars whose names match SECRET_PATTERNS → [REDACTED:<NAME>]
 * 2. By value: any env value ≥8 chars → [REDACTED]
 * Longer values are redacted first to handle overlapping matches.
 */
export function redact(output: string, env: Record<string, string>): string {
  let result = output;

  // Collect entries sorted by value length descending (longer match wins)
  const entries = Object.entries(env)
    .filter(([, v]) => v.length >= 8)
    .sort((a, b) => b[1].length - a[1].length);

  for (const [name, value] of entries) {
    const isSecretName = SECRET_PATTERNS.some((p) => p.test(name));
    const replacement = isSecretName ? `[REDACTED:${name}]` : "[REDACTED]";
    // Escape regex special chars in value
    const escaped = value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    result = result.replace(new RegExp(escaped, "g"), replacement);
  }

  return result;
}

function isContinuationByte(byte: number | undefined): boolean {
  return byte !== undefined && (byte & 0xc0) === 0x80;
}

/**
 * Truncate output to maxBytes, appending "[truncated]" if exceeded. The cut
 * never splits a UTF-8 sequence.
 */
export function truncate(output: string, maxBytes: number): string {
  const buf = Buffer.from(output, "utf-8");
  if (buf.length <= maxBytes) return output;
  let end = maxBytes;
  while (end > 0 && isContinuationByte(buf[end])) end--;
  return buf.subarray(0, end).toString("utf-8") + "\n[truncated]";
}

/** Keep only the defined env entries whose names look like secrets */
export function pickSecrets(
  env: Record<string, string | undefined>,
): Record<string, string> {
  const secrets: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (value === undefined) continue;
    if (SECRET_PATTERNS.some((p) => p.test(name))) secrets[name] = value;
  }
  return secrets;
}
