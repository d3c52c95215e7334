/**
 * Code-fence extraction for model responses.
 *
 * Models are asked to return bare file contents but often wrap them in
 * markdown fences, sometimes with prose around them. extractFenced()
 * recovers the body of the first fence found, trying an ordered list of
 * patterns, and otherwise hands back the whole response trimmed.
 */

// ─── Pattern Lists ──────────────────────────────────────────────────────────

/** Generic fence with no language tag on its own line. */
const GENERIC_FENCE = /```\n([\s\S]*?)\n```/;

/** Terraform / HCL, falling back to a bare inline fence. */
export const TERRAFORM_FENCES: readonly RegExp[] = [
  /```(?:terraform|hcl)?\n([\s\S]*?)\n```/,
  GENERIC_FENCE,
  /```([\s\S]*?)```/,
];

/** YAML documents (workflows). */
export const YAML_FENCES: readonly RegExp[] = [
  /```(?:yaml|yml)?\n([\s\S]*?)\n```/,
  GENERIC_FENCE,
];

/** Dockerfiles. */
export const DOCKERFILE_FENCES: readonly RegExp[] = [
  /```(?:dockerfile|docker)?\n([\s\S]*?)\n```/,
  GENERIC_FENCE,
];

/** Shell scripts. */
export const SHELL_FENCES: readonly RegExp[] = [
  /```(?:bash|sh|shell)?\n([\s\S]*?)\n```/,
  GENERIC_FENCE,
];

// ─── Extraction ─────────────────────────────────────────────────────────────

/**
 * Return the first captured group of the first pattern that matches,
 * trimmed. When no pattern matches, the trimmed input is returned; the
 * caller cannot tell the two outcomes apart.
 *
 * Patterns are tried in the given order. A pattern without a capture
 * group yields its whole match.
 */
export function extractFenced(response: string, patterns: readonly RegExp[]): string {
  for (const pattern of patterns) {
    const match = firstMatch(response, pattern);
    if (match) {
      return (match[1] ?? match[0]).trim();
    }
  }

  return response.trim();
}

/**
 * RegExp#exec on a global or sticky pattern depends on lastIndex, so the
 * search runs on a copy with those flags removed.
 */
function firstMatch(text: string, pattern: RegExp): RegExpExecArray | null {
  const flags = pattern.flags.replace(/[gy]/g, '');
  const regex = flags === pattern.flags ? pattern : new RegExp(pattern.source, flags);
  return regex.exec(text);
}
