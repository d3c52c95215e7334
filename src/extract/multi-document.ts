/**
 * Multi-document YAML splitting for manifest responses.
 *
 * The manifests prompt asks for several Kubernetes objects separated by
 * `---`. splitMultiDocument() cuts the response on that separator and
 * files each fragment under its lower-cased `kind`. Kind detection is a
 * heuristic: a YAML parse first, then a literal substring search for
 * fragments the parse cannot classify.
 */

import * as yaml from 'js-yaml';

/** Document separator. Split on literally, wherever it occurs. */
export const DOCUMENT_SEPARATOR = '---';

/** Literal markers searched when a fragment's kind cannot be parsed, in priority order. */
export const FALLBACK_KIND_MARKERS: ReadonlyArray<readonly [marker: string, kind: string]> = [
  ['Deployment', 'deployment'],
  ['Service', 'service'],
  ['Ingress', 'ingress'],
];

/** Marks a fragment whose kind must come from marker search. */
const UNPARSED = Symbol('unparsed');

export interface SplitOptions {
  /**
   * Called for every non-empty fragment that is left out of the result:
   * one that parses without a `kind`, or one that fails to parse and
   * carries none of the markers.
   */
  onDrop?: (fragment: string, index: number) => void;
}

/**
 * Split a multi-document response into a kind → fragment mapping.
 *
 * - Empty and whitespace-only fragments are skipped.
 * - Fragments are stored trimmed.
 * - A fragment that parses as YAML is filed under its string `kind`.
 *   One that parses to anything without a `kind` key is dropped.
 * - Marker search runs only for fragments that fail to parse, or whose
 *   `kind` is not a string.
 * - A later fragment with the same kind replaces an earlier one.
 *
 * Never throws for any input.
 */
export function splitMultiDocument(response: string, options: SplitOptions = {}): Record<string, string> {
  const manifests = new Map<string, string>();
  const fragments = response.split(DOCUMENT_SEPARATOR);

  fragments.forEach((raw, index) => {
    const fragment = raw.trim();
    if (!fragment) return;

    const parsed = parseKind(fragment);
    const kind = parsed === UNPARSED ? markerKind(fragment) : parsed;
    if (kind === undefined) {
      options.onDrop?.(fragment, index);
      return;
    }
    manifests.set(kind, fragment);
  });

  return Object.fromEntries(manifests);
}

/**
 * Lower-cased `kind` of a fragment, undefined when it parses without one,
 * or UNPARSED when it does not parse or its `kind` is not a string.
 */
function parseKind(fragment: string): string | undefined | typeof UNPARSED {
  let doc: unknown;
  try {
    doc = yaml.load(fragment);
  } catch {
    return UNPARSED;
  }

  if (typeof doc !== 'object' || doc === null || Array.isArray(doc)) return undefined;
  if (!Object.prototype.hasOwnProperty.call(doc, 'kind')) return undefined;
  const kind: unknown = Reflect.get(doc, 'kind');
  if (typeof kind !== 'string') return UNPARSED;
  const normalized = kind.trim().toLowerCase();
  // an empty kind would be written as ".yaml"
  return normalized === '' ? undefined : normalized;
}

function markerKind(fragment: string): string | undefined {
  const hit = FALLBACK_KIND_MARKERS.find(([marker]) => fragment.includes(marker));
  return hit?.[1];
}
