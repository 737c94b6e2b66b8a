/**
 * Tag helpers.
 *
 * A tag such as `VERB_SING₁` is a lexicon key (`VERB_SING`) followed by an
 * optional link marker (`₁`) that ties a good-sequence position to the
 * matching bad-sequence position.
 */

export const DEFAULT_LINK_MARKERS: readonly string[] = [
  '₁',
  '₂',
  '₃',
  '₄',
  '₅',
  '₆',
  '₇',
  '₈',
  '₉',
];

/**
 * Returns the link marker at the end of `tag`, or null when there is none.
 *
 * @example
 * ```typescript
 * linkMarker('VERB_PL₂'); // '₂'
 * linkMarker('NOUN');     // null
 * ```
 */
export function linkMarker(
  tag: string,
  markers: readonly string[] = DEFAULT_LINK_MARKERS
): string | null {
  // Markers may sit outside the BMP, so compare on code points
  const chars = Array.from(tag);
  const last = chars[chars.length - 1];
  if (last === undefined) return null;
  return markers.includes(last) ? last : null;
}

/**
 * Strips a trailing link marker, leaving the lexicon lookup key.
 *
 * @example
 * ```typescript
 * baseTag('VERB_SING₁'); // 'VERB_SING'
 * baseTag('DET');        // 'DET'
 * ```
 */
export function baseTag(
  tag: string,
  markers: readonly string[] = DEFAULT_LINK_MARKERS
): string {
  const marker = linkMarker(tag, markers);
  return marker === null ? tag : tag.slice(0, tag.length - marker.length);
}

/**
 * Splits a whitespace-separated tag sequence into tags.
 */
export function splitTags(sequence: string): string[] {
  return sequence.split(/\s+/).filter(tag => tag.length > 0);
}
