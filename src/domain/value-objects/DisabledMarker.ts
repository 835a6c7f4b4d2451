/**
 * Inert-URL transformation for announce URLs
 *
 * A tracker is disabled by injecting a marker right after the scheme
 * delimiter (`https://tracker.example/announce` becomes
 * `https://disabled-tracker.example/announce`), which leaves the URL in the
 * tracker list but makes its host unresolvable.
 */

const SCHEME_DELIMITER = '://';

export const DEFAULT_MARKER_PREFIX = 'disabled-';

function markerOffset(url: string): number {
  const index = url.indexOf(SCHEME_DELIMITER);
  return index === -1 ? -1 : index + SCHEME_DELIMITER.length;
}

/**
 * Whether the URL carries the marker right after its scheme delimiter
 */
export function hasMarker(url: string, markerPrefix: string): boolean {
  const offset = markerOffset(url);
  return offset !== -1 && markerPrefix.length > 0 && url.startsWith(markerPrefix, offset);
}

/**
 * Injects the marker after the scheme delimiter. Idempotent; URLs without a
 * scheme delimiter are returned unchanged.
 */
export function markDisabled(url: string, markerPrefix: string): string {
  const offset = markerOffset(url);
  if (offset === -1 || hasMarker(url, markerPrefix)) {
    return url;
  }
  return url.slice(0, offset) + markerPrefix + url.slice(offset);
}

/**
 * Removes the marker after the scheme delimiter. Idempotent.
 */
export function markEnabled(url: string, markerPrefix: string): string {
  if (!hasMarker(url, markerPrefix)) {
    return url;
  }
  const offset = markerOffset(url);
  return url.slice(0, offset) + url.slice(offset + markerPrefix.length);
}
