import { markEnabled } from '../value-objects/DisabledMarker';

/**
 * Whether an announce URL belongs to one of the configured target prefixes.
 * The marker is stripped first so disabled trackers still match.
 * Matching is a plain case-sensitive prefix test, no URL normalization.
 */
export function isTargeted(announceUrl: string, markerPrefix: string, targetPrefixes: readonly string[]): boolean {
  const cleanUrl = markEnabled(announceUrl, markerPrefix);
  return targetPrefixes.some((prefix) => cleanUrl.startsWith(prefix));
}
