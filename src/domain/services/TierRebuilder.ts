/**
 * Rebuilds a torrent's tier-ordered tracker list after per-tracker marker changes
 * The result is submitted as a full tracker-list replacement
 */

import { TrackerEntity } from '../entities';
import { markDisabled, markEnabled } from '../value-objects/DisabledMarker';

export type TrackerAction = 'keep' | 'disable' | 'enable';

export type TrackerDecision = (tracker: TrackerEntity) => TrackerAction;

export function isValidTier(tier: number | null): tier is number {
  return tier !== null && Number.isInteger(tier) && tier >= 0;
}

/**
 * True when the list can be rebuilt: at least one tracker, every tier known
 */
export function hasRebuildableTiers(trackers: readonly TrackerEntity[]): boolean {
  return trackers.length > 0 && trackers.every((tracker) => isValidTier(tracker.tier));
}

function applyAction(url: string, action: TrackerAction, markerPrefix: string): string {
  switch (action) {
    case 'disable':
      return markDisabled(url, markerPrefix);
    case 'enable':
      return markEnabled(url, markerPrefix);
    case 'keep':
      return url;
  }
}

/**
 * Groups the (possibly re-marked) URLs by their original tier and returns the
 * tiers in ascending order, each keeping the original within-tier order.
 * @throws Error when a tracker has no valid tier
 */
export function rebuildTiers(
  trackers: readonly TrackerEntity[],
  decision: TrackerDecision,
  markerPrefix: string
): string[][] {
  const tiers = new Map<number, string[]>();

  for (const tracker of trackers) {
    const { tier } = tracker;
    if (!isValidTier(tier)) {
      throw new Error(`Cannot rebuild tracker list: invalid tier for ${tracker.announce}`);
    }
    const url = applyAction(tracker.announce, decision(tracker), markerPrefix);
    const group = tiers.get(tier);
    if (group) {
      group.push(url);
    } else {
      tiers.set(tier, [url]);
    }
  }

  return [...tiers.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, urls]) => urls);
}
