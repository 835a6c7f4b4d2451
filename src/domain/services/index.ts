export * from './TrackerUrlMatcher';
export * from './TierRebuilder';
export * from './DisabledSetTracker';
export * from './TrackerDecisionEngine';
export * from './GlobalReenabler';
