/**
 * Domain interfaces (ports) - exports all interfaces
 */

export * from './ILogger';
export * from './ITorrentClient';
export * from './ISettingsStore';
