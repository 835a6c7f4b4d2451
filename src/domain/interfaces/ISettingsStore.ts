/**
 * Persistence port for the runtime settings edited over HTTP
 */

import { ServiceSettings } from '../entities';

export interface ISettingsStore {
  /**
   * Loads settings, creating the backing store with defaults when missing
   */
  load(): Promise<ServiceSettings>;

  save(settings: ServiceSettings): Promise<void>;
}
