/**
 * Runtime settings editable through the HTTP API
 */

export interface ServiceSettings {
  enabled: boolean;
  targetTrackers: string[];
}
