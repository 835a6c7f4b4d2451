/**
 * JSON-file implementation of ISettingsStore
 * Lets the web interface change settings without restarting the service
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { ServiceSettings } from '../../domain/entities';
import { ISettingsStore } from '../../domain/interfaces';

export const settingsFileSchema = z.object({
  enabled: z.boolean(),
  target_trackers: z.array(z.string())
});

export type SettingsFile = z.infer<typeof settingsFileSchema>;

export function toSettingsFile(settings: ServiceSettings): SettingsFile {
  return { enabled: settings.enabled, target_trackers: [...settings.targetTrackers] };
}

export class JsonSettingsStore implements ISettingsStore {
  constructor(
    private filePath: string,
    private defaultTargetTrackers: readonly string[] = []
  ) { }

  async load(): Promise<ServiceSettings> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        const defaults: ServiceSettings = { enabled: true, targetTrackers: [...this.defaultTargetTrackers] };
        await this.save(defaults);
        return defaults;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Settings file ${this.filePath} is not valid JSON`, { cause: error });
    }

    const parsed = settingsFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`Settings file ${this.filePath} is invalid: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ')}`);
    }
    return { enabled: parsed.data.enabled, targetTrackers: parsed.data.target_trackers };
  }

  async save(settings: ServiceSettings): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(toSettingsFile(settings), null, 2));
  }
}
