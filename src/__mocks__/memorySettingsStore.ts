/**
 * In-memory ISettingsStore for tests
 */

import { ServiceSettings } from '../domain/entities';
import { ISettingsStore } from '../domain/interfaces';

export class MemorySettingsStore implements ISettingsStore {
    saves = 0;
    failOnLoad: Error | null = null;

    constructor(private settings: ServiceSettings = { enabled: true, targetTrackers: [] }) { }

    async load(): Promise<ServiceSettings> {
        if (this.failOnLoad) throw this.failOnLoad;
        return { ...this.settings, targetTrackers: [...this.settings.targetTrackers] };
    }

    async save(settings: ServiceSettings): Promise<void> {
        this.saves++;
        this.settings = { ...settings, targetTrackers: [...settings.targetTrackers] };
    }
}
