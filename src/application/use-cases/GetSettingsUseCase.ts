/**
 * Use case for reading the runtime settings
 */

import { ISettingsStore } from '../../domain/interfaces';
import { ServiceSettings } from '../../domain/entities';

export interface GetSettingsResponse {
    success: boolean;
    settings?: ServiceSettings;
    error?: string;
}

export class GetSettingsUseCase {
    constructor(
        private settingsStore: ISettingsStore
    ) { }

    async execute(): Promise<GetSettingsResponse> {
        try {
            return { success: true, settings: await this.settingsStore.load() };
        } catch (error) {
            return { success: false, error: error instanceof Error ? error.message : 'Unknown error' };
        }
    }
}
