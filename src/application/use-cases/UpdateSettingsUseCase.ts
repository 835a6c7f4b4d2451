/**
 * Use case for partially updating the runtime settings
 */

import { ISettingsStore, ILogger } from '../../domain/interfaces';
import { ServiceSettings } from '../../domain/entities';

export interface UpdateSettingsRequest {
    enabled?: boolean;
    targetTrackers?: string[];
}

export interface UpdateSettingsResponse {
    success: boolean;
    settings?: ServiceSettings;
    error?: string;
}

export class UpdateSettingsUseCase {
    constructor(
        private settingsStore: ISettingsStore,
        private logger: ILogger
    ) { }

    async execute(request: UpdateSettingsRequest): Promise<UpdateSettingsResponse> {
        try {
            const current = await this.settingsStore.load();
            const settings: ServiceSettings = {
                enabled: request.enabled ?? current.enabled,
                targetTrackers: request.targetTrackers ?? current.targetTrackers
            };
            await this.settingsStore.save(settings);

            this.logger.info(
                `Settings saved: service ${settings.enabled ? 'enabled' : 'disabled'}, ` +
                `${settings.targetTrackers.length} target tracker(s)`
            );
            return { success: true, settings };
        } catch (error) {
            this.logger.error('Error in UpdateSettingsUseCase:', error);
            return { success: false, error: error instanceof Error ? error.message : 'Unknown error' };
        }
    }
}
