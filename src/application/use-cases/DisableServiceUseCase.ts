/**
 * Use case behind the web interface's "disable" button:
 * restores every tracker, then turns the service off
 */

import { ILogger } from '../../domain/interfaces';
import { ServiceSettings } from '../../domain/entities';
import { DisabledSetTracker } from '../../domain/services';
import { ReenableAllTrackersResponse, ReenableAllTrackersUseCase } from './ReenableAllTrackersUseCase';
import { UpdateSettingsUseCase } from './UpdateSettingsUseCase';

export interface DisableServiceRequest {
    disabledSet: DisabledSetTracker;
}

export interface DisableServiceResponse {
    success: boolean;
    settings?: ServiceSettings;
    reenable: ReenableAllTrackersResponse;
    error?: string;
}

export class DisableServiceUseCase {
    constructor(
        private reenableAllTrackersUseCase: ReenableAllTrackersUseCase,
        private updateSettingsUseCase: UpdateSettingsUseCase,
        private logger: ILogger
    ) { }

    async execute(request: DisableServiceRequest): Promise<DisableServiceResponse> {
        this.logger.info('Disabling service and re-enabling all trackers.');

        const reenable = await this.reenableAllTrackersUseCase.execute({ disabledSet: request.disabledSet });
        if (reenable.status !== 'completed') {
            return { success: false, reenable, error: reenable.error ?? 'Global re-enabling did not complete' };
        }

        const update = await this.updateSettingsUseCase.execute({ enabled: false });
        if (!update.success) {
            return { success: false, reenable, error: update.error };
        }
        return { success: true, settings: update.settings, reenable };
    }
}
