import { Request, Response } from 'express';
import { TrackerMonitor } from '../../../application/TrackerMonitor';
import { toSettingsFile } from '../../../infrastructure/settings/JsonSettingsStore';

/**
 * Controller for administrative tracker actions and service status
 */
export class TrackerController {
    constructor(
        private monitor: TrackerMonitor
    ) { }

    /**
     * Handles POST /api/disable_and_reenable
     * Restores every tracker, then turns the service off
     */
    async disableAndReenable(_req: Request, res: Response): Promise<void> {
        const result = await this.monitor.disableAndReenable();

        if (result.success && result.settings) {
            res.json(toSettingsFile(result.settings));
            return;
        }

        res.status(result.reenable.status === 'completed' ? 500 : 502).json({
            error: result.error || 'Failed to disable service'
        });
    }

    /**
     * Handles POST /api/reenable_all
     * Restores every tracker without changing the settings
     */
    async reenableAll(_req: Request, res: Response): Promise<void> {
        const result = await this.monitor.reenableAll();

        res.status(result.status === 'completed' ? 200 : 502).json(result);
    }

    /**
     * Handles GET /api/status
     */
    status(_req: Request, res: Response): void {
        res.json(this.monitor.status());
    }
}
