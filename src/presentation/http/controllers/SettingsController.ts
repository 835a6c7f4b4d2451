import { Request, Response } from 'express';
import { z } from 'zod';
import { TrackerMonitor } from '../../../application/TrackerMonitor';
import { toSettingsFile } from '../../../infrastructure/settings/JsonSettingsStore';

const updateSettingsBodySchema = z.object({
    enabled: z.boolean().optional(),
    target_trackers: z
        .array(z.union([z.string(), z.number(), z.boolean()]))
        .transform((items) => items.map((item) => String(item).trim()).filter((item) => item.length > 0))
        .optional()
});

/**
 * Controller for the settings edited from the web interface
 */
export class SettingsController {
    constructor(
        private monitor: TrackerMonitor
    ) { }

    /**
     * Handles GET /api/config
     */
    async get(_req: Request, res: Response): Promise<void> {
        const result = await this.monitor.getSettings();

        if (!result.success || !result.settings) {
            res.status(500).json({ error: result.error || 'Failed to load settings' });
            return;
        }

        res.json(toSettingsFile(result.settings));
    }

    /**
     * Handles POST /api/config
     * Accepts a partial update of `enabled` and `target_trackers`
     */
    async update(req: Request, res: Response): Promise<void> {
        const body = updateSettingsBodySchema.safeParse(req.body);

        if (!body.success) {
            res.status(400).json({
                error: body.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join(', ')
            });
            return;
        }

        const result = await this.monitor.updateSettings({
            enabled: body.data.enabled,
            targetTrackers: body.data.target_trackers
        });

        if (!result.success || !result.settings) {
            res.status(500).json({ error: result.error || 'Failed to save settings' });
            return;
        }

        res.json(toSettingsFile(result.settings));
    }
}
