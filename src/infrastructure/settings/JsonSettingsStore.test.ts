import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { JsonSettingsStore } from './JsonSettingsStore';

describe('JsonSettingsStore', () => {
    let dir: string;
    let filePath: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tracker-toggler-settings-'));
        filePath = path.join(dir, 'nested', 'config.json');
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should create the file with defaults when missing', async () => {
        const store = new JsonSettingsStore(filePath, ['https://tracker.private.test']);

        const settings = await store.load();

        expect(settings).toEqual({ enabled: true, targetTrackers: ['https://tracker.private.test'] });
        expect(fs.readFileSync(filePath, 'utf8')).toBe(
            '{\n  "enabled": true,\n  "target_trackers": [\n    "https://tracker.private.test"\n  ]\n}'
        );
    });

    it('should round-trip saved settings', async () => {
        const store = new JsonSettingsStore(filePath);

        await store.save({ enabled: false, targetTrackers: ['udp://a.test:80', 'https://b.test'] });

        expect(await store.load()).toEqual({ enabled: false, targetTrackers: ['udp://a.test:80', 'https://b.test'] });
    });

    it('should reject a file with the wrong shape', async () => {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, JSON.stringify({ enabled: 'yes', target_trackers: [] }));
        const store = new JsonSettingsStore(filePath);

        await expect(store.load()).rejects.toThrow(`Settings file ${filePath} is invalid: enabled: Expected boolean, received string`);
    });

    it('should reject a file that is not JSON', async () => {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, '{ not json');
        const store = new JsonSettingsStore(filePath);

        await expect(store.load()).rejects.toThrow(`Settings file ${filePath} is not valid JSON`);
    });
});
