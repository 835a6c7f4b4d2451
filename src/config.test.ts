import { describe, it, expect } from 'vitest';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    const config = loadConfig({});

    expect(config.PORT).toBe(8080);
    expect(config.TR_IP).toBe('localhost');
    expect(config.TR_PORT).toBe(9091);
    expect(config.TR_USERNAME).toBeUndefined();
    expect(config.CHECK_INTERVAL).toBe(60);
    expect(config.CONFIG_FILE).toBe('/data/config.json');
    expect(config.TARGET_TRACKERS).toEqual([]);
    expect(config.MARKER_PREFIX).toBe('disabled-');
    expect(config.DEBUG_MODE).toBe(false);
    expect(config.LOG_TO_FILE).toBe(true);
  });

  it('should parse environment values', () => {
    const config = loadConfig({
      TR_IP: 'transmission',
      TR_PORT: '9092',
      TR_USERNAME: 'admin',
      TR_PASSWORD: 'test-secret',
      CHECK_INTERVAL: '15',
      TARGET_TRACKERS: ' https://a.test ,, udp://b.test:80 ',
      DEBUG_MODE: 'T',
      LOG_TO_FILE: 'false'
    });

    expect(config.TR_IP).toBe('transmission');
    expect(config.TR_PORT).toBe(9092);
    expect(config.TR_USERNAME).toBe('admin');
    expect(config.TR_PASSWORD).toBe('test-secret');
    expect(config.CHECK_INTERVAL).toBe(15);
    expect(config.TARGET_TRACKERS).toEqual(['https://a.test', 'udp://b.test:80']);
    expect(config.DEBUG_MODE).toBe(true);
    expect(config.LOG_TO_FILE).toBe(false);
  });
});
