/**
 * Unit tests for the disabled-marker transformation
 */

import { describe, it, expect } from 'vitest';
import { hasMarker, markDisabled, markEnabled } from './DisabledMarker';

const MARKER = 'disabled-';

describe('DisabledMarker', () => {
    it('should inject the marker right after the scheme delimiter', () => {
        expect(markDisabled('https://tracker.example.test/announce?passkey=abc', MARKER))
            .toBe('https://disabled-tracker.example.test/announce?passkey=abc');
        expect(markDisabled('udp://open.example.test:6969/announce', MARKER))
            .toBe('udp://disabled-open.example.test:6969/announce');
    });

    it('should be idempotent when disabling', () => {
        const once = markDisabled('https://tracker.example.test/announce', MARKER);
        expect(markDisabled(once, MARKER)).toBe(once);
    });

    it('should restore the original URL when enabling', () => {
        const urls = [
            'https://tracker.example.test/announce',
            'http://tracker.example.test:8080/a/b?c=d',
            'udp://open.example.test:1337'
        ];
        for (const url of urls) {
            expect(markEnabled(markDisabled(url, MARKER), MARKER)).toBe(url);
        }
    });

    it('should leave unmarked URLs untouched when enabling', () => {
        expect(markEnabled('https://tracker.example.test/announce', MARKER))
            .toBe('https://tracker.example.test/announce');
    });

    it('should leave strings without a scheme untouched', () => {
        expect(markDisabled('tracker.example.test/announce', MARKER)).toBe('tracker.example.test/announce');
        expect(hasMarker('disabled-tracker.example.test', MARKER)).toBe(false);
    });

    it('should only look at the first scheme delimiter', () => {
        const url = 'https://tracker.example.test/announce?next=http://other.test';
        expect(markDisabled(url, MARKER))
            .toBe('https://disabled-tracker.example.test/announce?next=http://other.test');
    });

    it('should detect the marker', () => {
        expect(hasMarker('https://disabled-tracker.example.test/announce', MARKER)).toBe(true);
        expect(hasMarker('https://tracker.example.test/disabled-announce', MARKER)).toBe(false);
    });
});
