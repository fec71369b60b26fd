import { describe, it, expect } from 'vitest';
import { ZonedTimestamp } from '../../nodes/WeChatXml/core';

describe('ZonedTimestamp', () => {
    it('defaults to China Standard Time', () => {
        const ts = new ZonedTimestamp(0);
        expect(ts.timeZone).toBe('Asia/Shanghai');
        expect(ts.offsetMinutes).toBe(480);
        expect(ts.toISOString()).toBe('1970-01-01T08:00:00+08:00');
        expect(JSON.stringify({ ts })).toBe('{"ts":"1970-01-01T08:00:00+08:00"}');
    });

    it('formats other zones with their own offset', () => {
        expect(new ZonedTimestamp(0, 'UTC').toISOString()).toBe('1970-01-01T00:00:00+00:00');
        expect(new ZonedTimestamp(0, 'America/New_York').toISOString()).toBe('1969-12-31T19:00:00-05:00');
    });

    it('truncates to whole seconds', () => {
        expect(new ZonedTimestamp(1.9).epochSeconds).toBe(1);
        expect(ZonedTimestamp.fromDate(new Date(2_999)).epochSeconds).toBe(2);
        expect(new ZonedTimestamp(3).toDate().getTime()).toBe(3_000);
    });

    it('rejects non-finite seconds and unknown zones', () => {
        expect(() => new ZonedTimestamp(Number.NaN)).toThrow(RangeError);
        expect(() => new ZonedTimestamp(0, 'Not/AZone')).toThrow(RangeError);
    });

    it('compares instant and zone', () => {
        expect(new ZonedTimestamp(5).equals(new ZonedTimestamp(5))).toBe(true);
        expect(new ZonedTimestamp(5).equals(new ZonedTimestamp(5, 'UTC'))).toBe(false);
    });
});
