import { DEFAULT_TIME_ZONE } from './constants';

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
    let fmt = formatters.get(timeZone);
    if (!fmt) {
        fmt = new Intl.DateTimeFormat('en-US', {
            timeZone,
            hourCycle: 'h23',
            year: 'numeric',
            month: '2-digit',
            day: '2-digit',
            hour: '2-digit',
            minute: '2-digit',
            second: '2-digit',
        });
        formatters.set(timeZone, fmt);
    }
    return fmt;
}

const pad = (n: number, width = 2) => String(Math.abs(n)).padStart(width, '0');

/**
 * An instant at whole-second precision, viewed in a named IANA zone.
 */
export class ZonedTimestamp {
    readonly epochSeconds: number;
    readonly timeZone: string;

    constructor(epochSeconds: number, timeZone: string = DEFAULT_TIME_ZONE) {
        if (!Number.isFinite(epochSeconds)) {
            throw new RangeError(`Invalid epoch seconds: ${epochSeconds}`);
        }
        this.epochSeconds = Math.trunc(epochSeconds);
        this.timeZone = timeZone;
        // Throws RangeError for an unknown zone
        formatterFor(timeZone);
    }

    static fromDate(date: Date, timeZone: string = DEFAULT_TIME_ZONE): ZonedTimestamp {
        return new ZonedTimestamp(Math.floor(date.getTime() / 1000), timeZone);
    }

    static now(timeZone: string = DEFAULT_TIME_ZONE): ZonedTimestamp {
        return ZonedTimestamp.fromDate(new Date(), timeZone);
    }

    toDate(): Date {
        return new Date(this.epochSeconds * 1000);
    }

    /** Wall-clock fields in this zone */
    wallClock(): { year: number; month: number; day: number; hour: number; minute: number; second: number } {
        const parts = formatterFor(this.timeZone).formatToParts(this.toDate());
        const get = (type: Intl.DateTimeFormatPartTypes): number => {
            const part = parts.find((p) => p.type === type);
            return part ? Number(part.value) : 0;
        };
        return {
            year: get('year'),
            month: get('month'),
            day: get('day'),
            hour: get('hour'),
            minute: get('minute'),
            second: get('second'),
        };
    }

    /** Offset from UTC in minutes, e.g. 480 for Asia/Shanghai */
    get offsetMinutes(): number {
        const w = this.wallClock();
        const wallAsUtc = Date.UTC(w.year, w.month - 1, w.day, w.hour, w.minute, w.second) / 1000;
        return Math.round((wallAsUtc - this.epochSeconds) / 60);
    }

    /** ISO-8601 with the zone's offset, e.g. 1970-01-01T08:00:00+08:00 */
    toISOString(): string {
        const w = this.wallClock();
        const offset = this.offsetMinutes;
        const sign = offset < 0 ? '-' : '+';
        const date = `${pad(w.year, 4)}-${pad(w.month)}-${pad(w.day)}`;
        const time = `${pad(w.hour)}:${pad(w.minute)}:${pad(w.second)}`;
        return `${date}T${time}${sign}${pad(Math.trunc(offset / 60))}:${pad(offset % 60)}`;
    }

    toJSON(): string {
        return this.toISOString();
    }

    toString(): string {
        return this.toISOString();
    }

    equals(other: ZonedTimestamp): boolean {
        return this.epochSeconds === other.epochSeconds && this.timeZone === other.timeZone;
    }
}

export const nowSeconds = (): number => Math.floor(Date.now() / 1000);
