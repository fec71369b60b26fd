import { isPlainObject } from './xml';

export const toText = (value: unknown): string => {
    if (value === undefined || value === null) return '';
    if (typeof value === 'string') return value;
    if (value instanceof Uint8Array) return Buffer.from(value).toString('utf-8');
    return String(value);
};

export const base64Encode = (value: unknown): string =>
    Buffer.from(toText(value), 'utf-8').toString('base64');

export const base64Decode = (value: unknown): string =>
    Buffer.from(toText(value), 'base64').toString('utf-8');

/**
 * Deep copy of the containers a field value can hold. Class instances
 * (timestamps, buffers) are immutable for our purposes and kept by reference.
 */
export function deepClone<T>(value: T): T;
export function deepClone(value: unknown): unknown {
    if (Array.isArray(value)) return value.map((v) => deepClone(v));
    if (isPlainObject(value)) {
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(value)) out[k] = deepClone(v);
        return out;
    }
    return value;
}

export function describeValue(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return `an array of ${value.length}`;
    if (isPlainObject(value)) return 'a plain object';
    if (typeof value === 'object') return `an instance of ${value.constructor.name}`;
    return `a ${typeof value}`;
}
