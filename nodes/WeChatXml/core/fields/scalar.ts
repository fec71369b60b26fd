import { CodecErrorFactory, type FieldErrorContext } from '../errors';
import { ZonedTimestamp } from '../time';
import type { FieldKind } from '../types';
import { base64Decode, base64Encode, describeValue, toText } from '../utils';
import { isPlainObject, leafText, rawElement, textElement } from '../xml';
import { fieldFactory } from './field';

const INTEGER_RX = /^[+-]?\d+$/;
const FLOAT_RX = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const isEmpty = (raw: unknown): boolean =>
    raw === undefined || raw === null || (typeof raw === 'string' && raw.trim() === '');

/** Decode a text leaf through the kind's own converter, reporting as a decode failure */
function decodeLeaf<V>(node: unknown, ctx: FieldErrorContext, convert: (raw: unknown, ctx: FieldErrorContext) => V | undefined): V | undefined {
    const text = leafText(node);
    if (text === undefined) {
        if (isPlainObject(node) && Object.keys(node).length === 0) return undefined;
        throw CodecErrorFactory.decode(ctx, `expected text, found ${describeValue(node)}`);
    }
    try {
        return convert(text, ctx);
    } catch (error) {
        throw CodecErrorFactory.asDecode(error, ctx);
    }
}

// ============================================================================
// TEXT
// ============================================================================

function readText(raw: unknown, ctx: FieldErrorContext): string | undefined {
    if (raw === undefined || raw === null) return undefined;
    if (typeof raw === 'object' && !(raw instanceof Uint8Array)) {
        throw CodecErrorFactory.value(ctx, `expected text, found ${describeValue(raw)}`);
    }
    return toText(raw);
}

function decodeText(node: unknown, ctx: FieldErrorContext): string | undefined {
    const text = leafText(node);
    if (text !== undefined) return text;
    if (isPlainObject(node) && Object.keys(node).length === 0) return '';
    throw CodecErrorFactory.decode(ctx, `expected text, found ${describeValue(node)}`);
}

export const StringKind: FieldKind<string> = {
    name: 'String',
    read: readText,
    decode: decodeText,
    encode: (value, ctx) => textElement(ctx.wireName, toText(value)),
};

/**
 * Text stored as-is, read back base64-encoded. The conversion runs on every
 * read, so writing a read value back and reading again encodes twice.
 */
export const Base64EncodeKind: FieldKind<string> = {
    name: 'Base64Encode',
    read: (raw, ctx) => {
        const text = readText(raw, ctx);
        return text ? base64Encode(text) : text;
    },
    decode: decodeText,
    encode: (value, ctx) => textElement(ctx.wireName, toText(value)),
};

/** Base64 text stored as-is, read back decoded. Same per-read caveat as Base64EncodeKind. */
export const Base64DecodeKind: FieldKind<string> = {
    name: 'Base64Decode',
    read: (raw, ctx) => {
        const text = readText(raw, ctx);
        return text ? base64Decode(text) : text;
    },
    decode: decodeText,
    encode: (value, ctx) => textElement(ctx.wireName, toText(value)),
};

// ============================================================================
// NUMBERS
// ============================================================================

function numberKind(name: string, pattern: RegExp, normalize: (n: number) => number): FieldKind<number> {
    const read = (raw: unknown, ctx: FieldErrorContext): number | undefined => {
        if (isEmpty(raw)) return undefined;
        if (typeof raw === 'number') {
            if (!Number.isFinite(raw)) throw CodecErrorFactory.value(ctx, `${raw} is not a finite number`);
            return normalize(raw);
        }
        if (typeof raw === 'string' && pattern.test(raw.trim())) return normalize(Number(raw.trim()));
        const shown = typeof raw === 'string' ? `"${raw}"` : describeValue(raw);
        throw CodecErrorFactory.value(ctx, `${shown} is not a valid ${name.toLowerCase()}`);
    };

    return {
        name,
        read,
        decode: (node, ctx) => decodeLeaf(node, ctx, read),
        encode: (value, ctx) => {
            const n = read(value ?? ctx.defaultValue, ctx);
            return rawElement(ctx.wireName, n === undefined ? '' : String(n));
        },
    };
}

export const IntegerKind = numberKind('Integer', INTEGER_RX, Math.trunc);
export const FloatKind = numberKind('Float', FLOAT_RX, (n) => n);

function readId(raw: unknown, ctx: FieldErrorContext): number | bigint | undefined {
    if (isEmpty(raw)) return undefined;
    if (typeof raw === 'bigint') return raw;
    if (typeof raw === 'string' && INTEGER_RX.test(raw.trim())) {
        const digits = raw.trim().replace(/^\+/, '');
        const n = Number(digits);
        return Number.isSafeInteger(n) ? n : BigInt(digits);
    }
    return IntegerKind.read(raw, ctx);
}

/**
 * 64-bit identifiers such as MsgId: a number while it is exact, a bigint
 * past Number.MAX_SAFE_INTEGER.
 */
export const IdKind: FieldKind<number | bigint> = {
    name: 'Id',
    read: readId,
    decode: (node, ctx) => decodeLeaf(node, ctx, readId),
    encode: (value, ctx) => {
        const id = readId(value ?? ctx.defaultValue, ctx);
        return rawElement(ctx.wireName, id === undefined ? '' : String(id));
    },
};

// ============================================================================
// DATETIME
// ============================================================================

function readDateTime(raw: unknown, ctx: FieldErrorContext): ZonedTimestamp | undefined {
    if (isEmpty(raw)) return undefined;
    if (raw instanceof ZonedTimestamp) return raw;
    if (raw instanceof Date) {
        if (Number.isNaN(raw.getTime())) throw CodecErrorFactory.value(ctx, 'invalid Date');
        return ZonedTimestamp.fromDate(raw);
    }
    const epoch = IntegerKind.read(raw, ctx);
    return epoch === undefined ? undefined : new ZonedTimestamp(epoch);
}

/** Epoch seconds on the wire, a ZonedTimestamp in the default zone in memory */
export const DateTimeKind: FieldKind<ZonedTimestamp> = {
    name: 'DateTime',
    read: readDateTime,
    decode: (node, ctx) => decodeLeaf(node, ctx, readDateTime),
    encode: (value, ctx) => {
        const ts = readDateTime(value ?? ctx.defaultValue, ctx);
        return rawElement(ctx.wireName, ts === undefined ? '' : String(ts.epochSeconds));
    },
};

export const stringField = fieldFactory(StringKind);
export const integerField = fieldFactory(IntegerKind);
export const floatField = fieldFactory(FloatKind);
export const idField = fieldFactory(IdKind);
export const dateTimeField = fieldFactory(DateTimeKind);
export const base64EncodeField = fieldFactory(Base64EncodeKind);
export const base64DecodeField = fieldFactory(Base64DecodeKind);
