import { HARDWARE_DEFAULTS } from '../constants';
import { CodecErrorFactory, type FieldErrorContext } from '../errors';
import type { FieldKind } from '../types';
import { describeValue, toText } from '../utils';
import { isPlainObject, leafText, rawElement, textElement } from '../xml';
import { StringKind } from './scalar';
import { fieldFactory } from './field';

/**
 * Detached view of a nested value. Keys that were never set read as undefined.
 */
export type TextRecord = { [key: string]: string | undefined };

export type VideoValue = TextRecord & {
    mediaId?: string;
    title?: string;
    description?: string;
};

export type MusicValue = TextRecord & {
    thumbMediaId?: string;
    title?: string;
    description?: string;
    musicUrl?: string;
    hqMusicUrl?: string;
};

export type HardwareValue = TextRecord & {
    view?: string;
    action?: string;
};

type Part = {
    key: string;
    tag: string;
    /** Emitted even when unset */
    always?: boolean;
};

function nodeEntries(node: unknown, ctx: FieldErrorContext): Record<string, unknown> {
    if (isPlainObject(node)) return node;
    if (node === '' || node === undefined || node === null) return {};
    throw CodecErrorFactory.decode(ctx, `expected nested elements, found ${describeValue(node)}`);
}

// ============================================================================
// SINGLE NESTED IDENTIFIER
// ============================================================================

/** `<Wire><Inner>text</Inner></Wire>` holding one string */
function wrappedTextKind(name: string, innerTag: string): FieldKind<string> {
    return {
        name,
        read: StringKind.read,
        decode: (node, ctx) => {
            const inner = nodeEntries(node, ctx)[innerTag];
            if (inner === undefined) return undefined;
            const text = leafText(inner);
            if (text === undefined) {
                if (isPlainObject(inner) && Object.keys(inner).length === 0) return '';
                throw CodecErrorFactory.decode(ctx, `<${innerTag}> must be text`);
            }
            return text;
        },
        encode: (value, ctx) => rawElement(ctx.wireName, textElement(innerTag, toText(value))),
    };
}

export const ImageKind = wrappedTextKind('Image', 'MediaId');
export const VoiceKind = wrappedTextKind('Voice', 'MediaId');
export const TaskCardKind = wrappedTextKind('TaskCard', 'ReplaceName');

// ============================================================================
// NESTED RECORDS
// ============================================================================

function readRecord(raw: unknown, ctx: FieldErrorContext): TextRecord | undefined {
    if (raw === undefined || raw === null) return undefined;
    if (!isPlainObject(raw)) {
        throw CodecErrorFactory.value(ctx, `expected a mapping, found ${describeValue(raw)}`);
    }
    const view: TextRecord = {};
    for (const [key, v] of Object.entries(raw)) {
        if (v !== undefined && v !== null) view[key] = toText(v);
    }
    return view;
}

/**
 * `<Wire><Tag1>…</Tag1><Tag2>…</Tag2></Wire>` with sub-elements in `parts` order.
 * Unset optional parts are left out entirely.
 */
function recordKind(
    name: string,
    parts: readonly Part[],
    fallback?: () => TextRecord,
): FieldKind<TextRecord> {
    return {
        name,
        read: readRecord,
        decode: (node, ctx) => {
            const entries = nodeEntries(node, ctx);
            const view: TextRecord = {};
            for (const part of parts) {
                if (!(part.tag in entries)) continue;
                const inner = entries[part.tag];
                const text = leafText(inner);
                if (text === undefined) {
                    if (isPlainObject(inner) && Object.keys(inner).length === 0) {
                        view[part.key] = '';
                        continue;
                    }
                    throw CodecErrorFactory.decode(ctx, `<${part.tag}> must be text`);
                }
                view[part.key] = text;
            }
            return view;
        },
        encode: (value, ctx) => {
            let view = readRecord(value, ctx) ?? {};
            if (fallback && Object.keys(view).length === 0) view = fallback();
            const inner = parts
                .filter((p) => p.always || view[p.key] !== undefined)
                .map((p) => textElement(p.tag, view[p.key] ?? ''))
                .join('');
            return rawElement(ctx.wireName, inner);
        },
    };
}

export const VideoKind: FieldKind<VideoValue> = recordKind('Video', [
    { key: 'mediaId', tag: 'MediaId', always: true },
    { key: 'title', tag: 'Title' },
    { key: 'description', tag: 'Description' },
]);

export const MusicKind: FieldKind<MusicValue> = recordKind('Music', [
    { key: 'thumbMediaId', tag: 'ThumbMediaId', always: true },
    { key: 'title', tag: 'Title' },
    { key: 'description', tag: 'Description' },
    { key: 'musicUrl', tag: 'MusicUrl' },
    { key: 'hqMusicUrl', tag: 'HQMusicUrl' },
]);

/** Rendered with the built-in view/action when nothing was set */
export const HardwareKind: FieldKind<HardwareValue> = recordKind(
    'Hardware',
    [
        { key: 'view', tag: 'MessageView', always: true },
        { key: 'action', tag: 'MessageAction', always: true },
    ],
    () => ({ view: HARDWARE_DEFAULTS.view, action: HARDWARE_DEFAULTS.action }),
);

export const imageField = fieldFactory(ImageKind);
export const voiceField = fieldFactory(VoiceKind);
export const taskCardField = fieldFactory(TaskCardKind);
export const videoField = fieldFactory(VideoKind);
export const musicField = fieldFactory(MusicKind);
export const hardwareField = fieldFactory(HardwareKind);
