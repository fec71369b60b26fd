import { describe, it, expect } from 'vitest';
import {
    ArticlesKind,
    ArticlesLimitError,
    Base64DecodeKind,
    Base64EncodeKind,
    DateTimeKind,
    FieldDecodeError,
    FieldValueError,
    FloatKind,
    HardwareKind,
    IdKind,
    ImageKind,
    IntegerKind,
    MusicKind,
    StringKind,
    VideoKind,
    ZonedTimestamp,
    articlesField,
    integerField,
    stringField,
    type EncodeContext,
} from '../../nodes/WeChatXml/core';

const ctx = (wireName: string, defaultValue?: unknown): EncodeContext => ({
    schema: 'Sample',
    attribute: 'value',
    wireName,
    defaultValue,
});

// ── String ──────────────────────────────────────────────────────────────────

describe('StringKind', () => {
    it('wraps text in CDATA', () => {
        expect(StringKind.encode('hello', ctx('Content'))).toBe('<Content><![CDATA[hello]]></Content>');
    });

    it('splits a CDATA terminator across two sections', () => {
        expect(StringKind.encode('a]]>b', ctx('Content'))).toBe('<Content><![CDATA[a]]]]><![CDATA[>b]]></Content>');
    });

    it('renders an unset value as empty CDATA', () => {
        expect(StringKind.encode(undefined, ctx('Content'))).toBe('<Content><![CDATA[]]></Content>');
    });

    it('reads numbers and bytes as text', () => {
        expect(StringKind.read(42, ctx('Content'))).toBe('42');
        expect(StringKind.read(new TextEncoder().encode('bytes'), ctx('Content'))).toBe('bytes');
    });

    it('rejects a nested mapping', () => {
        expect(() => StringKind.read({ a: 1 }, ctx('Content'))).toThrow(FieldValueError);
    });

    it('decodes an empty element as an empty string', () => {
        expect(StringKind.decode({}, ctx('Content'))).toBe('');
    });
});

// ── Numbers ─────────────────────────────────────────────────────────────────

describe('IntegerKind', () => {
    it('reads integer text and truncates numbers', () => {
        expect(IntegerKind.read('42', ctx('MsgId'))).toBe(42);
        expect(IntegerKind.read(' -7 ', ctx('MsgId'))).toBe(-7);
        expect(IntegerKind.read(3.9, ctx('MsgId'))).toBe(3);
    });

    it('treats empty text as absent', () => {
        expect(IntegerKind.read('', ctx('MsgId'))).toBeUndefined();
        expect(IntegerKind.decode('', ctx('MsgId'))).toBeUndefined();
    });

    it('names the field when text is not an integer', () => {
        expect(() => IntegerKind.read('4.5', ctx('MsgId'))).toThrow('[Sample] value <MsgId>: "4.5" is not a valid integer');
    });

    it('reports a bad wire value as a decode failure', () => {
        expect(() => IntegerKind.decode('abc', ctx('MsgId'))).toThrow(FieldDecodeError);
    });

    it('renders without CDATA and falls back to the default', () => {
        expect(IntegerKind.encode(12, ctx('FuncFlag'))).toBe('<FuncFlag>12</FuncFlag>');
        expect(IntegerKind.encode(undefined, ctx('FuncFlag', 0))).toBe('<FuncFlag>0</FuncFlag>');
        expect(IntegerKind.encode(undefined, ctx('FuncFlag'))).toBe('<FuncFlag></FuncFlag>');
    });
});

describe('IdKind', () => {
    it('stays a number while the value is exact', () => {
        expect(IdKind.read('1234567890123456', ctx('MsgId'))).toBe(1234567890123456);
        expect(IdKind.read('+12', ctx('MsgId'))).toBe(12);
    });

    it('switches to bigint past the safe integer range', () => {
        expect(IdKind.read('23436871953577391', ctx('MsgId'))).toBe(23436871953577391n);
        expect(IdKind.decode('23436871953577391', ctx('MsgId'))).toBe(23436871953577391n);
    });

    it('renders every digit', () => {
        expect(IdKind.encode(23436871953577391n, ctx('MsgId'))).toBe('<MsgId>23436871953577391</MsgId>');
        expect(IdKind.encode(undefined, ctx('MsgId', 0))).toBe('<MsgId>0</MsgId>');
    });

    it('rejects non-integer text', () => {
        expect(() => IdKind.read('1.5', ctx('MsgId'))).toThrow('"1.5" is not a valid integer');
    });
});

describe('FloatKind', () => {
    it('reads decimal and exponent text', () => {
        expect(FloatKind.read('23.137466', ctx('Latitude'))).toBe(23.137466);
        expect(FloatKind.read('1e3', ctx('Latitude'))).toBe(1000);
    });

    it('rejects non-numeric text', () => {
        expect(() => FloatKind.read('north', ctx('Latitude'))).toThrow('"north" is not a valid float');
    });
});

// ── DateTime ────────────────────────────────────────────────────────────────

describe('DateTimeKind', () => {
    it('reads epoch seconds into a timestamp', () => {
        const ts = DateTimeKind.read('0', ctx('CreateTime'));
        expect(ts).toBeInstanceOf(ZonedTimestamp);
        expect(ts?.epochSeconds).toBe(0);
        expect(ts?.toISOString()).toBe('1970-01-01T08:00:00+08:00');
    });

    it('accepts a Date', () => {
        expect(DateTimeKind.read(new Date(5_500), ctx('CreateTime'))?.epochSeconds).toBe(5);
    });

    it('renders epoch seconds', () => {
        expect(DateTimeKind.encode(new ZonedTimestamp(1_700_000_000), ctx('CreateTime'))).toBe(
            '<CreateTime>1700000000</CreateTime>',
        );
    });
});

// ── Base64 ──────────────────────────────────────────────────────────────────

describe('Base64 kinds', () => {
    it('encodes on read without changing what is stored', () => {
        expect(Base64EncodeKind.read('hello', ctx('Content'))).toBe('aGVsbG8=');
        expect(Base64EncodeKind.read('aGVsbG8=', ctx('Content'))).toBe('YUdWc2JHOD0=');
    });

    it('decodes on read', () => {
        expect(Base64DecodeKind.read('aGVsbG8=', ctx('Content'))).toBe('hello');
    });

    it('keeps empty text empty', () => {
        expect(Base64EncodeKind.read('', ctx('Content'))).toBe('');
        expect(Base64DecodeKind.read(undefined, ctx('Content'))).toBeUndefined();
    });

    it('renders the value it is given once', () => {
        expect(Base64EncodeKind.encode('aGVsbG8=', ctx('Content'))).toBe('<Content><![CDATA[aGVsbG8=]]></Content>');
    });
});

// ── Nested media ────────────────────────────────────────────────────────────

describe('media kinds', () => {
    it('nests a single media id', () => {
        expect(ImageKind.encode('media-1', ctx('Image'))).toBe('<Image><MediaId><![CDATA[media-1]]></MediaId></Image>');
        expect(ImageKind.decode({ MediaId: 'media-1' }, ctx('Image'))).toBe('media-1');
    });

    it('always renders MediaId for video and skips unset parts', () => {
        expect(VideoKind.encode({ title: 'clip' }, ctx('Video'))).toBe(
            '<Video><MediaId><![CDATA[]]></MediaId><Title><![CDATA[clip]]></Title></Video>',
        );
    });

    it('omits MusicUrl when it was never set', () => {
        expect(MusicKind.encode({ thumbMediaId: 'th', title: 'song' }, ctx('Music'))).toBe(
            '<Music><ThumbMediaId><![CDATA[th]]></ThumbMediaId><Title><![CDATA[song]]></Title></Music>',
        );
    });

    it('decodes only the parts present', () => {
        expect(MusicKind.decode({ ThumbMediaId: 'th', HQMusicUrl: 'hq' }, ctx('Music'))).toEqual({
            thumbMediaId: 'th',
            hqMusicUrl: 'hq',
        });
    });

    it('renders the ranking card defaults for an unset hardware value', () => {
        expect(HardwareKind.encode(undefined, ctx('HardWare'))).toBe(
            '<HardWare><MessageView><![CDATA[myrank]]></MessageView><MessageAction><![CDATA[ranklist]]></MessageAction></HardWare>',
        );
    });

    it('rejects text where nested elements are expected', () => {
        expect(() => VideoKind.decode('flat', ctx('Video'))).toThrow('expected nested elements, found a string');
    });
});

// ── Articles ────────────────────────────────────────────────────────────────

describe('ArticlesKind', () => {
    it('renders ArticleCount then the items in tag order', () => {
        expect(ArticlesKind.encode([{ title: 'T', url: 'U' }], ctx('Articles'))).toBe(
            '<ArticleCount>1</ArticleCount>\n' +
                '<Articles><item><Title><![CDATA[T]]></Title><Description><![CDATA[]]></Description>' +
                '<PicUrl><![CDATA[]]></PicUrl><Url><![CDATA[U]]></Url></item></Articles>',
        );
    });

    it('renders an empty list', () => {
        expect(ArticlesKind.encode([], ctx('Articles'))).toBe('<ArticleCount>0</ArticleCount>\n<Articles></Articles>');
    });

    it('decodes items with missing parts as empty strings', () => {
        expect(ArticlesKind.decode({ item: [{ Title: 'T', PicUrl: 'P' }] }, ctx('Articles'))).toEqual([
            { title: 'T', description: '', image: 'P', url: '' },
        ]);
    });

    it('rejects more than ten items on decode and on write', () => {
        const items = Array.from({ length: 11 }, () => ({ Title: 't' }));
        expect(() => ArticlesKind.decode({ item: items }, ctx('Articles'))).toThrow(ArticlesLimitError);
        expect(() => ArticlesKind.check?.(new Array(11).fill({}), ctx('Articles'))).toThrow(
            "Can't add more than 10 articles in an ArticlesReply (got 11)",
        );
    });
});

// ── Field factories ─────────────────────────────────────────────────────────

describe('field factories', () => {
    it('keeps the wire name and default', () => {
        const def = integerField('FuncFlag', 0);
        expect(def.wireName).toBe('FuncFlag');
        expect(def.defaultValue).toBe(0);
        expect(stringField('Content').defaultValue).toBeUndefined();
    });

    it('hands out a fresh copy of a container default on every read', () => {
        const def = articlesField('Articles', []);
        const first = def.read(undefined, ctx('Articles'));
        first.push({ title: 'x' });
        expect(def.read(undefined, ctx('Articles'))).toEqual([]);
    });
});
