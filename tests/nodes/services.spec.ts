import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { description } from '../../nodes/WeChatXml/description';
import { parseComponentEventItem, parseMessageItem, MessageService } from '../../nodes/WeChatXml/services/message';
import {
    createReplyItem,
    deserializeReplyItem,
    isReplyKind,
    renderReplyItem,
    ReplyService,
} from '../../nodes/WeChatXml/services/reply';
import { ReplyConstructionError, UnknownReplyTypeError } from '../../nodes/WeChatXml/core';

const envelope = (...elements: string[]) => `<xml>\n${elements.join('\n')}\n</xml>`;

const TEXT_XML = envelope(
    '<ToUserName><![CDATA[gh_account]]></ToUserName>',
    '<FromUserName><![CDATA[openid-user]]></FromUserName>',
    '<CreateTime>0</CreateTime>',
    '<MsgType><![CDATA[text]]></MsgType>',
    '<Content><![CDATA[this is a test]]></Content>',
    '<MsgId>1234567890123456</MsgId>',
);

const EPOCH_0 = '1970-01-01T08:00:00+08:00';

beforeEach(() => {
    vi.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);
});

afterEach(() => {
    vi.restoreAllMocks();
});

// ── Message resource ────────────────────────────────────────────────────────

describe('parseMessageItem', () => {
    it('returns the decoded message as item data', () => {
        expect(parseMessageItem(TEXT_XML)).toEqual({
            success: true,
            resource: 'message',
            operation: 'parseMessage',
            message: {
                type: 'text',
                id: 1234567890123456,
                source: 'openid-user',
                target: 'gh_account',
                createTime: EPOCH_0,
                content: 'this is a test',
            },
        });
    });

    it('outputs a MsgId past 2^53 as its digits', () => {
        const xml = TEXT_XML.replace('1234567890123456', '23436871953577391');
        expect(parseMessageItem(xml).message).toMatchObject({ id: '23436871953577391' });
    });

    it('adds the raw values when debug info is requested', () => {
        const result = parseMessageItem(TEXT_XML, true);
        expect(result.debugInfo).toEqual({
            operation: 'parseMessage',
            xml: TEXT_XML,
            typeName: 'TextMessage',
            rawData: {
                ToUserName: 'gh_account',
                FromUserName: 'openid-user',
                CreateTime: EPOCH_0,
                MsgType: 'text',
                Content: 'this is a test',
                MsgId: 1234567890123456,
            },
            timestamp: expect.any(String),
        });
    });
});

describe('parseComponentEventItem', () => {
    it('returns the decoded notification', () => {
        const xml = envelope(
            '<AppId>wx-component</AppId>',
            '<CreateTime>0</CreateTime>',
            '<InfoType>component_verify_ticket</InfoType>',
            '<ComponentVerifyTicket>test-ticket</ComponentVerifyTicket>',
        );
        expect(parseComponentEventItem(xml)).toEqual({
            success: true,
            resource: 'message',
            operation: 'parseComponentEvent',
            event: {
                type: 'component_verify_ticket',
                appId: 'wx-component',
                createTime: EPOCH_0,
                verifyTicket: 'test-ticket',
            },
        });
    });
});

// ── Reply resource ──────────────────────────────────────────────────────────

describe('createReplyItem', () => {
    it('answers the source message with text', () => {
        expect(createReplyItem({ kind: 'text', content: 'hello', sourceXml: TEXT_XML })).toEqual({
            success: true,
            resource: 'reply',
            operation: 'createReply',
            reply: { type: 'text', source: 'gh_account', target: 'openid-user', time: 1_700_000_000, content: 'hello' },
            xml: envelope(
                '<MsgType><![CDATA[text]]></MsgType>',
                '<FromUserName><![CDATA[gh_account]]></FromUserName>',
                '<ToUserName><![CDATA[openid-user]]></ToUserName>',
                '<CreateTime>1700000000</CreateTime>',
                '<Content><![CDATA[hello]]></Content>',
            ),
        });
    });

    it('turns empty text into an empty reply', () => {
        const result = createReplyItem({ kind: 'text', content: '' });
        expect(result.xml).toBe('');
        expect(result.reply).toEqual({ type: 'empty', time: 1_700_000_000 });
    });

    it('builds news and media replies', () => {
        expect(createReplyItem({ kind: 'articles', articles: [{ title: 'a' }] }).reply).toEqual({
            type: 'news',
            time: 1_700_000_000,
            articles: [{ title: 'a' }],
        });
        expect(createReplyItem({ kind: 'voice', mediaId: 'media-1', sourceXml: TEXT_XML }).reply).toEqual({
            type: 'voice',
            source: 'gh_account',
            target: 'openid-user',
            time: 1_700_000_000,
            voice: 'media-1',
        });
    });

    it('accepts only the listed kinds', () => {
        expect(isReplyKind('articles')).toBe(true);
        expect(isReplyKind('music')).toBe(false);
    });
});

describe('renderReplyItem', () => {
    it('renders any registered type from plain fields', () => {
        const result = renderReplyItem('music', { music: { thumbMediaId: 'th' }, time: 5 }, TEXT_XML);
        expect(result.xml).toBe(
            envelope(
                '<MsgType><![CDATA[music]]></MsgType>',
                '<FromUserName><![CDATA[gh_account]]></FromUserName>',
                '<ToUserName><![CDATA[openid-user]]></ToUserName>',
                '<CreateTime>5</CreateTime>',
                '<Music><ThumbMediaId><![CDATA[th]]></ThumbMediaId></Music>',
            ),
        );
        expect(result.reply).toEqual({
            type: 'music',
            source: 'gh_account',
            target: 'openid-user',
            time: 5,
            music: { thumbMediaId: 'th' },
        });
    });

    it('rejects an unregistered type', () => {
        expect(() => renderReplyItem('bogus', {})).toThrow(UnknownReplyTypeError);
    });

    it('rejects fields that are not an object', () => {
        expect(() => renderReplyItem('text', [1])).toThrow(new ReplyConstructionError('fields given as an array of 1'));
    });

    it('rejects unknown attributes', () => {
        expect(() => renderReplyItem('text', { nope: 1 })).toThrow('[TextReply] unknown attribute "nope"');
    });
});

describe('deserializeReplyItem', () => {
    it('reads a rendered reply back', () => {
        const xml = envelope('<MsgType>text</MsgType>', '<CreateTime>1</CreateTime>', '<Content>hi</Content>');
        expect(deserializeReplyItem(xml).reply).toEqual({ type: 'text', time: 1, content: 'hi' });
        expect(deserializeReplyItem(xml, true).reply).toEqual({ type: 'text', time: 1_700_000_000, content: 'hi' });
    });

    it('reads empty input as an empty reply', () => {
        expect(deserializeReplyItem('')).toEqual({
            success: true,
            resource: 'reply',
            operation: 'deserializeReply',
            reply: { type: 'empty', time: 1_700_000_000 },
        });
    });
});

// ── Node description ────────────────────────────────────────────────────────

describe('node description', () => {
    it('names the node and its resources', () => {
        expect(description.name).toBe('weChatXml');
        expect(description.displayName).toBe('WeChat XML');
        const resource = description.properties.find((p) => p.name === 'resource');
        expect(resource?.default).toBe('message');
        expect(resource?.options).toEqual([
            { name: 'Message', value: 'message', description: 'Decode inbound webhook XML' },
            { name: 'Reply', value: 'reply', description: 'Build and read passive replies' },
        ]);
    });

    it('lists the active operations of each service', () => {
        expect(MessageService.operationOptions.map((o) => o.value)).toEqual(['parseMessage', 'parseComponentEvent']);
        expect(ReplyService.operationOptions.map((o) => o.value)).toEqual(['createReply', 'renderReply', 'deserializeReply']);
        expect(ReplyService.operationOptions[0]).toEqual({
            name: 'Create Reply',
            value: 'createReply',
            action: 'Create Reply',
            description: 'Build an empty, text, news, image or voice reply',
        });
    });

    it('builds the subtitle from the operation registries', () => {
        expect(description.subtitle).toContain('$parameter["operation"] === "parseMessage" ? "parse: message"');
        expect(description.subtitle).toContain('$parameter["resource"] === "reply" ?');
    });
});
