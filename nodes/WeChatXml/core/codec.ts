import { LoggerProxy as Logger } from 'n8n-workflow';
import { EVENT_TYPE_TAG, MAX_ARTICLES, MESSAGE_TYPE_TAG } from './constants';
import { ArticlesLimitError, CodecErrorFactory, ReplyConstructionError, UnknownReplyTypeError } from './errors';
import { COMPONENT_TYPES, UNKNOWN_COMPONENT_ENTRY, type BaseComponentEvent } from './catalog/components';
import { EVENT_TYPES, eventVariant } from './catalog/events';
import { MESSAGE_TYPES, UNKNOWN_MESSAGE_ENTRY, type BaseMessage } from './catalog/messages';
import { ArticlesReply, BaseReply, EmptyReply, REPLY_TYPES, TextReply } from './catalog/replies';
import type { Article } from './fields';
import type { RegistryEntry, TypeRegistry } from './registry';
import type { SchemaRecord } from './schema';
import { nowSeconds } from './time';
import type { FieldDefMap, RawData, SchemaDefinition } from './types';
import { describeValue, toText } from './utils';
import { isPlainObject, leafText, parseEnvelope } from './xml';

/**
 * Decode every element the schema claims through its field kind. Empty numeric
 * values stay unset; elements no field claims are kept verbatim.
 */
export function decodeElements(schema: SchemaDefinition<FieldDefMap>, elements: Record<string, unknown>): RawData {
    const data: RawData = {};
    for (const [tag, node] of Object.entries(elements)) {
        const field = schema.fieldByWire(tag);
        if (!field) {
            data[tag] = node;
            continue;
        }
        const value = field.def.kind.decode(node, field);
        if (value !== undefined) data[tag] = value;
    }
    return data;
}

function readDiscriminator(elements: Record<string, unknown>, tag: string, xml: string): string {
    const value = leafText(elements[tag])?.trim();
    if (!value) throw CodecErrorFactory.envelope(`missing <${tag}> element`, xml);
    return value;
}

function build<R>(entry: RegistryEntry<R>, elements: Record<string, unknown>): R {
    return entry.create(decodeElements(entry.schema, elements));
}

/**
 * Parse an envelope against one registry. Without a fallback an unregistered
 * discriminator is an UnknownReplyTypeError.
 */
export function parse<R>(xml: string, registry: TypeRegistry<R>, fallback?: RegistryEntry<R>): R {
    const elements = parseEnvelope(xml);
    const discriminator = readDiscriminator(elements, registry.discriminatorTag, xml);
    const entry = registry.resolve(discriminator);
    if (entry) return build(entry, elements);
    if (!fallback) throw new UnknownReplyTypeError(discriminator);

    Logger.debug(`No ${registry.name} schema for ${registry.discriminatorTag}="${discriminator}"`, {
        fallback: fallback.schema.typeName,
    });
    return build(fallback, elements);
}

function resolveMessage(msgType: string, elements: Record<string, unknown>): RegistryEntry<BaseMessage> | undefined {
    if (msgType !== 'event') return MESSAGE_TYPES.resolve(msgType);
    const event = leafText(elements[EVENT_TYPE_TAG]);
    if (event === undefined) return undefined;
    return EVENT_TYPES.resolve(eventVariant(event, leafText(elements.EventKey)));
}

/**
 * Inbound webhook payload to a message or event. Unregistered types come back
 * as UnknownMessage; only a malformed envelope throws.
 */
export function parseMessage(xml: string): BaseMessage {
    const elements = parseEnvelope(xml);
    const msgType = readDiscriminator(elements, MESSAGE_TYPE_TAG, xml).toLowerCase();
    const entry = resolveMessage(msgType, elements);
    if (entry) return build(entry, elements);

    Logger.debug(`No message schema for MsgType="${msgType}", parsing as UnknownMessage`, {
        event: leafText(elements[EVENT_TYPE_TAG]) ?? '',
    });
    return build(UNKNOWN_MESSAGE_ENTRY, elements);
}

export function parseComponentEvent(xml: string): BaseComponentEvent {
    return parse(xml, COMPONENT_TYPES, UNKNOWN_COMPONENT_ENTRY);
}

export function render(record: SchemaRecord<FieldDefMap>): string {
    return record.render();
}

// ============================================================================
// REPLY HELPERS
// ============================================================================

function isEmptyValue(value: unknown): boolean {
    return value === undefined || value === null || value === '' || (Array.isArray(value) && value.length === 0);
}

function toArticle(value: unknown, index: number): Article {
    if (!isPlainObject(value)) {
        throw new ReplyConstructionError(`article #${index + 1} (${describeValue(value)})`);
    }
    const article: Article = {};
    if (value.title != null) article.title = toText(value.title);
    if (value.description != null) article.description = toText(value.description);
    if (value.image != null) article.image = toText(value.image);
    if (value.url != null) article.url = toText(value.url);
    return article;
}

/**
 * Build a reply from a loose value:
 * nothing → EmptyReply, string → TextReply, list of articles → ArticlesReply,
 * an existing reply is readdressed to `message` when one is given.
 */
export function createReply(value: unknown, message?: BaseMessage): BaseReply;
export function createReply(value: unknown, message: BaseMessage | undefined, render: true): string;
export function createReply(value: unknown, message: BaseMessage | undefined, render: boolean): BaseReply | string;
export function createReply(value: unknown, message?: BaseMessage, render = false): BaseReply | string {
    const reply = toReply(value, message);
    return render ? reply.render() : reply;
}

function toReply(value: unknown, message: BaseMessage | undefined): BaseReply {
    if (isEmptyValue(value)) return new EmptyReply();
    if (value instanceof BaseReply) {
        return message ? value.replyTo(message) : value;
    }
    if (typeof value === 'string') return new TextReply({ content: value }, message);
    if (Array.isArray(value)) {
        if (value.length > MAX_ARTICLES) throw new ArticlesLimitError(value.length, MAX_ARTICLES);
        return new ArticlesReply({ articles: value.map(toArticle) }, message);
    }
    throw new ReplyConstructionError(describeValue(value));
}

/**
 * Rebuild a reply from its rendered XML. Empty input is an EmptyReply; an
 * unregistered MsgType throws instead of falling back.
 */
export function deserializeReply(xml: string, replaceTime = false): BaseReply {
    if (!xml.trim()) return new EmptyReply();
    const reply = parse(xml, REPLY_TYPES);
    if (replaceTime) reply.time = nowSeconds();
    Logger.debug(`Deserialized ${reply.schema.typeName}`, { type: reply.type });
    return reply;
}
