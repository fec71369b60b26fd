import { NodeOperationError, type IDataObject } from 'n8n-workflow';
import type { BaseMessage } from '../core/catalog/messages';
import { ImageReply, REPLY_TYPES, VoiceReply } from '../core/catalog/replies';
import { createReply, deserializeReply, parseMessage } from '../core/codec';
import { DebugManager } from '../core/debug';
import { ReplyConstructionError, UnknownReplyTypeError } from '../core/errors';
import {
    createBooleanProperty,
    createJsonProperty,
    createOptionsProperty,
    createStringProperty,
    createXmlProperty,
    generateOperationOptionsFromRegistry,
    getBooleanParam,
    getJsonParam,
    getStringParam,
    toDataObject,
} from '../core/service-utils';
import type { Service, ServiceOperationRegistry } from '../core/types';
import { describeValue } from '../core/utils';
import { isPlainObject } from '../core/xml';

const RESOURCE = 'reply';
const RESOURCE_DISPLAY_NAME = 'Reply';

/** ─ Centralized Operation Registry ─ */
const OPERATION_REGISTRY: ServiceOperationRegistry = {
    createReply: {
        uiName: 'Create Reply',
        subtitleName: 'create: reply',
        resource: RESOURCE,
        resourceDisplayName: RESOURCE_DISPLAY_NAME,
        description: 'Build an empty, text, news, image or voice reply',
        params: ['replyKind', 'content', 'articles', 'mediaId', 'sourceXml', 'includeDebugInfo'],
        active: true,
    },
    renderReply: {
        uiName: 'Render Reply',
        subtitleName: 'render: reply',
        resource: RESOURCE,
        resourceDisplayName: RESOURCE_DISPLAY_NAME,
        description: 'Render any registered reply type from a JSON object of fields',
        params: ['replyType', 'fields', 'sourceXml', 'includeDebugInfo'],
        active: true,
    },
    deserializeReply: {
        uiName: 'Deserialize Reply',
        subtitleName: 'deserialize: reply',
        resource: RESOURCE,
        resourceDisplayName: RESOURCE_DISPLAY_NAME,
        description: 'Read a rendered reply back into its fields',
        params: ['xml', 'replaceTime', 'includeDebugInfo'],
        active: true,
    },
};

export const REPLY_KINDS = ['empty', 'text', 'articles', 'image', 'voice'] as const;
export type ReplyKind = (typeof REPLY_KINDS)[number];

export function isReplyKind(value: string): value is ReplyKind {
    return REPLY_KINDS.some((kind) => kind === value);
}

export type CreateReplyParams = {
    kind: ReplyKind;
    content?: string;
    articles?: unknown;
    mediaId?: string;
    /** Inbound message XML; the reply is addressed back to its sender */
    sourceXml?: string;
    includeDebugInfo?: boolean;
};

function sourceMessage(sourceXml: string | undefined): BaseMessage | undefined {
    return sourceXml?.trim() ? parseMessage(sourceXml) : undefined;
}

function replyValue(params: CreateReplyParams): unknown {
    switch (params.kind) {
        case 'empty':
            return undefined;
        case 'text':
            return params.content ?? '';
        case 'articles':
            return params.articles;
        case 'image':
            return new ImageReply({ image: params.mediaId });
        case 'voice':
            return new VoiceReply({ voice: params.mediaId });
    }
}

/** An empty text content yields an EmptyReply, like any other empty value */
export function createReplyItem(params: CreateReplyParams): IDataObject {
    const reply = createReply(replyValue(params), sourceMessage(params.sourceXml));
    const xml = reply.render();
    return {
        success: true,
        resource: RESOURCE,
        operation: 'createReply',
        reply: toDataObject(reply),
        xml,
        ...(params.includeDebugInfo ? DebugManager.createDebugOutput('createReply', xml, reply) : {}),
    };
}

export function renderReplyItem(
    replyType: string,
    fields: unknown,
    sourceXml?: string,
    includeDebugInfo = false,
): IDataObject {
    const entry = REPLY_TYPES.resolve(replyType);
    if (!entry) throw new UnknownReplyTypeError(replyType);
    if (fields !== undefined && fields !== null && !isPlainObject(fields)) {
        throw new ReplyConstructionError(`fields given as ${describeValue(fields)}`);
    }

    const reply = entry.create({});
    const message = sourceMessage(sourceXml);
    if (message) reply.replyTo(message);
    if (isPlainObject(fields)) reply.assign(fields);

    const xml = reply.render();
    return {
        success: true,
        resource: RESOURCE,
        operation: 'renderReply',
        reply: toDataObject(reply),
        xml,
        ...(includeDebugInfo ? DebugManager.createDebugOutput('renderReply', xml, reply) : {}),
    };
}

export function deserializeReplyItem(xml: string, replaceTime = false, includeDebugInfo = false): IDataObject {
    const reply = deserializeReply(xml, replaceTime);
    return {
        success: true,
        resource: RESOURCE,
        operation: 'deserializeReply',
        reply: toDataObject(reply),
        ...(includeDebugInfo ? DebugManager.createDebugOutput('deserializeReply', xml, reply) : {}),
    };
}

const replyKindOptions = REPLY_KINDS.map((kind) => ({ name: kind.charAt(0).toUpperCase() + kind.slice(1), value: kind }));
const replyTypeOptions = REPLY_TYPES.keys().map((type) => ({ name: type, value: type }));

export const ReplyService: Service = {
    resource: RESOURCE,
    resourceDisplayName: RESOURCE_DISPLAY_NAME,
    resourceDescription: 'Build and read passive replies',
    operationRegistry: OPERATION_REGISTRY,
    operationOptions: generateOperationOptionsFromRegistry(OPERATION_REGISTRY),
    extraProperties: [
        createOptionsProperty('replyKind', 'Reply Kind', 'Shape of the reply', RESOURCE, ['createReply'], replyKindOptions, 'text'),
        {
            ...createStringProperty('content', 'Content', 'Text to send', RESOURCE, ['createReply']),
            displayOptions: { show: { resource: [RESOURCE], operation: ['createReply'], replyKind: ['text'] } },
        },
        createJsonProperty(
            'articles',
            'Articles',
            'Up to ten objects with title, description, image and url',
            RESOURCE,
            ['createReply'],
            '[]',
            { replyKind: ['articles'] },
        ),
        {
            ...createStringProperty('mediaId', 'Media ID', 'ID of uploaded media', RESOURCE, ['createReply']),
            displayOptions: { show: { resource: [RESOURCE], operation: ['createReply'], replyKind: ['image', 'voice'] } },
        },
        createOptionsProperty('replyType', 'Reply Type', 'Registered reply MsgType', RESOURCE, ['renderReply'], replyTypeOptions, 'text'),
        createJsonProperty('fields', 'Fields', 'Reply attributes, e.g. {"content": "hello"}', RESOURCE, ['renderReply'], '{}'),
        createXmlProperty(
            'sourceXml',
            'Source Message XML',
            'Inbound message being answered; sets FromUserName and ToUserName',
            RESOURCE,
            ['createReply', 'renderReply'],
        ),
        createXmlProperty('xml', 'XML', 'A rendered reply', RESOURCE, ['deserializeReply'], true),
        createBooleanProperty('replaceTime', 'Replace Time', 'Whether to stamp CreateTime with the current time', RESOURCE, ['deserializeReply']),
        createBooleanProperty(
            'includeDebugInfo',
            'Include Debug Info',
            'Whether to add the XML and the raw values to the output',
            RESOURCE,
            Object.keys(OPERATION_REGISTRY),
        ),
    ],
    async execute(operation, ctx, itemIndex) {
        const includeDebugInfo = getBooleanParam(ctx, 'includeDebugInfo', itemIndex);

        switch (operation) {
            case 'createReply': {
                const kind = getStringParam(ctx, 'replyKind', itemIndex);
                if (!isReplyKind(kind)) {
                    throw new NodeOperationError(ctx.getNode(), `Unsupported reply kind: ${kind}`, { itemIndex });
                }
                return createReplyItem({
                    kind,
                    content: kind === 'text' ? getStringParam(ctx, 'content', itemIndex) : undefined,
                    articles: kind === 'articles' ? getJsonParam(ctx, 'articles', itemIndex) : undefined,
                    mediaId: kind === 'image' || kind === 'voice' ? getStringParam(ctx, 'mediaId', itemIndex) : undefined,
                    sourceXml: getStringParam(ctx, 'sourceXml', itemIndex),
                    includeDebugInfo,
                });
            }
            case 'renderReply':
                return renderReplyItem(
                    getStringParam(ctx, 'replyType', itemIndex),
                    getJsonParam(ctx, 'fields', itemIndex),
                    getStringParam(ctx, 'sourceXml', itemIndex),
                    includeDebugInfo,
                );
            case 'deserializeReply':
                return deserializeReplyItem(
                    getStringParam(ctx, 'xml', itemIndex),
                    getBooleanParam(ctx, 'replaceTime', itemIndex),
                    includeDebugInfo,
                );
            default:
                throw new Error(`Unsupported operation: ${operation}`);
        }
    },
};
