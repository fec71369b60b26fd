// nodes/WeChatXml/core/catalog/messages.ts
// Inbound messages the platform pushes to the webhook, keyed by MsgType
import {
    base64DecodeField,
    dateTimeField,
    idField,
    stringField,
} from '../fields';
import { TypeRegistry } from '../registry';
import { SchemaRecord, defineSchema, extendSchema } from '../schema';
import type { ZonedTimestamp } from '../time';
import type { RawData, SchemaDefinition } from '../types';

// ============================================================================
// ENVELOPE
// ============================================================================

export const BASE_MESSAGE = defineSchema({
    typeName: 'BaseMessage',
    discriminator: 'unknown',
    fields: {
        id: idField('MsgId', 0),
        source: stringField('FromUserName'),
        target: stringField('ToUserName'),
        createTime: dateTimeField('CreateTime'),
    },
});
export type BaseMessageFields = typeof BASE_MESSAGE.fields;

const F = BASE_MESSAGE.fields;

/**
 * Base class for all messages and events. `source` is the sender's OpenID,
 * `target` the account that received the message.
 */
export abstract class BaseMessage<Fields extends BaseMessageFields = BaseMessageFields> extends SchemaRecord<Fields> {
    protected constructor(schema: SchemaDefinition<Fields>, data: RawData = {}) {
        super(schema, data);
    }

    /** A bigint when the id is past Number.MAX_SAFE_INTEGER */
    get id(): number | bigint {
        return this.read(F.id);
    }
    set id(value: number | bigint) {
        this.write(F.id, value);
    }

    get source(): string | undefined {
        return this.read(F.source);
    }
    set source(value: string | undefined) {
        this.write(F.source, value);
    }

    get target(): string | undefined {
        return this.read(F.target);
    }
    set target(value: string | undefined) {
        this.write(F.target, value);
    }

    get createTime(): ZonedTimestamp | undefined {
        return this.read(F.createTime);
    }
    set createTime(value: ZonedTimestamp | undefined) {
        this.write(F.createTime, value);
    }

    /** CreateTime as epoch seconds */
    get time(): number | undefined {
        return this.createTime?.epochSeconds;
    }
}

// ============================================================================
// STANDARD MESSAGES
// ============================================================================

const TEXT_MESSAGE = extendSchema(BASE_MESSAGE, {
    typeName: 'TextMessage',
    discriminator: 'text',
    fields: {
        content: stringField('Content'),
    },
});

export class TextMessage extends BaseMessage<typeof TEXT_MESSAGE.fields> {
    static readonly schema = TEXT_MESSAGE;

    constructor(data?: RawData) {
        super(TEXT_MESSAGE, data);
    }

    get content(): string | undefined {
        return this.read(TEXT_MESSAGE.fields.content);
    }
    set content(value: string | undefined) {
        this.write(TEXT_MESSAGE.fields.content, value);
    }
}

const IMAGE_MESSAGE = extendSchema(BASE_MESSAGE, {
    typeName: 'ImageMessage',
    discriminator: 'image',
    fields: {
        mediaId: stringField('MediaId'),
        image: stringField('PicUrl'),
    },
});

export class ImageMessage extends BaseMessage<typeof IMAGE_MESSAGE.fields> {
    static readonly schema = IMAGE_MESSAGE;

    constructor(data?: RawData) {
        super(IMAGE_MESSAGE, data);
    }

    get mediaId(): string | undefined {
        return this.read(IMAGE_MESSAGE.fields.mediaId);
    }

    /** Picture URL */
    get image(): string | undefined {
        return this.read(IMAGE_MESSAGE.fields.image);
    }
}

const VOICE_MESSAGE = extendSchema(BASE_MESSAGE, {
    typeName: 'VoiceMessage',
    discriminator: 'voice',
    fields: {
        mediaId: stringField('MediaId'),
        format: stringField('Format'),
        recognition: stringField('Recognition'),
    },
});

export class VoiceMessage extends BaseMessage<typeof VOICE_MESSAGE.fields> {
    static readonly schema = VOICE_MESSAGE;

    constructor(data?: RawData) {
        super(VOICE_MESSAGE, data);
    }

    get mediaId(): string | undefined {
        return this.read(VOICE_MESSAGE.fields.mediaId);
    }

    get format(): string | undefined {
        return this.read(VOICE_MESSAGE.fields.format);
    }

    /** Speech recognition result, when the account has it enabled */
    get recognition(): string | undefined {
        return this.read(VOICE_MESSAGE.fields.recognition);
    }
}

const VIDEO_FIELDS = {
    mediaId: stringField('MediaId'),
    thumbMediaId: stringField('ThumbMediaId'),
};

const VIDEO_MESSAGE = extendSchema(BASE_MESSAGE, {
    typeName: 'VideoMessage',
    discriminator: 'video',
    fields: VIDEO_FIELDS,
});

const SHORT_VIDEO_MESSAGE = extendSchema(BASE_MESSAGE, {
    typeName: 'ShortVideoMessage',
    discriminator: 'shortvideo',
    fields: VIDEO_FIELDS,
});

type VideoMessageFields = typeof VIDEO_MESSAGE.fields;

export class VideoMessage extends BaseMessage<VideoMessageFields> {
    static readonly schema = VIDEO_MESSAGE;

    constructor(data?: RawData, schema: SchemaDefinition<VideoMessageFields> = VIDEO_MESSAGE) {
        super(schema, data);
    }

    get mediaId(): string | undefined {
        return this.read(VIDEO_FIELDS.mediaId);
    }

    get thumbMediaId(): string | undefined {
        return this.read(VIDEO_FIELDS.thumbMediaId);
    }
}

export class ShortVideoMessage extends VideoMessage {
    static readonly schema = SHORT_VIDEO_MESSAGE;

    constructor(data?: RawData) {
        super(data, SHORT_VIDEO_MESSAGE);
    }
}

const LOCATION_MESSAGE = extendSchema(BASE_MESSAGE, {
    typeName: 'LocationMessage',
    discriminator: 'location',
    fields: {
        locationX: stringField('Location_X'),
        locationY: stringField('Location_Y'),
        scale: stringField('Scale'),
        label: stringField('Label'),
    },
});

export class LocationMessage extends BaseMessage<typeof LOCATION_MESSAGE.fields> {
    static readonly schema = LOCATION_MESSAGE;

    constructor(data?: RawData) {
        super(LOCATION_MESSAGE, data);
    }

    get locationX(): string | undefined {
        return this.read(LOCATION_MESSAGE.fields.locationX);
    }

    get locationY(): string | undefined {
        return this.read(LOCATION_MESSAGE.fields.locationY);
    }

    get scale(): string | undefined {
        return this.read(LOCATION_MESSAGE.fields.scale);
    }

    get label(): string | undefined {
        return this.read(LOCATION_MESSAGE.fields.label);
    }

    /** [latitude, longitude] as sent */
    get location(): [string | undefined, string | undefined] {
        return [this.locationX, this.locationY];
    }
}

const LINK_MESSAGE = extendSchema(BASE_MESSAGE, {
    typeName: 'LinkMessage',
    discriminator: 'link',
    fields: {
        title: stringField('Title'),
        description: stringField('Description'),
        url: stringField('Url'),
    },
});

export class LinkMessage extends BaseMessage<typeof LINK_MESSAGE.fields> {
    static readonly schema = LINK_MESSAGE;

    constructor(data?: RawData) {
        super(LINK_MESSAGE, data);
    }

    get title(): string | undefined {
        return this.read(LINK_MESSAGE.fields.title);
    }

    get description(): string | undefined {
        return this.read(LINK_MESSAGE.fields.description);
    }

    get url(): string | undefined {
        return this.read(LINK_MESSAGE.fields.url);
    }
}

const MINI_PROGRAM_PAGE_MESSAGE = extendSchema(BASE_MESSAGE, {
    typeName: 'MiniProgramPageMessage',
    discriminator: 'miniprogrampage',
    fields: {
        appId: stringField('AppId'),
        title: stringField('Title'),
        pagePath: stringField('PagePath'),
        thumbUrl: stringField('ThumbUrl'),
        thumbMediaId: stringField('ThumbMediaId'),
    },
});

export class MiniProgramPageMessage extends BaseMessage<typeof MINI_PROGRAM_PAGE_MESSAGE.fields> {
    static readonly schema = MINI_PROGRAM_PAGE_MESSAGE;

    constructor(data?: RawData) {
        super(MINI_PROGRAM_PAGE_MESSAGE, data);
    }

    get appId(): string | undefined {
        return this.read(MINI_PROGRAM_PAGE_MESSAGE.fields.appId);
    }

    get title(): string | undefined {
        return this.read(MINI_PROGRAM_PAGE_MESSAGE.fields.title);
    }

    get pagePath(): string | undefined {
        return this.read(MINI_PROGRAM_PAGE_MESSAGE.fields.pagePath);
    }

    get thumbUrl(): string | undefined {
        return this.read(MINI_PROGRAM_PAGE_MESSAGE.fields.thumbUrl);
    }

    get thumbMediaId(): string | undefined {
        return this.read(MINI_PROGRAM_PAGE_MESSAGE.fields.thumbMediaId);
    }
}

const DEVICE_TEXT_MESSAGE = extendSchema(BASE_MESSAGE, {
    typeName: 'DeviceTextMessage',
    discriminator: 'device_text',
    fields: {
        deviceType: stringField('DeviceType'),
        deviceId: stringField('DeviceID'),
        sessionId: stringField('SessionID'),
        openId: stringField('OpenID'),
        content: base64DecodeField('Content'),
    },
});

/** Data pushed by a connected hardware device; Content arrives base64-encoded */
export class DeviceTextMessage extends BaseMessage<typeof DEVICE_TEXT_MESSAGE.fields> {
    static readonly schema = DEVICE_TEXT_MESSAGE;

    constructor(data?: RawData) {
        super(DEVICE_TEXT_MESSAGE, data);
    }

    get deviceType(): string | undefined {
        return this.read(DEVICE_TEXT_MESSAGE.fields.deviceType);
    }

    get deviceId(): string | undefined {
        return this.read(DEVICE_TEXT_MESSAGE.fields.deviceId);
    }

    get sessionId(): string | undefined {
        return this.read(DEVICE_TEXT_MESSAGE.fields.sessionId);
    }

    get openId(): string | undefined {
        return this.read(DEVICE_TEXT_MESSAGE.fields.openId);
    }

    /** Decoded on every read */
    get content(): string | undefined {
        return this.read(DEVICE_TEXT_MESSAGE.fields.content);
    }
    set content(value: string | undefined) {
        this.write(DEVICE_TEXT_MESSAGE.fields.content, value);
    }
}

const UNKNOWN_MESSAGE = extendSchema(BASE_MESSAGE, {
    typeName: 'UnknownMessage',
    discriminator: 'unknown',
    fields: {},
});

/**
 * Any MsgType (or event) without a registered schema. Only the envelope
 * fields are typed; the rest stays readable through `snapshot()`.
 */
export class UnknownMessage extends BaseMessage {
    static readonly schema = UNKNOWN_MESSAGE;

    constructor(data?: RawData) {
        super(UNKNOWN_MESSAGE, data);
    }
}

// ============================================================================
// REGISTRY
// ============================================================================

export const MESSAGE_TYPES = new TypeRegistry<BaseMessage>('messages')
    .register(TEXT_MESSAGE, (data) => new TextMessage(data))
    .register(IMAGE_MESSAGE, (data) => new ImageMessage(data))
    .register(VOICE_MESSAGE, (data) => new VoiceMessage(data))
    .register(SHORT_VIDEO_MESSAGE, (data) => new ShortVideoMessage(data))
    .register(VIDEO_MESSAGE, (data) => new VideoMessage(data))
    .register(LOCATION_MESSAGE, (data) => new LocationMessage(data))
    .register(LINK_MESSAGE, (data) => new LinkMessage(data))
    .register(MINI_PROGRAM_PAGE_MESSAGE, (data) => new MiniProgramPageMessage(data))
    .register(DEVICE_TEXT_MESSAGE, (data) => new DeviceTextMessage(data))
    .seal();

export const UNKNOWN_MESSAGE_ENTRY = {
    schema: UNKNOWN_MESSAGE,
    create: (data: RawData): BaseMessage => new UnknownMessage(data),
};
