// nodes/WeChatXml/core/catalog/replies.ts
// Passive replies written back as the webhook response body, keyed by MsgType
import { LoggerProxy as Logger } from 'n8n-workflow';
import { MAX_ARTICLES } from '../constants';
import { ArticlesLimitError } from '../errors';
import {
    articlesField,
    base64EncodeField,
    hardwareField,
    imageField,
    integerField,
    musicField,
    stringField,
    taskCardField,
    videoField,
    voiceField,
    type Article,
    type HardwareValue,
    type MusicValue,
    type VideoValue,
} from '../fields';
import { TypeRegistry } from '../registry';
import { SchemaRecord, defineSchema, extendSchema } from '../schema';
import { nowSeconds } from '../time';
import type { FieldInit, SchemaDefinition } from '../types';
import type { BaseMessage } from './messages';

export const BASE_REPLY = defineSchema({
    typeName: 'BaseReply',
    discriminator: 'unknown',
    fields: {
        source: stringField('FromUserName'),
        target: stringField('ToUserName'),
        time: integerField('CreateTime'),
    },
});
export type BaseReplyFields = typeof BASE_REPLY.fields;

const F = BASE_REPLY.fields;

/**
 * Base class for replies. Given the message being answered, the reply is
 * addressed back to its sender from the account it was sent to.
 */
export abstract class BaseReply<Fields extends BaseReplyFields = BaseReplyFields> extends SchemaRecord<Fields> {
    protected constructor(schema: SchemaDefinition<Fields>, init: FieldInit<Fields> = {}, message?: BaseMessage) {
        super(schema);
        this.time = nowSeconds();
        if (message) this.replyTo(message);
        this.assign(init);
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

    /** Epoch seconds */
    get time(): number | undefined {
        return this.read(F.time);
    }
    set time(value: number | undefined) {
        this.write(F.time, value);
    }

    /** Address this reply to the sender of `message` */
    replyTo(message: BaseMessage): this {
        this.source = message.target;
        this.target = message.source;
        return this;
    }

    render(): string {
        if (this.source === undefined || this.target === undefined) {
            Logger.warn(`Rendering ${this.schema.typeName} without FromUserName/ToUserName`, {
                type: this.type,
            });
        }
        return super.render();
    }
}

// ============================================================================
// EMPTY
// ============================================================================

const EMPTY_REPLY = extendSchema(BASE_REPLY, {
    typeName: 'EmptyReply',
    discriminator: 'empty',
    fields: {},
});

/** Tells the platform the message was handled and no answer follows */
export class EmptyReply extends BaseReply {
    static readonly schema = EMPTY_REPLY;

    constructor() {
        super(EMPTY_REPLY);
    }

    render(): string {
        return '';
    }
}

// ============================================================================
// TEXT & MEDIA
// ============================================================================

const TEXT_REPLY = extendSchema(BASE_REPLY, {
    typeName: 'TextReply',
    discriminator: 'text',
    fields: {
        content: stringField('Content'),
    },
});
type TextReplyFields = typeof TEXT_REPLY.fields;

export class TextReply extends BaseReply<TextReplyFields> {
    static readonly schema = TEXT_REPLY;

    constructor(init?: FieldInit<TextReplyFields>, message?: BaseMessage) {
        super(TEXT_REPLY, init, message);
    }

    get content(): string | undefined {
        return this.read(TEXT_REPLY.fields.content);
    }
    set content(value: string | undefined) {
        this.write(TEXT_REPLY.fields.content, value);
    }
}

const IMAGE_REPLY = extendSchema(BASE_REPLY, {
    typeName: 'ImageReply',
    discriminator: 'image',
    fields: {
        image: imageField('Image'),
    },
});
type ImageReplyFields = typeof IMAGE_REPLY.fields;

export class ImageReply extends BaseReply<ImageReplyFields> {
    static readonly schema = IMAGE_REPLY;

    constructor(init?: FieldInit<ImageReplyFields>, message?: BaseMessage) {
        super(IMAGE_REPLY, init, message);
    }

    get image(): string | undefined {
        return this.read(IMAGE_REPLY.fields.image);
    }
    set image(value: string | undefined) {
        this.write(IMAGE_REPLY.fields.image, value);
    }

    get mediaId(): string | undefined {
        return this.image;
    }
    set mediaId(value: string | undefined) {
        this.image = value;
    }
}

const VOICE_REPLY = extendSchema(BASE_REPLY, {
    typeName: 'VoiceReply',
    discriminator: 'voice',
    fields: {
        voice: voiceField('Voice'),
    },
});
type VoiceReplyFields = typeof VOICE_REPLY.fields;

export class VoiceReply extends BaseReply<VoiceReplyFields> {
    static readonly schema = VOICE_REPLY;

    constructor(init?: FieldInit<VoiceReplyFields>, message?: BaseMessage) {
        super(VOICE_REPLY, init, message);
    }

    get voice(): string | undefined {
        return this.read(VOICE_REPLY.fields.voice);
    }
    set voice(value: string | undefined) {
        this.write(VOICE_REPLY.fields.voice, value);
    }

    get mediaId(): string | undefined {
        return this.voice;
    }
    set mediaId(value: string | undefined) {
        this.voice = value;
    }
}

const VIDEO_REPLY = extendSchema(BASE_REPLY, {
    typeName: 'VideoReply',
    discriminator: 'video',
    fields: {
        video: videoField('Video', {}),
    },
});
type VideoReplyFields = typeof VIDEO_REPLY.fields;

export class VideoReply extends BaseReply<VideoReplyFields> {
    static readonly schema = VIDEO_REPLY;

    constructor(init?: FieldInit<VideoReplyFields>, message?: BaseMessage) {
        super(VIDEO_REPLY, init, message);
    }

    /** Detached copy; assign the whole record back to change it */
    get video(): VideoValue {
        return this.read(VIDEO_REPLY.fields.video);
    }
    set video(value: VideoValue) {
        this.write(VIDEO_REPLY.fields.video, value);
    }

    get mediaId(): string | undefined {
        return this.video.mediaId;
    }
    set mediaId(value: string | undefined) {
        this.video = { ...this.video, mediaId: value };
    }

    get title(): string | undefined {
        return this.video.title;
    }
    set title(value: string | undefined) {
        this.video = { ...this.video, title: value };
    }

    get description(): string | undefined {
        return this.video.description;
    }
    set description(value: string | undefined) {
        this.video = { ...this.video, description: value };
    }
}

const MUSIC_REPLY = extendSchema(BASE_REPLY, {
    typeName: 'MusicReply',
    discriminator: 'music',
    fields: {
        music: musicField('Music', {}),
    },
});
type MusicReplyFields = typeof MUSIC_REPLY.fields;

export class MusicReply extends BaseReply<MusicReplyFields> {
    static readonly schema = MUSIC_REPLY;

    constructor(init?: FieldInit<MusicReplyFields>, message?: BaseMessage) {
        super(MUSIC_REPLY, init, message);
    }

    /** Detached copy; assign the whole record back to change it */
    get music(): MusicValue {
        return this.read(MUSIC_REPLY.fields.music);
    }
    set music(value: MusicValue) {
        this.write(MUSIC_REPLY.fields.music, value);
    }

    get thumbMediaId(): string | undefined {
        return this.music.thumbMediaId;
    }
    set thumbMediaId(value: string | undefined) {
        this.music = { ...this.music, thumbMediaId: value };
    }

    get title(): string | undefined {
        return this.music.title;
    }
    set title(value: string | undefined) {
        this.music = { ...this.music, title: value };
    }

    get description(): string | undefined {
        return this.music.description;
    }
    set description(value: string | undefined) {
        this.music = { ...this.music, description: value };
    }

    get musicUrl(): string | undefined {
        return this.music.musicUrl;
    }
    set musicUrl(value: string | undefined) {
        this.music = { ...this.music, musicUrl: value };
    }

    get hqMusicUrl(): string | undefined {
        return this.music.hqMusicUrl;
    }
    set hqMusicUrl(value: string | undefined) {
        this.music = { ...this.music, hqMusicUrl: value };
    }
}

const ARTICLES_REPLY = extendSchema(BASE_REPLY, {
    typeName: 'ArticlesReply',
    discriminator: 'news',
    fields: {
        articles: articlesField('Articles', []),
    },
});
type ArticlesReplyFields = typeof ARTICLES_REPLY.fields;

export class ArticlesReply extends BaseReply<ArticlesReplyFields> {
    static readonly schema = ARTICLES_REPLY;

    constructor(init?: FieldInit<ArticlesReplyFields>, message?: BaseMessage) {
        super(ARTICLES_REPLY, init, message);
    }

    get articles(): Article[] {
        return this.read(ARTICLES_REPLY.fields.articles);
    }
    set articles(value: Article[]) {
        this.write(ARTICLES_REPLY.fields.articles, value);
    }

    addArticle(article: Article): this {
        const articles = this.articles;
        if (articles.length >= MAX_ARTICLES) {
            throw new ArticlesLimitError(articles.length + 1, MAX_ARTICLES);
        }
        articles.push(article);
        this.articles = articles;
        return this;
    }
}

const TRANSFER_CUSTOMER_SERVICE_REPLY = extendSchema(BASE_REPLY, {
    typeName: 'TransferCustomerServiceReply',
    discriminator: 'transfer_customer_service',
    fields: {},
});

/** Hands the conversation over to the customer-service queue */
export class TransferCustomerServiceReply extends BaseReply {
    static readonly schema = TRANSFER_CUSTOMER_SERVICE_REPLY;

    constructor(init?: FieldInit<BaseReplyFields>, message?: BaseMessage) {
        super(TRANSFER_CUSTOMER_SERVICE_REPLY, init, message);
    }
}

// ============================================================================
// DEVICES
// ============================================================================

const DEVICE_FIELDS = {
    deviceType: stringField('DeviceType'),
    deviceId: stringField('DeviceID'),
};

const DEVICE_TEXT_REPLY = extendSchema(BASE_REPLY, {
    typeName: 'DeviceTextReply',
    discriminator: 'device_text',
    fields: {
        ...DEVICE_FIELDS,
        sessionId: stringField('SessionID'),
        content: base64EncodeField('Content'),
    },
});
type DeviceTextReplyFields = typeof DEVICE_TEXT_REPLY.fields;

/** Content is stored as given and base64-encoded on every read */
export class DeviceTextReply extends BaseReply<DeviceTextReplyFields> {
    static readonly schema = DEVICE_TEXT_REPLY;

    constructor(init?: FieldInit<DeviceTextReplyFields>, message?: BaseMessage) {
        super(DEVICE_TEXT_REPLY, init, message);
    }

    get deviceType(): string | undefined {
        return this.read(DEVICE_FIELDS.deviceType);
    }

    get deviceId(): string | undefined {
        return this.read(DEVICE_FIELDS.deviceId);
    }

    get sessionId(): string | undefined {
        return this.read(DEVICE_TEXT_REPLY.fields.sessionId);
    }

    get content(): string | undefined {
        return this.read(DEVICE_TEXT_REPLY.fields.content);
    }
    set content(value: string | undefined) {
        this.write(DEVICE_TEXT_REPLY.fields.content, value);
    }
}

const DEVICE_EVENT_REPLY = extendSchema(BASE_REPLY, {
    typeName: 'DeviceEventReply',
    discriminator: 'device_event',
    fields: {
        event: stringField('Event'),
        ...DEVICE_FIELDS,
        sessionId: stringField('SessionID'),
        content: base64EncodeField('Content'),
    },
});
type DeviceEventReplyFields = typeof DEVICE_EVENT_REPLY.fields;

export class DeviceEventReply extends BaseReply<DeviceEventReplyFields> {
    static readonly schema = DEVICE_EVENT_REPLY;

    constructor(init?: FieldInit<DeviceEventReplyFields>, message?: BaseMessage) {
        super(DEVICE_EVENT_REPLY, init, message);
    }

    get event(): string | undefined {
        return this.read(DEVICE_EVENT_REPLY.fields.event);
    }

    get deviceType(): string | undefined {
        return this.read(DEVICE_FIELDS.deviceType);
    }

    get deviceId(): string | undefined {
        return this.read(DEVICE_FIELDS.deviceId);
    }

    get sessionId(): string | undefined {
        return this.read(DEVICE_EVENT_REPLY.fields.sessionId);
    }

    get content(): string | undefined {
        return this.read(DEVICE_EVENT_REPLY.fields.content);
    }
    set content(value: string | undefined) {
        this.write(DEVICE_EVENT_REPLY.fields.content, value);
    }
}

const DEVICE_STATUS_REPLY = extendSchema(BASE_REPLY, {
    typeName: 'DeviceStatusReply',
    discriminator: 'device_status',
    fields: {
        ...DEVICE_FIELDS,
        status: integerField('DeviceStatus'),
    },
});
type DeviceStatusReplyFields = typeof DEVICE_STATUS_REPLY.fields;

export class DeviceStatusReply extends BaseReply<DeviceStatusReplyFields> {
    static readonly schema = DEVICE_STATUS_REPLY;

    constructor(init?: FieldInit<DeviceStatusReplyFields>, message?: BaseMessage) {
        super(DEVICE_STATUS_REPLY, init, message);
    }

    get deviceType(): string | undefined {
        return this.read(DEVICE_FIELDS.deviceType);
    }

    get deviceId(): string | undefined {
        return this.read(DEVICE_FIELDS.deviceId);
    }

    get status(): number | undefined {
        return this.read(DEVICE_STATUS_REPLY.fields.status);
    }
    set status(value: number | undefined) {
        this.write(DEVICE_STATUS_REPLY.fields.status, value);
    }
}

const HARDWARE_REPLY = extendSchema(BASE_REPLY, {
    typeName: 'HardwareReply',
    discriminator: 'hardware',
    fields: {
        funcFlag: integerField('FuncFlag', 0),
        hardware: hardwareField('HardWare'),
    },
});
type HardwareReplyFields = typeof HARDWARE_REPLY.fields;

/** WeChat Sport ranking card; renders view=myrank, action=ranklist unless set */
export class HardwareReply extends BaseReply<HardwareReplyFields> {
    static readonly schema = HARDWARE_REPLY;

    constructor(init?: FieldInit<HardwareReplyFields>, message?: BaseMessage) {
        super(HARDWARE_REPLY, init, message);
    }

    get funcFlag(): number {
        return this.read(HARDWARE_REPLY.fields.funcFlag);
    }
    set funcFlag(value: number) {
        this.write(HARDWARE_REPLY.fields.funcFlag, value);
    }

    get hardware(): HardwareValue | undefined {
        return this.read(HARDWARE_REPLY.fields.hardware);
    }
    set hardware(value: HardwareValue | undefined) {
        this.write(HARDWARE_REPLY.fields.hardware, value);
    }
}

const TASK_CARD_REPLY = extendSchema(BASE_REPLY, {
    typeName: 'TaskCardReply',
    discriminator: 'update_taskcard',
    fields: {
        replaceName: taskCardField('TaskCard'),
    },
});
type TaskCardReplyFields = typeof TASK_CARD_REPLY.fields;

/** Replaces the button label on a task card message */
export class TaskCardReply extends BaseReply<TaskCardReplyFields> {
    static readonly schema = TASK_CARD_REPLY;

    constructor(init?: FieldInit<TaskCardReplyFields>, message?: BaseMessage) {
        super(TASK_CARD_REPLY, init, message);
    }

    get replaceName(): string | undefined {
        return this.read(TASK_CARD_REPLY.fields.replaceName);
    }
    set replaceName(value: string | undefined) {
        this.write(TASK_CARD_REPLY.fields.replaceName, value);
    }
}

// ============================================================================
// REGISTRY
// ============================================================================

// Factories stamp the current time; a CreateTime in the data overrides it
export const REPLY_TYPES = new TypeRegistry<BaseReply>('replies')
    .register(EMPTY_REPLY, (data) => new EmptyReply().load(data))
    .register(TEXT_REPLY, (data) => new TextReply().load(data))
    .register(IMAGE_REPLY, (data) => new ImageReply().load(data))
    .register(VOICE_REPLY, (data) => new VoiceReply().load(data))
    .register(VIDEO_REPLY, (data) => new VideoReply().load(data))
    .register(MUSIC_REPLY, (data) => new MusicReply().load(data))
    .register(ARTICLES_REPLY, (data) => new ArticlesReply().load(data))
    .register(TRANSFER_CUSTOMER_SERVICE_REPLY, (data) => new TransferCustomerServiceReply().load(data))
    .register(DEVICE_TEXT_REPLY, (data) => new DeviceTextReply().load(data))
    .register(DEVICE_EVENT_REPLY, (data) => new DeviceEventReply().load(data))
    .register(DEVICE_STATUS_REPLY, (data) => new DeviceStatusReply().load(data))
    .register(HARDWARE_REPLY, (data) => new HardwareReply().load(data))
    .register(TASK_CARD_REPLY, (data) => new TaskCardReply().load(data))
    .seal();
