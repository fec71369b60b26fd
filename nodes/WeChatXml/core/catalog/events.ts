// nodes/WeChatXml/core/catalog/events.ts
// MsgType=event pushes, keyed by the lowercased Event element
import { EVENT_TYPE_TAG } from '../constants';
import { floatField, stringField } from '../fields';
import { TypeRegistry } from '../registry';
import { extendSchema } from '../schema';
import type { FieldDefMap, RawData, SchemaDefinition } from '../types';
import { BASE_MESSAGE, BaseMessage } from './messages';

/** EventKey prefix carried by a subscribe that came through a QR code */
export const QR_SCENE_PREFIX = 'qrscene_';

export const BASE_EVENT = extendSchema(BASE_MESSAGE, {
    typeName: 'BaseEvent',
    discriminator: 'event',
    fields: {
        event: stringField(EVENT_TYPE_TAG),
    },
});
export type BaseEventFields = typeof BASE_EVENT.fields;

export abstract class BaseEvent<Fields extends BaseEventFields = BaseEventFields> extends BaseMessage<Fields> {
    protected constructor(schema: SchemaDefinition<Fields>, data?: RawData) {
        super(schema, data);
    }

    /** Event name as registered, e.g. subscribe_scan */
    get event(): string {
        return this.schema.variant ?? this.read(BASE_EVENT.fields.event) ?? '';
    }

    /** Event element exactly as sent, e.g. SCAN */
    get rawEvent(): string | undefined {
        return this.read(BASE_EVENT.fields.event);
    }
}

/** Each event pins its own Event value so records built in code render correctly */
function eventSchema<O extends FieldDefMap>(
    typeName: string,
    variant: string,
    wireEvent: string,
    fields: O,
) {
    return extendSchema(BASE_EVENT, {
        typeName,
        discriminator: 'event',
        variant,
        fields: { event: stringField(EVENT_TYPE_TAG, wireEvent), ...fields },
    });
}

// ============================================================================
// FOLLOW
// ============================================================================

const SUBSCRIBE_EVENT = eventSchema('SubscribeEvent', 'subscribe', 'subscribe', {
    key: stringField('EventKey'),
});

export class SubscribeEvent extends BaseEvent<typeof SUBSCRIBE_EVENT.fields> {
    static readonly schema = SUBSCRIBE_EVENT;

    constructor(data?: RawData) {
        super(SUBSCRIBE_EVENT, data);
    }

    get key(): string | undefined {
        return this.read(SUBSCRIBE_EVENT.fields.key);
    }
}

const UNSUBSCRIBE_EVENT = eventSchema('UnsubscribeEvent', 'unsubscribe', 'unsubscribe', {});

export class UnsubscribeEvent extends BaseEvent<typeof UNSUBSCRIBE_EVENT.fields> {
    static readonly schema = UNSUBSCRIBE_EVENT;

    constructor(data?: RawData) {
        super(UNSUBSCRIBE_EVENT, data);
    }
}

const SCENE_FIELDS = {
    eventKey: stringField('EventKey'),
    ticket: stringField('Ticket'),
};

const SUBSCRIBE_SCAN_EVENT = eventSchema('SubscribeScanEvent', 'subscribe_scan', 'subscribe', SCENE_FIELDS);

/** A follow through a parametric QR code; EventKey is qrscene_<scene id> */
export class SubscribeScanEvent extends BaseEvent<typeof SUBSCRIBE_SCAN_EVENT.fields> {
    static readonly schema = SUBSCRIBE_SCAN_EVENT;

    constructor(data?: RawData) {
        super(SUBSCRIBE_SCAN_EVENT, data);
    }

    get sceneId(): string | undefined {
        const key = this.read(SCENE_FIELDS.eventKey);
        return key?.startsWith(QR_SCENE_PREFIX) ? key.slice(QR_SCENE_PREFIX.length) : key;
    }

    get ticket(): string | undefined {
        return this.read(SCENE_FIELDS.ticket);
    }
}

const SCAN_EVENT = eventSchema('ScanEvent', 'scan', 'SCAN', SCENE_FIELDS);

/** QR code scanned by a user who already follows the account */
export class ScanEvent extends BaseEvent<typeof SCAN_EVENT.fields> {
    static readonly schema = SCAN_EVENT;

    constructor(data?: RawData) {
        super(SCAN_EVENT, data);
    }

    get sceneId(): string | undefined {
        return this.read(SCENE_FIELDS.eventKey);
    }

    get ticket(): string | undefined {
        return this.read(SCENE_FIELDS.ticket);
    }
}

// ============================================================================
// LOCATION & MENU
// ============================================================================

const LOCATION_EVENT = eventSchema('LocationEvent', 'location', 'LOCATION', {
    latitude: floatField('Latitude', 0),
    longitude: floatField('Longitude', 0),
    precision: floatField('Precision', 0),
});

export class LocationEvent extends BaseEvent<typeof LOCATION_EVENT.fields> {
    static readonly schema = LOCATION_EVENT;

    constructor(data?: RawData) {
        super(LOCATION_EVENT, data);
    }

    get latitude(): number {
        return this.read(LOCATION_EVENT.fields.latitude);
    }

    get longitude(): number {
        return this.read(LOCATION_EVENT.fields.longitude);
    }

    get precision(): number {
        return this.read(LOCATION_EVENT.fields.precision);
    }
}

const CLICK_EVENT = eventSchema('ClickEvent', 'click', 'CLICK', {
    key: stringField('EventKey'),
});

export class ClickEvent extends BaseEvent<typeof CLICK_EVENT.fields> {
    static readonly schema = CLICK_EVENT;

    constructor(data?: RawData) {
        super(CLICK_EVENT, data);
    }

    get key(): string | undefined {
        return this.read(CLICK_EVENT.fields.key);
    }
}

const VIEW_EVENT = eventSchema('ViewEvent', 'view', 'VIEW', {
    url: stringField('EventKey'),
    menuId: stringField('MenuId'),
});

export class ViewEvent extends BaseEvent<typeof VIEW_EVENT.fields> {
    static readonly schema = VIEW_EVENT;

    constructor(data?: RawData) {
        super(VIEW_EVENT, data);
    }

    get url(): string | undefined {
        return this.read(VIEW_EVENT.fields.url);
    }

    get menuId(): string | undefined {
        return this.read(VIEW_EVENT.fields.menuId);
    }
}

export const EVENT_TYPES = new TypeRegistry<BaseMessage>('events', EVENT_TYPE_TAG)
    .register(SUBSCRIBE_EVENT, (data) => new SubscribeEvent(data))
    .register(UNSUBSCRIBE_EVENT, (data) => new UnsubscribeEvent(data))
    .register(SUBSCRIBE_SCAN_EVENT, (data) => new SubscribeScanEvent(data))
    .register(SCAN_EVENT, (data) => new ScanEvent(data))
    .register(LOCATION_EVENT, (data) => new LocationEvent(data))
    .register(CLICK_EVENT, (data) => new ClickEvent(data))
    .register(VIEW_EVENT, (data) => new ViewEvent(data))
    .seal();

/** Registry key for an event push: lowercased Event, with QR-code follows split out */
export function eventVariant(event: string, eventKey: string | undefined): string {
    const name = event.toLowerCase();
    if (name === 'subscribe' && eventKey?.startsWith(QR_SCENE_PREFIX)) return 'subscribe_scan';
    return name;
}
