// nodes/WeChatXml/core/catalog/components.ts
// Open-platform (third-party component) notifications, keyed by InfoType
import { COMPONENT_TYPE_TAG } from '../constants';
import { dateTimeField, stringField } from '../fields';
import { TypeRegistry } from '../registry';
import { SchemaRecord, defineSchema, extendSchema } from '../schema';
import type { ZonedTimestamp } from '../time';
import type { RawData, SchemaDefinition } from '../types';

export const BASE_COMPONENT_EVENT = defineSchema({
    typeName: 'BaseComponentEvent',
    discriminator: 'unknown',
    discriminatorTag: COMPONENT_TYPE_TAG,
    fields: {
        appId: stringField('AppId'),
        createTime: dateTimeField('CreateTime'),
    },
});
export type BaseComponentEventFields = typeof BASE_COMPONENT_EVENT.fields;

export abstract class BaseComponentEvent<
    Fields extends BaseComponentEventFields = BaseComponentEventFields,
> extends SchemaRecord<Fields> {
    protected constructor(schema: SchemaDefinition<Fields>, data: RawData = {}) {
        super(schema, data);
    }

    /** The component's own AppId */
    get appId(): string | undefined {
        return this.read(BASE_COMPONENT_EVENT.fields.appId);
    }

    get createTime(): ZonedTimestamp | undefined {
        return this.read(BASE_COMPONENT_EVENT.fields.createTime);
    }
}

const VERIFY_TICKET_EVENT = extendSchema(BASE_COMPONENT_EVENT, {
    typeName: 'ComponentVerifyTicketEvent',
    discriminator: 'component_verify_ticket',
    fields: {
        verifyTicket: stringField('ComponentVerifyTicket'),
    },
});

/** Pushed every ten minutes; the ticket is needed to fetch component tokens */
export class ComponentVerifyTicketEvent extends BaseComponentEvent<typeof VERIFY_TICKET_EVENT.fields> {
    static readonly schema = VERIFY_TICKET_EVENT;

    constructor(data?: RawData) {
        super(VERIFY_TICKET_EVENT, data);
    }

    get verifyTicket(): string | undefined {
        return this.read(VERIFY_TICKET_EVENT.fields.verifyTicket);
    }
}

const UNAUTHORIZED_EVENT = extendSchema(BASE_COMPONENT_EVENT, {
    typeName: 'ComponentUnauthorizedEvent',
    discriminator: 'unauthorized',
    fields: {
        authorizerAppId: stringField('AuthorizerAppid'),
    },
});

export class ComponentUnauthorizedEvent extends BaseComponentEvent<typeof UNAUTHORIZED_EVENT.fields> {
    static readonly schema = UNAUTHORIZED_EVENT;

    constructor(data?: RawData) {
        super(UNAUTHORIZED_EVENT, data);
    }

    get authorizerAppId(): string | undefined {
        return this.read(UNAUTHORIZED_EVENT.fields.authorizerAppId);
    }
}

const AUTHORIZATION_FIELDS = {
    authorizerAppId: stringField('AuthorizerAppid'),
    authorizationCode: stringField('AuthorizationCode'),
    authorizationCodeExpiredTime: stringField('AuthorizationCodeExpiredTime'),
    preAuthCode: stringField('PreAuthCode'),
};

const AUTHORIZED_EVENT = extendSchema(BASE_COMPONENT_EVENT, {
    typeName: 'ComponentAuthorizedEvent',
    discriminator: 'authorized',
    fields: AUTHORIZATION_FIELDS,
});

const UPDATE_AUTHORIZED_EVENT = extendSchema(BASE_COMPONENT_EVENT, {
    typeName: 'ComponentUpdateAuthorizedEvent',
    discriminator: 'updateauthorized',
    fields: AUTHORIZATION_FIELDS,
});

type AuthorizationFields = typeof AUTHORIZED_EVENT.fields;

export class ComponentAuthorizedEvent extends BaseComponentEvent<AuthorizationFields> {
    static readonly schema = AUTHORIZED_EVENT;

    constructor(data?: RawData, schema: SchemaDefinition<AuthorizationFields> = AUTHORIZED_EVENT) {
        super(schema, data);
    }

    get authorizerAppId(): string | undefined {
        return this.read(AUTHORIZATION_FIELDS.authorizerAppId);
    }

    get authorizationCode(): string | undefined {
        return this.read(AUTHORIZATION_FIELDS.authorizationCode);
    }

    get authorizationCodeExpiredTime(): string | undefined {
        return this.read(AUTHORIZATION_FIELDS.authorizationCodeExpiredTime);
    }

    get preAuthCode(): string | undefined {
        return this.read(AUTHORIZATION_FIELDS.preAuthCode);
    }
}

export class ComponentUpdateAuthorizedEvent extends ComponentAuthorizedEvent {
    static readonly schema = UPDATE_AUTHORIZED_EVENT;

    constructor(data?: RawData) {
        super(data, UPDATE_AUTHORIZED_EVENT);
    }
}

const UNKNOWN_COMPONENT_EVENT = extendSchema(BASE_COMPONENT_EVENT, {
    typeName: 'UnknownComponentEvent',
    discriminator: 'unknown',
    fields: {},
});

export class UnknownComponentEvent extends BaseComponentEvent {
    static readonly schema = UNKNOWN_COMPONENT_EVENT;

    constructor(data?: RawData) {
        super(UNKNOWN_COMPONENT_EVENT, data);
    }
}

export const COMPONENT_TYPES = new TypeRegistry<BaseComponentEvent>('components', COMPONENT_TYPE_TAG)
    .register(VERIFY_TICKET_EVENT, (data) => new ComponentVerifyTicketEvent(data))
    .register(UNAUTHORIZED_EVENT, (data) => new ComponentUnauthorizedEvent(data))
    .register(AUTHORIZED_EVENT, (data) => new ComponentAuthorizedEvent(data))
    .register(UPDATE_AUTHORIZED_EVENT, (data) => new ComponentUpdateAuthorizedEvent(data))
    .seal();

export const UNKNOWN_COMPONENT_ENTRY = {
    schema: UNKNOWN_COMPONENT_EVENT,
    create: (data: RawData): BaseComponentEvent => new UnknownComponentEvent(data),
};
