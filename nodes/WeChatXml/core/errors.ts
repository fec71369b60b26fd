/**
 * Base class for every failure raised by the codec.
 */
export class WeChatXmlError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'WeChatXmlError';
    }
}

/**
 * The envelope or one of its values could not be interpreted.
 */
export class DecodeError extends WeChatXmlError {
    constructor(message: string) {
        super(message);
        this.name = 'DecodeError';
    }
}

export class EnvelopeDecodeError extends DecodeError {
    constructor(
        public readonly reason: string,
        public readonly envelopeSnippet?: string,
    ) {
        super(`Bad envelope: ${reason}`);
        this.name = 'EnvelopeDecodeError';
    }
}

export class UnknownReplyTypeError extends DecodeError {
    constructor(public readonly discriminator: string) {
        super(`Unknown reply type "${discriminator}"`);
        this.name = 'UnknownReplyTypeError';
    }
}

/**
 * A wire value did not fit its field kind.
 */
export class FieldDecodeError extends DecodeError {
    constructor(
        public readonly schema: string,
        public readonly attribute: string,
        public readonly wireName: string,
        public readonly detail: string,
    ) {
        super(formatFieldMessage(schema, attribute, wireName, detail));
        this.name = 'FieldDecodeError';
    }
}

/**
 * A stored value could not be coerced on read.
 */
export class FieldValueError extends WeChatXmlError {
    constructor(
        public readonly schema: string,
        public readonly attribute: string,
        public readonly wireName: string,
        public readonly detail: string,
    ) {
        super(formatFieldMessage(schema, attribute, wireName, detail));
        this.name = 'FieldValueError';
    }
}

export class ArticlesLimitError extends WeChatXmlError {
    constructor(
        public readonly count: number,
        public readonly limit: number,
    ) {
        super(`Can't add more than ${limit} articles in an ArticlesReply (got ${count})`);
        this.name = 'ArticlesLimitError';
    }
}

export class ReplyConstructionError extends WeChatXmlError {
    constructor(public readonly received: string) {
        super(`Can't create a reply from ${received}`);
        this.name = 'ReplyConstructionError';
    }
}

export class SchemaDefinitionError extends WeChatXmlError {
    constructor(
        public readonly schema: string,
        detail: string,
    ) {
        super(`[${schema}] ${detail}`);
        this.name = 'SchemaDefinitionError';
    }
}

export class RegistryError extends WeChatXmlError {
    constructor(
        public readonly registry: string,
        public readonly discriminator: string,
        detail: string,
    ) {
        super(`[${registry}] ${discriminator}: ${detail}`);
        this.name = 'RegistryError';
    }
}

function formatFieldMessage(schema: string, attribute: string, wireName: string, detail: string): string {
    return `[${schema}] ${attribute} <${wireName}>: ${detail}`;
}

/** Shared context the field kinds receive for error reporting */
export type FieldErrorContext = {
    schema: string;
    attribute: string;
    wireName: string;
};

/**
 * Factory methods for the errors raised from inside field kinds
 */
export class CodecErrorFactory {
    static decode(ctx: FieldErrorContext, detail: string): FieldDecodeError {
        return new FieldDecodeError(ctx.schema, ctx.attribute, ctx.wireName, detail);
    }

    static value(ctx: FieldErrorContext, detail: string): FieldValueError {
        return new FieldValueError(ctx.schema, ctx.attribute, ctx.wireName, detail);
    }

    static envelope(reason: string, xml?: string): EnvelopeDecodeError {
        const snippet = xml === undefined ? undefined : xml.length > 200 ? xml.slice(0, 200) + '…' : xml;
        return new EnvelopeDecodeError(reason, snippet);
    }

    /** Re-raise a read-time failure as a decode failure for the same field */
    static asDecode(error: unknown, ctx: FieldErrorContext): FieldDecodeError {
        if (error instanceof FieldDecodeError) return error;
        const detail = error instanceof FieldValueError ? error.detail : error instanceof Error ? error.message : String(error);
        return CodecErrorFactory.decode(ctx, detail);
    }
}
