import type { IDataObject, IExecuteFunctions, INodeProperties, INodePropertyOptions } from 'n8n-workflow';
import type { FieldErrorContext } from './errors';

/** Per-instance value store keyed by wire name */
export type RawData = Record<string, unknown>;

export type EncodeContext = FieldErrorContext & {
    /** The bound field's own copy of its default */
    defaultValue: unknown;
};

/**
 * A wire encoding for one family of values.
 *
 * `read` is the converter: it runs on every attribute read of a stored value and
 * returns undefined for an empty one. `decode` turns a parsed wire node into the
 * value stored in RawData; `encode` renders a value (as returned by `read`).
 */
export interface FieldKind<V> {
    readonly name: string;
    read(raw: unknown, ctx: FieldErrorContext): V | undefined;
    decode(node: unknown, ctx: FieldErrorContext): V | undefined;
    encode(value: unknown, ctx: EncodeContext): string;
    /** Construction check on write; never transforms the value */
    check?(value: unknown, ctx: FieldErrorContext): void;
}

/**
 * An unbound field: kind, wire name and default. The attribute name is the key
 * it is declared under in a schema.
 */
export interface FieldDef<T> {
    readonly wireName: string;
    readonly kind: FieldKind<unknown>;
    readonly defaultValue: unknown;
    read(raw: unknown, ctx: FieldErrorContext): T;
}

export type FieldDefMap = { readonly [attribute: string]: FieldDef<unknown> };

export type FieldValue<D> = D extends FieldDef<infer T> ? T : never;

/** Constructor input for a schema's records */
export type FieldInit<F extends FieldDefMap> = { [K in keyof F]?: FieldValue<F[K]> };

/** A field as it sits in one schema, with its own copy of the default */
export interface BoundField extends FieldErrorContext {
    readonly def: FieldDef<unknown>;
    readonly defaultValue: unknown;
}

export interface SchemaDefinition<F extends FieldDefMap> {
    /** Class-style name used in error messages, e.g. TextReply */
    readonly typeName: string;
    /** Value written to the discriminator element */
    readonly discriminator: string;
    /** Element holding the discriminator, MsgType or InfoType */
    readonly discriminatorTag: string;
    /** Registry key when it differs from the discriminator (events) */
    readonly variant?: string;
    readonly parent?: SchemaDefinition<FieldDefMap>;
    readonly fields: F;
    /** Declaration order, inherited fields first */
    readonly order: readonly BoundField[];
    fieldByAttribute(attribute: string): BoundField | undefined;
    fieldByWire(wireName: string): BoundField | undefined;
}

// ============================================================================
// NODE SERVICES
// ============================================================================

export type NonEmptyArray<T> = [T, ...T[]];

/**
 * UI and parameter metadata for one node operation
 */
export type OperationMetadata = {
    uiName: string;            // e.g. "Parse Message"
    subtitleName: string;      // e.g. "parse: message"
    resource: string;
    resourceDisplayName: string;
    description: string;
    params: string[];          // node parameters the operation reads
    active: boolean;
};

export type ServiceOperationRegistry = {
    [operation: string]: OperationMetadata;
};

export type Service = {
    resource: string;
    resourceDisplayName: string;
    resourceDescription: string;
    operationRegistry: ServiceOperationRegistry;
    operationOptions: NonEmptyArray<INodePropertyOptions>;
    extraProperties: INodeProperties[];
    execute(operation: string, ctx: IExecuteFunctions, itemIndex: number): Promise<IDataObject>;
};
