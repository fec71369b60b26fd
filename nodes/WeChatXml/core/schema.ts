import { ENVELOPE_ROOT, MESSAGE_TYPE_TAG } from './constants';
import { SchemaDefinitionError } from './errors';
import type { BoundField, FieldDef, FieldDefMap, RawData, SchemaDefinition } from './types';
import { deepClone } from './utils';
import { textElement } from './xml';

export type SchemaOptions<O extends FieldDefMap> = {
    typeName: string;
    discriminator: string;
    /** Defaults to MsgType, or to the parent's tag */
    discriminatorTag?: string;
    variant?: string;
    fields: O;
};

function bindField(schema: string, attribute: string, def: FieldDef<unknown>, defaultValue: unknown): BoundField {
    return Object.freeze({
        schema,
        attribute,
        wireName: def.wireName,
        def,
        defaultValue: deepClone(defaultValue),
    });
}

function buildSchema<F extends FieldDefMap>(
    options: SchemaOptions<FieldDefMap>,
    discriminatorTag: string,
    fields: F,
    inherited: readonly BoundField[],
    parent?: SchemaDefinition<FieldDefMap>,
): SchemaDefinition<F> {
    const { typeName } = options;
    const order: BoundField[] = inherited.map((f) => bindField(typeName, f.attribute, f.def, f.defaultValue));
    for (const [attribute, def] of Object.entries(options.fields)) {
        order.push(bindField(typeName, attribute, def, def.defaultValue));
    }

    const byAttribute = new Map<string, BoundField>();
    const byWire = new Map<string, BoundField>();
    for (const field of order) {
        if (field.wireName === discriminatorTag) {
            throw new SchemaDefinitionError(typeName, `field "${field.attribute}" uses the discriminator element <${discriminatorTag}>`);
        }
        const clash = byWire.get(field.wireName);
        if (clash) {
            throw new SchemaDefinitionError(typeName, `fields "${clash.attribute}" and "${field.attribute}" share <${field.wireName}>`);
        }
        byAttribute.set(field.attribute, field);
        byWire.set(field.wireName, field);
    }

    return Object.freeze({
        typeName,
        discriminator: options.discriminator,
        discriminatorTag,
        variant: options.variant,
        parent,
        fields,
        order: Object.freeze(order),
        fieldByAttribute: (attribute: string) => byAttribute.get(attribute),
        fieldByWire: (wireName: string) => byWire.get(wireName),
    });
}

/** A root schema with no inherited fields */
export function defineSchema<O extends FieldDefMap>(options: SchemaOptions<O>): SchemaDefinition<O> {
    return buildSchema(options, options.discriminatorTag ?? MESSAGE_TYPE_TAG, options.fields, []);
}

/**
 * Parent fields first, each copied with its own default, then the new fields.
 * A field redeclared here replaces the inherited one and moves to the end.
 */
export function extendSchema<P extends FieldDefMap, O extends FieldDefMap>(
    parent: SchemaDefinition<P>,
    options: SchemaOptions<O>,
): SchemaDefinition<P & O> {
    const inherited = parent.order.filter((f) => !(f.attribute in options.fields));
    return buildSchema(
        options,
        options.discriminatorTag ?? parent.discriminatorTag,
        { ...parent.fields, ...options.fields },
        inherited,
        parent,
    );
}

/**
 * One message, event or reply: a schema plus the RawData it exclusively owns.
 * Subclasses expose typed accessors through `read` and `write`.
 */
export abstract class SchemaRecord<F extends FieldDefMap> {
    readonly schema: SchemaDefinition<F>;
    protected readonly data: RawData;

    /** `data` is copied; the record never shares its store with the caller */
    protected constructor(schema: SchemaDefinition<F>, data: RawData = {}) {
        this.schema = schema;
        this.data = deepClone(data);
    }

    /** The discriminator value, e.g. "text" */
    get type(): string {
        return this.schema.discriminator;
    }

    protected read<T>(def: FieldDef<T>): T {
        const field = this.boundFor(def);
        return def.read(this.materialize(field), field);
    }

    protected write<T>(def: FieldDef<T>, value: T): void {
        this.store(this.boundFor(def), value);
    }

    /** Read by attribute name, converted */
    get(attribute: string): unknown {
        const field = this.fieldFor(attribute);
        return field.def.read(this.materialize(field), field);
    }

    /** Write by attribute name, stored verbatim */
    set(attribute: string, value: unknown): void {
        this.store(this.fieldFor(attribute), value);
    }

    has(attribute: string): boolean {
        const field = this.schema.fieldByAttribute(attribute);
        return field !== undefined && this.data[field.wireName] != null;
    }

    assign(init: Readonly<Record<string, unknown>>): this {
        for (const [attribute, value] of Object.entries(init)) {
            if (value !== undefined) this.set(attribute, value);
        }
        return this;
    }

    /** Merge a copy of already-decoded wire values */
    load(data: RawData): this {
        Object.assign(this.data, deepClone(data));
        return this;
    }

    /** Deep copy of the backing store, safe to hand to another worker */
    snapshot(): RawData {
        return deepClone(this.data);
    }

    render(): string {
        const nodes = [textElement(this.schema.discriminatorTag, this.schema.discriminator)];
        for (const field of this.schema.order) {
            const value = field.def.read(this.materialize(field), field);
            nodes.push(field.def.kind.encode(value, field));
        }
        return `<${ENVELOPE_ROOT}>\n${nodes.join('\n')}\n</${ENVELOPE_ROOT}>`;
    }

    /** Attribute values as read; 64-bit ids past the safe range become digit strings */
    toJSON(): Record<string, unknown> {
        const out: Record<string, unknown> = { type: this.type };
        for (const field of this.schema.order) {
            const value = this.get(field.attribute);
            out[field.attribute] = typeof value === 'bigint' ? value.toString() : value;
        }
        return out;
    }

    toString(): string {
        return this.render();
    }

    private fieldFor(attribute: string): BoundField {
        const field = this.schema.fieldByAttribute(attribute);
        if (!field) throw new SchemaDefinitionError(this.schema.typeName, `unknown attribute "${attribute}"`);
        return field;
    }

    private boundFor(def: FieldDef<unknown>): BoundField {
        const field = this.schema.fieldByWire(def.wireName);
        if (!field) throw new SchemaDefinitionError(this.schema.typeName, `no field is bound to <${def.wireName}>`);
        return field;
    }

    /** Absent values become a private copy of the default, stored for later reads */
    private materialize(field: BoundField): unknown {
        const current = this.data[field.wireName];
        if (current !== undefined && current !== null) return current;
        const value = deepClone(field.defaultValue);
        if (value !== undefined) this.data[field.wireName] = value;
        return value;
    }

    private store(field: BoundField, value: unknown): void {
        field.def.kind.check?.(value, field);
        this.data[field.wireName] = value;
    }
}
