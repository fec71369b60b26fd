import { MESSAGE_TYPE_TAG } from './constants';
import { RegistryError } from './errors';
import type { FieldDefMap, RawData, SchemaDefinition } from './types';

export type RegistryEntry<R> = {
    schema: SchemaDefinition<FieldDefMap>;
    create: (data: RawData) => R;
};

/**
 * Discriminator → schema/factory table. Filled while the catalog modules load,
 * then sealed; lookups afterwards are read-only.
 */
export class TypeRegistry<R> {
    private readonly entries = new Map<string, RegistryEntry<R>>();
    private sealed = false;

    constructor(
        readonly name: string,
        /** Element the discriminator is read from */
        readonly discriminatorTag: string = MESSAGE_TYPE_TAG,
    ) {}

    /** Key defaults to the schema's variant, then its discriminator */
    register(schema: SchemaDefinition<FieldDefMap>, create: (data: RawData) => R, key?: string): this {
        const discriminator = key ?? schema.variant ?? schema.discriminator;
        if (this.sealed) {
            throw new RegistryError(this.name, discriminator, 'registry is sealed');
        }
        if (this.entries.has(discriminator)) {
            throw new RegistryError(this.name, discriminator, 'already registered');
        }
        this.entries.set(discriminator, { schema, create });
        return this;
    }

    seal(): this {
        this.sealed = true;
        return this;
    }

    get isSealed(): boolean {
        return this.sealed;
    }

    resolve(discriminator: string): RegistryEntry<R> | undefined {
        return this.entries.get(discriminator);
    }

    has(discriminator: string): boolean {
        return this.entries.has(discriminator);
    }

    keys(): string[] {
        return [...this.entries.keys()];
    }
}
