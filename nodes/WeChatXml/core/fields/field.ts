import type { FieldErrorContext } from '../errors';
import type { FieldDef, FieldKind } from '../types';
import { deepClone } from '../utils';

/** Field factory for one kind: without a default the value may be undefined */
export type FieldFactory<V> = {
    (wireName: string): FieldDef<V | undefined>;
    (wireName: string, defaultValue: V): FieldDef<V>;
};

function bindKind<V>(kind: FieldKind<V>, wireName: string, defaultValue: V | undefined): FieldDef<V | undefined> {
    return Object.freeze({
        wireName,
        kind,
        defaultValue,
        read(raw: unknown, ctx: FieldErrorContext): V | undefined {
            const value = kind.read(raw, ctx);
            if (value === undefined && defaultValue !== undefined) return deepClone(defaultValue);
            return value;
        },
    });
}

export function fieldFactory<V>(kind: FieldKind<V>): FieldFactory<V> {
    function make(wireName: string): FieldDef<V | undefined>;
    function make(wireName: string, defaultValue: V): FieldDef<V>;
    function make(wireName: string, defaultValue?: V): FieldDef<V | undefined> {
        return bindKind(kind, wireName, defaultValue);
    }
    return make;
}
