// nodes/WeChatXml/core/service-utils.ts
import {
    NodeOperationError,
    type GenericValue,
    type IDataObject,
    type IExecuteFunctions,
    type INodeProperties,
    type INodePropertyOptions,
} from 'n8n-workflow';
import type { FieldDefMap, NonEmptyArray, ServiceOperationRegistry } from './types';
import type { SchemaRecord } from './schema';
import { ZonedTimestamp } from './time';
import { toText } from './utils';
import { isPlainObject } from './xml';

// ============================================================================
// PARAMETERS
// ============================================================================

export function getStringParam(ctx: IExecuteFunctions, name: string, itemIndex: number): string {
    const value = ctx.getNodeParameter(name, itemIndex, '');
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    throw new NodeOperationError(ctx.getNode(), `Parameter "${name}" must be text`, { itemIndex });
}

export function getBooleanParam(ctx: IExecuteFunctions, name: string, itemIndex: number): boolean {
    const value = ctx.getNodeParameter(name, itemIndex, false);
    if (typeof value === 'boolean') return value;
    throw new NodeOperationError(ctx.getNode(), `Parameter "${name}" must be a boolean`, { itemIndex });
}

/**
 * JSON parameters arrive as text or already parsed, depending on how the
 * value was entered
 */
export function getJsonParam(ctx: IExecuteFunctions, name: string, itemIndex: number): unknown {
    const value = ctx.getNodeParameter(name, itemIndex, '');
    if (typeof value !== 'string') return value;
    if (value.trim() === '') return undefined;
    try {
        const parsed: unknown = JSON.parse(value);
        return parsed;
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new NodeOperationError(ctx.getNode(), `Parameter "${name}" is not valid JSON: ${reason}`, { itemIndex });
    }
}

// ============================================================================
// OUTPUT
// ============================================================================

/** Item-safe copy of a field value: timestamps become ISO strings */
export function toDataValue(value: unknown): GenericValue {
    if (value instanceof ZonedTimestamp) return value.toISOString();
    if (value instanceof Uint8Array) return toText(value);
    if (typeof value === 'bigint') return value.toString();
    if (Array.isArray(value)) return value.map((v) => toDataValue(v));
    if (isPlainObject(value)) {
        const out: IDataObject = {};
        for (const [key, v] of Object.entries(value)) out[key] = toDataValue(v);
        return out;
    }
    if (value === null || value === undefined) return value;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    return String(value);
}

/** `{ type, ...attributes }` of a message, event or reply */
export function toDataObject(record: SchemaRecord<FieldDefMap>): IDataObject {
    const out: IDataObject = {};
    for (const [key, value] of Object.entries(record.toJSON())) out[key] = toDataValue(value);
    return out;
}

// ============================================================================
// UI PROPERTY GENERATION
// ============================================================================

/**
 * Generate operation options from an operation registry (active entries only)
 */
export function generateOperationOptionsFromRegistry(
    registry: ServiceOperationRegistry,
): NonEmptyArray<INodePropertyOptions> {
    const [first, ...rest] = Object.entries(registry)
        .filter(([, meta]) => meta.active)
        .map(([op, meta]) => ({
            name: meta.uiName,
            value: op,
            action: meta.uiName,
            description: meta.description,
        }));
    if (!first) throw new Error('Operation registry has no active operations');
    return [first, ...rest];
}

/** operation → subtitle, for the node's subtitle expression */
export function buildSubtitleLookup(registry: ServiceOperationRegistry): Record<string, string> {
    return Object.fromEntries(Object.entries(registry).map(([op, meta]) => [op, meta.subtitleName]));
}

export function createStringProperty(
    name: string,
    displayName: string,
    description: string,
    resource: string,
    operations: string[],
    required: boolean = false,
): INodeProperties {
    return {
        displayName,
        name,
        type: 'string',
        default: '',
        required,
        description,
        displayOptions: { show: { resource: [resource], operation: operations } },
    };
}

export function createXmlProperty(
    name: string,
    displayName: string,
    description: string,
    resource: string,
    operations: string[],
    required: boolean = false,
): INodeProperties {
    return {
        ...createStringProperty(name, displayName, description, resource, operations, required),
        typeOptions: { rows: 6 },
    };
}

export function createJsonProperty(
    name: string,
    displayName: string,
    description: string,
    resource: string,
    operations: string[],
    defaultValue: string,
    extraShow: Record<string, string[]> = {},
): INodeProperties {
    return {
        displayName,
        name,
        type: 'json',
        default: defaultValue,
        description,
        displayOptions: { show: { resource: [resource], operation: operations, ...extraShow } },
    };
}

export function createBooleanProperty(
    name: string,
    displayName: string,
    description: string,
    resource: string,
    operations: string[],
    defaultValue: boolean = false,
): INodeProperties {
    return {
        displayName,
        name,
        type: 'boolean',
        default: defaultValue,
        description,
        displayOptions: { show: { resource: [resource], operation: operations } },
    };
}

export function createOptionsProperty(
    name: string,
    displayName: string,
    description: string,
    resource: string,
    operations: string[],
    options: INodePropertyOptions[],
    defaultValue: string,
): INodeProperties {
    return {
        displayName,
        name,
        type: 'options',
        options,
        default: defaultValue,
        description,
        displayOptions: { show: { resource: [resource], operation: operations } },
    };
}
