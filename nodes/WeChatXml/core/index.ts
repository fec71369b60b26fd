// nodes/WeChatXml/core/index.ts

// Configuration & errors
export * from './constants';
export * from './errors';
export * from './types';

// Values & field kinds
export { ZonedTimestamp } from './time';
export * from './fields';

// Schemas & registries
export { SchemaRecord, defineSchema, extendSchema, type SchemaOptions } from './schema';
export { TypeRegistry, type RegistryEntry } from './registry';

// Catalog
export * from './catalog/messages';
export * from './catalog/events';
export * from './catalog/components';
export * from './catalog/replies';

// Codec
export {
    createReply,
    decodeElements,
    deserializeReply,
    parse,
    parseComponentEvent,
    parseMessage,
    render,
} from './codec';
