import type { IDataObject } from 'n8n-workflow';
import { parseComponentEvent, parseMessage } from '../core/codec';
import { DebugManager } from '../core/debug';
import {
    createBooleanProperty,
    createXmlProperty,
    generateOperationOptionsFromRegistry,
    getBooleanParam,
    getStringParam,
    toDataObject,
} from '../core/service-utils';
import type { Service, ServiceOperationRegistry } from '../core/types';

const RESOURCE = 'message';
const RESOURCE_DISPLAY_NAME = 'Message';

/** ─ Centralized Operation Registry ─ */
const OPERATION_REGISTRY: ServiceOperationRegistry = {
    parseMessage: {
        uiName: 'Parse Message',
        subtitleName: 'parse: message',
        resource: RESOURCE,
        resourceDisplayName: RESOURCE_DISPLAY_NAME,
        description: 'Parse a decrypted webhook payload into a message or event',
        params: ['xml', 'includeDebugInfo'],
        active: true,
    },
    parseComponentEvent: {
        uiName: 'Parse Component Event',
        subtitleName: 'parse: component event',
        resource: RESOURCE,
        resourceDisplayName: RESOURCE_DISPLAY_NAME,
        description: 'Parse an open-platform notification keyed by InfoType',
        params: ['xml', 'includeDebugInfo'],
        active: true,
    },
};

const OPERATIONS = Object.keys(OPERATION_REGISTRY);

export function parseMessageItem(xml: string, includeDebugInfo = false): IDataObject {
    const message = parseMessage(xml);
    return {
        success: true,
        resource: RESOURCE,
        operation: 'parseMessage',
        message: toDataObject(message),
        ...(includeDebugInfo ? DebugManager.createDebugOutput('parseMessage', xml, message) : {}),
    };
}

export function parseComponentEventItem(xml: string, includeDebugInfo = false): IDataObject {
    const event = parseComponentEvent(xml);
    return {
        success: true,
        resource: RESOURCE,
        operation: 'parseComponentEvent',
        event: toDataObject(event),
        ...(includeDebugInfo ? DebugManager.createDebugOutput('parseComponentEvent', xml, event) : {}),
    };
}

export const MessageService: Service = {
    resource: RESOURCE,
    resourceDisplayName: RESOURCE_DISPLAY_NAME,
    resourceDescription: 'Decode inbound webhook XML',
    operationRegistry: OPERATION_REGISTRY,
    operationOptions: generateOperationOptionsFromRegistry(OPERATION_REGISTRY),
    extraProperties: [
        createXmlProperty('xml', 'XML', 'Decrypted, signature-checked request body', RESOURCE, OPERATIONS, true),
        createBooleanProperty(
            'includeDebugInfo',
            'Include Debug Info',
            'Whether to add the input XML and the decoded raw values to the output',
            RESOURCE,
            OPERATIONS,
        ),
    ],
    async execute(operation, ctx, itemIndex) {
        const xml = getStringParam(ctx, 'xml', itemIndex);
        const includeDebugInfo = getBooleanParam(ctx, 'includeDebugInfo', itemIndex);

        switch (operation) {
            case 'parseMessage':
                return parseMessageItem(xml, includeDebugInfo);
            case 'parseComponentEvent':
                return parseComponentEventItem(xml, includeDebugInfo);
            default:
                throw new Error(`Unsupported operation: ${operation}`);
        }
    },
};
