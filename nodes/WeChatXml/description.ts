import { NodeConnectionTypes, type INodeTypeDescription } from 'n8n-workflow';
import { buildSubtitleLookup } from './core/service-utils';
import { MessageService } from './services/message';
import { ReplyService } from './services/reply';

export const services = [MessageService, ReplyService] as const;

const resourceOptions = services.map((s) => ({
    name: s.resourceDisplayName,
    value: s.resource,
    description: s.resourceDescription,
}));

const operationProperties = services.map((s) => ({
    displayName: 'Operation',
    name: 'operation',
    type: 'options' as const,
    noDataExpression: true,
    displayOptions: { show: { resource: [s.resource] } },
    options: s.operationOptions,
    default: s.operationOptions[0].value,
}));

const extraProps = services.flatMap((s) => s.extraProperties);

// Subtitle per resource/operation, falling back to the raw operation value
const createSubtitleExpression = (): string => {
    const conditions = services.map((s) => {
        const ops = Object.entries(buildSubtitleLookup(s.operationRegistry)).map(
            ([operation, subtitle]) => `$parameter["operation"] === "${operation}" ? "${subtitle}"`,
        );
        ops.push('$parameter["operation"]');
        return `$parameter["resource"] === "${s.resource}" ? (${ops.join(' : ')})`;
    });
    conditions.push('$parameter["operation"]');
    return `={{ ${conditions.join(' : ')} }}`;
};

export const description: INodeTypeDescription = {
    displayName: 'WeChat XML',
    name: 'weChatXml',
    group: ['transform'],
    version: 1,
    description: 'Parse WeChat webhook XML and build passive replies',
    defaults: { name: 'WeChat XML' },
    inputs: [NodeConnectionTypes.Main],
    outputs: [NodeConnectionTypes.Main],
    subtitle: createSubtitleExpression(),
    properties: [
        {
            displayName: 'Resource',
            name: 'resource',
            type: 'options',
            noDataExpression: true,
            options: resourceOptions,
            default: services[0].resource,
        },
        ...operationProperties,
        ...extraProps,
    ],
};
