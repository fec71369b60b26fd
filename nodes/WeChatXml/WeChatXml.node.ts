import {
    NodeOperationError,
    type IDataObject,
    type IExecuteFunctions,
    type INodeExecutionData,
    type INodeType,
    type INodeTypeDescription,
} from 'n8n-workflow';

import { description, services } from './description';
import type { Service } from './core/types';
import { getStringParam } from './core/service-utils';

const registry: Record<string, Service> = Object.fromEntries(services.map((s) => [s.resource, s]));

export class WeChatXml implements INodeType {
    description: INodeTypeDescription = description;

    async execute(this: IExecuteFunctions): Promise<INodeExecutionData[][]> {
        const items = this.getInputData();
        const out: INodeExecutionData[] = [];

        for (let i = 0; i < items.length; i++) {
            try {
                const resource = getStringParam(this, 'resource', i);
                const operation = getStringParam(this, 'operation', i);

                const svc = registry[resource];
                if (!svc) throw new NodeOperationError(this.getNode(), `Unsupported resource: ${resource}`, { itemIndex: i });

                const payload: IDataObject = await svc.execute(operation, this, i);
                out.push({ json: payload, pairedItem: { item: i } });
            } catch (err) {
                const error = err instanceof Error ? err : new Error(String(err));
                if (this.continueOnFail()) {
                    out.push({ json: { success: false, error: error.message }, pairedItem: { item: i } });
                    continue;
                }
                if (error instanceof NodeOperationError) throw error;
                throw new NodeOperationError(this.getNode(), error, { itemIndex: i });
            }
        }

        return [out];
    }
}
