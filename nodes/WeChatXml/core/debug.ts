import type { IDataObject } from 'n8n-workflow';
import type { SchemaRecord } from './schema';
import { toDataValue } from './service-utils';
import type { FieldDefMap } from './types';

/**
 * Debug output attached to node results when "Include Debug Info" is on
 */
export class DebugManager {
    /**
     * @param xml - The envelope that was parsed or rendered
     * @param record - The instance built from or rendered to `xml`
     */
    static createDebugOutput(operation: string, xml: string, record?: SchemaRecord<FieldDefMap>): IDataObject {
        return {
            debugInfo: {
                operation,
                xml,
                typeName: record?.schema.typeName,
                rawData: record ? toDataValue(record.snapshot()) : undefined,
                timestamp: new Date().toISOString(),
            },
        };
    }
}
