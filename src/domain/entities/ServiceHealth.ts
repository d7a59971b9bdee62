import { JSONSchemaType } from 'ajv';
import { ajv, assertPayload, readJsonPayload } from './ResponsePayload';

/**
 * Body of the transcription service's `GET /health`.
 */
export interface ServiceHealth {
    status: string;
    model: string;
    version: string;
}

export const SERVICE_HEALTH_SCHEMA: JSONSchemaType<ServiceHealth> = {
    type: 'object',
    properties: {
        status: { type: 'string' },
        model: { type: 'string' },
        version: { type: 'string' },
    },
    required: ['status', 'model', 'version'],
    additionalProperties: true,
};

const validateServiceHealth = ajv.compile(SERVICE_HEALTH_SCHEMA);

export function parseServiceHealth(body: string | null | undefined, statusCode?: number): ServiceHealth {
    const data = assertPayload(validateServiceHealth, readJsonPayload(body, statusCode), 'health response', statusCode);
    return { status: data.status, model: data.model, version: data.version };
}

export function isHealthy(health: ServiceHealth): boolean {
    return health.status === 'healthy';
}
