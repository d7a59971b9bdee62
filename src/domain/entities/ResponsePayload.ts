import Ajv, { ValidateFunction } from 'ajv';
import { TranscriptionParseError } from '../errors/TranscriptionErrors';

/** Shared validator instance for transcription service payloads. */
export const ajv = new Ajv({ allErrors: true });

/**
 * Decodes a raw response body into JSON. A missing or blank body reads as `{}`
 * so that it fails schema validation on its required keys instead.
 */
export function readJsonPayload(body: string | null | undefined, statusCode?: number): unknown {
    const raw = body && body.trim() ? body : '{}';
    try {
        return JSON.parse(raw);
    } catch (error) {
        throw new TranscriptionParseError(
            `Transcription service returned a body that is not valid JSON${statusSuffix(statusCode)}`,
            { cause: error, statusCode }
        );
    }
}

/**
 * Runs a compiled schema against a payload, converting a mismatch into a parse error.
 */
export function assertPayload<T>(
    validate: ValidateFunction<T>,
    payload: unknown,
    label: string,
    statusCode?: number
): T {
    if (validate(payload)) {
        return payload;
    }

    const reasons = ajv.errorsText(validate.errors, { dataVar: 'response' });
    throw new TranscriptionParseError(`Invalid ${label}${statusSuffix(statusCode)}: ${reasons}`, {
        statusCode,
        serviceDetail: extractServiceDetail(payload),
    });
}

/**
 * The service reports failures as `{ "detail": "..." }`.
 */
export function extractServiceDetail(payload: unknown): string | undefined {
    if (typeof payload === 'object' && payload !== null && 'detail' in payload) {
        const detail = payload.detail;
        return typeof detail === 'string' ? detail : undefined;
    }
    return undefined;
}

function statusSuffix(statusCode?: number): string {
    return statusCode !== undefined && (statusCode < 200 || statusCode >= 300)
        ? ` (HTTP ${statusCode})`
        : '';
}
