/**
 * TranscriptionResult Entity
 *
 * The parsed outcome of one successful upload. Built once per response,
 * handed straight to the caller and never mutated afterwards.
 */
import { JSONSchemaType } from 'ajv';
import { TranscriptionError } from '../errors/TranscriptionErrors';
import { ajv, assertPayload, readJsonPayload } from './ResponsePayload';

export interface TranscriptionResult {
    /** Full transcribed text */
    readonly transcript: string;
    /** Detected or declared language */
    readonly language: string;
    /** Short summary of the transcript */
    readonly tldr: string;
    /** Audio duration, only when the service reports one */
    readonly durationSeconds?: number;
}

/**
 * Either a parsed result or the failure that prevented one.
 */
export type TranscriptionOutcome =
    | { readonly ok: true; readonly result: TranscriptionResult }
    | { readonly ok: false; readonly error: TranscriptionError };

/**
 * Wire shape of `POST /transcribe`. Keys beyond these (e.g. `status`) are ignored.
 */
export interface TranscriptionResponseBody {
    transcript: string;
    language: string;
    tldr: string;
    duration?: number | null;
}

export const TRANSCRIPTION_RESPONSE_SCHEMA: JSONSchemaType<TranscriptionResponseBody> = {
    type: 'object',
    properties: {
        transcript: { type: 'string' },
        language: { type: 'string' },
        tldr: { type: 'string' },
        duration: { type: 'number', nullable: true },
    },
    required: ['transcript', 'language', 'tldr'],
    additionalProperties: true,
};

const validateTranscriptionResponse = ajv.compile(TRANSCRIPTION_RESPONSE_SCHEMA);

/**
 * Parses a raw `/transcribe` body. All three text fields must be present as
 * strings; anything less throws TranscriptionParseError rather than yielding
 * a partially populated result.
 */
export function parseTranscriptionResponse(
    body: string | null | undefined,
    statusCode?: number
): TranscriptionResult {
    const payload = readJsonPayload(body, statusCode);
    const data = assertPayload(validateTranscriptionResponse, payload, 'transcription response', statusCode);

    return createTranscriptionResult(data);
}

export function createTranscriptionResult(data: TranscriptionResponseBody): TranscriptionResult {
    const result: TranscriptionResult = typeof data.duration === 'number'
        ? { transcript: data.transcript, language: data.language, tldr: data.tldr, durationSeconds: data.duration }
        : { transcript: data.transcript, language: data.language, tldr: data.tldr };

    return Object.freeze(result);
}

export function successOutcome(result: TranscriptionResult): TranscriptionOutcome {
    return { ok: true, result };
}

export function failureOutcome(error: TranscriptionError): TranscriptionOutcome {
    return { ok: false, error };
}
