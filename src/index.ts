import { Config, getConfig } from './config';
import { ITranscriptionClient } from './domain/ports/ITranscriptionClient';
import { TranscribeApiClient } from './infrastructure/transcription/TranscribeApiClient';

export type { Config } from './config';
export { DEFAULT_BASE_URL, getConfig, loadConfig, resetConfig, validateConfig } from './config';
export type {
    TranscriptionResult,
    TranscriptionOutcome,
    TranscriptionResponseBody,
} from './domain/entities/TranscriptionResult';
export { TRANSCRIPTION_RESPONSE_SCHEMA, parseTranscriptionResponse } from './domain/entities/TranscriptionResult';
export type { ServiceHealth } from './domain/entities/ServiceHealth';
export { SERVICE_HEALTH_SCHEMA, isHealthy } from './domain/entities/ServiceHealth';
export type { TranscriptionErrorKind } from './domain/errors/TranscriptionErrors';
export {
    TranscriptionError,
    TranscriptionParseError,
    TranscriptionTransportError,
} from './domain/errors/TranscriptionErrors';
export type { ITranscriptionClient, TranscribeOptions, TranscriptionCallback } from './domain/ports/ITranscriptionClient';
export type { TranscribeClientConfig } from './infrastructure/transcription/TranscribeApiClient';
export type { TimeoutPhase } from './infrastructure/transcription/PhasedTimeoutTransport';
export { PhaseTimeoutError } from './infrastructure/transcription/PhasedTimeoutTransport';
export {
    AUDIO_CONTENT_TYPE,
    TranscribeApiClient,
    createTranscribeHttpClient,
} from './infrastructure/transcription/TranscribeApiClient';

/**
 * Composition root: builds a client from environment configuration unless
 * one is supplied.
 */
export function createTranscriptionClient(config: Config = getConfig()): ITranscriptionClient {
    return new TranscribeApiClient(config);
}
