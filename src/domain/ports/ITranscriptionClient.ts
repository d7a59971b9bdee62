import { TranscriptionOutcome } from '../entities/TranscriptionResult';
import { ServiceHealth } from '../entities/ServiceHealth';

export interface TranscribeOptions {
    /** Language hint forwarded to the service, e.g. "en" */
    language?: string;
}

export type TranscriptionCallback = (outcome: TranscriptionOutcome) => void;

/**
 * ITranscriptionClient - Port for uploading audio to the transcription service.
 * Implementations: TranscribeApiClient
 */
export interface ITranscriptionClient {
    /**
     * Uploads a local audio file and resolves with its outcome.
     * Transport and parse failures resolve as `{ ok: false }`; only an
     * unreadable audio file rejects.
     */
    transcribe(audioFilePath: string, options?: TranscribeOptions): Promise<TranscriptionOutcome>;

    /**
     * Callback form of transcribe(). Returns immediately and invokes the
     * callback exactly once. An unreadable audio file throws synchronously.
     */
    transcribeAudio(audioFilePath: string, callback: TranscriptionCallback, options?: TranscribeOptions): void;

    /**
     * Queries the service's health endpoint.
     */
    checkHealth(): Promise<ServiceHealth>;
}
