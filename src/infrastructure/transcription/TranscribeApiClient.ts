import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import FormData from 'form-data';
import * as fs from 'fs';
import * as path from 'path';
import { Config } from '../../config';
import {
    ITranscriptionClient,
    TranscribeOptions,
    TranscriptionCallback,
} from '../../domain/ports/ITranscriptionClient';
import {
    TranscriptionOutcome,
    failureOutcome,
    parseTranscriptionResponse,
    successOutcome,
} from '../../domain/entities/TranscriptionResult';
import { ServiceHealth, parseServiceHealth } from '../../domain/entities/ServiceHealth';
import {
    TranscriptionError,
    TranscriptionParseError,
    TranscriptionTransportError,
} from '../../domain/errors/TranscriptionErrors';
import { createPhasedTimeoutTransport } from './PhasedTimeoutTransport';

/** Declared for every upload regardless of the file's real encoding. */
export const AUDIO_CONTENT_TYPE = 'audio/ogg';
export const TRANSCRIBE_PATH = '/transcribe';
export const HEALTH_PATH = '/health';

export type TranscribeClientConfig = Pick<Config, 'baseUrl' | 'connectTimeoutMs' | 'readTimeoutMs' | 'writeTimeoutMs'>;

interface AudioUpload {
    filePath: string;
    fileName: string;
    sizeBytes: number;
}

/**
 * Request settings every call carries, whichever axios instance sends it.
 * Bodies come back as text and every status code resolves, so parsing alone
 * decides success. Timeouts are enforced per phase by the transport.
 */
export function transcribeRequestConfig(config: TranscribeClientConfig): AxiosRequestConfig {
    return {
        baseURL: config.baseUrl,
        responseType: 'text',
        maxContentLength: Infinity,
        maxBodyLength: Infinity,
        validateStatus: () => true,
        timeout: 0,
        transport: createPhasedTimeoutTransport(config),
    };
}

/**
 * Builds the shared transport.
 */
export function createTranscribeHttpClient(config: TranscribeClientConfig): AxiosInstance {
    return axios.create(transcribeRequestConfig(config));
}

/**
 * Client for the transcription service's multipart upload endpoint.
 */
export class TranscribeApiClient implements ITranscriptionClient {
    private readonly http: AxiosInstance;
    private readonly requestConfig: AxiosRequestConfig;

    /**
     * An injected axios instance only sends requests; base URL, timeouts and
     * status handling always come from `config`.
     */
    constructor(config: TranscribeClientConfig, http?: AxiosInstance) {
        if (!config.baseUrl) {
            throw new Error('Transcription service base URL is required');
        }
        this.requestConfig = transcribeRequestConfig(config);
        this.http = http ?? axios.create(this.requestConfig);
    }

    async transcribe(audioFilePath: string, options?: TranscribeOptions): Promise<TranscriptionOutcome> {
        const upload = this.prepareUpload(audioFilePath);
        return this.send(upload, options);
    }

    transcribeAudio(audioFilePath: string, callback: TranscriptionCallback, options?: TranscribeOptions): void {
        // File problems surface here, synchronously, before anything is dispatched
        const upload = this.prepareUpload(audioFilePath);

        void this.send(upload, options).then((outcome) => this.deliver(callback, outcome));
    }

    async checkHealth(): Promise<ServiceHealth> {
        let response: AxiosResponse<unknown>;
        try {
            response = await this.http.get<unknown>(HEALTH_PATH, this.requestConfig);
        } catch (error) {
            throw toTransportError(error);
        }

        try {
            return parseServiceHealth(bodyText(response.data), response.status);
        } catch (error) {
            throw toParseError(error, response.status);
        }
    }

    private prepareUpload(audioFilePath: string): AudioUpload {
        fs.accessSync(audioFilePath, fs.constants.R_OK);
        const stats = fs.statSync(audioFilePath);
        if (!stats.isFile()) {
            throw new Error(`Audio file is not a regular file: ${audioFilePath}`);
        }

        return {
            filePath: audioFilePath,
            fileName: path.basename(audioFilePath),
            sizeBytes: stats.size,
        };
    }

    /**
     * Performs the upload. Never rejects: every failure becomes an outcome.
     */
    private async send(upload: AudioUpload, options?: TranscribeOptions): Promise<TranscriptionOutcome> {
        let response: AxiosResponse<unknown>;
        try {
            const formData = new FormData();
            formData.append('file', fs.createReadStream(upload.filePath), {
                filename: upload.fileName,
                contentType: AUDIO_CONTENT_TYPE,
            });

            console.log(`[TranscribeClient] Uploading ${upload.fileName} (${(upload.sizeBytes / 1024).toFixed(1)}KB)...`);
            response = await this.http.post<unknown>(TRANSCRIBE_PATH, formData, {
                ...this.requestConfig,
                headers: formData.getHeaders(),
                params: options?.language ? { language: options.language } : undefined,
            });
        } catch (error) {
            const transportError = toTransportError(error);
            console.error(`[TranscribeClient] ${transportError.message}`);
            return failureOutcome(transportError);
        }

        try {
            const result = parseTranscriptionResponse(bodyText(response.data), response.status);
            console.log(`[TranscribeClient] Transcription complete. Language: ${result.language}`);
            return successOutcome(result);
        } catch (error) {
            const parseError = toParseError(error, response.status);
            console.warn(`[TranscribeClient] ${parseError.message}`);
            return failureOutcome(parseError);
        }
    }

    private deliver(callback: TranscriptionCallback, outcome: TranscriptionOutcome): void {
        try {
            callback(outcome);
        } catch (error) {
            console.error('[TranscribeClient] Completion callback threw:', error);
        }
    }
}

function toTransportError(error: unknown): TranscriptionTransportError {
    const message = error instanceof Error ? error.message : String(error);
    const code = errorCode(error) ?? (error instanceof Error ? errorCode(error.cause) : undefined);

    return new TranscriptionTransportError(`Transcription request failed: ${message}`, { cause: error, code });
}

function toParseError(error: unknown, statusCode: number): TranscriptionError {
    if (error instanceof TranscriptionError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TranscriptionParseError(`Failed to read transcription response: ${message}`, {
        cause: error,
        statusCode,
    });
}

function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

function bodyText(data: unknown): string | undefined {
    if (data === undefined || data === null) {
        return undefined;
    }
    if (typeof data === 'string') {
        return data;
    }
    if (Buffer.isBuffer(data)) {
        return data.toString('utf-8');
    }
    return JSON.stringify(data);
}
