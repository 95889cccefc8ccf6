import { SpeechClient, protos } from '@google-cloud/speech';
import { Storage, Bucket } from '@google-cloud/storage';
import fs from 'fs-extra';
import path from 'path';
import { ENV } from './env';
import { ChunkInfo, RecognitionSettings } from './types';
import { TranscriptionTimeoutError, describeError, toTranscriptionError } from './errors';
import { CHUNK_SAMPLE_RATE_HZ } from './chunk';
import { debug, info, warn } from './log';

type RecognitionConfig = protos.google.cloud.speech.v1.IRecognitionConfig;
type RecognitionAudio = protos.google.cloud.speech.v1.IRecognitionAudio;
type RecognizeResponse = protos.google.cloud.speech.v1.ILongRunningRecognizeResponse;

/**
 * Anything that turns one chunk into text. Rejects with a TranscriptionError.
 */
export interface Transcriber {
    transcribe(chunk: ChunkInfo): Promise<string>;
}

export interface RecognizeRequest {
    config: RecognitionConfig;
    audio: RecognitionAudio;
}

/**
 * Speech API surface the transcriber needs; swapped for a fake in tests.
 * The backend owns the deadline: once `timeoutMs` passes it stops the
 * operation and rejects with TranscriptionTimeoutError. 0 disables.
 */
export interface RecognitionBackend {
    longRunningRecognize(request: RecognizeRequest, timeoutMs: number): Promise<RecognizeResponse>;
}

/** Polling settings for a long-running operation, as google-gax takes them. */
export interface LongRunningBackoff {
    initialRetryDelayMillis: number;
    retryDelayMultiplier: number;
    maxRetryDelayMillis: number;
    totalTimeoutMillis?: number | null;
}

export interface RecognizeOperation {
    promise(): Promise<[RecognizeResponse, ...unknown[]]>;
    cancel(): unknown;
}

/** The part of SpeechClient used here. */
export interface SpeechApi {
    longRunningRecognize(
        request: RecognizeRequest,
        options?: { longrunning?: LongRunningBackoff }
    ): Promise<[RecognizeOperation, ...unknown[]]>;
}

/** Object storage used to pass chunks to the recognizer by URI. */
export interface StagingStore {
    upload(localPath: string, objectName: string): Promise<string>;
    remove(objectName: string): Promise<void>;
}

export interface GoogleTranscriberOptions extends RecognitionSettings {
    timeoutSec: number;
}

export function buildRecognitionConfig(settings: RecognitionSettings): RecognitionConfig {
    return {
        encoding: 'FLAC',
        sampleRateHertz: settings.sampleRateHz,
        languageCode: settings.languageCode,
        enableAutomaticPunctuation: settings.autoPunctuation,
    };
}

/**
 * First alternative of every result, joined by single spaces.
 */
export function extractTranscript(response: RecognizeResponse): string {
    const parts: string[] = [];
    for (const result of response.results || []) {
        const text = result.alternatives?.[0]?.transcript?.trim();
        if (text) parts.push(text);
    }
    return parts.join(' ').trim();
}

// google-gax defaults for operation polling, bounded by the chunk deadline
const LRO_POLL = { initialRetryDelayMillis: 100, retryDelayMultiplier: 1.3, maxRetryDelayMillis: 60000 };

async function withDeadline<T>(work: Promise<T>, timeoutMs: number, onTimeout: () => void): Promise<T> {
    if (!timeoutMs || timeoutMs <= 0) return work;
    const timers: NodeJS.Timeout[] = [];
    const timeout = new Promise<never>((_, reject) => {
        timers.push(
            setTimeout(() => {
                onTimeout();
                reject(new TranscriptionTimeoutError(`Recognition did not finish within ${timeoutMs}ms`, 'TIMEOUT'));
            }, timeoutMs)
        );
    });
    try {
        return await Promise.race([work, timeout]);
    } finally {
        timers.forEach(clearTimeout);
    }
}

function cancelOperation(operation: RecognizeOperation) {
    Promise.resolve()
        .then(() => operation.cancel())
        .catch((e: unknown) => warn('transcribe.operation.cancel.fail', { error: describeError(e) }));
}

export function googleRecognitionBackend(client?: SpeechApi): RecognitionBackend {
    // Created on first call so missing credentials surface as a per-chunk failure
    let speech = client;
    return {
        async longRunningRecognize(request, timeoutMs) {
            if (!speech) speech = new SpeechClient();
            const options = timeoutMs > 0 ? { longrunning: { ...LRO_POLL, totalTimeoutMillis: timeoutMs } } : undefined;
            const [operation] = await speech.longRunningRecognize(request, options);
            const [response] = await withDeadline(operation.promise(), timeoutMs, () => {
                warn('transcribe.operation.timeout', { timeoutMs });
                cancelOperation(operation);
            });
            return response;
        },
    };
}

export function gcsStagingStore(bucketName: string, location: string, storage?: Storage): StagingStore {
    let client = storage;
    let ready: Promise<Bucket> | null = null;

    function getClient(): Storage {
        if (!client) client = new Storage();
        return client;
    }

    async function ensureBucket(): Promise<Bucket> {
        const bucket = getClient().bucket(bucketName);
        const [exists] = await bucket.exists();
        if (!exists) {
            info('staging.bucket.create', { bucket: bucketName, location });
            await getClient().createBucket(bucketName, { location });
        }
        return bucket;
    }

    return {
        async upload(localPath, objectName) {
            if (!ready) ready = ensureBucket();
            let bucket: Bucket;
            try {
                bucket = await ready;
            } catch (e) {
                ready = null;
                throw e;
            }
            await bucket.upload(localPath, { destination: objectName });
            return `gs://${bucketName}/${objectName}`;
        },
        async remove(objectName) {
            await getClient().bucket(bucketName).file(objectName).delete({ ignoreNotFound: true });
        },
    };
}

export function stagingObjectName(chunk: ChunkInfo): string {
    // The work dir name is unique per run, so concurrent runs never share objects
    return `chunks/${path.basename(path.dirname(chunk.path))}/${path.basename(chunk.path)}`;
}

export class GoogleSpeechTranscriber implements Transcriber {
    private opts: GoogleTranscriberOptions;
    private backend: RecognitionBackend;
    private staging: StagingStore | null;

    constructor(
        opts: GoogleTranscriberOptions,
        backend: RecognitionBackend = googleRecognitionBackend(),
        staging: StagingStore | null = null
    ) {
        this.opts = opts;
        this.backend = backend;
        this.staging = staging;
    }

    async transcribe(chunk: ChunkInfo): Promise<string> {
        const config = buildRecognitionConfig(this.opts);
        let objectName: string | null = null;
        try {
            let audio: RecognitionAudio;
            if (this.staging) {
                objectName = stagingObjectName(chunk);
                const uri = await this.staging.upload(chunk.path, objectName);
                debug('transcribe.chunk.staged', { idx: chunk.chunkIndex, uri });
                audio = { uri };
            } else {
                audio = { content: await fs.readFile(chunk.path) };
            }
            const response = await this.backend.longRunningRecognize({ config, audio }, this.opts.timeoutSec * 1000);
            return extractTranscript(response);
        } catch (e) {
            throw toTranscriptionError(e, { chunkIndex: chunk.chunkIndex });
        } finally {
            if (objectName && this.staging) {
                try {
                    await this.staging.remove(objectName);
                } catch (e) {
                    warn('staging.delete.fail', { object: objectName, error: describeError(e) });
                }
            }
        }
    }
}

/**
 * Transcriber configured from the environment.
 */
export function createTranscriber(env: typeof ENV = ENV): Transcriber {
    const staging = env.stagingBucket ? gcsStagingStore(env.stagingBucket, env.stagingBucketLocation) : null;
    info('transcribe.init', {
        engine: 'google-speech@v1',
        languageCode: env.languageCode,
        autoPunctuation: env.autoPunctuation,
        staging: env.stagingBucket || 'inline',
    });
    return new GoogleSpeechTranscriber(
        {
            languageCode: env.languageCode,
            autoPunctuation: env.autoPunctuation,
            sampleRateHz: CHUNK_SAMPLE_RATE_HZ,
            timeoutSec: env.transcribeTimeoutSec,
        },
        googleRecognitionBackend(),
        staging
    );
}
