import * as dotenv from 'dotenv';
import os from 'os';
import path from 'path';
dotenv.config();

export const ENV = {
    chunkMs: Number(process.env.CHUNK_MS || 60000),
    languageCode: process.env.LANGUAGE_CODE || 'en-US',
    autoPunctuation: (process.env.AUTO_PUNCTUATION || 'true').toLowerCase() === 'true',
    // Optional: GCS bucket used to hand chunks to the recognizer by URI; empty sends audio inline
    stagingBucket: process.env.STAGING_BUCKET || '',
    stagingBucketLocation: process.env.STAGING_BUCKET_LOCATION || 'us-central1',
    // Wait (seconds) for one long-running recognition operation. 0 disables.
    transcribeTimeoutSec: Number(process.env.TRANSCRIBE_TIMEOUT_SEC || 90),
    // Optional: override ffmpeg/ffprobe binary name/path
    ffmpegBin: process.env.FFMPEG_BIN || 'ffmpeg',
    ffprobeBin: process.env.FFPROBE_BIN || 'ffprobe',
    tmpRoot: process.env.TMP_ROOT || os.tmpdir(),
    logFile: process.env.LOG_FILE || '',
    googleCredentials: process.env.GOOGLE_APPLICATION_CREDENTIALS || '',
};

/**
 * Absolute form of a credentials path; relative paths are taken from `baseDir`.
 * Returns null when no path is configured.
 */
export function resolveCredentialsPath(raw: string, baseDir: string = process.cwd()): string | null {
    const trimmed = raw.trim();
    if (!trimmed) return null;
    return path.isAbsolute(trimmed) ? trimmed : path.resolve(baseDir, trimmed);
}

/**
 * Rewrites GOOGLE_APPLICATION_CREDENTIALS to an absolute path so the Google
 * client libraries find it regardless of their own working directory.
 */
export function applyCredentialsEnv(): string | null {
    const resolved = resolveCredentialsPath(ENV.googleCredentials);
    if (resolved) {
        process.env.GOOGLE_APPLICATION_CREDENTIALS = resolved;
        ENV.googleCredentials = resolved;
    }
    return resolved;
}
