import { execa } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { ChunkInfo, ChunkManifest, ChunkWindow } from './types';
import { SourceFileError, SplitError, SplitterUnavailableError } from './errors';
import { info, startStep } from './log';

export const CHUNK_SAMPLE_RATE_HZ = 16000;

export interface ChunkOptions {
    chunkMs: number;
    ffmpegBin?: string;
    ffprobeBin?: string;
}

/**
 * Consecutive windows covering [0, durationMs) with no gaps or overlaps.
 * The last window is shorter when durationMs is not a multiple of chunkMs.
 */
export function planChunks(durationMs: number, chunkMs: number): ChunkWindow[] {
    if (!Number.isFinite(chunkMs) || chunkMs <= 0) {
        throw new RangeError(`Chunk duration must be a positive number of milliseconds, got ${chunkMs}`);
    }
    const total = Math.max(0, durationMs);
    const count = Math.ceil(total / chunkMs);
    const windows: ChunkWindow[] = [];
    for (let i = 0; i < count; i++) {
        windows.push({
            chunkIndex: i,
            startMs: i * chunkMs,
            endMs: Math.min((i + 1) * chunkMs, total),
        });
    }
    return windows;
}

export function chunkFileName(index: number): string {
    return `chunk_${String(index).padStart(4, '0')}.flac`;
}

function isMissingBinary(e: unknown): boolean {
    return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT';
}

function shortMessage(e: unknown): string {
    if (typeof e === 'object' && e !== null && 'shortMessage' in e && typeof e.shortMessage === 'string') {
        return e.shortMessage;
    }
    return e instanceof Error ? e.message : String(e);
}

export async function probeDurationMs(sourcePath: string, ffprobeBin = 'ffprobe'): Promise<number> {
    let stdout: string;
    try {
        const probe = await execa(ffprobeBin, [
            '-v',
            'error',
            '-show_entries',
            'format=duration',
            '-of',
            'default=noprint_wrappers=1:nokey=1',
            sourcePath,
        ]);
        stdout = probe.stdout;
    } catch (e) {
        if (isMissingBinary(e)) {
            throw new SplitterUnavailableError(`${ffprobeBin} not found. Install ffmpeg or set FFPROBE_BIN.`);
        }
        throw new SplitError(
            `ffprobe failed for ${sourcePath}. Check that it is a valid audio file. Underlying error: ${shortMessage(e)}`
        );
    }
    const parsed = parseFloat(stdout);
    if (!Number.isFinite(parsed)) {
        throw new SplitError(`ffprobe could not determine duration for ${sourcePath}. Raw output: ${stdout}`);
    }
    return Math.round(Math.max(0, parsed) * 1000);
}

export function ffmpegSegmentArgs(sourcePath: string, window: ChunkWindow, outPath: string): string[] {
    // Accurate seeking: -ss after -i. 16 kHz mono FLAC is what the recognizer is configured for.
    return [
        '-y',
        '-loglevel',
        'error',
        '-hide_banner',
        '-nostdin',
        '-i',
        sourcePath,
        '-ss',
        String(window.startMs / 1000),
        '-t',
        String((window.endMs - window.startMs) / 1000),
        '-vn',
        '-sn',
        '-ac',
        '1',
        '-ar',
        String(CHUNK_SAMPLE_RATE_HZ),
        '-acodec',
        'flac',
        '-f',
        'flac',
        outPath,
    ];
}

export async function assertReadableSource(sourcePath: string): Promise<void> {
    if (!(await fs.pathExists(sourcePath))) {
        throw new SourceFileError(`Input audio not found: ${sourcePath}`, 'ENOENT');
    }
    try {
        await fs.access(sourcePath, fs.constants.R_OK);
    } catch (e) {
        throw new SourceFileError(`Input audio is not readable: ${sourcePath}. ${shortMessage(e)}`, 'EACCES');
    }
    const stat = await fs.stat(sourcePath);
    if (!stat.isFile()) {
        throw new SourceFileError(`Input path is not a file: ${sourcePath}`);
    }
    if (stat.size === 0) {
        throw new SourceFileError(`Input audio is empty (0 bytes): ${sourcePath}`);
    }
}

export async function chunkAudio(
    sourcePath: string,
    workDir: string,
    opts: ChunkOptions
): Promise<ChunkManifest> {
    await assertReadableSource(sourcePath);
    await fs.ensureDir(workDir);

    const ffmpegBin = opts.ffmpegBin || 'ffmpeg';
    const durationMs = await probeDurationMs(sourcePath, opts.ffprobeBin || 'ffprobe');
    info('chunk.probe', { sourcePath, durationMs });

    const windows = planChunks(durationMs, opts.chunkMs);
    if (windows.length === 0) {
        throw new SplitError(`Source audio has zero duration: ${sourcePath}`);
    }

    const chunks: ChunkInfo[] = [];
    const timer = startStep('chunk.split', { sourcePath, durationMs, chunkMs: opts.chunkMs });
    for (const window of windows) {
        const outPath = path.resolve(workDir, chunkFileName(window.chunkIndex));
        try {
            await execa(ffmpegBin, ffmpegSegmentArgs(sourcePath, window, outPath));
        } catch (e) {
            if (isMissingBinary(e)) {
                throw new SplitterUnavailableError(`${ffmpegBin} not found. Install ffmpeg or set FFMPEG_BIN.`);
            }
            throw new SplitError(
                `ffmpeg failed while extracting segment index=${window.chunkIndex} start=${window.startMs}ms end=${window.endMs}ms. ` +
                    `Check that ${sourcePath} is a valid audio file. Underlying error: ${shortMessage(e)}`,
                undefined,
                { chunkIndex: window.chunkIndex }
            );
        }

        // Sanity check produced chunk
        const exists = await fs.pathExists(outPath);
        const size = exists ? (await fs.stat(outPath)).size : 0;
        if (size === 0) {
            throw new SplitError(
                `Created empty chunk at ${outPath}. The source audio had no samples in [${window.startMs}, ${window.endMs}) ms.`,
                undefined,
                { chunkIndex: window.chunkIndex }
            );
        }
        chunks.push({ ...window, path: outPath });
        info('chunk.created', { idx: window.chunkIndex + 1, total: windows.length, path: outPath });
        timer.eta(chunks.length, windows.length);
    }

    timer.end();
    info('chunk.complete', { sourcePath, count: chunks.length, durationMs });
    return { sourcePath, workDir, durationMs, chunkMs: opts.chunkMs, chunks };
}
