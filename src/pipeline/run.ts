import fs from "fs-extra";
import path from "path";
import { ENV } from "./env";
import { chunkAudio, ChunkOptions } from "./chunk";
import { createTranscriber, Transcriber } from "./transcribe";
import { cleanupChunks, combineFragments, outputPathFor, writeTranscript } from "./export";
import { describeError, TranscriptionError } from "./errors";
import { ChunkManifest, TranscriptFragment } from "./types";
import { info, warn, error, startStep } from "./log";

export interface RunPipelineOptions {
  chunkMs?: number;
  tmpRoot?: string;
  outputPath?: string;
}

export interface PipelineDeps {
  split: (sourcePath: string, workDir: string, opts: ChunkOptions) => Promise<ChunkManifest>;
  transcriber: Transcriber;
}

export interface RunPipelineResult {
  outputPath: string;
  chunkCount: number;
  failedChunks: number[];
  characters: number;
  durationMs: number;
}

/**
 * One fragment per chunk, in chunk order. A failed or silent chunk yields an
 * empty fragment and the loop moves on.
 */
export async function transcribeAll(
  manifest: ChunkManifest,
  transcriber: Transcriber
): Promise<TranscriptFragment[]> {
  const fragments: TranscriptFragment[] = [];
  const total = manifest.chunks.length;
  const timer = startStep("transcribe.chunks", { total });
  for (const chunk of manifest.chunks) {
    const idx = chunk.chunkIndex + 1;
    info("transcribe.chunk.start", { idx, total, progress: `${idx}/${total}` });
    try {
      const text = await transcriber.transcribe(chunk);
      if (text) {
        fragments.push({ chunkIndex: chunk.chunkIndex, text, ok: true });
        info("transcribe.chunk.done", { idx, total, characters: text.length });
      } else {
        fragments.push({ chunkIndex: chunk.chunkIndex, text: "", ok: false, error: "no speech recognized" });
        warn("transcribe.chunk.empty", { idx, total });
      }
    } catch (e) {
      const name = e instanceof TranscriptionError ? e.name : "UnexpectedError";
      fragments.push({ chunkIndex: chunk.chunkIndex, text: "", ok: false, error: describeError(e) });
      error("transcribe.chunk.fail", { idx, total, kind: name, error: describeError(e) });
    }
    timer.eta(fragments.length, total);
  }
  timer.end();
  return fragments;
}

export async function runPipelineForFile(
  sourcePath: string,
  opts: RunPipelineOptions = {},
  deps: Partial<PipelineDeps> = {}
): Promise<RunPipelineResult> {
  const startTs = Date.now();
  const chunkMs = opts.chunkMs ?? ENV.chunkMs;
  const tmpRoot = opts.tmpRoot ?? ENV.tmpRoot;
  const split = deps.split ?? chunkAudio;

  await fs.ensureDir(tmpRoot);
  const workDir = await fs.mkdtemp(path.join(tmpRoot, "chunks-"));
  info("run.start", { sourcePath, chunkMs, workDir });

  try {
    const manifest = await split(sourcePath, workDir, {
      chunkMs,
      ffmpegBin: ENV.ffmpegBin,
      ffprobeBin: ENV.ffprobeBin,
    });
    info("run.split", { chunks: manifest.chunks.length, durationMs: manifest.durationMs });

    const transcriber = deps.transcriber ?? createTranscriber();
    const fragments = await transcribeAll(manifest, transcriber);
    const failedChunks = fragments.filter((f) => !f.ok).map((f) => f.chunkIndex);
    if (failedChunks.length === fragments.length) {
      error("transcribe.none", { chunks: fragments.length });
    } else if (failedChunks.length) {
      warn("transcribe.partial", { failed: failedChunks.length, total: fragments.length });
    }

    const combined = combineFragments(fragments);
    const outputPath = await writeTranscript(opts.outputPath ?? outputPathFor(sourcePath), combined);

    const durationMs = Date.now() - startTs;
    info("run.complete", { outputPath, chunks: fragments.length, failed: failedChunks.length, durationMs });
    return {
      outputPath,
      chunkCount: fragments.length,
      failedChunks,
      characters: combined.length,
      durationMs,
    };
  } finally {
    await cleanupChunks(workDir);
  }
}
