import fs from "fs-extra";
import path from "path";
import { TranscriptFragment } from "./types";
import { describeError } from "./errors";
import { info, warn } from "./log";

export const TRANSCRIPT_SUFFIX = "_transcript.txt";

/**
 * Ordered join of fragment texts. Empty fragments (failed chunks) are
 * skipped, the rest are separated by a single space.
 */
export function combineFragments(fragments: TranscriptFragment[]): string {
  return [...fragments]
    .sort((a, b) => a.chunkIndex - b.chunkIndex)
    .map((f) => f.text)
    .filter((text) => text.length > 0)
    .join(" ");
}

// foo/bar.mp3 -> foo/bar_transcript.txt
export function outputPathFor(sourcePath: string): string {
  const parsed = path.parse(sourcePath);
  return path.join(parsed.dir, `${parsed.name}${TRANSCRIPT_SUFFIX}`);
}

export async function writeTranscript(outputPath: string, text: string): Promise<string> {
  const data = Buffer.from(text, "utf8");
  const fd = await fs.open(outputPath, "w");
  try {
    // writeFile loops until every byte is on disk
    await fs.writeFile(fd, data);
    await fs.fsync(fd);
  } finally {
    await fs.close(fd);
  }
  info("export.write", { path: outputPath, characters: text.length });
  return outputPath;
}

/**
 * Best-effort removal of a run's work directory and every chunk in it.
 * Returns the number of files removed.
 */
export async function cleanupChunks(workDir: string): Promise<number> {
  if (!(await fs.pathExists(workDir))) return 0;
  let removed = 0;
  let entries: string[] = [];
  try {
    entries = await fs.readdir(workDir);
  } catch (e) {
    warn("cleanup.list.fail", { workDir, error: describeError(e) });
  }
  for (const name of entries) {
    const p = path.join(workDir, name);
    try {
      await fs.remove(p);
      removed += 1;
    } catch (e) {
      warn("cleanup.file.fail", { path: p, error: describeError(e) });
    }
  }
  try {
    await fs.rmdir(workDir);
  } catch (e) {
    warn("cleanup.dir.fail", { workDir, error: describeError(e) });
  }
  info("cleanup.complete", { workDir, removed });
  return removed;
}
