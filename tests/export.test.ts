import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { cleanupChunks, combineFragments, outputPathFor, writeTranscript } from '../src/pipeline/export';

describe('combineFragments', () => {
  it('joins fragments in chunk order with a single space', () => {
    expect(
      combineFragments([
        { chunkIndex: 2, text: 'three', ok: true },
        { chunkIndex: 0, text: 'one', ok: true },
        { chunkIndex: 1, text: 'two', ok: true },
      ])
    ).toBe('one two three');
  });

  it('leaves a sentence split across chunks as it is', () => {
    expect(
      combineFragments([
        { chunkIndex: 0, text: 'The quick brown', ok: true },
        { chunkIndex: 1, text: 'fox jumps.', ok: true },
      ])
    ).toBe('The quick brown fox jumps.');
  });

  it('skips empty fragments from failed chunks', () => {
    expect(
      combineFragments([
        { chunkIndex: 0, text: 'one', ok: true },
        { chunkIndex: 1, text: '', ok: false, error: 'AuthenticationError: denied' },
        { chunkIndex: 2, text: 'three', ok: true },
      ])
    ).toBe('one three');
  });

  it('is empty when every chunk failed', () => {
    expect(
      combineFragments([
        { chunkIndex: 0, text: '', ok: false },
        { chunkIndex: 1, text: '', ok: false },
      ])
    ).toBe('');
    expect(combineFragments([])).toBe('');
  });
});

describe('outputPathFor', () => {
  it('puts the transcript beside the source', () => {
    expect(outputPathFor('foo/bar.mp3')).toBe('foo/bar_transcript.txt');
    expect(outputPathFor('/data/audio/interview.wav')).toBe('/data/audio/interview_transcript.txt');
  });

  it('strips only the last extension', () => {
    expect(outputPathFor('podcast.ep1.mp3')).toBe('podcast.ep1_transcript.txt');
    expect(outputPathFor('noext')).toBe('noext_transcript.txt');
  });
});

describe('writeTranscript / cleanupChunks', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'export-test-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('writes utf-8 and overwrites an existing file', async () => {
    const out = path.join(dir, 'bar_transcript.txt');
    await fs.writeFile(out, 'stale content that is longer than the new one');

    await expect(writeTranscript(out, 'café – naïve')).resolves.toBe(out);

    expect(await fs.readFile(out, 'utf8')).toBe('café – naïve');
  });

  it('writes every byte of a long multi-byte transcript', async () => {
    const out = path.join(dir, 'long_transcript.txt');
    const text = 'é'.repeat(200000);

    await writeTranscript(out, text);

    expect((await fs.stat(out)).size).toBe(400000);
    expect(await fs.readFile(out, 'utf8')).toBe(text);
  });

  it('writes an empty file for an empty transcript', async () => {
    const out = path.join(dir, 'empty_transcript.txt');
    await writeTranscript(out, '');
    expect((await fs.stat(out)).size).toBe(0);
  });

  it('removes every chunk and the work directory', async () => {
    const workDir = path.join(dir, 'chunks-abc');
    await fs.ensureDir(workDir);
    for (const name of ['chunk_0000.flac', 'chunk_0001.flac', 'chunk_0002.flac']) {
      await fs.writeFile(path.join(workDir, name), 'x');
    }

    await expect(cleanupChunks(workDir)).resolves.toBe(3);
    expect(await fs.pathExists(workDir)).toBe(false);
  });

  it('does nothing for a missing work directory', async () => {
    await expect(cleanupChunks(path.join(dir, 'never-created'))).resolves.toBe(0);
  });
});
