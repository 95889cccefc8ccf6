/**
 * Tests for error classes
 */

import { describe, it, expect } from 'vitest';
import {
  PipelineError,
  FatalError,
  SourceFileError,
  SplitterUnavailableError,
  SplitError,
  TranscriptionError,
  AuthenticationError,
  QuotaExceededError,
  AudioRejectedError,
  ServiceUnavailableError,
  TranscriptionTimeoutError,
  toTranscriptionError,
  describeError,
} from '../src/pipeline/errors';

describe('Error Classes', () => {
  describe('PipelineError', () => {
    it('should create basic error', () => {
      const error = new PipelineError('Test error');
      expect(error.message).toBe('Test error');
      expect(error.name).toBe('PipelineError');
      expect(error.code).toBeUndefined();
      expect(error.details).toBeUndefined();
    });

    it('should format toString with and without a code', () => {
      expect(new PipelineError('Test error').toString()).toBe('PipelineError: Test error');
      expect(new SplitError('bad segment', 'E1').toString()).toBe('SplitError: bad segment (code: E1)');
    });
  });

  describe('Fatal errors', () => {
    it('should derive from FatalError', () => {
      for (const error of [
        new SourceFileError('missing'),
        new SplitterUnavailableError('ffmpeg not found'),
        new SplitError('ffmpeg exited 1'),
      ]) {
        expect(error).toBeInstanceOf(FatalError);
        expect(error).toBeInstanceOf(PipelineError);
        expect(error).not.toBeInstanceOf(TranscriptionError);
      }
    });

    it('should tag a missing tool with ENOENT', () => {
      const error = new SplitterUnavailableError('ffprobe not found');
      expect(error.name).toBe('SplitterUnavailableError');
      expect(error.code).toBe('ENOENT');
    });
  });

  describe('Chunk errors', () => {
    it('should derive from TranscriptionError', () => {
      const error = new QuotaExceededError('quota', 8, { chunkIndex: 4 });
      expect(error).toBeInstanceOf(TranscriptionError);
      expect(error).not.toBeInstanceOf(FatalError);
      expect(error.name).toBe('QuotaExceededError');
      expect(error.details).toEqual({ chunkIndex: 4 });
    });
  });
});

describe('toTranscriptionError', () => {
  it('passes typed errors through unchanged', () => {
    const original = new AuthenticationError('denied', 16);
    expect(toTranscriptionError(original)).toBe(original);
  });

  it('maps HTTP style status codes', () => {
    expect(toTranscriptionError(Object.assign(new Error('forbidden'), { code: 403 }))).toBeInstanceOf(AuthenticationError);
    expect(toTranscriptionError(Object.assign(new Error('slow down'), { code: 429 }))).toBeInstanceOf(QuotaExceededError);
    expect(toTranscriptionError(Object.assign(new Error('bad'), { code: 400 }))).toBeInstanceOf(AudioRejectedError);
    expect(toTranscriptionError(Object.assign(new Error('down'), { code: 503 }))).toBeInstanceOf(ServiceUnavailableError);
  });

  it('falls back to a generic chunk error', () => {
    const error = toTranscriptionError(Object.assign(new Error('13 INTERNAL: oops'), { code: 13 }));
    expect(error.constructor).toBe(TranscriptionError);
    expect(error.message).toBe('13 INTERNAL: oops');
    expect(error.code).toBe(13);
  });

  it('wraps non-Error values', () => {
    const error = toTranscriptionError('socket hang up');
    expect(error).toBeInstanceOf(TranscriptionError);
    expect(error.message).toBe('socket hang up');
  });

  it('keeps timeouts typed', () => {
    expect(toTranscriptionError(new TranscriptionTimeoutError('late'))).toBeInstanceOf(TranscriptionTimeoutError);
  });
});

describe('describeError', () => {
  it('renders any thrown value on one line', () => {
    expect(describeError(new AuthenticationError('denied', 16))).toBe('AuthenticationError: denied (code: 16)');
    expect(describeError(new TypeError('nope'))).toBe('TypeError: nope');
    expect(describeError(42)).toBe('42');
  });
});
