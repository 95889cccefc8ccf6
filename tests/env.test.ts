import { describe, it, expect } from 'vitest';
import path from 'path';
import { resolveCredentialsPath } from '../src/pipeline/env';
import { parseLogLevel } from '../src/pipeline/log';

describe('resolveCredentialsPath', () => {
  it('returns null when unset', () => {
    expect(resolveCredentialsPath('')).toBeNull();
    expect(resolveCredentialsPath('   ')).toBeNull();
  });

  it('keeps absolute paths', () => {
    expect(resolveCredentialsPath('/etc/gcp/key.json', '/work')).toBe('/etc/gcp/key.json');
  });

  it('resolves relative paths against the base directory', () => {
    expect(resolveCredentialsPath('keys/service.json', '/work')).toBe(path.resolve('/work', 'keys/service.json'));
  });
});

describe('parseLogLevel', () => {
  it('accepts known levels case-insensitively', () => {
    expect(parseLogLevel('WARN')).toBe('warn');
    expect(parseLogLevel('debug')).toBe('debug');
  });

  it('falls back for unknown or missing values', () => {
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel(undefined, 'error')).toBe('error');
  });
});
