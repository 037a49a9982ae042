/**
 * Configuration Tests — defaults, validation, freezing
 */

import { describe, it, expect } from 'vitest';
import {
  resolveBatcherConfig,
  resolveSqlAdapterConfig,
  utf8ByteLength,
  DEFAULT_MAX_BYTES,
  DEFAULT_SLOW_FLUSH_MS,
} from '../src/config.js';
import { BatcherError } from '../src/errors.js';
import { BatcherEventEmitter } from '../src/events.js';

describe('utf8ByteLength', () => {
  it('counts bytes, not characters', () => {
    expect(utf8ByteLength('SELECT 1')).toBe(8);
    expect(utf8ByteLength('é')).toBe(2);
    expect(utf8ByteLength('日本')).toBe(6);
    expect(utf8ByteLength('')).toBe(0);
  });
});

describe('resolveBatcherConfig', () => {
  it('fills defaults', () => {
    const config = resolveBatcherConfig();
    expect(config.maxBytes).toBe(DEFAULT_MAX_BYTES);
    expect(config.delimiter).toBe(';');
    expect(config.dryRun).toBe(false);
    expect(config.logging).toBe(true);
    expect(config.slowFlushMs).toBe(DEFAULT_SLOW_FLUSH_MS);
    expect(config.sizeFunc).toBe(utf8ByteLength);
  });

  it('keeps explicit values', () => {
    const sizeFunc = (s: string): number => s.length;
    const config = resolveBatcherConfig({
      maxBytes: 2048,
      delimiter: ';\n',
      dryRun: true,
      sizeFunc,
      logging: 'verbose',
      slowFlushMs: 0,
    });
    expect(config).toEqual({ maxBytes: 2048, delimiter: ';\n', dryRun: true, sizeFunc, logging: 'verbose', slowFlushMs: 0 });
  });

  it('does not carry the emitter into the config', () => {
    const config = resolveBatcherConfig({ emitter: new BatcherEventEmitter() });
    expect('emitter' in config).toBe(false);
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(resolveBatcherConfig({ maxBytes: 10 }))).toBe(true);
  });

  it.each([0, -1, 1.5, Number.NaN])('rejects maxBytes %s', (maxBytes) => {
    expect(() => resolveBatcherConfig({ maxBytes })).toThrow(BatcherError);
  });

  it('rejects an empty delimiter', () => {
    expect(() => resolveBatcherConfig({ delimiter: '' })).toThrow(/delimiter/);
  });

  it('rejects a negative slowFlushMs', () => {
    expect(() => resolveBatcherConfig({ slowFlushMs: -1 })).toThrow(/slowFlushMs/);
  });

  it('lists every issue with INVALID_CONFIG', () => {
    try {
      resolveBatcherConfig({ maxBytes: 0, delimiter: '' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(BatcherError);
      expect(err).toMatchObject({ code: 'INVALID_CONFIG', retryable: false });
      expect(err).toHaveProperty('message', expect.stringMatching(/^Invalid batcher configuration: maxBytes: .*, delimiter: .*\. Fix: /));
    }
  });
});

describe('resolveSqlAdapterConfig', () => {
  it('accepts a uri with optional fields', () => {
    expect(resolveSqlAdapterConfig({ uri: 'postgresql://localhost/app', maxQuerySize: 1024, label: 'test' }))
      .toEqual({ uri: 'postgresql://localhost/app', maxQuerySize: 1024, label: 'test' });
  });

  it('rejects an empty uri', () => {
    expect(() => resolveSqlAdapterConfig({ uri: '' })).toThrow(/^Invalid adapter configuration: uri: /);
  });

  it('rejects a non-positive maxQuerySize', () => {
    expect(() => resolveSqlAdapterConfig({ uri: 'postgresql://localhost/app', maxQuerySize: 0 })).toThrow(/maxQuerySize/);
  });
});
