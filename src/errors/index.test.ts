import { describe, it, expect } from 'vitest';
import {
  ConfigInvalidError,
  MetricsUnavailableError,
  NotifierTransportError,
  toError,
} from './index.js';

describe('errors', () => {
  it('MetricsUnavailableError carries its code and cause', () => {
    const cause = new Error('EACCES');
    const err = new MetricsUnavailableError('Failed to read disk usage', cause);

    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('MetricsUnavailableError');
    expect(err.code).toBe('METRICS_UNAVAILABLE');
    expect(err.cause).toBe(cause);
  });

  it('NotifierTransportError names its transport', () => {
    const err = new NotifierTransportError('Webhook responded with 500', 'webhook');

    expect(err.code).toBe('NOTIFIER_TRANSPORT_ERROR');
    expect(err.transport).toBe('webhook');
  });

  it('ConfigInvalidError joins every issue into its message', () => {
    const err = new ConfigInvalidError(['PORT must be a port number, got -1', 'bad level']);

    expect(err.code).toBe('CONFIG_INVALID');
    expect(err.issues).toHaveLength(2);
    expect(err.message).toBe('Invalid configuration: PORT must be a port number, got -1; bad level');
  });

  describe('toError', () => {
    it('returns errors unchanged', () => {
      const err = new RangeError('out of range');
      expect(toError(err)).toBe(err);
    });

    it('wraps strings and other values', () => {
      expect(toError('plain message').message).toBe('plain message');
      expect(toError(42).message).toBe('Unknown error');
    });
  });
});
