import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SignalEmitter } from '../../src/services/signal-emitter.js';

const mocks = vi.hoisted(() => {
  const jsPublish = vi.fn();
  const streamInfo = vi.fn();
  const streamAdd = vi.fn();
  const nc = {
    jetstream: vi.fn(() => ({ publish: jsPublish })),
    jetstreamManager: vi.fn(async () => ({ streams: { info: streamInfo, add: streamAdd } })),
    isClosed: vi.fn(() => false),
    flush: vi.fn(async () => undefined),
    drain: vi.fn(async () => undefined),
    closed: vi.fn(() => new Promise<void>(() => {})),
  };
  return { jsPublish, streamInfo, streamAdd, nc };
});

// Enum values mirror the real nats exports
vi.mock('nats', () => ({
  connect: vi.fn(async () => mocks.nc),
  StringCodec: () => ({
    encode: (s: string) => new TextEncoder().encode(s),
    decode: (b: Uint8Array) => new TextDecoder().decode(b),
  }),
  RetentionPolicy: { Limits: 'limits', Interest: 'interest', Workqueue: 'workqueue' },
  StorageType: { File: 'file', Memory: 'memory' },
}));

describe('services/signal-emitter', () => {
  let emitter: SignalEmitter;
  const log = vi.fn();

  beforeEach(() => {
    vi.clearAllMocks();
    mocks.jsPublish.mockResolvedValue({ stream: 'CLAIMGATE_SIGNALS', seq: 1 });
    mocks.streamInfo.mockResolvedValue({ config: {} });
    mocks.streamAdd.mockResolvedValue({ config: {} });
    emitter = new SignalEmitter({ url: 'nats://localhost:4222', log });
  });

  it('names the stream and one subject per signal family', () => {
    expect(SignalEmitter.STREAM_NAME).toBe('CLAIMGATE_SIGNALS');
    expect(Object.values(SignalEmitter.SUBJECTS)).toEqual([
      'claimgate.signal.lifecycle',
      'claimgate.signal.approval',
      'claimgate.signal.manifest',
      'claimgate.signal.notification',
    ]);
  });

  describe('connect', () => {
    it('connects and reuses an existing stream', async () => {
      await emitter.connect();

      expect(mocks.streamAdd).not.toHaveBeenCalled();
      expect(await emitter.healthCheck()).toBeGreaterThanOrEqual(0);
      expect(log).toHaveBeenCalledWith('info', expect.objectContaining({ event: 'nats_connect' }));
    });

    it('creates the stream when it is missing', async () => {
      mocks.streamInfo.mockRejectedValueOnce(new Error('stream not found'));
      await emitter.connect();

      expect(mocks.streamAdd).toHaveBeenCalledWith(expect.objectContaining({
        name: 'CLAIMGATE_SIGNALS',
        subjects: ['claimgate.signal.>'],
        max_age: 7 * 24 * 60 * 60 * 1_000_000_000,
      }));
      expect(log).toHaveBeenCalledWith('info', {
        event: 'nats_stream_missing',
        stream: 'CLAIMGATE_SIGNALS',
        message: 'stream not found',
      });
    });
  });

  describe('publish', () => {
    it('returns false when not connected', async () => {
      expect(await emitter.publish(SignalEmitter.SUBJECTS.lifecycle, { claimId: 'a/db' })).toBe(false);
      expect(log).toHaveBeenCalledWith('warn', expect.objectContaining({ event: 'nats_publish_skip' }));
    });

    it('publishes JSON after connection', async () => {
      await emitter.connect();

      const result = await emitter.publish(SignalEmitter.SUBJECTS.approval, { request_id: 'req-1' });

      expect(result).toBe(true);
      const [subject, payload] = mocks.jsPublish.mock.calls[0] ?? [];
      expect(subject).toBe('claimgate.signal.approval');
      expect(payload).toBeInstanceOf(Uint8Array);
      if (payload instanceof Uint8Array) {
        expect(JSON.parse(new TextDecoder().decode(payload))).toEqual({ request_id: 'req-1' });
      }
    });

    it('returns false and logs on publish failure', async () => {
      await emitter.connect();
      mocks.jsPublish.mockRejectedValueOnce(new Error('publish failed'));

      expect(await emitter.publish(SignalEmitter.SUBJECTS.manifest, {})).toBe(false);
      expect(log).toHaveBeenCalledWith('error', expect.objectContaining({
        event: 'nats_publish_error',
        message: 'publish failed',
      }));
    });
  });

  describe('healthCheck', () => {
    it('throws when not connected', async () => {
      await expect(emitter.healthCheck()).rejects.toThrow('NATS not connected');
    });

    it('returns latency when connected', async () => {
      await emitter.connect();
      expect(await emitter.healthCheck()).toBeGreaterThanOrEqual(0);
    });
  });

  it('drains the connection on close', async () => {
    await emitter.connect();
    await emitter.close();
    expect(mocks.nc.drain).toHaveBeenCalledTimes(1);
    await expect(emitter.healthCheck()).rejects.toThrow('NATS not connected');
    expect(await emitter.publish(SignalEmitter.SUBJECTS.lifecycle, {})).toBe(false);
  });
});
