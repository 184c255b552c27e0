/**
 * Governance signals on NATS JetStream.
 *
 * Every lifecycle action, approval transition, emitted manifest and
 * platform notification is published under `claimgate.signal.>` into the
 * CLAIMGATE_SIGNALS stream. Consumers (audit, chat bridges, the
 * provisioning engine) subscribe per subject.
 *
 * publish() reports delivery as a boolean and never throws: a signal is a
 * side effect of a decision that has already been stored.
 */
import {
  connect,
  type NatsConnection,
  type JetStreamClient,
  type JetStreamManager,
  type StreamConfig,
  StringCodec,
  RetentionPolicy,
  StorageType,
} from 'nats';
import type { LogFn } from '../middleware/logger.js';

export interface NatsClientOptions {
  readonly url: string;
  readonly log?: LogFn;
}

export interface SignalPublisher {
  publish(subject: string, data: Record<string, unknown>): Promise<boolean>;
}

const STREAM_NAME = 'CLAIMGATE_SIGNALS';
const SIGNAL_RETENTION_DAYS = 7;
const NANOS_PER_DAY = 24 * 60 * 60 * 1_000_000_000;

export class SignalEmitter implements SignalPublisher {
  static readonly STREAM_NAME = STREAM_NAME;
  static readonly SUBJECTS = {
    lifecycle: 'claimgate.signal.lifecycle',
    approval: 'claimgate.signal.approval',
    manifest: 'claimgate.signal.manifest',
    notification: 'claimgate.signal.notification',
  } as const;

  static readonly STREAM_CONFIG: Partial<StreamConfig> = {
    name: STREAM_NAME,
    subjects: ['claimgate.signal.>'],
    retention: RetentionPolicy.Limits,
    storage: StorageType.File,
    max_msgs: 100_000,
    max_age: SIGNAL_RETENTION_DAYS * NANOS_PER_DAY,
    num_replicas: 1,
  };

  private nc: NatsConnection | null = null;
  private js: JetStreamClient | null = null;
  private readonly codec = StringCodec();
  private readonly log: LogFn;

  constructor(private readonly opts: NatsClientOptions) {
    this.log = opts.log ?? (() => {});
  }

  /** Connect, reconnecting forever, and make sure the signal stream exists. */
  async connect(): Promise<void> {
    const nc = await connect({
      servers: this.opts.url,
      name: 'claimgate',
      maxReconnectAttempts: -1,
    });
    this.nc = nc;
    this.log('info', { event: 'nats_connect', server: this.opts.url });

    void nc.closed().then((err) => {
      this.log('warn', { event: 'nats_closed', ...(err ? { message: err.message } : {}) });
    });

    await this.ensureStream(await nc.jetstreamManager());
    this.js = nc.jetstream();
  }

  private async ensureStream(jsm: JetStreamManager): Promise<void> {
    try {
      await jsm.streams.info(SignalEmitter.STREAM_NAME);
      return;
    } catch (err) {
      this.log('info', {
        event: 'nats_stream_missing',
        stream: SignalEmitter.STREAM_NAME,
        message: err instanceof Error ? err.message : String(err),
      });
    }
    await jsm.streams.add(SignalEmitter.STREAM_CONFIG);
    this.log('info', { event: 'nats_stream_created', stream: SignalEmitter.STREAM_NAME });
  }

  async publish(subject: string, data: Record<string, unknown>): Promise<boolean> {
    if (!this.js) {
      this.log('warn', { event: 'nats_publish_skip', reason: 'not_connected', subject });
      return false;
    }
    try {
      await this.js.publish(subject, this.codec.encode(JSON.stringify(data)));
      return true;
    } catch (err) {
      this.log('error', {
        event: 'nats_publish_error',
        subject,
        message: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }

  /** Flush round-trip in ms; throws when there is no open connection. */
  async healthCheck(): Promise<number> {
    if (!this.nc || this.nc.isClosed()) {
      throw new Error('NATS not connected');
    }
    const start = Date.now();
    await this.nc.flush();
    return Date.now() - start;
  }

  /** Drain pending publishes and close. */
  async close(): Promise<void> {
    const nc = this.nc;
    this.nc = null;
    this.js = null;
    if (nc && !nc.isClosed()) {
      await nc.drain();
    }
  }
}
