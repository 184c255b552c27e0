/**
 * Telemetry init/shutdown: no-op without a collector, SDK lifecycle with one.
 */
import { describe, it, expect } from 'vitest';
import { initTelemetry, shutdownTelemetry } from '../telemetry.js';

describe('initTelemetry', () => {
  it('returns null when no endpoint is configured', () => {
    expect(initTelemetry({ endpoint: null })).toBeNull();
  });

  it('returns null for an empty endpoint', () => {
    expect(initTelemetry({ endpoint: '' })).toBeNull();
  });

  it('starts an SDK when an endpoint is provided', async () => {
    // Nothing listens here; the exporter only connects on flush
    const sdk = initTelemetry({ endpoint: 'http://localhost:0' });
    expect(sdk).not.toBeNull();
    await shutdownTelemetry(sdk);
  });
});

describe('shutdownTelemetry', () => {
  it('resolves cleanly when sdk is null', async () => {
    await expect(shutdownTelemetry(null)).resolves.toBeUndefined();
  });
});
