import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-grpc';
import { Resource } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import { BatchSpanProcessor } from '@opentelemetry/sdk-trace-node';

export interface TelemetryOptions {
  /** OTLP gRPC collector endpoint. Null disables export. */
  endpoint: string | null;
  serviceName?: string;
  serviceVersion?: string;
}

/**
 * Start the OpenTelemetry SDK when a collector is configured.
 * Without one the global tracer stays a no-op and spans cost nothing.
 */
export function initTelemetry(opts: TelemetryOptions): NodeSDK | null {
  if (!opts.endpoint) return null;

  const sdk = new NodeSDK({
    resource: new Resource({
      [ATTR_SERVICE_NAME]: opts.serviceName ?? 'claimgate',
      [ATTR_SERVICE_VERSION]: opts.serviceVersion ?? '1.0.0',
    }),
    spanProcessor: new BatchSpanProcessor(new OTLPTraceExporter({ url: opts.endpoint })),
  });
  sdk.start();
  return sdk;
}

/** Flush pending spans. Safe to call with null. */
export async function shutdownTelemetry(sdk: NodeSDK | null): Promise<void> {
  if (!sdk) return;
  await sdk.shutdown();
}
