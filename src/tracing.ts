import { NodeSDK } from '@opentelemetry/sdk-node';
import { trace } from '@opentelemetry/api';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { JaegerExporter } from '@opentelemetry/exporter-jaeger';
import { logEvent } from './observability/log.js';
import { errorMessage } from './pipeline/errors.js';

export async function setupTracing(serviceName: string, env: NodeJS.ProcessEnv = process.env): Promise<() => Promise<void>> {
  const endpoint = env.JAEGER_ENDPOINT || 'http://127.0.0.1:14268/api/traces';
  if (!env.OTEL_SERVICE_NAME) env.OTEL_SERVICE_NAME = serviceName;

  const sdk = new NodeSDK({
    traceExporter: new JaegerExporter({ endpoint }),
    instrumentations: [getNodeAutoInstrumentations({ '@opentelemetry/instrumentation-fs': { enabled: false } })],
  });
  sdk.start();
  const span = trace.getTracer('startup').startSpan(`startup:${serviceName}`);
  span.addEvent('service_start');
  span.end();
  logEvent('info', 'tracing.started', { service: serviceName, endpoint });

  return async () => {
    try {
      await sdk.shutdown();
    } catch (e) {
      logEvent('warn', 'tracing.shutdown_failed', { error: errorMessage(e) });
    }
  };
}
