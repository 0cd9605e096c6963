import { metrics, trace, type Counter, type Histogram, type Tracer } from '@opentelemetry/api';

const SCOPE = 'portcall';
const SCOPE_VERSION = '1.0.0';

/**
 * Spans and instruments go through the global OpenTelemetry API; they stay
 * no-ops until the host application registers its own providers.
 */
export namespace TelemetryService {
  let tracer: Tracer | undefined;
  const counters = new Map<string, Counter>();
  const histograms = new Map<string, Histogram>();

  export function getTracer(): Tracer {
    if (!tracer) {
      tracer = trace.getTracer(SCOPE, SCOPE_VERSION);
    }

    return tracer;
  }

  export function counter(name: string, description: string, unit = '1'): Counter {
    let instrument = counters.get(name);

    if (!instrument) {
      instrument = metrics.getMeter(SCOPE, SCOPE_VERSION).createCounter(name, { description, unit });
      counters.set(name, instrument);
    }

    return instrument;
  }

  export function histogram(name: string, description: string, unit = 'ms'): Histogram {
    let instrument = histograms.get(name);

    if (!instrument) {
      instrument = metrics.getMeter(SCOPE, SCOPE_VERSION).createHistogram(name, { description, unit });
      histograms.set(name, instrument);
    }

    return instrument;
  }
}
