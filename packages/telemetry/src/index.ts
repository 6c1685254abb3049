import {
  context,
  diag,
  DiagConsoleLogger,
  DiagLogLevel,
  SpanStatusCode,
  trace,
  type Span,
  type Tracer
} from "@opentelemetry/api";
import {
  BasicTracerProvider,
  BatchSpanProcessor,
  ConsoleSpanExporter,
  type SpanProcessor
} from "@opentelemetry/sdk-trace-base";
import { Resource } from "@opentelemetry/resources";
import { SemanticResourceAttributes } from "@opentelemetry/semantic-conventions";

export interface TracerOptions {
  /** Print finished spans to stdout. Without it spans go to the no-op provider. */
  consoleExport?: boolean;
  /** Extra processor registered alongside (or instead of) the console exporter. */
  spanProcessor?: SpanProcessor;
}

const registry = new Map<string, BasicTracerProvider>();

diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.ERROR);

export function ensureTracer(serviceName: string, options: TracerOptions = {}): Tracer {
  if (registry.has(serviceName)) {
    return trace.getTracer(serviceName);
  }

  const processors: SpanProcessor[] = [];
  if (options.consoleExport) {
    processors.push(new BatchSpanProcessor(new ConsoleSpanExporter()));
  }
  if (options.spanProcessor) {
    processors.push(options.spanProcessor);
  }

  if (processors.length > 0) {
    const resource = new Resource({
      [SemanticResourceAttributes.SERVICE_NAME]: serviceName,
      environment: process.env.NODE_ENV ?? "development"
    });

    const provider = new BasicTracerProvider({ resource });
    processors.forEach((processor) => provider.addSpanProcessor(processor));
    provider.register();
    registry.set(serviceName, provider);
  }

  return trace.getTracer(serviceName);
}

export async function shutdownTracers(): Promise<void> {
  const providers = Array.from(registry.values());
  registry.clear();
  await Promise.allSettled(providers.map((provider) => provider.shutdown()));
}

export function withSpan<T>(tracerName: string, name: string, fn: (span: Span) => Promise<T> | T): Promise<T> {
  const tracer = trace.getTracer(tracerName);
  const span = tracer.startSpan(name);
  return context.with(trace.setSpan(context.active(), span), async () => {
    try {
      return await fn(span);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
      throw error;
    } finally {
      span.end();
    }
  });
}
