// tracing-utils.ts
import { type Span, SpanStatusCode, trace, context } from '@opentelemetry/api';

const TRACER_NAME = 'sap-bo-mcp-server';

export function getActiveSpan(spanOverride?: Span): Span | undefined {
  return spanOverride ?? trace.getSpan(context.active());
}

export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);

  return tracer.startActiveSpan(name, async (span) => {
    try {
      return await fn(span);
    } catch (err) {
      span.recordException(err instanceof Error ? err : String(err));
      span.setStatus({ code: SpanStatusCode.ERROR, message: err instanceof Error ? err.message : String(err) });
      throw err;
    } finally {
      span.end();
    }
  });
}

// Decorator version of withSpan
// Usage: @WithSpan('my-operation')
export function WithSpan(name: string) {
  return <This, T extends unknown[], R>(
    _target: object,
    _propertyKey: string,
    descriptor: TypedPropertyDescriptor<(this: This, ...args: T) => Promise<R>>
  ) => {
    const originalMethod = descriptor.value;

    if (!originalMethod) {
      throw new Error('WithSpan can only be applied to methods');
    }

    descriptor.value = async function (this: This, ...args: T): Promise<R> {
      return withSpan(name, () => originalMethod.apply(this, args));
    };

    return descriptor;
  };
}
