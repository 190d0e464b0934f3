import { type Span, SpanStatusCode, trace, context } from '@opentelemetry/api';
import { tracer } from './tracing';

/**
 * Tracing Utility Functions
 *
 * Helper functions for creating and managing OpenTelemetry spans
 */

type SpanAttributes = Record<string, string | number | boolean | null | undefined>;

/**
 * Execute a function within a new span
 *
 * Status stays unset on success so `fn` can mark an unsuccessful outcome.
 *
 * @param spanName - Name of the span
 * @param fn - Function to execute within the span
 * @param attributes - Optional span attributes
 * @returns Result of the function
 */
export async function withSpan<T>(
    spanName: string,
    fn: (span: Span) => Promise<T>,
    attributes?: SpanAttributes
): Promise<T> {
    const span = tracer.startSpan(spanName);

    if (attributes) {
        addSpanAttributes(span, attributes);
    }

    try {
        // Execute function in span context
        return await context.with(trace.setSpan(context.active(), span), () => fn(span));
    } catch (error) {
        recordException(span, error);
        span.setStatus({
            code: SpanStatusCode.ERROR,
            message: error instanceof Error ? error.message : 'Unknown error',
        });

        throw error;
    } finally {
        // Always end the span
        span.end();
    }
}

/**
 * Add structured attributes to a span, skipping absent values
 */
export function addSpanAttributes(span: Span, attributes: SpanAttributes): void {
    for (const [key, value] of Object.entries(attributes)) {
        if (value !== null && value !== undefined) {
            span.setAttribute(key, value);
        }
    }
}

/**
 * Record an exception in a span
 */
export function recordException(span: Span, error: unknown): void {
    if (error instanceof Error) {
        span.recordException(error);
    } else {
        span.recordException({
            name: 'UnknownError',
            message: String(error),
        });
    }
}

/**
 * Set span status
 *
 * @param success - Whether the operation was successful
 * @param message - Optional status message
 */
export function setSpanStatus(span: Span, success: boolean, message?: string): void {
    if (success) {
        span.setStatus({ code: SpanStatusCode.OK });
    } else {
        span.setStatus({
            code: SpanStatusCode.ERROR,
            message: message || 'Operation failed',
        });
    }
}
