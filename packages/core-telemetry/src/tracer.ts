import { createRequire } from "node:module";
import type { Span, Tracer } from "dd-trace";

let tracerInstance: Tracer | null = null;

export interface TracerOptions {
	service: string;
	version: string;
	env: string;
	logInjection?: boolean;
	runtimeMetrics?: boolean;
}

export function initTracer(options: TracerOptions): Tracer {
	if (tracerInstance) {
		return tracerInstance;
	}

	// Loaded lazily so the engine runs without the agent installed
	const require = createRequire(import.meta.url);
	const ddTrace: Tracer = require("dd-trace");

	tracerInstance = ddTrace.init({
		service: options.service,
		version: options.version,
		env: options.env,
		logInjection: options.logInjection ?? true,
		runtimeMetrics: options.runtimeMetrics ?? true,
	});

	return tracerInstance;
}

function getCurrentSpan(): Span | undefined {
	if (!tracerInstance) {
		return undefined;
	}
	return tracerInstance.scope().active() ?? undefined;
}

export interface SpanOptions {
	resource?: string;
	type?: string;
	tags?: Record<string, string>;
}

/**
 * Run `fn` inside a span. Without an initialised tracer `fn` runs
 * directly with no span.
 */
export async function withSpan<T>(
	operationName: string,
	options: SpanOptions,
	fn: (span: Span | undefined) => Promise<T>,
): Promise<T> {
	if (!tracerInstance) {
		return fn(undefined);
	}

	const traceOpts: { resource?: string; type?: string; tags?: Record<string, string> } = {};
	if (options.resource !== undefined) traceOpts.resource = options.resource;
	if (options.type !== undefined) traceOpts.type = options.type;
	if (options.tags !== undefined) traceOpts.tags = options.tags;

	return tracerInstance.trace(operationName, traceOpts, async (span) => {
		try {
			return await fn(span);
		} catch (error) {
			span.setTag("error", true);
			if (error instanceof Error) {
				span.setTag("error.message", error.message);
				span.setTag("error.stack", error.stack ?? "");
			}
			throw error;
		}
	});
}

/**
 * Trace context of the active span, for Kafka headers
 */
export function injectTraceContext(): { trace_id?: string; span_id?: string } {
	const span = getCurrentSpan();
	if (!span) {
		return {};
	}

	const context = span.context();
	return {
		trace_id: context.toTraceId(),
		span_id: context.toSpanId(),
	};
}

export function extractTraceContext(
	headers: Record<string, string | Buffer | undefined>,
): {
	trace_id?: string;
	span_id?: string;
} {
	const traceId = headers["x-datadog-trace-id"];
	const spanId = headers["x-datadog-parent-id"];

	const result: { trace_id?: string; span_id?: string } = {};
	if (traceId) result.trace_id = String(traceId);
	if (spanId) result.span_id = String(spanId);
	return result;
}
