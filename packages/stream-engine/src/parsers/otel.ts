import type { RawLogRecord, SpanRecord } from "@logflow/core-contracts";
import { z } from "zod";
import { type ParseResult, decodePayload, failed, parsed } from "./types.js";

const NANOS_PER_MILLI = 1_000_000n;

/** OTLP/JSON encodes 64-bit integers as strings */
const unixNanos = z.union([
	z.string().regex(/^\d+$/),
	z.number().int().nonnegative(),
]);

const anyValueSchema = z.object({
	stringValue: z.string().optional(),
});

const keyValueSchema = z.object({
	key: z.string(),
	value: anyValueSchema.optional(),
});

const spanSchema = z.object({
	traceId: z.string().min(1),
	spanId: z.string().min(1),
	name: z.string().min(1),
	startTimeUnixNano: unixNanos,
	endTimeUnixNano: unixNanos,
	status: z
		.object({
			code: z.union([z.number(), z.string()]).optional(),
		})
		.optional(),
});

const scopeSpansSchema = z.object({
	spans: z.array(spanSchema).default([]),
});

const resourceSpansSchema = z.object({
	resource: z
		.object({
			attributes: z.array(keyValueSchema).default([]),
		})
		.optional(),
	scopeSpans: z.array(scopeSpansSchema).optional(),
	/** Pre-1.0 name of scopeSpans */
	instrumentationLibrarySpans: z.array(scopeSpansSchema).optional(),
});

export const otlpTraceSchema = z.object({
	resourceSpans: z.array(resourceSpansSchema),
});

const UNKNOWN_SERVICE = "unknown_service";

function isErrorStatus(code: number | string | undefined): boolean {
	return code === 2 || code === "STATUS_CODE_ERROR";
}

/**
 * Flatten one OTLP/JSON export request into spans. An empty batch parses
 * to no spans.
 */
export function parseOtelSpans(raw: RawLogRecord): ParseResult<SpanRecord[]> {
	const payload = decodePayload(raw.payload);

	let json: unknown;
	try {
		json = JSON.parse(payload);
	} catch (error) {
		return failed(
			payload,
			"malformed_json",
			error instanceof Error ? error.message : String(error),
		);
	}

	const result = otlpTraceSchema.safeParse(json);
	if (!result.success) {
		const issue = result.error.issues[0];
		const field = issue?.path.join(".") || null;
		return failed(
			payload,
			"missing_field",
			issue ? `${field ?? "<root>"}: ${issue.message}` : "invalid span batch",
			field,
		);
	}

	const spans: SpanRecord[] = [];
	for (const resource of result.data.resourceSpans) {
		const serviceName =
			resource.resource?.attributes.find((a) => a.key === "service.name")?.value
				?.stringValue ?? UNKNOWN_SERVICE;
		const scopes = resource.scopeSpans ?? resource.instrumentationLibrarySpans ?? [];

		for (const scope of scopes) {
			for (const span of scope.spans) {
				const start = BigInt(span.startTimeUnixNano);
				const end = BigInt(span.endTimeUnixNano);
				if (end < start) {
					return failed(
						payload,
						"malformed_timestamp",
						`span ${span.spanId} ends before it starts`,
						"endTimeUnixNano",
					);
				}
				spans.push({
					service_name: serviceName,
					span_name: span.name,
					trace_id: span.traceId,
					span_id: span.spanId,
					event_time: Number(start / NANOS_PER_MILLI),
					duration_ms: Number(end - start) / 1e6,
					is_error: isErrorStatus(span.status?.code),
				});
			}
		}
	}

	return parsed(spans);
}
