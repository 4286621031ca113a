import type { RawLogRecord, StructuredLogRecord } from "@logflow/core-contracts";
import { z } from "zod";
import { parseDateTime } from "./timestamps.js";
import { type ParseResult, decodePayload, failed, parsed } from "./types.js";

export const structuredLogSchema = z.object({
	timestamp: z.union([z.string().min(1), z.number().finite()]),
	level: z.string().min(1),
	service: z.string().min(1),
	message: z.string(),
	hostname: z.string().nullish(),
	status_code: z.number().int().nullish(),
	latency_ms: z.number().finite().nullish(),
	trace_id: z.string().nullish(),
	span_id: z.string().nullish(),
});

export type StructuredLogInput = z.infer<typeof structuredLogSchema>;

function readJson(payload: string): { ok: true; value: unknown } | { ok: false; error: string } {
	try {
		return { ok: true, value: JSON.parse(payload) };
	} catch (error) {
		return {
			ok: false,
			error: error instanceof Error ? error.message : String(error),
		};
	}
}

/** Trailing zone designator on a timestamp that is not ISO shaped */
const EXPLICIT_ZONE = /(?:\bGMT|\bUTC|Z|[+-]\d{2}:?\d{2})$/;

/**
 * ISO-like timestamps without a zone are UTC. Other formats go through
 * `Date.parse` only when they name their zone; it would read them in the
 * host's local time otherwise.
 */
function toEpochMillis(timestamp: string | number): number | null {
	if (typeof timestamp === "number") {
		return Number.isFinite(timestamp) ? timestamp : null;
	}
	const iso = parseDateTime(timestamp);
	if (iso !== null) {
		return iso;
	}
	if (!EXPLICIT_ZONE.test(timestamp.trim())) {
		return null;
	}
	const ms = Date.parse(timestamp);
	return Number.isFinite(ms) ? ms : null;
}

export function parseStructured(
	raw: RawLogRecord,
): ParseResult<StructuredLogRecord> {
	const payload = decodePayload(raw.payload);

	const json = readJson(payload);
	if (!json.ok) {
		return failed(payload, "malformed_json", json.error);
	}
	if (json.value === null || typeof json.value !== "object" || Array.isArray(json.value)) {
		return failed(payload, "malformed_json", "expected a JSON object");
	}

	const result = structuredLogSchema.safeParse(json.value);
	if (!result.success) {
		const issue = result.error.issues[0];
		const field = issue?.path.join(".") || null;
		return failed(
			payload,
			"missing_field",
			issue ? `${field ?? "<root>"}: ${issue.message}` : "invalid record",
			field,
		);
	}

	const input = result.data;
	const eventTime = toEpochMillis(input.timestamp);
	if (eventTime === null) {
		return failed(
			payload,
			"malformed_timestamp",
			`invalid timestamp ${JSON.stringify(input.timestamp)}`,
			"timestamp",
		);
	}

	return parsed({
		kind: "structured",
		log_source: "structured",
		event_time: eventTime,
		timestamp:
			typeof input.timestamp === "string"
				? input.timestamp
				: new Date(eventTime).toISOString(),
		level: input.level,
		service: input.service,
		message: input.message,
		hostname: input.hostname ?? null,
		status_code: input.status_code ?? null,
		latency_ms: input.latency_ms ?? null,
		trace_id: input.trace_id ?? null,
		span_id: input.span_id ?? null,
	});
}
