import type {
	DeadLetterEntry,
	ParseFailureReason,
	RawLogRecord,
} from "@logflow/core-contracts";

export interface ParseFailure {
	readonly reason: ParseFailureReason;
	readonly detail: string;
	readonly field: string | null;
	/** Original payload, decoded as UTF-8 */
	readonly payload: string;
}

export type ParseResult<T> =
	| { status: "parsed"; record: T }
	| { status: "failed"; failure: ParseFailure };

export function parsed<T>(record: T): ParseResult<T> {
	return { status: "parsed", record };
}

export function failed<T>(
	payload: string,
	reason: ParseFailureReason,
	detail: string,
	field: string | null = null,
): ParseResult<T> {
	return { status: "failed", failure: { reason, detail, field, payload } };
}

const decoder = new TextDecoder("utf-8");

export function decodePayload(payload: string | Uint8Array): string {
	return typeof payload === "string" ? payload : decoder.decode(payload);
}

export function toDeadLetter(
	raw: RawLogRecord,
	failure: ParseFailure,
): DeadLetterEntry {
	return {
		source_topic: raw.source_topic,
		key: raw.key,
		payload: failure.payload,
		reason: failure.reason,
		detail: failure.detail,
		field: failure.field,
		ingest_time: raw.ingest_time,
	};
}
