/**
 * Machine-readable parse failure reasons
 */
export type ParseFailureReason =
	| "missing_field"
	| "malformed_timestamp"
	| "unrecognized_format"
	| "malformed_json";

/**
 * Record the pipeline could not parse. Keeps the original payload so it can
 * be replayed once the parser is fixed.
 */
export interface DeadLetterEntry {
	readonly source_topic: string;
	readonly key: string | null;
	/** Original payload, decoded as UTF-8 */
	readonly payload: string;
	readonly reason: ParseFailureReason;
	readonly detail: string;
	/** Field that was missing or invalid, if the parser knows it */
	readonly field: string | null;
	readonly ingest_time: number;
}

/**
 * DLQ error classifications
 */
export type ErrorClassification = "retryable" | "non_retryable" | "poison";

/**
 * Payload published on the dead-letter topic
 */
export interface DLQPayload {
	/** Unique DLQ entry ID */
	dlq_id: string;
	/** Topic the record was consumed from */
	original_topic: string;
	original_partition?: number;
	original_offset?: string;
	original_key?: string;
	/** Original record, raw text for parse failures */
	original_message: unknown;
	/** Pipeline stage where failure occurred */
	failure_stage: "parse" | "process";
	error_classification: ErrorClassification;
	/** Parse failure reason or application error code */
	error_code: string;
	error_message: string;
	error_stack?: string;
	retry_count: number;
	dlq_at: string;
	processing_service: string;
	processing_instance?: string;
}
