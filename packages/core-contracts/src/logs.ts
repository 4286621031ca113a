/**
 * Log sources the engine understands. The tag travels on every parsed record
 * and becomes `log_type` on the unified event.
 */
export type LogSource = "structured" | "syslog" | "nginx" | "app_legacy";

/**
 * Raw record as delivered by the transport. Never mutated; discarded once
 * parsed or dead-lettered.
 */
export interface RawLogRecord {
	readonly source_topic: string;
	readonly key: string | null;
	readonly payload: string | Uint8Array;
	/** Broker timestamp, epoch millis */
	readonly ingest_time: number;
}

interface ParsedRecordBase {
	/** Event time, epoch millis */
	readonly event_time: number;
	readonly log_source: LogSource;
}

export interface StructuredLogRecord extends ParsedRecordBase {
	readonly kind: "structured";
	readonly log_source: "structured";
	readonly timestamp: string;
	readonly level: string;
	readonly service: string;
	readonly message: string;
	readonly hostname: string | null;
	readonly status_code: number | null;
	readonly latency_ms: number | null;
	readonly trace_id: string | null;
	readonly span_id: string | null;
}

export interface SyslogRecord extends ParsedRecordBase {
	readonly kind: "syslog";
	readonly log_source: "syslog";
	readonly priority: number;
	readonly facility: number;
	readonly severity: number;
	readonly severity_label: SyslogSeverityLabel;
	/** Timestamp as written on the line (RFC-3164 carries no year) */
	readonly timestamp: string | null;
	readonly hostname: string | null;
	readonly process: string | null;
	readonly pid: number | null;
	readonly message: string | null;
}

export interface NginxAccessRecord extends ParsedRecordBase {
	readonly kind: "nginx";
	readonly log_source: "nginx";
	readonly client_ip: string;
	readonly request_time: string;
	/** Null when nginx could not read the request line */
	readonly method: string | null;
	readonly path: string | null;
	readonly protocol: string | null;
	readonly status_code: number;
	readonly bytes_sent: number | null;
	readonly referer: string | null;
	readonly user_agent: string | null;
	readonly response_time_sec: number | null;
}

export type AppLegacyDialect = "piped" | "bracket" | "standard";

export interface AppLegacyRecord extends ParsedRecordBase {
	readonly kind: "app_legacy";
	readonly log_source: "app_legacy";
	readonly dialect: AppLegacyDialect;
	/** Application identifier taken from the raw record key */
	readonly application: string | null;
	readonly timestamp: string;
	readonly level: string;
	readonly thread: string | null;
	readonly class_name: string | null;
	readonly message: string;
	readonly duration_ms: number | null;
	readonly rows: number | null;
}

export type ParsedLogRecord =
	| StructuredLogRecord
	| SyslogRecord
	| NginxAccessRecord
	| AppLegacyRecord;

export type ParsedLogKind = ParsedLogRecord["kind"];

export const SYSLOG_SEVERITY_LABELS = [
	"EMERGENCY",
	"ALERT",
	"CRITICAL",
	"ERROR",
	"WARNING",
	"NOTICE",
	"INFO",
	"DEBUG",
] as const;

export type SyslogSeverityLabel =
	| (typeof SYSLOG_SEVERITY_LABELS)[number]
	| "UNKNOWN";

/**
 * One span flattened out of an OTLP/JSON batch on the telemetry stream.
 */
export interface SpanRecord {
	readonly service_name: string;
	readonly span_name: string;
	readonly trace_id: string;
	readonly span_id: string;
	/** Span start, epoch millis */
	readonly event_time: number;
	readonly duration_ms: number;
	readonly is_error: boolean;
}

/**
 * Canonical event shape shared by every source.
 */
export interface UnifiedLogEvent {
	readonly event_time: number;
	readonly severity_label: string;
	readonly source_name: string;
	readonly hostname: string | null;
	readonly message: string;
	readonly status_code: number | null;
	readonly latency_ms: number | null;
	readonly trace_id: string | null;
	readonly log_type: LogSource;
}
