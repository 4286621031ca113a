// Log records
export type {
	LogSource,
	RawLogRecord,
	StructuredLogRecord,
	SyslogRecord,
	NginxAccessRecord,
	AppLegacyDialect,
	AppLegacyRecord,
	ParsedLogRecord,
	ParsedLogKind,
	SyslogSeverityLabel,
	SpanRecord,
	UnifiedLogEvent,
} from "./logs.js";
export { SYSLOG_SEVERITY_LABELS } from "./logs.js";

// Window output
export type { GroupValue, MeasureSummary, MetricSnapshot } from "./metrics.js";

// Alerts
export type {
	Alert,
	AlertSeverity,
	AlertType,
	EvidenceValue,
} from "./alerts.js";

// Dead letters
export type {
	DeadLetterEntry,
	DLQPayload,
	ErrorClassification,
	ParseFailureReason,
} from "./dlq.js";

// Stream names
export {
	STREAMS,
	RAW_STREAMS,
	metricStream,
	type StreamName,
	type RawStreamName,
} from "./streams.js";

// Schema versions
export { SCHEMA_VERSIONS, type SchemaVersion } from "./versions.js";
