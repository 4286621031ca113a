/**
 * Stream names on the engine boundary. Raw inputs come from the data
 * generator; everything else is produced by the pipeline.
 */
export const STREAMS = {
	// Raw inputs
	LOGS_STRUCTURED: "logs-structured",
	LOGS_SYSLOG_RAW: "logs-syslog-raw",
	LOGS_NGINX_RAW: "logs-nginx-raw",
	LOGS_APP_MIXED: "logs-app-mixed",
	TELEMETRY_OTEL: "telemetry-otel",

	// Parsed, one per format
	STRUCTURED_PARSED: "logs-structured-parsed",
	SYSLOG_PARSED: "logs-syslog-parsed",
	NGINX_PARSED: "logs-nginx-parsed",
	APP_PARSED: "logs-app-parsed",
	SPANS_PARSED: "telemetry-spans-parsed",

	LOGS_UNIFIED: "logs-unified",

	// Alert families
	ALERTS_CRITICAL_LOGS: "alerts-critical-logs",
	ALERTS_ERROR_RATE: "alerts-error-rate",
	ALERTS_LATENCY_SLA: "alerts-latency-sla",
	ALERTS_HTTP_STATUS: "alerts-http-status",
	SECURITY_SSH_FAILURES: "security-ssh-failures",
	SECURITY_SUSPICIOUS_IPS: "security-suspicious-ips",

	DEAD_LETTER: "logs-dlq",
} as const;

export type StreamName = (typeof STREAMS)[keyof typeof STREAMS];

export const RAW_STREAMS = [
	STREAMS.LOGS_STRUCTURED,
	STREAMS.LOGS_SYSLOG_RAW,
	STREAMS.LOGS_NGINX_RAW,
	STREAMS.LOGS_APP_MIXED,
	STREAMS.TELEMETRY_OTEL,
] as const;

export type RawStreamName = (typeof RAW_STREAMS)[number];

/**
 * Metric streams are named after the aggregation query that feeds them.
 */
export function metricStream(query: string): string {
	return `metrics-${query}`;
}
