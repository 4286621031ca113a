import type {
	AppLegacyRecord,
	NginxAccessRecord,
	ParsedLogRecord,
	StructuredLogRecord,
	SyslogRecord,
	UnifiedLogEvent,
} from "@logflow/core-contracts";

const UNKNOWN_SOURCE = "unknown";
const NGINX_SOURCE = "nginx";
/** What nginx writes in place of a request line it could not read */
const UNREADABLE_REQUEST = "-";

export function nginxSeverity(statusCode: number): "ERROR" | "WARN" | "INFO" {
	if (statusCode >= 500) return "ERROR";
	if (statusCode >= 400) return "WARN";
	return "INFO";
}

function fromStructured(r: StructuredLogRecord): UnifiedLogEvent {
	return {
		event_time: r.event_time,
		severity_label: r.level,
		source_name: r.service,
		hostname: r.hostname,
		message: r.message,
		status_code: r.status_code,
		latency_ms: r.latency_ms,
		trace_id: r.trace_id,
		log_type: "structured",
	};
}

function fromSyslog(r: SyslogRecord): UnifiedLogEvent {
	return {
		event_time: r.event_time,
		severity_label: r.severity_label,
		source_name: r.process ?? UNKNOWN_SOURCE,
		hostname: r.hostname,
		message: r.message ?? "",
		status_code: null,
		latency_ms: null,
		trace_id: null,
		log_type: "syslog",
	};
}

function fromNginx(r: NginxAccessRecord): UnifiedLogEvent {
	return {
		event_time: r.event_time,
		severity_label: nginxSeverity(r.status_code),
		source_name: NGINX_SOURCE,
		hostname: null,
		message: r.method === null || r.path === null ? UNREADABLE_REQUEST : `${r.method} ${r.path}`,
		status_code: r.status_code,
		latency_ms:
			r.response_time_sec === null ? null : Math.round(r.response_time_sec * 1000),
		trace_id: null,
		log_type: "nginx",
	};
}

function fromAppLegacy(r: AppLegacyRecord): UnifiedLogEvent {
	return {
		event_time: r.event_time,
		severity_label: r.level,
		source_name: r.application ?? UNKNOWN_SOURCE,
		hostname: null,
		message: r.message,
		status_code: null,
		latency_ms: r.duration_ms,
		trace_id: null,
		log_type: "app_legacy",
	};
}

function assertNever(value: never): never {
	throw new Error(`Unhandled parsed record: ${JSON.stringify(value)}`);
}

/**
 * Map any parsed record to the unified event. The result is frozen; a
 * new record kind fails to compile until it has a case here.
 */
export function normalize(record: ParsedLogRecord): UnifiedLogEvent {
	switch (record.kind) {
		case "structured":
			return Object.freeze(fromStructured(record));
		case "syslog":
			return Object.freeze(fromSyslog(record));
		case "nginx":
			return Object.freeze(fromNginx(record));
		case "app_legacy":
			return Object.freeze(fromAppLegacy(record));
		default:
			return assertNever(record);
	}
}
