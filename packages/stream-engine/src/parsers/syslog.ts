import {
	type RawLogRecord,
	SYSLOG_SEVERITY_LABELS,
	type SyslogRecord,
	type SyslogSeverityLabel,
} from "@logflow/core-contracts";
import { monthIndex, utcMillis } from "./timestamps.js";
import { type ParseResult, decodePayload, failed, parsed } from "./types.js";

/** Highest valid PRI: facility 23, severity 7 */
const MAX_PRIORITY = 191;

// <PRI>[Mmm dd hh:mm:ss ][host ][process[pid]: ]message
const SYSLOG_LINE =
	/^<(\d{1,3})>(?:([A-Z][a-z]{2}\s+\d{1,2}\s\d{2}:\d{2}:\d{2})\s+)?(?:([^\s:]+)\s+)?(?:([^\s[:]+)(?:\[(\d+)\])?:\s*)?(.*)$/s;

const SYSLOG_TIMESTAMP = /^([A-Z][a-z]{2})\s+(\d{1,2})\s(\d{2}):(\d{2}):(\d{2})$/;

export interface SyslogParserOptions {
	/** RFC-3164 timestamps have no year */
	defaultYear: number;
}

export function severityLabel(severity: number): SyslogSeverityLabel {
	return SYSLOG_SEVERITY_LABELS[severity] ?? "UNKNOWN";
}

/**
 * Resolve `Dec 09 18:12:47` in UTC. Null when the date does not exist.
 */
export function resolveSyslogTimestamp(
	timestamp: string,
	year: number,
): number | null {
	const match = SYSLOG_TIMESTAMP.exec(timestamp);
	if (!match) {
		return null;
	}
	const [, mon, day, hour, minute, second] = match;
	const month = monthIndex(mon ?? "");
	if (month === null) {
		return null;
	}
	return utcMillis(
		year,
		month,
		Number(day),
		Number(hour),
		Number(minute),
		Number(second),
	);
}

function emptyToNull(value: string | undefined): string | null {
	return value === undefined || value === "" ? null : value;
}

export function parseSyslog(
	raw: RawLogRecord,
	options: SyslogParserOptions,
): ParseResult<SyslogRecord> {
	const payload = decodePayload(raw.payload);
	const line = payload.replace(/\r?\n$/, "");

	const match = SYSLOG_LINE.exec(line);
	if (!match) {
		return failed(payload, "unrecognized_format", "missing <PRI> header", "priority");
	}

	const [, pri, timestamp, hostname, processName, pid, message] = match;
	const priority = Number(pri);
	if (priority > MAX_PRIORITY) {
		return failed(
			payload,
			"unrecognized_format",
			`priority ${priority} exceeds ${MAX_PRIORITY}`,
			"priority",
		);
	}

	const severity = priority % 8;
	const eventTime = timestamp
		? resolveSyslogTimestamp(timestamp, options.defaultYear)
		: null;

	return parsed({
		kind: "syslog",
		log_source: "syslog",
		event_time: eventTime ?? raw.ingest_time,
		priority,
		facility: Math.floor(priority / 8),
		severity,
		severity_label: severityLabel(severity),
		timestamp: timestamp ?? null,
		hostname: emptyToNull(hostname),
		process: emptyToNull(processName),
		pid: pid === undefined ? null : Number(pid),
		message: emptyToNull(message),
	});
}
