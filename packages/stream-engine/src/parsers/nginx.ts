import type { NginxAccessRecord, RawLogRecord } from "@logflow/core-contracts";
import { monthIndex, utcMillis, zoneOffsetMillis } from "./timestamps.js";
import { type ParseResult, decodePayload, failed, parsed } from "./types.js";

// client ident user [time_local] "request" rest
const ACCESS_PREFIX = /^(\S+) \S+ \S+ \[([^\]]*)\] "([^"]*)"(.*)$/s;

const TIME_LOCAL =
	/^(\d{2})\/([A-Z][a-z]{2})\/(\d{4}):(\d{2}):(\d{2}):(\d{2}) ([+-]\d{4})$/;

const TOKEN = /"([^"]*)"|(\S+)/g;

/**
 * `10/Oct/2023:13:55:36 +0000` to epoch millis
 */
export function parseTimeLocal(value: string): number | null {
	const match = TIME_LOCAL.exec(value);
	if (!match) {
		return null;
	}
	const [, day, mon, year, hour, minute, second, zone] = match;
	const month = monthIndex(mon ?? "");
	if (month === null) {
		return null;
	}
	const local = utcMillis(
		Number(year),
		month,
		Number(day),
		Number(hour),
		Number(minute),
		Number(second),
	);
	return local === null ? null : local - zoneOffsetMillis(zone);
}

function tokenize(rest: string): string[] {
	const tokens: string[] = [];
	for (const match of rest.matchAll(TOKEN)) {
		tokens.push(match[1] ?? match[2] ?? "");
	}
	return tokens;
}

function dashToNull(value: string | undefined): string | null {
	return value === undefined || value === "-" || value === "" ? null : value;
}

interface RequestLine {
	method: string | null;
	path: string | null;
	protocol: string | null;
}

const UNREADABLE_REQUEST: RequestLine = { method: null, path: null, protocol: null };

/**
 * Nginx logs `"-"` when it could not read a request line at all, and the
 * raw bytes when a client sent something that is not HTTP. Both keep the
 * record with no method or path.
 */
function readRequestLine(request: string): RequestLine {
	const [method, path, protocol] = request.split(" ").filter((p) => p !== "");
	if (!method || !path || !/^[A-Z]+$/.test(method)) {
		return UNREADABLE_REQUEST;
	}
	return { method, path, protocol: protocol ?? null };
}

export function parseNginx(raw: RawLogRecord): ParseResult<NginxAccessRecord> {
	const payload = decodePayload(raw.payload);
	const match = ACCESS_PREFIX.exec(payload.trim());
	if (!match) {
		return failed(payload, "unrecognized_format", "not a combined access log line");
	}

	const [, clientIp = "", timeLocal = "", request = "", rest = ""] = match;

	const eventTime = parseTimeLocal(timeLocal);
	if (eventTime === null) {
		return failed(
			payload,
			"malformed_timestamp",
			`invalid time_local: ${timeLocal}`,
			"request_time",
		);
	}

	const line = readRequestLine(request);

	const [status, bytes, referer, userAgent, responseTime] = tokenize(rest);
	if (!status || !/^\d{3}$/.test(status)) {
		return failed(payload, "missing_field", "no status code", "status_code");
	}

	return parsed({
		kind: "nginx",
		log_source: "nginx",
		event_time: eventTime,
		client_ip: clientIp,
		request_time: timeLocal,
		method: line.method,
		path: line.path,
		protocol: line.protocol,
		status_code: Number(status),
		bytes_sent: bytes && /^\d+$/.test(bytes) ? Number(bytes) : null,
		referer: dashToNull(referer),
		user_agent: dashToNull(userAgent),
		response_time_sec:
			responseTime && /^\d+(\.\d+)?$/.test(responseTime)
				? Number(responseTime)
				: null,
	});
}
