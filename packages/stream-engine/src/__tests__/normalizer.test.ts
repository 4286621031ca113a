import type {
	NginxAccessRecord,
	StructuredLogRecord,
	SyslogRecord,
} from "@logflow/core-contracts";
import { describe, expect, it } from "vitest";
import { nginxSeverity, normalize } from "../normalizer.js";

const nginxRecord = (status_code: number): NginxAccessRecord => ({
	kind: "nginx",
	log_source: "nginx",
	event_time: 1_000,
	client_ip: "10.0.0.1",
	request_time: "10/Oct/2023:13:55:36 +0000",
	method: "POST",
	path: "/login",
	protocol: "HTTP/1.1",
	status_code,
	bytes_sent: 12,
	referer: null,
	user_agent: null,
	response_time_sec: 0.25,
});

describe("nginxSeverity", () => {
	it("should map status classes at their boundaries", () => {
		expect(nginxSeverity(399)).toBe("INFO");
		expect(nginxSeverity(400)).toBe("WARN");
		expect(nginxSeverity(499)).toBe("WARN");
		expect(nginxSeverity(500)).toBe("ERROR");
	});
});

describe("normalize", () => {
	it("should map an access record", () => {
		expect(normalize(nginxRecord(503))).toEqual({
			event_time: 1_000,
			severity_label: "ERROR",
			source_name: "nginx",
			hostname: null,
			message: "POST /login",
			status_code: 503,
			latency_ms: 250,
			trace_id: null,
			log_type: "nginx",
		});
	});

	it("should render an unreadable request line as nginx logs it", () => {
		const event = normalize({ ...nginxRecord(400), method: null, path: null, protocol: null });

		expect(event.message).toBe("-");
		expect(event.severity_label).toBe("WARN");
	});

	it("should fill syslog gaps with fixed values", () => {
		const record: SyslogRecord = {
			kind: "syslog",
			log_source: "syslog",
			event_time: 2_000,
			priority: 13,
			facility: 1,
			severity: 5,
			severity_label: "NOTICE",
			timestamp: null,
			hostname: null,
			process: null,
			pid: null,
			message: null,
		};

		const event = normalize(record);

		expect(event.source_name).toBe("unknown");
		expect(event.message).toBe("");
		expect(event.severity_label).toBe("NOTICE");
		expect(event.log_type).toBe("syslog");
	});

	it("should carry trace context from structured records", () => {
		const record: StructuredLogRecord = {
			kind: "structured",
			log_source: "structured",
			event_time: 3_000,
			timestamp: "1970-01-01T00:00:03.000Z",
			level: "WARN",
			service: "payments",
			message: "slow",
			hostname: "pay-1",
			status_code: null,
			latency_ms: 900,
			trace_id: "trace-9",
			span_id: "span-9",
		};

		const event = normalize(record);

		expect(event.source_name).toBe("payments");
		expect(event.hostname).toBe("pay-1");
		expect(event.latency_ms).toBe(900);
		expect(event.trace_id).toBe("trace-9");
	});

	it("should be deterministic and return a frozen event", () => {
		const record = nginxRecord(404);

		const first = normalize(record);
		const second = normalize(record);

		expect(first).toEqual(second);
		expect(Object.isFrozen(first)).toBe(true);
	});
});
