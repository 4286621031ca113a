import {
	type ParsedLogRecord,
	type RawLogRecord,
	STREAMS,
	type SpanRecord,
} from "@logflow/core-contracts";
import { parseAppLegacy } from "./app-legacy.js";
import { parseNginx } from "./nginx.js";
import { parseOtelSpans } from "./otel.js";
import { parseStructured } from "./structured.js";
import { parseSyslog } from "./syslog.js";
import { type ParseFailure, type ParseResult, decodePayload } from "./types.js";

export type LogFormat = "structured" | "syslog" | "nginx" | "app_legacy" | "otel";

const TOPIC_FORMATS: Readonly<Record<string, LogFormat>> = {
	[STREAMS.LOGS_STRUCTURED]: "structured",
	[STREAMS.LOGS_SYSLOG_RAW]: "syslog",
	[STREAMS.LOGS_NGINX_RAW]: "nginx",
	[STREAMS.LOGS_APP_MIXED]: "app_legacy",
	[STREAMS.TELEMETRY_OTEL]: "otel",
};

export function formatForTopic(topic: string): LogFormat | null {
	return TOPIC_FORMATS[topic] ?? null;
}

export type RegistryResult =
	| { status: "log"; record: ParsedLogRecord }
	| { status: "spans"; spans: SpanRecord[] }
	| { status: "failed"; failure: ParseFailure };

export interface ParserRegistryOptions {
	syslog: { defaultYear: number };
}

export interface ParserRegistry {
	parse(raw: RawLogRecord): RegistryResult;
}

function asLog(result: ParseResult<ParsedLogRecord>): RegistryResult {
	return result.status === "parsed"
		? { status: "log", record: result.record }
		: result;
}

/**
 * Dispatch a raw record to its parser by source topic.
 */
export function createParserRegistry(
	options: ParserRegistryOptions,
): ParserRegistry {
	const syslogOptions = { defaultYear: options.syslog.defaultYear };

	return {
		parse(raw) {
			const format = formatForTopic(raw.source_topic);
			switch (format) {
				case "structured":
					return asLog(parseStructured(raw));
				case "syslog":
					return asLog(parseSyslog(raw, syslogOptions));
				case "nginx":
					return asLog(parseNginx(raw));
				case "app_legacy":
					return asLog(parseAppLegacy(raw));
				case "otel": {
					const result = parseOtelSpans(raw);
					return result.status === "parsed"
						? { status: "spans", spans: result.record }
						: result;
				}
				case null:
					return {
						status: "failed",
						failure: {
							reason: "unrecognized_format",
							detail: `no parser for topic ${raw.source_topic}`,
							field: null,
							payload: decodePayload(raw.payload),
						},
					};
			}
		},
	};
}
