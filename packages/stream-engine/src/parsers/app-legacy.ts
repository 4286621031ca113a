import type {
	AppLegacyDialect,
	AppLegacyRecord,
	RawLogRecord,
} from "@logflow/core-contracts";
import { parseDateTime } from "./timestamps.js";
import { type ParseResult, decodePayload, failed, parsed } from "./types.js";

const BRACKET_LINE = /^\[([^\]]+)\]\s+([A-Za-z]+):\s+(\S+)\s+::\s+(.*)$/s;

const STANDARD_LINE =
	/^(\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}:\d{2}(?:[.,]\d{1,6})?(?:Z|[+-]\d{2}:?\d{2})?)\s+([A-Za-z]+)\s+\[([^\]]*)\]\s+(\S+)\s+-\s+(.*)$/s;

const DURATION = /\btook\s+(\d+)\s*ms\b/;
const ROWS = /\brows=(\d+)\b/;

/** Minimum top-level pipes for the piped dialect */
const PIPED_MIN_SEPARATORS = 3;

/**
 * Split on `|` outside `[...]` and double quotes.
 */
export function splitTopLevelPipes(line: string): string[] {
	const parts: string[] = [];
	let depth = 0;
	let quoted = false;
	let current = "";

	for (const ch of line) {
		if (ch === '"') {
			quoted = !quoted;
		} else if (!quoted && ch === "[") {
			depth++;
		} else if (!quoted && ch === "]" && depth > 0) {
			depth--;
		} else if (ch === "|" && !quoted && depth === 0) {
			parts.push(current);
			current = "";
			continue;
		}
		current += ch;
	}
	parts.push(current);
	return parts;
}

/**
 * Dialect by structural cue, first match wins: enough top-level pipes,
 * then a leading `[`, then standard.
 */
export function detectDialect(line: string): AppLegacyDialect {
	if (splitTopLevelPipes(line).length - 1 >= PIPED_MIN_SEPARATORS) {
		return "piped";
	}
	if (line.startsWith("[")) {
		return "bracket";
	}
	return "standard";
}

export function scanMessage(message: string): {
	duration_ms: number | null;
	rows: number | null;
} {
	const duration = DURATION.exec(message);
	const rows = ROWS.exec(message);
	return {
		duration_ms: duration?.[1] ? Number(duration[1]) : null,
		rows: rows?.[1] ? Number(rows[1]) : null,
	};
}

interface DialectFields {
	timestamp: string;
	level: string;
	thread: string | null;
	class_name: string | null;
	message: string;
}

type DialectResult =
	| { status: "parsed"; fields: DialectFields }
	| { status: "failed"; detail: string };

function parsePiped(line: string): DialectResult {
	const parts = splitTopLevelPipes(line).map((p) => p.trim());
	const [level = "", timestamp = "", thread = ""] = parts;
	if (parts.length >= 5) {
		return {
			status: "parsed",
			fields: {
				level,
				timestamp,
				thread: thread || null,
				class_name: parts[3] || null,
				message: parts.slice(4).join("|"),
			},
		};
	}
	// LEVEL|timestamp|thread|message
	return {
		status: "parsed",
		fields: {
			level,
			timestamp,
			thread: thread || null,
			class_name: null,
			message: parts[3] ?? "",
		},
	};
}

function parseBracket(line: string): DialectResult {
	const match = BRACKET_LINE.exec(line);
	if (!match) {
		return { status: "failed", detail: "expected [timestamp] LEVEL: class :: message" };
	}
	const [, timestamp = "", level = "", className = "", message = ""] = match;
	return {
		status: "parsed",
		fields: { timestamp, level, thread: null, class_name: className, message },
	};
}

function parseStandard(line: string): DialectResult {
	const match = STANDARD_LINE.exec(line);
	if (!match) {
		return {
			status: "failed",
			detail: "expected timestamp LEVEL [thread] class - message",
		};
	}
	const [, timestamp = "", level = "", thread = "", className = "", message = ""] =
		match;
	return {
		status: "parsed",
		fields: {
			timestamp,
			level,
			thread: thread || null,
			class_name: className,
			message,
		},
	};
}

export function parseAppLegacy(raw: RawLogRecord): ParseResult<AppLegacyRecord> {
	const payload = decodePayload(raw.payload);
	const line = payload.trim();
	const dialect = detectDialect(line);

	const result =
		dialect === "piped"
			? parsePiped(line)
			: dialect === "bracket"
				? parseBracket(line)
				: parseStandard(line);

	if (result.status === "failed") {
		return failed(payload, "unrecognized_format", `${dialect}: ${result.detail}`);
	}

	const { fields } = result;
	if (!fields.level) {
		return failed(payload, "missing_field", `${dialect}: no level`, "level");
	}

	const eventTime = parseDateTime(fields.timestamp);
	if (eventTime === null) {
		return failed(
			payload,
			"malformed_timestamp",
			`${dialect}: invalid timestamp ${JSON.stringify(fields.timestamp)}`,
			"timestamp",
		);
	}

	return parsed({
		kind: "app_legacy",
		log_source: "app_legacy",
		event_time: eventTime,
		dialect,
		application: raw.key,
		timestamp: fields.timestamp,
		level: fields.level,
		thread: fields.thread,
		class_name: fields.class_name,
		message: fields.message,
		...scanMessage(fields.message),
	});
}
