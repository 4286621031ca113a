import {
	type Logger as PinoInstance,
	type LoggerOptions as PinoOptions,
	pino,
	stdTimeFunctions,
} from "pino";
import type { ServiceTags } from "./tags.js";
import { validateTags } from "./tags.js";

export interface LogContext extends Record<string, unknown> {
	trace_id?: string;
	span_id?: string;
	topic?: string;
	partition?: number;
	offset?: string;
	query?: string;
	group_key?: string;
	stage?: string;
	error_code?: string;
}

export interface Logger {
	debug(msg: string, context?: LogContext): void;
	info(msg: string, context?: LogContext): void;
	warn(msg: string, context?: LogContext): void;
	error(msg: string, context?: LogContext): void;
	child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
	level?: string;
	serviceTags: ServiceTags;
	pretty?: boolean;
}

/**
 * Keys whose values never reach the log output. Raw log payloads are
 * included: they are customer data and may carry credentials.
 */
const REDACTED_PATTERNS = [
	/password/i,
	/secret/i,
	/token/i,
	/api_?key/i,
	/auth/i,
	/credential/i,
	/private/i,
	/payload/i,
];

const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function redactSensitive(
	obj: Record<string, unknown>,
): Record<string, unknown> {
	const result: Record<string, unknown> = {};

	for (const [key, value] of Object.entries(obj)) {
		if (REDACTED_PATTERNS.some((p) => p.test(key))) {
			result[key] = "[REDACTED]";
			continue;
		}

		if (isPlainObject(value)) {
			result[key] = redactSensitive(value);
			continue;
		}

		if (typeof value === "string") {
			result[key] = value.replace(EMAIL_PATTERN, "[EMAIL_REDACTED]");
			continue;
		}

		result[key] = value;
	}

	return result;
}

class PinoLogger implements Logger {
	private pino: PinoInstance;
	private baseTags: ServiceTags;

	constructor(pinoInstance: PinoInstance, baseTags: ServiceTags) {
		this.pino = pinoInstance;
		this.baseTags = baseTags;
	}

	private formatContext(context?: LogContext): Record<string, unknown> {
		if (!context) {
			return { ...this.baseTags };
		}

		const redacted = redactSensitive(context);
		return {
			...this.baseTags,
			...redacted,
			// Datadog log-trace correlation fields
			dd: {
				trace_id: context.trace_id,
				span_id: context.span_id,
			},
		};
	}

	debug(msg: string, context?: LogContext): void {
		this.pino.debug(this.formatContext(context), msg);
	}

	info(msg: string, context?: LogContext): void {
		this.pino.info(this.formatContext(context), msg);
	}

	warn(msg: string, context?: LogContext): void {
		this.pino.warn(this.formatContext(context), msg);
	}

	error(msg: string, context?: LogContext): void {
		this.pino.error(this.formatContext(context), msg);
	}

	child(bindings: Record<string, unknown>): Logger {
		return new PinoLogger(
			this.pino.child(redactSensitive(bindings)),
			this.baseTags,
		);
	}
}

export function createLogger(options: LoggerOptions): Logger {
	validateTags({ ...options.serviceTags }, "logger");

	const pinoOptions: PinoOptions = {
		level: options.level ?? "info",
		base: {
			// Datadog unified service tags
			env: options.serviceTags.env,
			service: options.serviceTags.service,
			version: options.serviceTags.version,
		},
		formatters: {
			level: (label) => ({ level: label }),
		},
		timestamp: stdTimeFunctions.isoTime,
	};

	if (options.pretty) {
		pinoOptions.transport = {
			target: "pino-pretty",
			options: {
				colorize: true,
				translateTime: "SYS:standard",
				ignore: "pid,hostname",
			},
		};
	}

	return new PinoLogger(pino(pinoOptions), options.serviceTags);
}
