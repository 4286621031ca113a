import type { ErrorClassification } from "@logflow/core-contracts";

export class KafkaError extends Error {
	constructor(
		message: string,
		public readonly code: string,
		public readonly retryable: boolean,
	) {
		super(message);
		this.name = "KafkaError";
	}
}

export class RetryableError extends KafkaError {
	constructor(message: string, code: string) {
		super(message, code, true);
		this.name = "RetryableError";
	}
}

export class NonRetryableError extends KafkaError {
	constructor(message: string, code: string) {
		super(message, code, false);
		this.name = "NonRetryableError";
	}
}

/**
 * Messages that point at a broker or network problem
 */
const RETRYABLE_PATTERNS = [
	/ECONNREFUSED/i,
	/ETIMEDOUT/i,
	/ENOTFOUND/i,
	/connection.*reset/i,
	/timeout/i,
	/temporarily unavailable/i,
	/leader not available/i,
	/request timed out/i,
	/network/i,
];

/**
 * Classify an error for DLQ routing
 */
export function classifyError(error: Error): ErrorClassification {
	if (error instanceof KafkaError) {
		return error.retryable ? "retryable" : "non_retryable";
	}

	for (const pattern of RETRYABLE_PATTERNS) {
		if (pattern.test(error.message)) {
			return "retryable";
		}
	}

	return "non_retryable";
}

export function errorCode(error: Error): string {
	return error instanceof KafkaError ? error.code : "UNKNOWN";
}
