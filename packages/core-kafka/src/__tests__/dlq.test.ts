import type { Envelope } from "../envelope.js";
import type { Logger } from "@logflow/core-telemetry";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { buildDLQPayload, createDLQPublisher } from "../dlq.js";
import type { LogflowProducer } from "../producer.js";

const createMockLogger = (): Logger => {
	const logger: Logger = {
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		child: vi.fn(() => logger),
	};
	return logger;
};

const source = { service: "log-processor", version: "1.0.0" };

describe("buildDLQPayload", () => {
	it("should leave optional fields off when absent", () => {
		const payload = buildDLQPayload(
			{
				originalTopic: "logs-syslog-raw",
				originalMessage: "not syslog",
				failureStage: "parse",
				errorClassification: "poison",
				errorCode: "unrecognized_format",
				errorMessage: "missing <PRI> header",
				retryCount: 0,
			},
			source,
			new Date("2024-01-15T10:30:45.000Z"),
		);

		const { dlq_id, ...rest } = payload;
		expect(dlq_id).toMatch(/^[0-9a-f-]{36}$/);
		expect(rest).toEqual({
			original_topic: "logs-syslog-raw",
			original_message: "not syslog",
			failure_stage: "parse",
			error_classification: "poison",
			error_code: "unrecognized_format",
			error_message: "missing <PRI> header",
			retry_count: 0,
			dlq_at: "2024-01-15T10:30:45.000Z",
			processing_service: "log-processor",
		});
	});

	it("should carry partition zero and the key", () => {
		const payload = buildDLQPayload(
			{
				originalTopic: "logs-app-mixed",
				originalPartition: 0,
				originalOffset: "7",
				originalKey: "billing-api",
				originalMessage: "x",
				failureStage: "process",
				errorClassification: "non_retryable",
				errorCode: "UNKNOWN",
				errorMessage: "boom",
				retryCount: 3,
			},
			{ ...source, instance_id: "pod-1" },
		);

		expect(payload.original_partition).toBe(0);
		expect(payload.original_offset).toBe("7");
		expect(payload.original_key).toBe("billing-api");
		expect(payload.processing_instance).toBe("pod-1");
	});
});

describe("DLQPublisher", () => {
	let send: ReturnType<typeof vi.fn>;
	let producer: LogflowProducer;
	let logger: Logger;

	beforeEach(() => {
		send = vi.fn(async () => []);
		producer = {
			connect: vi.fn(),
			disconnect: vi.fn(),
			isConnected: vi.fn(() => true),
			send,
			sendBatch: vi.fn(),
		} as unknown as LogflowProducer;
		logger = createMockLogger();
	});

	it("should publish an enveloped payload to the prefixed dead-letter topic", async () => {
		const publisher = createDLQPublisher({
			producer,
			logger,
			source,
			topicPrefix: "staging.",
		});

		await publisher.publish({
			originalTopic: "staging.logs-nginx-raw",
			originalKey: "edge-1",
			originalMessage: "garbage",
			failureStage: "parse",
			errorClassification: "poison",
			errorCode: "unrecognized_format",
			errorMessage: "not a combined access log line",
			retryCount: 0,
		});

		expect(send).toHaveBeenCalledTimes(1);
		const [topic, envelope, options] = send.mock.calls[0] ?? [];
		expect(topic).toBe("staging.logs-dlq");
		expect(options).toEqual({ key: "edge-1" });
		const sent: Envelope = envelope;
		expect(sent.kind).toBe("dead_letter");
		expect(sent.stream).toBe("logs-dlq");
		expect(sent.schema_version).toBe("v1");
	});

	it("should log and not throw when the producer fails", async () => {
		send.mockRejectedValueOnce(new Error("broker down"));
		const publisher = createDLQPublisher({ producer, logger, source });

		await expect(
			publisher.publish({
				originalTopic: "logs-nginx-raw",
				originalMessage: "garbage",
				failureStage: "parse",
				errorClassification: "poison",
				errorCode: "unrecognized_format",
				errorMessage: "bad",
				retryCount: 0,
			}),
		).resolves.toBeUndefined();

		expect(logger.error).toHaveBeenCalledWith(
			"Failed to publish to DLQ",
			expect.objectContaining({ error_message: "broker down" }),
		);
	});
});
