import { pipelineConfigSchema } from "@logflow/core-config";
import type { LogflowConsumer, LogflowProducer } from "@logflow/core-kafka";
import type { Logger } from "@logflow/core-telemetry";
import { type LogPipeline, createLogPipeline } from "@logflow/stream-engine";
import { ServiceUnavailableException } from "@nestjs/common";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { HealthController } from "./health.controller.js";
import { HealthService } from "./health.service.js";

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

describe("HealthService", () => {
	let consumer: LogflowConsumer;
	let producer: LogflowProducer;
	let pipeline: LogPipeline;
	let service: HealthService;

	const now = new Date(Date.UTC(2024, 0, 15, 12, 0, 0));

	beforeEach(() => {
		vi.clearAllMocks();
		consumer = {
			connect: vi.fn(),
			disconnect: vi.fn(),
			subscribe: vi.fn(),
			run: vi.fn(),
			isConnected: vi.fn(() => true),
			pause: vi.fn(),
			resume: vi.fn(),
		};
		producer = {
			connect: vi.fn(),
			disconnect: vi.fn(),
			isConnected: vi.fn(() => true),
			send: vi.fn(),
			sendBatch: vi.fn(),
		};
		pipeline = createLogPipeline({
			config: pipelineConfigSchema.parse({ syslog: { defaultYear: 2024 } }),
			sink: { push: vi.fn() },
			logger: createMockLogger(),
		});
		service = new HealthService(consumer, producer, pipeline);
	});

	it("should report ok when both Kafka clients are connected", () => {
		const result = service.check(now);

		expect(result.status).toBe("ok");
		expect(result.timestamp).toBe("2024-01-15T12:00:00.000Z");
		expect(result.checks).toEqual({
			consumer: { status: "ok" },
			producer: { status: "ok" },
		});
		expect(result.pipeline.records_ingested).toBe(0);
		expect(result.pipeline.watermarks["volume-by-endpoint"]).toBeNull();
	});

	it("should report unhealthy when the consumer is disconnected", () => {
		vi.mocked(consumer.isConnected).mockReturnValue(false);

		const result = service.check(now);

		expect(result.status).toBe("unhealthy");
		expect(result.checks.consumer).toEqual({
			status: "unhealthy",
			message: "Kafka consumer not connected",
		});
		expect(result.checks.producer).toEqual({ status: "ok" });
	});

	describe("HealthController", () => {
		it("should answer liveness regardless of Kafka", () => {
			vi.mocked(producer.isConnected).mockReturnValue(false);
			const controller = new HealthController(service);

			expect(controller.liveness()).toEqual({ status: "ok" });
		});

		it("should fail readiness with 503 while unhealthy", () => {
			vi.mocked(producer.isConnected).mockReturnValue(false);
			const controller = new HealthController(service);

			expect(() => controller.readiness()).toThrow(ServiceUnavailableException);
		});

		it("should pass readiness when healthy", () => {
			const controller = new HealthController(service);

			expect(controller.readiness().status).toBe("ok");
		});
	});
});
