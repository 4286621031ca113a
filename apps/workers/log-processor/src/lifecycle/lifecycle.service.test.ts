import type { Logger, Metrics } from "@logflow/core-telemetry";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { LifecycleService } from "./lifecycle.service.js";

describe("LifecycleService", () => {
	let logger: Logger;
	let metrics: Metrics;
	let service: LifecycleService;

	beforeEach(() => {
		vi.clearAllMocks();
		logger = {
			debug: vi.fn(),
			info: vi.fn(),
			warn: vi.fn(),
			error: vi.fn(),
			child: vi.fn(() => logger),
		};
		metrics = {
			increment: vi.fn(),
			gauge: vi.fn(),
			histogram: vi.fn(),
			timing: vi.fn(),
		};
		service = new LifecycleService(logger, metrics);
	});

	it("should run shutdown callbacks last-registered first", async () => {
		const order: string[] = [];
		service.onShutdown(async () => {
			order.push("producer");
		});
		service.onShutdown(async () => {
			order.push("consumer");
		});

		await service.beforeApplicationShutdown("SIGTERM");
		await service.onApplicationShutdown("SIGTERM");

		expect(order).toEqual(["consumer", "producer"]);
	});

	it("should keep running callbacks after one fails", async () => {
		const survivor = vi.fn().mockResolvedValue(undefined);
		service.onShutdown(survivor);
		service.onShutdown(() => Promise.reject(new Error("disconnect timed out")));

		await service.onApplicationShutdown();

		expect(survivor).toHaveBeenCalledTimes(1);
		expect(logger.error).toHaveBeenCalledWith(
			"Shutdown callback failed",
			expect.objectContaining({ error_message: "disconnect timed out" }),
		);
	});

	it("should run each callback once", async () => {
		const callback = vi.fn().mockResolvedValue(undefined);
		service.onShutdown(callback);

		await service.onApplicationShutdown();
		await service.onApplicationShutdown();

		expect(callback).toHaveBeenCalledTimes(1);
	});

	it("should mark shutdown in progress before callbacks run", async () => {
		expect(service.isShutdownInProgress()).toBe(false);

		await service.beforeApplicationShutdown("SIGINT");

		expect(service.isShutdownInProgress()).toBe(true);
		expect(logger.info).toHaveBeenCalledWith("Shutdown initiated", { signal: "SIGINT" });
		expect(metrics.increment).toHaveBeenCalledWith("worker.shutdown_started");
	});

	it("should log completion with the signal", async () => {
		await service.onApplicationShutdown("SIGTERM");

		expect(logger.info).toHaveBeenCalledWith(
			"Shutdown completed",
			expect.objectContaining({ signal: "SIGTERM" }),
		);
		expect(metrics.increment).toHaveBeenCalledWith("worker.shutdown_completed");
	});
});
