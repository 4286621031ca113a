import type { Logger, Metrics } from "@logflow/core-telemetry";
import type {
	BeforeApplicationShutdown,
	OnApplicationShutdown,
	OnModuleInit,
} from "@nestjs/common";

export type ShutdownSignal = "SIGTERM" | "SIGINT";

type ShutdownCallback = () => Promise<void>;

/** Time given to the logger to drain before a crash exit */
const CRASH_EXIT_DELAY_MS = 1000;

export class LifecycleService
	implements OnModuleInit, BeforeApplicationShutdown, OnApplicationShutdown
{
	private shutdownCallbacks: ShutdownCallback[] = [];
	private shuttingDown = false;
	private shutdownStartTime?: number;

	constructor(
		private readonly logger: Logger,
		private readonly metrics: Metrics,
	) {}

	onModuleInit(): void {
		process.on("SIGTERM", () => this.handleSignal("SIGTERM"));
		process.on("SIGINT", () => this.handleSignal("SIGINT"));
		process.on("uncaughtException", (error) => this.handleCrash("Uncaught exception", error));
		process.on("unhandledRejection", (reason) =>
			this.handleCrash("Unhandled rejection", reason),
		);
	}

	/**
	 * Register work to run at shutdown. Callbacks run last-registered
	 * first, so a consumer registered after its producer stops before it.
	 */
	onShutdown(callback: ShutdownCallback): void {
		this.shutdownCallbacks.push(callback);
	}

	isShutdownInProgress(): boolean {
		return this.shuttingDown;
	}

	async beforeApplicationShutdown(signal?: string): Promise<void> {
		this.shuttingDown = true;
		this.shutdownStartTime = Date.now();
		this.logger.info("Shutdown initiated", { signal: signal ?? "none" });
		this.metrics.increment("worker.shutdown_started");
	}

	async onApplicationShutdown(signal?: string): Promise<void> {
		for (const callback of [...this.shutdownCallbacks].reverse()) {
			try {
				await callback();
			} catch (error) {
				this.logger.error("Shutdown callback failed", {
					error_message: error instanceof Error ? error.message : String(error),
					error_stack: error instanceof Error ? error.stack : undefined,
				});
			}
		}
		this.shutdownCallbacks = [];

		const durationMs = this.shutdownStartTime ? Date.now() - this.shutdownStartTime : 0;
		this.logger.info("Shutdown completed", {
			signal: signal ?? "none",
			duration_ms: durationMs,
		});
		this.metrics.increment("worker.shutdown_completed");
	}

	private handleSignal(signal: ShutdownSignal): void {
		if (this.shuttingDown) {
			return;
		}
		this.shuttingDown = true;
		this.logger.info("Signal received", { signal });
		this.metrics.increment("worker.signal_received", 1, { reason: signal });
	}

	private handleCrash(message: string, reason: unknown): void {
		this.logger.error(message, {
			error_message: reason instanceof Error ? reason.message : String(reason),
			error_stack: reason instanceof Error ? reason.stack : undefined,
		});
		this.metrics.increment("worker.crashed", 1, { reason: message });

		setTimeout(() => {
			process.exit(1);
		}, CRASH_EXIT_DELAY_MS);
	}
}
