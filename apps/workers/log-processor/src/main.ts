import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module.js";
import { WORKER_CONFIG, type WorkerConfig } from "./config/config.module.js";
import { NestLogger } from "./telemetry/nest-logger.js";

async function bootstrap() {
	const app = await NestFactory.create(AppModule, {
		bufferLogs: true,
	});

	const logger = app.get(NestLogger);
	app.useLogger(logger);
	app.enableShutdownHooks();

	const config = app.get<WorkerConfig>(WORKER_CONFIG);
	await app.listen(config.base.healthPort);

	logger.log(
		`Log processor started, health endpoint on port ${config.base.healthPort}`,
	);
}

bootstrap().catch((err) => {
	console.error("Failed to start log processor:", err);
	process.exit(1);
});
