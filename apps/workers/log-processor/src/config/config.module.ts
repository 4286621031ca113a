import { type FullConfig, loadConfig } from "@logflow/core-config";
import { type DynamicModule, Global, Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

export const WORKER_CONFIG = "WORKER_CONFIG";

export type WorkerConfig = FullConfig;

export interface WorkerConfigOptions {
	envFilePath?: string;
}

/**
 * Loads `.env` into the process environment, then validates it once.
 * An invalid environment fails the boot.
 */
@Global()
@Module({})
export class WorkerConfigModule {
	static forRoot(options: WorkerConfigOptions = {}): DynamicModule {
		return {
			module: WorkerConfigModule,
			imports: [
				ConfigModule.forRoot({
					...(options.envFilePath ? { envFilePath: options.envFilePath } : {}),
					isGlobal: true,
				}),
			],
			providers: [
				{
					provide: WORKER_CONFIG,
					useFactory: (): WorkerConfig => loadConfig(),
				},
			],
			exports: [WORKER_CONFIG],
		};
	}
}
