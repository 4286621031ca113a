import type { Logger } from "@logflow/core-telemetry";
import type { LoggerService } from "@nestjs/common";

function toText(message: unknown): string {
	return typeof message === "string" ? message : JSON.stringify(message);
}

/**
 * Routes framework logs through the service logger. Nest passes the
 * context name as the last optional parameter.
 */
export class NestLogger implements LoggerService {
	constructor(private readonly logger: Logger) {}

	log(message: unknown, ...optionalParams: unknown[]): void {
		this.logger.info(toText(message), this.context(optionalParams));
	}

	error(message: unknown, ...optionalParams: unknown[]): void {
		const [stack] = optionalParams;
		const context = this.context(optionalParams);
		if (typeof stack === "string" && optionalParams.length > 1) {
			context["error_stack"] = stack;
		}
		this.logger.error(toText(message), context);
	}

	warn(message: unknown, ...optionalParams: unknown[]): void {
		this.logger.warn(toText(message), this.context(optionalParams));
	}

	debug(message: unknown, ...optionalParams: unknown[]): void {
		this.logger.debug(toText(message), this.context(optionalParams));
	}

	verbose(message: unknown, ...optionalParams: unknown[]): void {
		this.logger.debug(toText(message), this.context(optionalParams));
	}

	private context(optionalParams: unknown[]): Record<string, unknown> {
		const last = optionalParams[optionalParams.length - 1];
		return typeof last === "string" ? { nest_context: last } : {};
	}
}
