import {
	Controller,
	Get,
	HttpCode,
	HttpStatus,
	Inject,
	ServiceUnavailableException,
} from "@nestjs/common";
import { HEALTH_SERVICE, type HealthResponse, HealthService } from "./health.service.js";

@Controller("health")
export class HealthController {
	constructor(@Inject(HEALTH_SERVICE) private readonly healthService: HealthService) {}

	/**
	 * Liveness probe. The process answers, so it is alive.
	 */
	@Get("live")
	@HttpCode(HttpStatus.OK)
	liveness(): { status: "ok" } {
		return { status: "ok" };
	}

	/**
	 * Readiness probe. 503 until both Kafka clients are connected.
	 */
	@Get("ready")
	readiness(): HealthResponse {
		const result = this.healthService.check();
		if (result.status === "unhealthy") {
			throw new ServiceUnavailableException(result);
		}
		return result;
	}

	@Get()
	getHealth(): HealthResponse {
		return this.healthService.check();
	}
}
