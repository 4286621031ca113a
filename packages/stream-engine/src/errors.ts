import type { WindowStatus } from "./windowing/window-state.js";

export class EngineError extends Error {
	constructor(
		message: string,
		public readonly code: string,
	) {
		super(message);
		this.name = "EngineError";
	}
}

/**
 * A window was driven through a transition its lifecycle does not allow,
 * e.g. accumulating into a window that already closed.
 */
export class WindowStateError extends EngineError {
	constructor(
		public readonly from: WindowStatus,
		public readonly to: WindowStatus,
		windowId: string,
	) {
		super(
			`Illegal window transition ${from} -> ${to} for ${windowId}`,
			"WINDOW_STATE",
		);
		this.name = "WindowStateError";
	}
}

/**
 * Aggregation query configured with a field it cannot group by. Raised
 * at startup.
 */
export class QueryConfigError extends EngineError {
	constructor(
		public readonly query: string,
		message: string,
	) {
		super(`Query ${query}: ${message}`, "QUERY_CONFIG");
		this.name = "QueryConfigError";
	}
}
