import {
	type ClosedBy,
	type Observation,
	type WindowBounds,
	type WindowSpec,
	WindowState,
} from "./window-state.js";

/**
 * Owns the windows of every group key hashed to it. No other shard
 * touches these accumulators.
 */
export class WindowShard {
	private readonly windows = new Map<string, WindowState>();

	constructor(
		readonly index: number,
		private readonly spec: WindowSpec,
	) {}

	get openWindows(): number {
		return this.windows.size;
	}

	accumulate(observation: Observation, bounds: WindowBounds): void {
		const id = `${bounds.start}\u0000${observation.group_key}`;
		let window = this.windows.get(id);
		if (!window) {
			window = new WindowState(
				this.spec,
				bounds,
				observation.group_key,
				observation.group,
			);
			this.windows.set(id, window);
		}
		window.add(observation);
	}

	/**
	 * Close and hand over every window whose end the watermark has reached.
	 */
	closeReady(watermark: number): WindowState[] {
		const ready: WindowState[] = [];
		for (const [id, window] of this.windows) {
			if (window.bounds.end <= watermark) {
				window.close("watermark");
				ready.push(window);
				this.windows.delete(id);
			}
		}
		return ready;
	}

	/**
	 * Close every remaining window, for shutdown.
	 */
	drain(by: ClosedBy): WindowState[] {
		const remaining = [...this.windows.values()];
		for (const window of remaining) {
			window.close(by);
		}
		this.windows.clear();
		return remaining;
	}
}
