/**
 * Event-time watermark over a set of partitions. Each partition's
 * watermark is its max event time minus the allowed lateness; the
 * combined watermark is the minimum over every partition observed by this
 * tracker and never moves backwards.
 */
export class WatermarkTracker {
	private readonly maxEventTime = new Map<string, number>();
	private global = Number.NEGATIVE_INFINITY;

	constructor(private readonly allowedLatenessMs: number) {}

	get current(): number {
		return this.global;
	}

	hasWatermark(): boolean {
		return Number.isFinite(this.global);
	}

	/** Watermark of a single partition, or null before its first event. */
	watermarkOf(partition: string): number | null {
		const max = this.maxEventTime.get(partition);
		return max === undefined ? null : max - this.allowedLatenessMs;
	}

	/**
	 * Record an event and return the combined watermark after it.
	 */
	observe(partition: string, eventTime: number): number {
		const previous = this.maxEventTime.get(partition);
		if (previous === undefined || eventTime > previous) {
			this.maxEventTime.set(partition, eventTime);
		}

		let min = Number.POSITIVE_INFINITY;
		for (const max of this.maxEventTime.values()) {
			min = Math.min(min, max - this.allowedLatenessMs);
		}
		if (min > this.global) {
			this.global = min;
		}
		return this.global;
	}

	partitions(): Record<string, number> {
		const result: Record<string, number> = {};
		for (const [partition, max] of this.maxEventTime) {
			result[partition] = max - this.allowedLatenessMs;
		}
		return result;
	}
}
