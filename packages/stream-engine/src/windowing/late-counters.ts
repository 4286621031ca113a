/**
 * Named counters over a SharedArrayBuffer, incremented with Atomics so
 * shards moved onto worker threads can share one instance.
 */
export class LateEventCounters {
	private readonly slots: BigInt64Array;
	private readonly index: ReadonlyMap<string, number>;

	constructor(
		names: readonly string[],
		readonly buffer: SharedArrayBuffer = new SharedArrayBuffer(
			Math.max(names.length, 1) * BigInt64Array.BYTES_PER_ELEMENT,
		),
	) {
		this.slots = new BigInt64Array(buffer);
		if (this.slots.length < names.length) {
			throw new RangeError(
				`Counter buffer holds ${this.slots.length} slots, ${names.length} needed`,
			);
		}
		this.index = new Map(names.map((name, i) => [name, i]));
	}

	increment(name: string, by = 1): number {
		return Number(Atomics.add(this.slots, this.slot(name), BigInt(by))) + by;
	}

	get(name: string): number {
		return Number(Atomics.load(this.slots, this.slot(name)));
	}

	snapshot(): Record<string, number> {
		const result: Record<string, number> = {};
		for (const [name, i] of this.index) {
			result[name] = Number(Atomics.load(this.slots, i));
		}
		return result;
	}

	private slot(name: string): number {
		const i = this.index.get(name);
		if (i === undefined) {
			throw new RangeError(`Unknown counter ${name}`);
		}
		return i;
	}
}
