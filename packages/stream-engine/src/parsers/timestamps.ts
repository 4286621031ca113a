const MONTHS: Readonly<Record<string, number>> = {
	Jan: 0,
	Feb: 1,
	Mar: 2,
	Apr: 3,
	May: 4,
	Jun: 5,
	Jul: 6,
	Aug: 7,
	Sep: 8,
	Oct: 9,
	Nov: 10,
	Dec: 11,
};

export function monthIndex(name: string): number | null {
	return MONTHS[name] ?? null;
}

/**
 * Date.UTC that rejects out-of-range parts instead of rolling them over
 * (Feb 30 is not Mar 2).
 */
export function utcMillis(
	year: number,
	month: number,
	day: number,
	hour: number,
	minute: number,
	second: number,
	millis = 0,
): number | null {
	if (hour > 23 || minute > 59 || second > 59) {
		return null;
	}
	const ms = Date.UTC(year, month, day, hour, minute, second, millis);
	const check = new Date(ms);
	if (
		check.getUTCFullYear() !== year ||
		check.getUTCMonth() !== month ||
		check.getUTCDate() !== day
	) {
		return null;
	}
	return ms;
}

const LOCAL_TIMESTAMP =
	/^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:[.,](\d{1,6}))?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * `2024-01-15 10:30:45`, optionally with fractional seconds (`.123` or
 * `,123`) and a zone. Times without a zone are read as UTC.
 */
export function parseDateTime(value: string): number | null {
	const match = LOCAL_TIMESTAMP.exec(value.trim());
	if (!match) {
		return null;
	}
	const [, y, mo, d, h, mi, s, frac, zone] = match;
	const millis = frac ? Math.floor(Number(`0.${frac}`) * 1000) : 0;
	const base = utcMillis(
		Number(y),
		Number(mo) - 1,
		Number(d),
		Number(h),
		Number(mi),
		Number(s),
		millis,
	);
	if (base === null) {
		return null;
	}
	return base - zoneOffsetMillis(zone);
}

/**
 * Offset of `Z`, `+0100` or `-05:30` in millis; 0 when absent.
 */
export function zoneOffsetMillis(zone: string | undefined): number {
	if (!zone || zone === "Z") {
		return 0;
	}
	const digits = zone.slice(1).replace(":", "");
	const hours = Number(digits.slice(0, 2));
	const minutes = Number(digits.slice(2, 4));
	const sign = zone.startsWith("-") ? -1 : 1;
	return sign * (hours * 60 + minutes) * 60_000;
}
