/**
 * Injectable clock plus duration and formatting helpers.
 *
 * Detection timestamps, window eviction, cooldowns and health checks all read
 * `Clock.now()` so tests can drive time explicitly.
 */

export interface Clock {
	now(): number;
}

export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Manually driven clock for tests. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

// ── Duration helpers ─────────────────────────────────────────────────

export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
	hours: (n: number) => n * 3_600_000,
	toSeconds: (ms: number) => ms / 1_000,
	toMinutes: (ms: number) => ms / 60_000,
} as const;

// ── Formatting ───────────────────────────────────────────────────────

/** `2024-05-01 12:30:05 UTC` */
export function formatUtc(ms: number): string {
	const iso = new Date(ms).toISOString();
	return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`;
}

/** Compact human duration: `45s`, `5m`, `2h 30m`. */
export function formatDuration(ms: number): string {
	const totalSeconds = Math.floor(ms / 1_000);
	if (totalSeconds < 60) return `${totalSeconds}s`;
	const totalMinutes = Math.floor(totalSeconds / 60);
	if (totalMinutes < 60) {
		const seconds = totalSeconds % 60;
		return seconds === 0 ? `${totalMinutes}m` : `${totalMinutes}m ${seconds}s`;
	}
	const hours = Math.floor(totalMinutes / 60);
	const minutes = totalMinutes % 60;
	return minutes === 0 ? `${hours}h` : `${hours}h ${minutes}m`;
}
