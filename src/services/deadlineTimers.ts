/**
 * In-process deadline callbacks keyed by group member.
 *
 * A callback for an already resolved record is a no-op at the store's status
 * guard. Timers lost on restart are re-armed by the recovery reconciler.
 *
 * @module services/deadlineTimers
 */

import { type ModerationKey, nowSeconds } from "../types";
import { StructuredLogger } from "../utils/logger";

export const timerKey = (key: ModerationKey): string =>
	`${key.groupId}:${key.userId}`;

export class DeadlineTimers {
	private readonly timers = new Map<string, NodeJS.Timeout>();

	/**
	 * Schedules `callback` for the Unix-seconds `deadline`, replacing any timer
	 * already armed for the key. A deadline in the past fires on the next tick.
	 */
	arm(
		key: ModerationKey,
		deadline: number,
		callback: () => Promise<void>,
		now: number = nowSeconds(),
	): void {
		this.cancel(key);

		const id = timerKey(key);
		const delayMs = Math.max(0, (deadline - now) * 1000);
		const timer = setTimeout(() => {
			this.timers.delete(id);
			callback().catch((error) => {
				StructuredLogger.logError(error, {
					...key,
					operation: "deadline_callback",
				});
			});
		}, delayMs);

		this.timers.set(id, timer);
	}

	/** Returns true if a timer was armed for the key. */
	cancel(key: ModerationKey): boolean {
		const id = timerKey(key);
		const timer = this.timers.get(id);
		if (!timer) return false;
		clearTimeout(timer);
		this.timers.delete(id);
		return true;
	}

	has(key: ModerationKey): boolean {
		return this.timers.has(timerKey(key));
	}

	get size(): number {
		return this.timers.size;
	}

	clear(): void {
		for (const timer of this.timers.values()) {
			clearTimeout(timer);
		}
		this.timers.clear();
	}
}
