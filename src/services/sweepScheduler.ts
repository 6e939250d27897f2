/**
 * Periodic sweep for deadline-driven state: overdue captchas, time-based
 * profile escalation and closed probation windows, in every monitored group.
 *
 * Every tick uses one `now` for all of its decisions and goes through the same
 * tracker and lifecycle operations as the message handlers, so a record the
 * handlers already acted on is seen as terminal or restricted and skipped.
 *
 * @module services/sweepScheduler
 */

import { type ModerationKey, nowSeconds, type ViolationRecord } from "../types";
import type { FailureReason } from "../utils/errors";
import { logger, StructuredLogger } from "../utils/logger";
import type { CaptchaLifecycle } from "./captchaLifecycle";
import type { DecisionExecutor } from "./enforcementExecutor";
import type { ProbationTracker } from "./probationTracker";
import type { ViolationTracker } from "./violationTracker";

/** One group's trackers, lifecycle and executor. */
export interface SweepDependencies {
	captcha: CaptchaLifecycle;
	profile: ViolationTracker;
	probation: ProbationTracker;
	executor: DecisionExecutor;
}

export interface SweepOptions {
	intervalSeconds: number;
	startupDelaySeconds: number;
}

export interface SweepSummary {
	captchasExpired: number;
	escalated: number;
	windowsReset: number;
	failures: number;
}

/** Outcomes that mean another path already handled the record. */
const BENIGN: ReadonlySet<FailureReason> = new Set([
	"AlreadyTerminal",
	"NotFound",
	"TooEarly",
]);

const keyOf = (record: { group_id: number; user_id: number }): ModerationKey => ({
	groupId: record.group_id,
	userId: record.user_id,
});

export class SweepScheduler {
	private startupTimer?: NodeJS.Timeout;
	private intervalTimer?: NodeJS.Timeout;
	private ticking = false;

	constructor(
		private readonly groups: readonly SweepDependencies[],
		private readonly options: SweepOptions,
	) {}

	/** First tick after the startup delay, then every interval. */
	start(): void {
		if (this.startupTimer || this.intervalTimer) return;

		this.startupTimer = setTimeout(() => {
			this.startupTimer = undefined;
			this.runScheduled();
			this.intervalTimer = setInterval(
				() => this.runScheduled(),
				this.options.intervalSeconds * 1000,
			);
		}, this.options.startupDelaySeconds * 1000);

		logger.info("Sweep scheduler started", {
			intervalSeconds: this.options.intervalSeconds,
			startupDelaySeconds: this.options.startupDelaySeconds,
		});
	}

	stop(): void {
		if (this.startupTimer) clearTimeout(this.startupTimer);
		if (this.intervalTimer) clearInterval(this.intervalTimer);
		this.startupTimer = undefined;
		this.intervalTimer = undefined;
	}

	get running(): boolean {
		return this.startupTimer !== undefined || this.intervalTimer !== undefined;
	}

	/**
	 * Runs one sweep. Resolves to undefined without doing anything while a
	 * previous tick is still in progress.
	 */
	async tick(now: number = nowSeconds()): Promise<SweepSummary | undefined> {
		if (this.ticking) {
			logger.debug("Sweep tick skipped, previous tick still running");
			return undefined;
		}
		this.ticking = true;

		try {
			const summary: SweepSummary = {
				captchasExpired: 0,
				escalated: 0,
				windowsReset: 0,
				failures: 0,
			};

			for (const group of this.groups) {
				await this.expireCaptchas(group, now, summary);
				await this.escalateProfiles(group, now, summary);
				this.resetClosedWindows(group, now, summary);
			}

			if (
				summary.captchasExpired ||
				summary.escalated ||
				summary.windowsReset ||
				summary.failures
			) {
				logger.info("Sweep completed", { now, ...summary });
			}
			return summary;
		} finally {
			this.ticking = false;
		}
	}

	private runScheduled(): void {
		this.tick().catch((error) => {
			StructuredLogger.logError(error, { operation: "sweep_tick" });
		});
	}

	private async expireCaptchas(
		group: SweepDependencies,
		now: number,
		summary: SweepSummary,
	) {
		const overdue = group.captcha.listOverdue(now);
		if (!overdue.ok) {
			summary.failures++;
			return;
		}

		for (const record of overdue.value) {
			const result = await group.captcha.expire(keyOf(record), now);
			if (result.ok) {
				summary.captchasExpired++;
			} else if (!BENIGN.has(result.reason)) {
				summary.failures++;
			}
		}
	}

	private async escalateProfiles(
		group: SweepDependencies,
		now: number,
		summary: SweepSummary,
	) {
		const candidates = group.profile.listOverdue(now);
		if (!candidates.ok) {
			summary.failures++;
			return;
		}

		for (const record of candidates.value) {
			const result = group.profile.enforceDeadline(keyOf(record), now);
			if (!result.ok) {
				if (!BENIGN.has(result.reason)) summary.failures++;
				continue;
			}
			if (result.value.action !== "restrict") continue;

			summary.escalated++;
			try {
				await group.executor.applyEscalation(result.value);
			} catch (error) {
				StructuredLogger.logError(error, {
					...keyOf(record),
					operation: "apply_escalation",
				});
			}
		}
	}

	private resetClosedWindows(
		group: SweepDependencies,
		now: number,
		summary: SweepSummary,
	) {
		const closed = group.probation.listClosedWindows(now);
		if (!closed.ok) {
			summary.failures++;
			return;
		}

		for (const record of closed.value) {
			const result = group.probation.status(keyOf(record), now);
			if (!result.ok) {
				summary.failures++;
			} else if (wasReset(record, result.value)) {
				summary.windowsReset++;
			}
		}
	}
}

function wasReset(
	before: ViolationRecord,
	after: ViolationRecord | undefined,
): boolean {
	return before.count > 0 && after !== undefined && after.count === 0;
}
