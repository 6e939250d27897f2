/**
 * Startup reconciliation of captcha deadlines lost with the previous process.
 *
 * @module services/recoveryReconciler
 */

import { nowSeconds } from "../types";
import { logger } from "../utils/logger";
import type { CaptchaLifecycle } from "./captchaLifecycle";

export interface RecoverySummary {
	expired: number;
	rearmed: number;
	failed: number;
}

export class RecoveryReconciler {
	/** One lifecycle per monitored group. */
	constructor(private readonly captchas: readonly CaptchaLifecycle[]) {}

	/**
	 * Expires every pending captcha whose deadline passed while the bot was
	 * down and re-arms a callback for the rest. Touches nothing else.
	 * Must complete before the first sweep tick and before polling starts.
	 */
	async run(now: number = nowSeconds()): Promise<RecoverySummary> {
		const summary: RecoverySummary = { expired: 0, rearmed: 0, failed: 0 };

		for (const captcha of this.captchas) {
			await this.recover(captcha, now, summary);
		}

		logger.info("Captcha recovery complete", { ...summary });
		return summary;
	}

	private async recover(
		captcha: CaptchaLifecycle,
		now: number,
		summary: RecoverySummary,
	): Promise<void> {
		const pending = captcha.listPending();
		if (!pending.ok) {
			logger.error("Captcha recovery could not list pending records", {
				reason: pending.reason,
				message: pending.message,
			});
			summary.failed++;
			return;
		}

		for (const record of pending.value) {
			if (record.deadline <= now) {
				const key = { groupId: record.group_id, userId: record.user_id };
				const result = await captcha.expire(key, now);
				if (result.ok) {
					summary.expired++;
				} else if (result.reason !== "AlreadyTerminal") {
					summary.failed++;
				}
			} else {
				captcha.arm(record, now);
				summary.rearmed++;
			}
		}
	}
}
