/**
 * Join verification (captcha) lifecycle.
 *
 * States: `pending` -> `verified` | `expired`. Terminal records are never
 * written again, so the per-record timer, the sweep and the recovery
 * reconciler can all call {@link CaptchaLifecycle.expire} and exactly one of
 * them observes the transition.
 *
 * @module services/captchaLifecycle
 */

import type { CaptchaStore } from "../store/captchaStore";
import {
	type CaptchaChallenge,
	type CaptchaRecord,
	type ModerationKey,
	nowSeconds,
} from "../types";
import { fail, ok, type Result, toFailure } from "../utils/errors";
import { StructuredLogger } from "../utils/logger";
import type { DeadlineTimers } from "./deadlineTimers";

/** Invoked once per record, after it moved to `expired`. */
export type CaptchaExpiryListener = (record: CaptchaRecord) => Promise<void>;

export interface CaptchaLifecycleOptions {
	timeoutSeconds: number;
	timers: DeadlineTimers;
	onExpired?: CaptchaExpiryListener;
	/** Limits the pending and overdue listings to one group */
	groupId?: number;
}

type Resolution =
	| { kind: "resolved"; record: CaptchaRecord }
	| { kind: "terminal"; record: CaptchaRecord }
	| { kind: "early"; record: CaptchaRecord }
	| { kind: "missing" };

export class CaptchaLifecycle {
	constructor(
		private readonly store: CaptchaStore,
		private readonly options: CaptchaLifecycleOptions,
	) {}

	get timeoutSeconds(): number {
		return this.options.timeoutSeconds;
	}

	/**
	 * Opens a challenge with `deadline = now + timeout` and arms its deadline
	 * callback. Fails with `AlreadyPending` while another challenge is open.
	 */
	create(
		key: ModerationKey,
		now: number = nowSeconds(),
		challenge: CaptchaChallenge = {},
	): Result<CaptchaRecord> {
		try {
			const deadline = now + this.options.timeoutSeconds;
			const result = this.store.insertPending(key, now, deadline, challenge);
			if (!result.inserted) {
				return fail(
					"AlreadyPending",
					`Captcha already pending until ${result.record.deadline}`,
				);
			}

			this.arm(result.record, now);
			StructuredLogger.logUserAction("Captcha created", {
				...key,
				operation: "captcha_create",
				deadline,
			});
			return ok(result.record);
		} catch (error) {
			return toFailure(error, { ...key, operation: "captcha_create" });
		}
	}

	/** Stores the challenge message on the pending record. */
	attachChallenge(
		key: ModerationKey,
		chatId: number,
		messageId: number,
	): Result<boolean> {
		try {
			return ok(this.store.attachChallenge(key, chatId, messageId));
		} catch (error) {
			return toFailure(error, { ...key, operation: "captcha_attach" });
		}
	}

	/**
	 * Marks the pending challenge verified and cancels its timer.
	 * `AlreadyTerminal` when it was already verified or expired, `NotFound`
	 * when the member never had one.
	 */
	verify(
		key: ModerationKey,
		now: number = nowSeconds(),
	): Result<CaptchaRecord> {
		try {
			const resolution = this.store.transaction((): Resolution => {
				const pending = this.store.findPending(key);
				if (!pending) return this.terminalOrMissing(key);
				return {
					kind: "resolved",
					record: this.store.transition(pending.id, "verified", now, true),
				};
			});

			if (resolution.kind !== "resolved") {
				return this.failureFor(resolution);
			}

			this.options.timers.cancel(key);
			StructuredLogger.logUserAction("Captcha verified", {
				...key,
				operation: "captcha_verify",
			});
			return ok(resolution.record);
		} catch (error) {
			return toFailure(error, { ...key, operation: "captcha_verify" });
		}
	}

	/**
	 * Expires the pending challenge once its deadline has passed, then
	 * notifies the expiry listener. Rejects a call before the deadline with
	 * `TooEarly`.
	 */
	async expire(
		key: ModerationKey,
		now: number = nowSeconds(),
	): Promise<Result<CaptchaRecord>> {
		let resolution: Resolution;
		try {
			resolution = this.store.transaction((): Resolution => {
				const pending = this.store.findPending(key);
				if (!pending) return this.terminalOrMissing(key);
				if (now < pending.deadline) return { kind: "early", record: pending };
				return {
					kind: "resolved",
					record: this.store.transition(pending.id, "expired", now),
				};
			});
		} catch (error) {
			return toFailure(error, { ...key, operation: "captcha_expire" });
		}

		if (resolution.kind !== "resolved") {
			return this.failureFor(resolution);
		}

		this.options.timers.cancel(key);
		StructuredLogger.logSecurityEvent("Captcha expired", {
			...key,
			operation: "captcha_expire",
			deadline: resolution.record.deadline,
		});

		const { onExpired } = this.options;
		if (onExpired) {
			try {
				await onExpired(resolution.record);
			} catch (error) {
				StructuredLogger.logError(error, {
					...key,
					operation: "captcha_expiry_listener",
				});
			}
		}
		return ok(resolution.record);
	}

	/** The open challenge for the key, if any. */
	getPending(key: ModerationKey): Result<CaptchaRecord | undefined> {
		try {
			return ok(this.store.findPending(key));
		} catch (error) {
			return toFailure(error, { ...key, operation: "captcha_get_pending" });
		}
	}

	/** The most recent challenge for the key in any status. */
	getLatest(key: ModerationKey): Result<CaptchaRecord | undefined> {
		try {
			return ok(this.store.findLatest(key));
		} catch (error) {
			return toFailure(error, { ...key, operation: "captcha_get_latest" });
		}
	}

	listPending(): Result<CaptchaRecord[]> {
		try {
			return ok(this.store.listPending(this.options.groupId));
		} catch (error) {
			return toFailure(error, { operation: "captcha_list_pending" });
		}
	}

	listOverdue(now: number = nowSeconds()): Result<CaptchaRecord[]> {
		try {
			return ok(this.store.listOverdue(now, this.options.groupId));
		} catch (error) {
			return toFailure(error, { operation: "captcha_list_overdue" });
		}
	}

	/**
	 * Arms the deadline callback for a pending record. A callback that wakes
	 * before the deadline re-arms itself.
	 */
	arm(record: CaptchaRecord, now: number = nowSeconds()): void {
		const key = { groupId: record.group_id, userId: record.user_id };
		this.options.timers.arm(
			key,
			record.deadline,
			async () => {
				const result = await this.expire(key);
				if (!result.ok && result.reason === "TooEarly") {
					this.arm(record);
				}
			},
			now,
		);
	}

	private terminalOrMissing(key: ModerationKey): Resolution {
		const latest = this.store.findLatest(key);
		return latest ? { kind: "terminal", record: latest } : { kind: "missing" };
	}

	private failureFor(
		resolution: Exclude<Resolution, { kind: "resolved" }>,
	): Result<CaptchaRecord> {
		switch (resolution.kind) {
			case "terminal":
				return fail(
					"AlreadyTerminal",
					`Captcha already ${resolution.record.status}`,
				);
			case "early":
				return fail(
					"TooEarly",
					`Deadline ${resolution.record.deadline} not reached`,
				);
			case "missing":
				return fail("NotFound", "No captcha for this member");
		}
	}
}
