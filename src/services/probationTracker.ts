/**
 * Link/forward probation for new members.
 *
 * Same progressive enforcement as the profile tracker, scoped to a time
 * window. A window that closed with no later violation is reset before the
 * next event is applied, so an old window never adds to a new one.
 *
 * @module services/probationTracker
 */

import type { ViolationStore } from "../store/violationStore";
import {
	type ModerationKey,
	nowSeconds,
	type ViolationRecord,
} from "../types";
import { NotFoundError, ok, type Result, toFailure } from "../utils/errors";
import { StructuredLogger } from "../utils/logger";
import { ViolationTracker } from "./violationTracker";

export interface ProbationTrackerOptions {
	/** Violations inside one window before the user is restricted */
	threshold: number;
	/** Window length in seconds */
	windowSeconds: number;
	/** Limits the sweep listings to one group */
	groupId?: number;
}

export class ProbationTracker extends ViolationTracker {
	private readonly windowSeconds: number;

	constructor(store: ViolationStore, options: ProbationTrackerOptions) {
		super(store, {
			kind: "probation",
			threshold: options.threshold,
			groupId: options.groupId,
		});
		this.windowSeconds = options.windowSeconds;
	}

	/**
	 * Opens a fresh window for a member who just joined or passed the captcha.
	 * A restricted record is left as it is.
	 */
	startProbation(
		key: ModerationKey,
		now: number = nowSeconds(),
	): Result<ViolationRecord> {
		try {
			const { current } = this.store.atomicUpdate(key, this.kind, (stored) => {
				if (stored?.restricted) return stored;
				return {
					...this.emptyRecord(key, now),
					probation_until: now + this.windowSeconds,
				};
			});
			if (!current) {
				throw new NotFoundError("No probation record after update");
			}
			StructuredLogger.logUserAction("Probation started", {
				...key,
				operation: "start_probation",
				probationUntil: current.probation_until,
			});
			return ok(current);
		} catch (error) {
			return toFailure(error, { ...key, operation: "start_probation" });
		}
	}

	/** True while the member's window is open. */
	isOnProbation(
		key: ModerationKey,
		now: number = nowSeconds(),
	): Result<boolean> {
		const status = this.status(key, now);
		if (!status.ok) return status;
		const until = status.value?.probation_until;
		return ok(until !== undefined && until !== null && until > now);
	}

	/** Records with violations whose window has closed; candidates for a reset. */
	listClosedWindows(now: number = nowSeconds()): Result<ViolationRecord[]> {
		try {
			return ok(
				this.store.listClosedWindows(this.kind, now, this.options.groupId),
			);
		} catch (error) {
			return toFailure(error, {
				kind: this.kind,
				operation: "list_closed_windows",
			});
		}
	}

	/**
	 * Current record after applying the window reset. Writes only when a
	 * reset is due.
	 */
	status(
		key: ModerationKey,
		now: number = nowSeconds(),
	): Result<ViolationRecord | undefined> {
		try {
			const { current } = this.store.atomicUpdate(key, this.kind, (stored) =>
				stored === undefined ? null : (this.normalize(key, stored, now) ?? null),
			);
			return ok(current);
		} catch (error) {
			return toFailure(error, { ...key, kind: this.kind, operation: "status" });
		}
	}

	protected normalize(
		_key: ModerationKey,
		stored: ViolationRecord | undefined,
		now: number,
	): ViolationRecord | undefined {
		if (!stored || !this.windowClosed(stored, now)) return stored;

		StructuredLogger.logDebug("Probation window closed, resetting count", {
			groupId: stored.group_id,
			userId: stored.user_id,
			count: stored.count,
		});
		return { ...stored, count: 0, restricted_by: "none" };
	}

	protected increment(
		key: ModerationKey,
		base: ViolationRecord | undefined,
		now: number,
	): ViolationRecord {
		const next = super.increment(key, base, now);
		const until = base?.probation_until;
		if (until === undefined || until === null || until < now) {
			return { ...next, probation_until: now + this.windowSeconds };
		}
		return next;
	}

	/**
	 * A window is closed once `now` is past `probation_until` and no violation
	 * landed after that boundary. Restricted records stay as they are until an
	 * explicit reset.
	 */
	private windowClosed(record: ViolationRecord, now: number): boolean {
		return (
			!record.restricted &&
			record.count > 0 &&
			record.probation_until !== null &&
			now > record.probation_until &&
			record.last_seen_at <= record.probation_until
		);
	}
}
