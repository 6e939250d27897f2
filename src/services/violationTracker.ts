/**
 * Progressive enforcement engine.
 *
 * One instance per violation kind. Every operation goes through the
 * {@link ViolationStore} atomic primitives and returns a typed {@link Result};
 * the caller turns the decision into platform actions.
 *
 * @module services/violationTracker
 */

import type {
	ViolationExpectation,
	ViolationStore,
} from "../store/violationStore";
import {
	type EnforcementAction,
	type ModerationKey,
	nowSeconds,
	type ViolationDecision,
	type ViolationKind,
	type ViolationRecord,
} from "../types";
import {
	InvalidTransitionError,
	NotFoundError,
	ok,
	PersistenceConflictError,
	type Result,
	toFailure,
} from "../utils/errors";
import { StructuredLogger } from "../utils/logger";

export interface ViolationTrackerOptions {
	kind: ViolationKind;
	/** Violation count at which the user is restricted */
	threshold: number;
	/** When false every violation only warns; nothing is restricted */
	enforce?: boolean;
	/** Seconds after the first violation before the sweep restricts */
	escalateAfterSeconds?: number;
	/** Limits the sweep listings to one group */
	groupId?: number;
}

/**
 * Maps a post-increment count to an action.
 *
 * @param count - Count including the violation being recorded
 * @param alreadyRestricted - Restriction state before this violation
 */
export function decideAction(
	count: number,
	alreadyRestricted: boolean,
	threshold: number,
	enforce: boolean,
): EnforcementAction {
	if (!enforce) return "warn";
	if (alreadyRestricted) return "no_op";
	if (count >= threshold) return "restrict";
	return count === 1 ? "warn" : "silent";
}

export class ViolationTracker {
	protected readonly enforce: boolean;

	constructor(
		protected readonly store: ViolationStore,
		protected readonly options: ViolationTrackerOptions,
	) {
		this.enforce = options.enforce ?? true;
	}

	get kind(): ViolationKind {
		return this.options.kind;
	}

	get threshold(): number {
		return this.options.threshold;
	}

	/**
	 * Counts one violation and decides the action, in a single transaction.
	 * Of any number of racing calls, only the one whose increment reaches the
	 * threshold sees `restrict`.
	 */
	recordViolation(
		key: ModerationKey,
		now: number = nowSeconds(),
	): Result<ViolationDecision> {
		try {
			const decided: { action: EnforcementAction } = { action: "no_op" };

			const { current } = this.store.atomicUpdate(key, this.kind, (stored) => {
				const base = this.normalize(key, stored, now);
				const next = this.increment(key, base, now);
				decided.action = decideAction(
					next.count,
					next.restricted,
					this.threshold,
					this.enforce,
				);
				return decided.action === "restrict"
					? { ...next, restricted: true, restricted_by: "system" }
					: next;
			});
			const { action } = decided;

			if (!current) {
				throw new NotFoundError(`No ${this.kind} record after update`);
			}

			if (action === "restrict") {
				StructuredLogger.logSecurityEvent("Violation threshold reached", {
					...key,
					kind: this.kind,
					action,
					count: current.count,
				});
			} else {
				StructuredLogger.logDebug("Violation recorded", {
					...key,
					kind: this.kind,
					action,
					count: current.count,
				});
			}

			return ok({ action, count: current.count, record: current });
		} catch (error) {
			return toFailure(error, {
				...key,
				kind: this.kind,
				operation: "record_violation",
			});
		}
	}

	/**
	 * Time-based escalation: restricts an unrestricted record whose first
	 * violation is at least `escalateAfterSeconds` old, regardless of count.
	 * A precondition failure is retried once and then reported as `no_op`.
	 */
	enforceDeadline(
		key: ModerationKey,
		now: number = nowSeconds(),
	): Result<ViolationDecision> {
		const escalateAfter = this.options.escalateAfterSeconds;

		const attempt = (): ViolationDecision => {
			const record = this.store.read(key, this.kind);
			if (!record) {
				throw new NotFoundError(
					`No ${this.kind} record for user ${key.userId} in group ${key.groupId}`,
				);
			}

			const cutoff =
				escalateAfter === undefined ? undefined : now - escalateAfter;
			if (
				!this.enforce ||
				cutoff === undefined ||
				record.restricted ||
				record.count === 0 ||
				record.first_seen_at > cutoff
			) {
				return { action: "no_op", count: record.count, record };
			}

			const expected: ViolationExpectation = {
				restricted: false,
				count: record.count,
				firstSeenAtOrBefore: cutoff,
			};
			const updated = this.store.compareAndSet(key, this.kind, expected, {
				restricted: true,
				restrictedBy: "system",
			});

			StructuredLogger.logSecurityEvent("Time threshold reached", {
				...key,
				kind: this.kind,
				action: "restrict",
				count: updated.count,
			});
			return { action: "restrict", count: updated.count, record: updated };
		};

		try {
			return ok(this.withConflictRetry(key, attempt));
		} catch (error) {
			return toFailure(error, {
				...key,
				kind: this.kind,
				operation: "enforce_deadline",
			});
		}
	}

	/**
	 * Removes the record: count back to zero, not restricted,
	 * `restricted_by = none`.
	 *
	 * @returns Whether a record existed
	 */
	reset(key: ModerationKey): Result<boolean> {
		try {
			const existed = this.store.delete(key, this.kind);
			if (existed) {
				StructuredLogger.logUserAction("Violation record reset", {
					...key,
					kind: this.kind,
					operation: "reset",
				});
			}
			return ok(existed);
		} catch (error) {
			return toFailure(error, { ...key, kind: this.kind, operation: "reset" });
		}
	}

	/**
	 * Unrestricted records whose first violation is at least
	 * `escalateAfterSeconds` old. Empty when time escalation is off.
	 */
	listOverdue(now: number = nowSeconds()): Result<ViolationRecord[]> {
		const escalateAfter = this.options.escalateAfterSeconds;
		if (escalateAfter === undefined || !this.enforce) return ok([]);
		try {
			return ok(
				this.store.listEscalationCandidates(
					this.kind,
					now - escalateAfter,
					this.options.groupId,
				),
			);
		} catch (error) {
			return toFailure(error, { kind: this.kind, operation: "list_overdue" });
		}
	}

	/** Read-only view of the record. */
	status(
		key: ModerationKey,
		_now: number = nowSeconds(),
	): Result<ViolationRecord | undefined> {
		try {
			return ok(this.store.read(key, this.kind));
		} catch (error) {
			return toFailure(error, { ...key, kind: this.kind, operation: "status" });
		}
	}

	/**
	 * Records that an administrator restricted the user. The system never
	 * clears such a restriction on its own.
	 */
	markAdministratorRestricted(
		key: ModerationKey,
		now: number = nowSeconds(),
	): Result<ViolationRecord> {
		try {
			const { current } = this.store.atomicUpdate(key, this.kind, (stored) => ({
				...(stored ?? this.emptyRecord(key, now)),
				restricted: true,
				restricted_by: "administrator",
				last_seen_at: now,
			}));
			if (!current) {
				throw new NotFoundError(`No ${this.kind} record after update`);
			}
			StructuredLogger.logSecurityEvent("Administrator restriction recorded", {
				...key,
				kind: this.kind,
			});
			return ok(current);
		} catch (error) {
			return toFailure(error, {
				...key,
				kind: this.kind,
				operation: "mark_admin_restricted",
			});
		}
	}

	/**
	 * Records that the restriction was lifted on the platform by someone other
	 * than the bot. The count is kept, so the next violation restricts again.
	 */
	markLifted(key: ModerationKey): Result<ViolationRecord | undefined> {
		try {
			const { previous, current } = this.store.atomicUpdate(
				key,
				this.kind,
				(stored) =>
					stored?.restricted
						? { ...stored, restricted: false, restricted_by: "none" }
						: (stored ?? null),
			);
			if (previous?.restricted) {
				StructuredLogger.logUserAction("Restriction lifted externally", {
					...key,
					kind: this.kind,
					count: previous.count,
				});
			}
			return ok(current);
		} catch (error) {
			return toFailure(error, {
				...key,
				kind: this.kind,
				operation: "mark_lifted",
			});
		}
	}

	/**
	 * Lifts a restriction the system applied and resets the record.
	 * Fails with `InvalidTransition` when the user is not restricted or the
	 * restriction belongs to an administrator, and `NotFound` without a record.
	 *
	 * @returns The record as it was before clearing
	 */
	clearSystemRestriction(key: ModerationKey): Result<ViolationRecord> {
		try {
			const { previous } = this.store.atomicUpdate(key, this.kind, (stored) => {
				if (!stored) return null;
				if (stored.restricted && stored.restricted_by === "system") return null;
				return stored;
			});

			if (!previous) {
				throw new NotFoundError(`No ${this.kind} record`);
			}
			if (previous.restricted_by === "administrator") {
				throw new InvalidTransitionError("Restricted by an administrator");
			}
			if (!previous.restricted) {
				throw new InvalidTransitionError("Not restricted");
			}

			StructuredLogger.logUserAction("System restriction cleared", {
				...key,
				kind: this.kind,
				operation: "clear_system_restriction",
			});
			return ok(previous);
		} catch (error) {
			return toFailure(error, {
				...key,
				kind: this.kind,
				operation: "clear_system_restriction",
			});
		}
	}

	/**
	 * Adjusts the stored record before a new event is applied. The base
	 * tracker keeps it as is.
	 */
	protected normalize(
		_key: ModerationKey,
		stored: ViolationRecord | undefined,
		_now: number,
	): ViolationRecord | undefined {
		return stored;
	}

	/** Applies one violation to the (normalized) record. */
	protected increment(
		key: ModerationKey,
		base: ViolationRecord | undefined,
		now: number,
	): ViolationRecord {
		if (!base) {
			return { ...this.emptyRecord(key, now), count: 1 };
		}
		return {
			...base,
			count: base.count + 1,
			first_seen_at: base.count === 0 ? now : base.first_seen_at,
			last_seen_at: now,
		};
	}

	protected emptyRecord(key: ModerationKey, now: number): ViolationRecord {
		return {
			group_id: key.groupId,
			user_id: key.userId,
			kind: this.kind,
			count: 0,
			first_seen_at: now,
			last_seen_at: now,
			restricted: false,
			restricted_by: "none",
			probation_until: null,
		};
	}

	private withConflictRetry(
		key: ModerationKey,
		attempt: () => ViolationDecision,
	): ViolationDecision {
		for (let tries = 0; tries < 2; tries++) {
			try {
				return attempt();
			} catch (error) {
				if (!(error instanceof PersistenceConflictError)) throw error;
				StructuredLogger.logDebug("Compare-and-set conflict", {
					...key,
					kind: this.kind,
					attempt: tries + 1,
				});
			}
		}

		const record = this.store.read(key, this.kind);
		if (!record) {
			throw new NotFoundError(`No ${this.kind} record after conflict`);
		}
		return { action: "no_op", count: record.count, record };
	}
}
