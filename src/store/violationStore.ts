/**
 * Durable violation state shared by the profile and probation trackers.
 *
 * Every mutation is either a single conditional UPDATE or a read-modify-write
 * inside one IMMEDIATE transaction, so two callers can never act on the same
 * pre-update value.
 *
 * @module store/violationStore
 */

import type { DatabaseHandle } from "../database";
import type {
	ModerationKey,
	RestrictedBy,
	ViolationKind,
	ViolationRecord,
} from "../types";
import { NotFoundError, PersistenceConflictError } from "../utils/errors";

interface ViolationRow {
	group_id: number;
	user_id: number;
	kind: ViolationKind;
	count: number;
	first_seen_at: number;
	last_seen_at: number;
	restricted: number;
	restricted_by: RestrictedBy;
	probation_until: number | null;
}

/** Before/after pair returned by {@link ViolationStore.atomicUpdate}. */
export interface ViolationTransition {
	previous: ViolationRecord | undefined;
	current: ViolationRecord | undefined;
}

/** Preconditions a compare-and-set checks against the stored row. */
export interface ViolationExpectation {
	restricted?: boolean;
	restrictedBy?: RestrictedBy;
	count?: number;
	firstSeenAtOrBefore?: number;
}

const toRecord = (row: ViolationRow): ViolationRecord => ({
	...row,
	restricted: row.restricted === 1,
});

const KEY_CLAUSE = "group_id = ? AND user_id = ? AND kind = ?";

const keyParams = (key: ModerationKey, kind: ViolationKind): unknown[] => [
	key.groupId,
	key.userId,
	kind,
];

export class ViolationStore {
	constructor(private readonly db: DatabaseHandle) {}

	/** Consistent snapshot of one record. */
	read(key: ModerationKey, kind: ViolationKind): ViolationRecord | undefined {
		const row = this.db.get<ViolationRow>(
			`SELECT * FROM violation_records WHERE ${KEY_CLAUSE}`,
			keyParams(key, kind),
		);
		return row ? toRecord(row) : undefined;
	}

	/**
	 * Reads the record, applies `updateFn` and writes the result back as one
	 * transaction. `updateFn` must be pure and synchronous: returning `null`
	 * deletes the record, returning the input unchanged writes nothing.
	 *
	 * @returns The record before and after the update
	 */
	atomicUpdate(
		key: ModerationKey,
		kind: ViolationKind,
		updateFn: (current: ViolationRecord | undefined) => ViolationRecord | null,
	): ViolationTransition {
		return this.db.transaction(() => {
			const previous = this.read(key, kind);
			const next = updateFn(previous);

			if (next === null) {
				if (previous) {
					this.db.execute(
						`DELETE FROM violation_records WHERE ${KEY_CLAUSE}`,
						keyParams(key, kind),
					);
				}
				return { previous, current: undefined };
			}

			if (next !== previous) {
				this.write(key, kind, next);
			}
			return { previous, current: next };
		});
	}

	/**
	 * Sets the restriction flags only if the stored row still matches
	 * `expected`.
	 *
	 * @throws {NotFoundError} If there is no record for the key
	 * @throws {PersistenceConflictError} If the row exists but a precondition failed
	 */
	compareAndSet(
		key: ModerationKey,
		kind: ViolationKind,
		expected: ViolationExpectation,
		patch: { restricted: boolean; restrictedBy: RestrictedBy },
	): ViolationRecord {
		const conditions: string[] = [KEY_CLAUSE];
		const params: unknown[] = [
			patch.restricted ? 1 : 0,
			patch.restrictedBy,
			...keyParams(key, kind),
		];

		if (expected.restricted !== undefined) {
			conditions.push("restricted = ?");
			params.push(expected.restricted ? 1 : 0);
		}
		if (expected.restrictedBy !== undefined) {
			conditions.push("restricted_by = ?");
			params.push(expected.restrictedBy);
		}
		if (expected.count !== undefined) {
			conditions.push("count = ?");
			params.push(expected.count);
		}
		if (expected.firstSeenAtOrBefore !== undefined) {
			conditions.push("first_seen_at <= ?");
			params.push(expected.firstSeenAtOrBefore);
		}

		return this.db.transaction(() => {
			const result = this.db.execute(
				`UPDATE violation_records SET restricted = ?, restricted_by = ?
         WHERE ${conditions.join(" AND ")}`,
				params,
			);

			const current = this.read(key, kind);
			if (!current) {
				throw new NotFoundError(
					`No ${kind} record for user ${key.userId} in group ${key.groupId}`,
				);
			}
			if (result.changes === 0) {
				throw new PersistenceConflictError(
					`${kind} record for user ${key.userId} changed before update`,
				);
			}
			return current;
		});
	}

	/** Removes the record. Returns true if one existed. */
	delete(key: ModerationKey, kind: ViolationKind): boolean {
		const result = this.db.execute(
			`DELETE FROM violation_records WHERE ${KEY_CLAUSE}`,
			keyParams(key, kind),
		);
		return result.changes > 0;
	}

	/**
	 * Unrestricted records with at least one violation whose first event is
	 * at or before `cutoff`. Every group unless `groupId` is given.
	 */
	listEscalationCandidates(
		kind: ViolationKind,
		cutoff: number,
		groupId?: number,
	): ViolationRecord[] {
		return this.db
			.query<ViolationRow>(
				`SELECT * FROM violation_records
         WHERE kind = ? AND restricted = 0 AND count > 0 AND first_seen_at <= ?
           AND (? IS NULL OR group_id = ?)
         ORDER BY first_seen_at ASC`,
				[kind, cutoff, groupId ?? null, groupId ?? null],
			)
			.map(toRecord);
	}

	/** Unrestricted records with violations whose window closed before `now`. */
	listClosedWindows(
		kind: ViolationKind,
		now: number,
		groupId?: number,
	): ViolationRecord[] {
		return this.db
			.query<ViolationRow>(
				`SELECT * FROM violation_records
         WHERE kind = ? AND restricted = 0 AND count > 0
           AND probation_until IS NOT NULL AND probation_until < ?
           AND (? IS NULL OR group_id = ?)
         ORDER BY probation_until ASC`,
				[kind, now, groupId ?? null, groupId ?? null],
			)
			.map(toRecord);
	}

	private write(
		key: ModerationKey,
		kind: ViolationKind,
		record: ViolationRecord,
	): void {
		this.db.execute(
			`INSERT INTO violation_records
         (group_id, user_id, kind, count, first_seen_at, last_seen_at, restricted, restricted_by, probation_until)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(group_id, user_id, kind) DO UPDATE SET
         count = excluded.count,
         first_seen_at = excluded.first_seen_at,
         last_seen_at = excluded.last_seen_at,
         restricted = excluded.restricted,
         restricted_by = excluded.restricted_by,
         probation_until = excluded.probation_until`,
			[
				...keyParams(key, kind),
				record.count,
				record.first_seen_at,
				record.last_seen_at,
				record.restricted ? 1 : 0,
				record.restricted_by,
				record.probation_until,
			],
		);
	}
}
