/**
 * Durable captcha verification state.
 *
 * A partial unique index keeps at most one `pending` row per (group, user);
 * status changes are compare-and-set updates guarded by `status = 'pending'`,
 * so terminal rows are never written again.
 *
 * @module store/captchaStore
 */

import type { DatabaseHandle } from "../database";
import type {
	CaptchaChallenge,
	CaptchaRecord,
	CaptchaStatus,
	ModerationKey,
} from "../types";
import { PersistenceConflictError } from "../utils/errors";

/** Outcome of {@link CaptchaStore.insertPending}. */
export type PendingInsert =
	| { inserted: true; record: CaptchaRecord }
	| { inserted: false; record: CaptchaRecord };

export class CaptchaStore {
	constructor(private readonly db: DatabaseHandle) {}

	/** Runs `fn` as one IMMEDIATE transaction on the underlying database. */
	transaction<T>(fn: () => T): T {
		return this.db.transaction(fn);
	}

	/**
	 * Inserts a pending record unless one already exists for the key.
	 */
	insertPending(
		key: ModerationKey,
		joinedAt: number,
		deadline: number,
		challenge: CaptchaChallenge = {},
	): PendingInsert {
		return this.db.transaction(() => {
			const existing = this.findPending(key);
			if (existing) {
				return { inserted: false, record: existing };
			}

			const result = this.db.execute(
				`INSERT INTO captcha_records
           (group_id, user_id, status, joined_at, deadline, attempts, chat_id, message_id, user_full_name)
         VALUES (?, ?, 'pending', ?, ?, 0, ?, ?, ?)`,
				[
					key.groupId,
					key.userId,
					joinedAt,
					deadline,
					challenge.chatId ?? null,
					challenge.messageId ?? null,
					challenge.userFullName ?? null,
				],
			);

			const record = this.findById(Number(result.lastInsertRowid));
			if (!record) {
				throw new PersistenceConflictError(
					`Captcha for user ${key.userId} vanished after insert`,
				);
			}
			return { inserted: true, record };
		});
	}

	findById(id: number): CaptchaRecord | undefined {
		return this.db.get<CaptchaRecord>(
			"SELECT * FROM captcha_records WHERE id = ?",
			[id],
		);
	}

	/** The non-terminal record for the key, if any. */
	findPending(key: ModerationKey): CaptchaRecord | undefined {
		return this.db.get<CaptchaRecord>(
			"SELECT * FROM captcha_records WHERE group_id = ? AND user_id = ? AND status = 'pending'",
			[key.groupId, key.userId],
		);
	}

	/** Most recent record for the key in any status. */
	findLatest(key: ModerationKey): CaptchaRecord | undefined {
		return this.db.get<CaptchaRecord>(
			"SELECT * FROM captcha_records WHERE group_id = ? AND user_id = ? ORDER BY id DESC LIMIT 1",
			[key.groupId, key.userId],
		);
	}

	/** Every group unless `groupId` is given. */
	listPending(groupId?: number): CaptchaRecord[] {
		return this.db.query<CaptchaRecord>(
			`SELECT * FROM captcha_records
       WHERE status = 'pending' AND (? IS NULL OR group_id = ?)
       ORDER BY deadline ASC`,
			[groupId ?? null, groupId ?? null],
		);
	}

	/** Pending records whose deadline is at or before `now`. */
	listOverdue(now: number, groupId?: number): CaptchaRecord[] {
		return this.db.query<CaptchaRecord>(
			`SELECT * FROM captcha_records
       WHERE status = 'pending' AND deadline <= ? AND (? IS NULL OR group_id = ?)
       ORDER BY deadline ASC`,
			[now, groupId ?? null, groupId ?? null],
		);
	}

	/**
	 * Moves a pending record to a terminal status.
	 *
	 * @throws {PersistenceConflictError} If the record is no longer pending
	 */
	transition(
		id: number,
		to: Exclude<CaptchaStatus, "pending">,
		now: number,
		countAttempt = false,
	): CaptchaRecord {
		const result = this.db.execute(
			`UPDATE captcha_records
       SET status = ?, resolved_at = ?, attempts = attempts + ?
       WHERE id = ? AND status = 'pending'`,
			[to, now, countAttempt ? 1 : 0, id],
		);
		const record = this.findById(id);
		if (result.changes === 0 || !record) {
			throw new PersistenceConflictError(
				`Captcha ${id} is no longer pending`,
			);
		}
		return record;
	}

	/** Records the challenge message on the pending record. */
	attachChallenge(
		key: ModerationKey,
		chatId: number,
		messageId: number,
	): boolean {
		const result = this.db.execute(
			`UPDATE captcha_records SET chat_id = ?, message_id = ?
       WHERE group_id = ? AND user_id = ? AND status = 'pending'`,
			[chatId, messageId, key.groupId, key.userId],
		);
		return result.changes > 0;
	}
}
