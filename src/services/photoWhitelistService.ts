/**
 * Photo whitelist: members whose profile photo is hidden by their privacy
 * settings and who were vouched for by an administrator.
 *
 * @module services/photoWhitelistService
 */

import type { DatabaseHandle } from "../database";
import { nowSeconds } from "../types";
import { ok, type Result, toFailure } from "../utils/errors";
import { StructuredLogger } from "../utils/logger";

export class PhotoWhitelistService {
	constructor(private readonly db: DatabaseHandle) {}

	isWhitelisted(userId: number): Result<boolean> {
		try {
			const row = this.db.get<{ user_id: number }>(
				"SELECT user_id FROM photo_whitelist WHERE user_id = ?",
				[userId],
			);
			return ok(row !== undefined);
		} catch (error) {
			return toFailure(error, { userId, operation: "whitelist_check" });
		}
	}

	/**
	 * Adds the user. Resolves to false when the user was already listed.
	 */
	add(
		userId: number,
		verifiedBy: number,
		notes?: string,
		now: number = nowSeconds(),
	): Result<boolean> {
		try {
			const result = this.db.execute(
				`INSERT INTO photo_whitelist (user_id, verified_by, verified_at, notes)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(user_id) DO NOTHING`,
				[userId, verifiedBy, now, notes ?? null],
			);
			const added = result.changes > 0;
			if (added) {
				StructuredLogger.logUserAction("User added to photo whitelist", {
					userId,
					adminId: verifiedBy,
					operation: "whitelist_add",
				});
			}
			return ok(added);
		} catch (error) {
			return toFailure(error, { userId, operation: "whitelist_add" });
		}
	}

	/** Resolves to false when the user was not listed. */
	remove(userId: number, removedBy: number): Result<boolean> {
		try {
			const result = this.db.execute(
				"DELETE FROM photo_whitelist WHERE user_id = ?",
				[userId],
			);
			const removed = result.changes > 0;
			if (removed) {
				StructuredLogger.logUserAction("User removed from photo whitelist", {
					userId,
					adminId: removedBy,
					operation: "whitelist_remove",
				});
			}
			return ok(removed);
		} catch (error) {
			return toFailure(error, { userId, operation: "whitelist_remove" });
		}
	}
}
