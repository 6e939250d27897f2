/** Moderation entity types - row interfaces are snake_case to match SQLite columns */

/** Identifies a member of a monitored group. */
export interface ModerationKey {
	groupId: number;
	userId: number;
}

export type ViolationKind = "profile" | "probation";

export type RestrictedBy = "none" | "system" | "administrator";

export type EnforcementAction = "warn" | "silent" | "restrict" | "no_op";

export type CaptchaStatus = "pending" | "verified" | "expired";

export interface ViolationRecord {
	group_id: number;
	user_id: number;
	kind: ViolationKind;
	count: number;
	first_seen_at: number; // Unix timestamp
	last_seen_at: number; // Unix timestamp
	restricted: boolean;
	restricted_by: RestrictedBy;
	probation_until: number | null; // Unix timestamp, probation records only
}

/** What the caller should do after a tracker operation. */
export interface ViolationDecision {
	action: EnforcementAction;
	count: number;
	record: ViolationRecord;
}

export interface CaptchaRecord {
	id: number;
	group_id: number;
	user_id: number;
	status: CaptchaStatus;
	joined_at: number; // Unix timestamp
	deadline: number; // Unix timestamp
	attempts: number;
	resolved_at: number | null;
	chat_id: number | null;
	message_id: number | null;
	user_full_name: string | null;
}

/** Challenge message details kept so an expiry can edit the message later. */
export interface CaptchaChallenge {
	chatId?: number;
	messageId?: number;
	userFullName?: string;
}

export interface PhotoWhitelistEntry {
	id: number;
	user_id: number;
	verified_by: number;
	verified_at: number; // Unix timestamp
	notes: string | null;
}

/** Current Unix time in seconds. */
export const nowSeconds = (): number => Math.floor(Date.now() / 1000);
