/** Conversions from Telegram users and command arguments to moderation identities */

import type { User } from "telegraf/types";
import type { ModerationKey } from "../types";
import type { MemberRef } from "./messages";

export const fullName = (user: Pick<User, "first_name" | "last_name">): string =>
	user.last_name ? `${user.first_name} ${user.last_name}` : user.first_name;

export const toMemberRef = (user: User): MemberRef => ({
	id: user.id,
	fullName: fullName(user),
});

export const memberKey = (groupId: number, user: Pick<User, "id">): ModerationKey => ({
	groupId,
	userId: user.id,
});

/**
 * Parses a numeric user ID argument. Returns null for anything that is not
 * a whole number, including "@username" forms.
 */
export function parseUserId(argument: string | undefined): number | null {
	if (!argument) return null;
	const trimmed = argument.trim();
	if (!/^-?\d+$/.test(trimmed)) return null;
	const id = Number.parseInt(trimmed, 10);
	return Number.isSafeInteger(id) ? id : null;
}
