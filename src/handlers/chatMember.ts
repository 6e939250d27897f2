/**
 * Membership updates: joins start verification or probation, and
 * restrictions changed by someone other than the bot are recorded so the
 * bot never overrides an administrator.
 *
 * @module handlers/chatMember
 */

import type { Context, Telegraf } from "telegraf";
import type { User } from "telegraf/types";
import type { MembershipStatus } from "../services/messagingGateway";
import type {
	BotServices,
	ModerationServices,
} from "../services/moderationServices";
import { nowSeconds } from "../types";
import { logger } from "../utils/logger";
import { memberKey } from "../utils/userResolver";
import { startJoinFlow } from "./captcha";

export interface MembershipChange {
	chatId: number;
	/** Who made the change */
	actorId: number;
	/** The bot's own user ID */
	botId: number;
	oldStatus: MembershipStatus;
	newStatus: MembershipStatus;
	user: User;
}

export type MembershipOutcome =
	| "ignored"
	| "joined"
	| "admin_restricted"
	| "admin_lifted";

const OUTSIDE: ReadonlySet<MembershipStatus> = new Set(["left", "kicked"]);
const INSIDE: ReadonlySet<MembershipStatus> = new Set(["member", "restricted"]);

export async function handleMembershipChange(
	services: ModerationServices,
	change: MembershipChange,
	now: number = nowSeconds(),
): Promise<MembershipOutcome> {
	const { config, profile, probation } = services;
	if (change.chatId !== config.groupId || change.user.is_bot) {
		return "ignored";
	}

	if (OUTSIDE.has(change.oldStatus) && INSIDE.has(change.newStatus)) {
		await startJoinFlow(services, change.user, now);
		return "joined";
	}

	if (change.actorId === change.botId) return "ignored";

	const key = memberKey(config.groupId, change.user);

	if (change.newStatus === "restricted" && change.oldStatus !== "restricted") {
		const marked = profile.markAdministratorRestricted(key, now);
		if (!marked.ok) {
			logger.warn("Administrator restriction not recorded", {
				...key,
				reason: marked.reason,
			});
		}
		return "admin_restricted";
	}

	if (change.oldStatus === "restricted" && change.newStatus === "member") {
		for (const tracker of [profile, probation]) {
			const lifted = tracker.markLifted(key);
			if (!lifted.ok) {
				logger.warn("Lifted restriction not recorded", {
					...key,
					kind: tracker.kind,
					reason: lifted.reason,
				});
			}
		}
		return "admin_lifted";
	}

	return "ignored";
}

/**
 * Registers the chat_member update handler. Telegram only delivers these
 * updates when they are listed in `allowed_updates` and the bot is an
 * administrator of the group.
 */
export const registerChatMemberHandlers = (
	bot: Telegraf<Context>,
	services: BotServices,
) => {
	bot.on("chat_member", async (ctx) => {
		const update = ctx.chatMember;
		const group = services.forGroup(update.chat.id);
		if (!group) return;

		const outcome = await handleMembershipChange(group, {
			chatId: update.chat.id,
			actorId: update.from.id,
			botId: ctx.botInfo.id,
			oldStatus: update.old_chat_member.status,
			newStatus: update.new_chat_member.status,
			user: update.new_chat_member.user,
		});
		logger.debug("Membership update handled", {
			groupId: update.chat.id,
			userId: update.new_chat_member.user.id,
			outcome,
		});
	});
};
