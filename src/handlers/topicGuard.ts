/**
 * Keeps the warning topic for bot notices: posts there by anyone other than
 * the bot or a group administrator are deleted.
 *
 * @module handlers/topicGuard
 */

import type { Context, Telegraf } from "telegraf";
import type { User } from "telegraf/types";
import type { BotServices } from "../services/moderationServices";
import { logger, StructuredLogger } from "../utils/logger";

export interface TopicMessage {
	chat: { id: number };
	message_id: number;
	message_thread_id?: number;
	from?: User;
}

export type TopicOutcome = "ignored" | "allowed" | "deleted" | "failed";

const ADMIN_STATUSES = new Set(["creator", "administrator"]);

export async function handleTopicMessage(
	bot: BotServices,
	message: TopicMessage,
	botId: number,
): Promise<TopicOutcome> {
	const group = bot.forGroup(message.chat.id);
	const topicId = group?.config.warningTopicId;
	if (
		!group ||
		topicId === undefined ||
		message.message_thread_id !== topicId ||
		!message.from
	) {
		return "ignored";
	}

	const key = { groupId: group.config.groupId, userId: message.from.id };
	if (message.from.id === botId) return "allowed";

	try {
		const member = await bot.gateway.getMember(key.groupId, key.userId);
		if (member && ADMIN_STATUSES.has(member.status)) return "allowed";

		await bot.gateway.deleteMessage(key.groupId, message.message_id);
	} catch (error) {
		StructuredLogger.logError(error, { ...key, operation: "topic_guard" });
		return "failed";
	}

	logger.info("Deleted message in warning topic", {
		...key,
		topicId,
		messageId: message.message_id,
	});
	return "deleted";
}

/**
 * Registers the warning topic guard. Runs ahead of the group message handler
 * and always passes the update on, so a deleted post still counts toward the
 * sender's profile and probation checks.
 */
export const registerTopicGuardHandlers = (
	bot: Telegraf<Context>,
	services: BotServices,
) => {
	bot.on("message", async (ctx, next) => {
		if (ctx.chat.type === "group" || ctx.chat.type === "supergroup") {
			await handleTopicMessage(services, ctx.message, ctx.botInfo.id);
		}
		return next();
	});
};
