/**
 * Group message handler: probation content rules first, then profile
 * compliance.
 *
 * @module handlers/groupMessages
 */

import type { Context, Telegraf } from "telegraf";
import type { User } from "telegraf/types";
import type {
	BotServices,
	ModerationServices,
} from "../services/moderationServices";
import type { ProfileCheckResult } from "../services/profileChecker";
import { nowSeconds } from "../types";
import { type InspectableMessage, probationViolations } from "../utils/linkDetection";
import { logger, StructuredLogger } from "../utils/logger";
import { memberKey, toMemberRef } from "../utils/userResolver";
import { startJoinFlow } from "./captcha";

export interface GroupMessage extends InspectableMessage {
	chat: { id: number };
	from?: User;
}

export type GroupMessageOutcome =
	| "ignored"
	| "probation_violation"
	| "profile_complete"
	| "profile_violation"
	| "failed";

/**
 * Applies both policies to one message in the monitored group.
 *
 * A message that breaks probation rules is deleted and counted against
 * probation only; the profile check runs for every other message.
 */
export async function handleGroupMessage(
	services: ModerationServices,
	message: GroupMessage,
	now: number = nowSeconds(),
): Promise<GroupMessageOutcome> {
	const { config, probation, profile, checker, executor, gateway } = services;
	const user = message.from;

	if (message.chat.id !== config.groupId || !user || user.is_bot) {
		return "ignored";
	}

	const key = memberKey(config.groupId, user);
	const member = toMemberRef(user);

	const violations = probationViolations(message);
	if (violations.length > 0) {
		const onProbation = probation.isOnProbation(key, now);
		if (onProbation.ok && onProbation.value) {
			logger.info("Probation violation detected", { ...key, violations });

			try {
				await gateway.deleteMessage(message.chat.id, message.message_id);
			} catch (error) {
				StructuredLogger.logError(error, { ...key, operation: "delete_violation" });
			}

			const decision = probation.recordViolation(key, now);
			if (!decision.ok) {
				logger.warn("Probation violation not recorded", {
					...key,
					reason: decision.reason,
				});
				return "failed";
			}
			await executor.applyProbationDecision(member, decision.value);
			return "probation_violation";
		}
	}

	let check: ProfileCheckResult;
	try {
		check = await checker.check(user);
	} catch (error) {
		StructuredLogger.logError(error, { ...key, operation: "profile_check" });
		return "failed";
	}

	if (check.complete) {
		const status = profile.status(key, now);
		if (status.ok && status.value && !status.value.restricted) {
			profile.reset(key);
		}
		return "profile_complete";
	}

	const decision = profile.recordViolation(key, now);
	if (!decision.ok) {
		logger.warn("Profile violation not recorded", {
			...key,
			reason: decision.reason,
		});
		return "failed";
	}
	await executor.applyProfileDecision(member, decision.value, check.missing);
	return "profile_violation";
}

/**
 * Registers the group message handler. Service messages announcing new
 * members start the join flow; everything else from a monitored group is
 * checked against that group's policies.
 */
export const registerGroupMessageHandlers = (
	bot: Telegraf<Context>,
	services: BotServices,
) => {
	bot.on("message", async (ctx, next) => {
		if (ctx.chat.type !== "group" && ctx.chat.type !== "supergroup") {
			return next();
		}
		const group = services.forGroup(ctx.chat.id);
		if (!group) return;

		const message = ctx.message;
		if ("new_chat_members" in message) {
			for (const user of message.new_chat_members) {
				await startJoinFlow(group, user);
			}
			return;
		}

		await handleGroupMessage(group, message);
	});
};
