/**
 * Private chat self-service: a member restricted by the bot lifts the
 * restriction, in every monitored group, after fixing what caused it.
 *
 * @module handlers/directMessages
 */

import type { Context, Telegraf } from "telegraf";
import type { User } from "telegraf/types";
import type { MemberInfo, MessageText } from "../services/messagingGateway";
import type {
	BotServices,
	ModerationServices,
} from "../services/moderationServices";
import { type ModerationKey, nowSeconds } from "../types";
import { logger, StructuredLogger } from "../utils/logger";
import {
	CAPTCHA_PENDING_DM,
	DM_ALREADY_UNRESTRICTED,
	DM_NO_RESTRICTION,
	DM_NOT_IN_GROUP,
	DM_OTHER_RESTRICTION,
	DM_UNRESTRICTION_FAILED,
	DM_UNRESTRICTION_SUCCESS,
	dmIncompleteProfile,
	dmUnrestrictionNotice,
} from "../utils/messages";
import { memberKey, toMemberRef } from "../utils/userResolver";

type LiftOutcome = "lifted" | "already" | "other_restriction" | "failed" | "none";

/**
 * Works out the reply to a private message, across every monitored group.
 *
 * Order: membership, pending captcha, profile completeness, then in each
 * group whichever bot-owned restriction applies: a profile restriction the
 * system applied, or the mute left behind by a resolved captcha.
 * Administrator restrictions and probation restrictions are never lifted
 * here.
 */
export async function handleDirectMessage(
	bot: BotServices,
	user: User,
	now: number = nowSeconds(),
): Promise<MessageText> {
	const memberships: Array<{ group: ModerationServices; member: MemberInfo }> =
		[];
	for (const group of bot.groups) {
		const member = await bot.gateway.getMember(group.config.groupId, user.id);
		if (member && member.status !== "left" && member.status !== "kicked") {
			memberships.push({ group, member });
		}
	}
	if (memberships.length === 0) return DM_NOT_IN_GROUP;

	for (const { group } of memberships) {
		const pending = group.captcha.getPending(
			memberKey(group.config.groupId, user),
		);
		if (pending.ok && pending.value) return CAPTCHA_PENDING_DM;
	}

	const check = await bot.checker.check(user);
	if (!check.complete) {
		return dmIncompleteProfile(
			check.missing,
			memberships[0].group.config.rulesLink,
		);
	}

	const outcomes = new Set<LiftOutcome>();
	for (const { group, member } of memberships) {
		outcomes.add(await liftInGroup(group, member, user, now));
	}

	if (outcomes.has("lifted")) return DM_UNRESTRICTION_SUCCESS;
	if (outcomes.has("failed")) return DM_UNRESTRICTION_FAILED;
	if (outcomes.has("other_restriction")) return DM_OTHER_RESTRICTION;
	if (outcomes.has("already")) return DM_ALREADY_UNRESTRICTED;
	return DM_NO_RESTRICTION;
}

async function liftInGroup(
	services: ModerationServices,
	member: MemberInfo,
	user: User,
	now: number,
): Promise<LiftOutcome> {
	const { config, profile, probation } = services;
	const key = memberKey(config.groupId, user);

	const record = profile.status(key, now);
	if (!record.ok) {
		logger.warn("Profile status unavailable", { ...key, reason: record.reason });
		return "failed";
	}

	if (record.value?.restricted && record.value.restricted_by === "system") {
		const probationRecord = probation.status(key, now);
		if (!probationRecord.ok) {
			logger.warn("Probation status unavailable", {
				...key,
				reason: probationRecord.reason,
			});
			return "failed";
		}
		if (probationRecord.value?.restricted) {
			clearProfileRestriction(services, key);
			logger.info("Profile restriction cleared, probation restriction kept", key);
			return "other_restriction";
		}

		if (member.status !== "restricted") {
			clearProfileRestriction(services, key);
			logger.info("Bot restriction already lifted on the platform", key);
			return "already";
		}
		if (!(await unrestrict(services, key))) return "failed";

		clearProfileRestriction(services, key);
		await services.executor.notify(dmUnrestrictionNotice(toMemberRef(user)), {
			userId: user.id,
			action: "dm_unrestrict",
		});
		return "lifted";
	}

	if (
		member.status === "restricted" &&
		record.value?.restricted_by !== "administrator" &&
		heldByResolvedCaptcha(services, key, now)
	) {
		if (!(await unrestrict(services, key))) return "failed";

		const started = probation.startProbation(key, now);
		if (!started.ok) {
			logger.warn("Probation not started", { ...key, reason: started.reason });
		}
		await services.executor.notify(dmUnrestrictionNotice(toMemberRef(user)), {
			userId: user.id,
			action: "dm_unrestrict_captcha",
		});
		return "lifted";
	}

	return "none";
}

function clearProfileRestriction(
	services: ModerationServices,
	key: ModerationKey,
): void {
	const cleared = services.profile.clearSystemRestriction(key);
	if (!cleared.ok) {
		logger.warn("Profile restriction changed while unrestricting", {
			...key,
			reason: cleared.reason,
		});
	}
}

/**
 * Registers the private chat handler. Must come after the command handlers,
 * which answer their own commands without passing them on.
 */
export const registerDirectMessageHandlers = (
	bot: Telegraf<Context>,
	services: BotServices,
) => {
	bot.on("message", async (ctx, next) => {
		if (ctx.chat.type !== "private") return next();

		try {
			await ctx.reply(await handleDirectMessage(services, ctx.from));
		} catch (error) {
			StructuredLogger.logError(error, {
				userId: ctx.from.id,
				operation: "direct_message",
			});
			await ctx.reply(DM_UNRESTRICTION_FAILED);
		}
	});
};

/**
 * True when the member's last challenge is resolved and nothing else holds
 * the restriction: no open probation enforcement.
 */
function heldByResolvedCaptcha(
	services: ModerationServices,
	key: ModerationKey,
	now: number,
): boolean {
	const latest = services.captcha.getLatest(key);
	if (!latest.ok || !latest.value || latest.value.status === "pending") {
		return false;
	}
	const probationRecord = services.probation.status(key, now);
	return probationRecord.ok && !probationRecord.value?.restricted;
}

async function unrestrict(
	services: ModerationServices,
	key: ModerationKey,
): Promise<boolean> {
	try {
		await services.gateway.unrestrictMember(key.groupId, key.userId);
		StructuredLogger.logUserAction("User unrestricted via DM", {
			...key,
			operation: "dm_unrestrict",
		});
		return true;
	} catch (error) {
		StructuredLogger.logError(error, { ...key, operation: "dm_unrestrict" });
		return false;
	}
}
