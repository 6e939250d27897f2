/**
 * Join verification handlers: challenge on join, button press to verify.
 *
 * @module handlers/captcha
 */

import type { Context, Telegraf } from "telegraf";
import type { User } from "telegraf/types";
import type {
	BotServices,
	ModerationServices,
} from "../services/moderationServices";
import { nowSeconds } from "../types";
import { CAPTCHA_CALLBACK_PATTERN, captchaKeyboard } from "../utils/keyboards";
import { logger, StructuredLogger } from "../utils/logger";
import {
	CAPTCHA_VERIFY_FAILED,
	CAPTCHA_WRONG_USER,
	captchaVerified,
	captchaWelcome,
} from "../utils/messages";
import { fullName, memberKey, toMemberRef } from "../utils/userResolver";

/**
 * Handles a member who just joined the monitored group.
 *
 * With captcha on: opens a challenge (a duplicate join event finds it
 * pending and stops), mutes the member and posts the button. With captcha
 * off the member goes straight onto probation.
 */
export async function startJoinFlow(
	services: ModerationServices,
	user: User,
	now: number = nowSeconds(),
): Promise<void> {
	const { config, captcha, gateway, probation } = services;
	if (user.is_bot) return;

	const key = memberKey(config.groupId, user);

	if (!config.captcha.enabled) {
		const started = probation.startProbation(key, now);
		if (!started.ok) {
			logger.warn("Probation not started", { ...key, reason: started.reason });
		}
		return;
	}

	const created = captcha.create(key, now, { userFullName: fullName(user) });
	if (!created.ok) {
		logger.info("Captcha not created", {
			...key,
			reason: created.reason,
		});
		return;
	}

	try {
		await gateway.restrictMember(config.groupId, user.id);
	} catch (error) {
		StructuredLogger.logError(error, { ...key, operation: "captcha_restrict" });
	}

	try {
		const sent = await gateway.sendMessage(
			config.groupId,
			captchaWelcome(toMemberRef(user), config.captcha.timeoutSeconds),
			{ threadId: config.warningTopicId, replyMarkup: captchaKeyboard(user.id) },
		);
		captcha.attachChallenge(key, config.groupId, sent.messageId);
	} catch (error) {
		StructuredLogger.logError(error, { ...key, operation: "captcha_challenge" });
	}
}

export interface CaptchaPress {
	/** Who pressed the button */
	from: User;
	/** User ID carried in the callback data */
	targetUserId: number;
	/** Where the challenge message lives */
	chatId?: number;
	messageId?: number;
}

/**
 * Resolves a captcha button press.
 *
 * @returns Text for the callback answer; empty for a silent answer
 */
export async function handleCaptchaPress(
	services: ModerationServices,
	press: CaptchaPress,
	now: number = nowSeconds(),
): Promise<string> {
	const { config, captcha, gateway, probation } = services;

	if (press.from.id !== press.targetUserId) {
		return CAPTCHA_WRONG_USER;
	}

	const key = memberKey(config.groupId, press.from);
	const verified = captcha.verify(key, now);
	if (!verified.ok) {
		logger.info("Captcha press rejected", { ...key, reason: verified.reason });
		return CAPTCHA_VERIFY_FAILED;
	}

	try {
		await gateway.unrestrictMember(config.groupId, press.from.id);
	} catch (error) {
		StructuredLogger.logError(error, { ...key, operation: "captcha_unrestrict" });
		return CAPTCHA_VERIFY_FAILED;
	}

	const started = probation.startProbation(key, now);
	if (!started.ok) {
		logger.warn("Probation not started", { ...key, reason: started.reason });
	}

	if (press.chatId !== undefined && press.messageId !== undefined) {
		try {
			await gateway.editMessage(
				press.chatId,
				press.messageId,
				captchaVerified(toMemberRef(press.from)),
			);
		} catch (error) {
			StructuredLogger.logError(error, { ...key, operation: "captcha_edit" });
		}
	}
	return "";
}

/**
 * Registers the captcha button handler. Joins arrive through the message and
 * chat-member handlers, which call {@link startJoinFlow}.
 */
export const registerCaptchaHandlers = (
	bot: Telegraf<Context>,
	services: BotServices,
) => {
	bot.action(CAPTCHA_CALLBACK_PATTERN, async (ctx) => {
		const targetUserId = Number(ctx.match[1]);
		const message = ctx.callbackQuery.message;
		const group = message ? services.forGroup(message.chat.id) : undefined;
		if (!message || !group) {
			await ctx.answerCbQuery(CAPTCHA_VERIFY_FAILED);
			return;
		}

		const answer = await handleCaptchaPress(group, {
			from: ctx.callbackQuery.from,
			targetUserId,
			chatId: message.chat.id,
			messageId: message.message_id,
		});

		await ctx.answerCbQuery(answer || undefined);
	});
};
