/**
 * Administrator tools, usable in a private chat with the bot by
 * administrators of any monitored group: the photo whitelist commands, the
 * profile check (by ID or by forwarding a message) and its inline buttons.
 *
 * @module handlers/admin
 */

import type { Context, Telegraf } from "telegraf";
import type {
	InlineKeyboardMarkup,
	MessageOriginChannel,
	MessageOriginChat,
	MessageOriginHiddenUser,
	MessageOriginUser,
	User,
} from "telegraf/types";
import type { MessageText, UserInfo } from "../services/messagingGateway";
import type { BotServices } from "../services/moderationServices";
import {
	checkKeyboard,
	missingFromCodes,
	UNVERIFY_CALLBACK_PATTERN,
	unverifyKeyboard,
	VERIFY_CALLBACK_PATTERN,
	WARN_CALLBACK_PATTERN,
} from "../utils/keyboards";
import { StructuredLogger } from "../utils/logger";
import {
	ADMIN_INVALID_USER_ID,
	ADMIN_NOT_ALLOWED,
	ADMIN_PRIVATE_ONLY,
	adminAlreadyWhitelisted,
	adminNotWhitelisted,
	adminUnverified,
	adminUsage,
	adminVerified,
	CHECK_HIDDEN_FORWARD,
	CHECK_NOT_IN_GROUP,
	CHECK_USER_NOT_FOUND,
	checkReport,
	checkWarningSent,
	profileWarning,
	verificationClearance,
} from "../utils/messages";
import { fullName, parseUserId } from "../utils/userResolver";

const ADMIN_STATUSES = new Set(["creator", "administrator"]);
const OUTSIDE_STATUSES = new Set(["left", "kicked"]);

/** True if the user administers at least one monitored group. */
export async function isGroupAdmin(
	bot: BotServices,
	userId: number,
): Promise<boolean> {
	for (const group of bot.groups) {
		const member = await bot.gateway.getMember(group.config.groupId, userId);
		if (member !== undefined && ADMIN_STATUSES.has(member.status)) return true;
	}
	return false;
}

/**
 * Whitelists the user's profile photo, then in every monitored group lifts
 * any restriction and clears the profile record. Posts a clearance notice in
 * each group where a record existed.
 */
export async function verifyMember(
	bot: BotServices,
	adminId: number,
	targetUserId: number,
): Promise<MessageText> {
	const added = bot.whitelist.add(targetUserId, adminId);
	if (!added.ok) {
		throw new Error(`Whitelist unavailable: ${added.message ?? added.reason}`);
	}
	if (!added.value) {
		return adminAlreadyWhitelisted(targetUserId);
	}

	for (const group of bot.groups) {
		const key = { groupId: group.config.groupId, userId: targetUserId };

		try {
			await bot.gateway.unrestrictMember(key.groupId, targetUserId);
			group.probation.markLifted(key);
		} catch (error) {
			// Not restricted or not in the group
			StructuredLogger.logDebug("Unrestrict during verification failed", {
				...key,
				error: error instanceof Error ? error.message : String(error),
			});
		}

		const reset = group.profile.reset(key);
		if (reset.ok && reset.value) {
			const member = await bot.gateway.getMember(key.groupId, targetUserId);
			await group.executor.notify(
				verificationClearance({
					id: targetUserId,
					fullName: member?.fullName ?? `User ${targetUserId}`,
				}),
				{ userId: targetUserId, action: "admin_verify" },
			);
		}
	}

	StructuredLogger.logUserAction("Admin verified user", {
		userId: targetUserId,
		adminId,
		operation: "verify",
	});
	return adminVerified(targetUserId);
}

export function unverifyMember(
	bot: BotServices,
	adminId: number,
	targetUserId: number,
): MessageText {
	const removed = bot.whitelist.remove(targetUserId, adminId);
	if (!removed.ok) {
		throw new Error(
			`Whitelist unavailable: ${removed.message ?? removed.reason}`,
		);
	}
	return removed.value
		? adminUnverified(targetUserId)
		: adminNotWhitelisted(targetUserId);
}

/** The user as a monitored group sees them, else as the bot's own chat does. */
async function lookupUser(
	bot: BotServices,
	userId: number,
): Promise<UserInfo | undefined> {
	for (const group of bot.groups) {
		const member = await bot.gateway.getMember(group.config.groupId, userId);
		if (member && !OUTSIDE_STATUSES.has(member.status)) {
			return { id: userId, fullName: member.fullName, username: member.username };
		}
	}
	return bot.gateway.getUser(userId);
}

export interface CheckReply {
	text: MessageText;
	keyboard?: InlineKeyboardMarkup;
}

/**
 * Reports the user's profile status.
 *
 * An incomplete profile gets warn and verify buttons; a complete profile
 * that relies on the whitelist gets an unverify button.
 *
 * @param known - The user from a forwarded message, which skips the lookup
 */
export async function checkMember(
	bot: BotServices,
	targetUserId: number,
	known?: UserInfo,
): Promise<CheckReply> {
	const user = known ?? (await lookupUser(bot, targetUserId));
	if (!user) return { text: CHECK_USER_NOT_FOUND };

	const check = await bot.checker.check(user);
	const whitelisted = bot.whitelist.isWhitelisted(user.id);
	const isWhitelisted = whitelisted.ok && whitelisted.value;

	const text = checkReport(user, {
		hasProfilePhoto: check.hasProfilePhoto,
		hasUsername: check.hasUsername,
		whitelisted: isWhitelisted,
	});
	if (!check.complete) {
		return { text, keyboard: checkKeyboard(user.id, check) };
	}
	return isWhitelisted ? { text, keyboard: unverifyKeyboard(user.id) } : { text };
}

/**
 * Posts a profile warning in every monitored group the user belongs to.
 *
 * @returns Text that replaces the check report
 */
export async function warnMember(
	bot: BotServices,
	adminId: number,
	targetUserId: number,
	missing: string[],
): Promise<MessageText> {
	let warned: UserInfo | undefined;
	for (const group of bot.groups) {
		const member = await bot.gateway.getMember(
			group.config.groupId,
			targetUserId,
		);
		if (!member || OUTSIDE_STATUSES.has(member.status)) continue;

		warned = { id: targetUserId, fullName: member.fullName };
		await group.executor.notify(
			profileWarning(warned, missing, group.config.rulesLink),
			{ userId: targetUserId, action: "admin_warn" },
		);
	}
	if (!warned) return CHECK_NOT_IN_GROUP;

	StructuredLogger.logUserAction("Admin warned user", {
		userId: targetUserId,
		adminId,
		operation: "warn",
	});
	return checkWarningSent(warned);
}

/**
 * The original sender of a forwarded message. "hidden" when the sender's
 * privacy settings hide the account.
 */
export function forwardedUser(
	origin:
		| MessageOriginUser
		| MessageOriginHiddenUser
		| MessageOriginChat
		| MessageOriginChannel
		| undefined,
): User | "hidden" | undefined {
	if (origin?.type === "user") return origin.sender_user;
	if (origin?.type === "hidden_user") return "hidden";
	return undefined;
}

export interface AdminPress {
	/** Who pressed the button */
	from: User;
	chatId?: number;
	messageId?: number;
}

/**
 * Runs an inline button action for an administrator and replaces the check
 * report with its result.
 *
 * @returns Text for the callback answer; empty for a silent answer
 */
export async function handleAdminPress(
	bot: BotServices,
	press: AdminPress,
	run: (adminId: number) => Promise<MessageText>,
): Promise<string> {
	if (!(await isGroupAdmin(bot, press.from.id))) {
		StructuredLogger.logSecurityEvent("Admin button refused", {
			userId: press.from.id,
		});
		return ADMIN_NOT_ALLOWED;
	}

	const text = await run(press.from.id);
	if (press.chatId !== undefined && press.messageId !== undefined) {
		try {
			await bot.gateway.editMessage(press.chatId, press.messageId, text);
		} catch (error) {
			StructuredLogger.logError(error, {
				userId: press.from.id,
				operation: "admin_edit",
			});
		}
	}
	return "";
}

/**
 * Registers the administrator commands, the forwarded message check and the
 * check report buttons.
 *
 * Commands registered:
 * - /verify USER_ID - whitelist a hidden profile photo and clear warnings
 * - /unverify USER_ID - remove the whitelist entry
 * - /check USER_ID - report the user's profile status
 */
export const registerAdminHandlers = (
	bot: Telegraf<Context>,
	services: BotServices,
) => {
	const guard = async (ctx: Context, command: string): Promise<number | null> => {
		if (ctx.chat?.type !== "private") {
			await ctx.reply(ADMIN_PRIVATE_ONLY);
			return null;
		}
		const adminId = ctx.from?.id;
		if (adminId === undefined || !(await isGroupAdmin(services, adminId))) {
			StructuredLogger.logSecurityEvent("Admin command refused", {
				userId: adminId,
				operation: command,
			});
			await ctx.reply(ADMIN_NOT_ALLOWED);
			return null;
		}
		return adminId;
	};

	const targetOf = async (
		ctx: Context & { payload: string },
		command: string,
	): Promise<number | null> => {
		const [argument] = ctx.payload.trim().split(/\s+/);
		if (!argument) {
			await ctx.reply(adminUsage(command));
			return null;
		}
		const targetUserId = parseUserId(argument);
		if (targetUserId === null) await ctx.reply(ADMIN_INVALID_USER_ID);
		return targetUserId;
	};

	const replyCheck = async (ctx: Context, reply: CheckReply) => {
		await ctx.reply(
			reply.text,
			reply.keyboard ? { reply_markup: reply.keyboard } : undefined,
		);
	};

	bot.command("verify", async (ctx) => {
		const adminId = await guard(ctx, "verify");
		if (adminId === null) return;
		const targetUserId = await targetOf(ctx, "verify");
		if (targetUserId === null) return;

		await ctx.reply(await verifyMember(services, adminId, targetUserId));
	});

	bot.command("unverify", async (ctx) => {
		const adminId = await guard(ctx, "unverify");
		if (adminId === null) return;
		const targetUserId = await targetOf(ctx, "unverify");
		if (targetUserId === null) return;

		await ctx.reply(unverifyMember(services, adminId, targetUserId));
	});

	bot.command("check", async (ctx) => {
		const adminId = await guard(ctx, "check");
		if (adminId === null) return;
		const targetUserId = await targetOf(ctx, "check");
		if (targetUserId === null) return;

		await replyCheck(ctx, await checkMember(services, targetUserId));
	});

	bot.on("message", async (ctx, next) => {
		const origin =
			"forward_origin" in ctx.message ? ctx.message.forward_origin : undefined;
		if (ctx.chat.type !== "private" || !origin) return next();
		if ((await guard(ctx, "check_forward")) === null) return;

		const sender = forwardedUser(origin);
		if (sender === "hidden") return ctx.reply(CHECK_HIDDEN_FORWARD);
		if (sender === undefined) return ctx.reply(CHECK_USER_NOT_FOUND);
		await replyCheck(
			ctx,
			await checkMember(services, sender.id, {
				id: sender.id,
				fullName: fullName(sender),
				username: sender.username,
			}),
		);
	});

	bot.action(WARN_CALLBACK_PATTERN, async (ctx) => {
		const targetUserId = Number(ctx.match[1]);
		const missing = missingFromCodes(ctx.match[2]);
		const message = ctx.callbackQuery.message;

		const answer = await handleAdminPress(
			services,
			{
				from: ctx.callbackQuery.from,
				chatId: message?.chat.id,
				messageId: message?.message_id,
			},
			(adminId) => warnMember(services, adminId, targetUserId, missing),
		);
		await ctx.answerCbQuery(answer || undefined);
	});

	bot.action(VERIFY_CALLBACK_PATTERN, async (ctx) => {
		const targetUserId = Number(ctx.match[1]);
		const message = ctx.callbackQuery.message;

		const answer = await handleAdminPress(
			services,
			{
				from: ctx.callbackQuery.from,
				chatId: message?.chat.id,
				messageId: message?.message_id,
			},
			(adminId) => verifyMember(services, adminId, targetUserId),
		);
		await ctx.answerCbQuery(answer || undefined);
	});

	bot.action(UNVERIFY_CALLBACK_PATTERN, async (ctx) => {
		const targetUserId = Number(ctx.match[1]);
		const message = ctx.callbackQuery.message;

		const answer = await handleAdminPress(
			services,
			{
				from: ctx.callbackQuery.from,
				chatId: message?.chat.id,
				messageId: message?.message_id,
			},
			async (adminId) => unverifyMember(services, adminId, targetUserId),
		);
		await ctx.answerCbQuery(answer || undefined);
	});
};
