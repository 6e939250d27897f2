/**
 * Messaging Gateway: the narrow set of platform calls the moderation layer
 * makes. Production uses {@link TelegramGateway}; tests substitute an
 * in-memory implementation.
 *
 * @module services/messagingGateway
 */

import { type Telegram, TelegramError } from "telegraf";
import type { FmtString } from "telegraf/format";
import type { ChatPermissions, InlineKeyboardMarkup } from "telegraf/types";
import { logger } from "../utils/logger";
import { fullName } from "../utils/userResolver";

export type MessageText = string | FmtString;

export type MembershipStatus =
	| "creator"
	| "administrator"
	| "member"
	| "restricted"
	| "left"
	| "kicked";

export interface MemberInfo {
	status: MembershipStatus;
	userId: number;
	fullName: string;
	username?: string;
	isBot: boolean;
}

/** A user as seen outside any group. */
export interface UserInfo {
	id: number;
	fullName: string;
	username?: string;
}

export interface SendOptions {
	/** Forum topic to post into */
	threadId?: number;
	replyMarkup?: InlineKeyboardMarkup;
}

export interface MessagingGateway {
	sendMessage(
		chatId: number,
		text: MessageText,
		options?: SendOptions,
	): Promise<{ messageId: number }>;
	editMessage(chatId: number, messageId: number, text: MessageText): Promise<void>;
	deleteMessage(chatId: number, messageId: number): Promise<void>;
	/** Removes every send permission. */
	restrictMember(chatId: number, userId: number): Promise<void>;
	/** Restores the group's default member permissions. */
	unrestrictMember(chatId: number, userId: number): Promise<void>;
	/** Undefined when the platform will not tell (user unknown, bot not in chat). */
	getMember(chatId: number, userId: number): Promise<MemberInfo | undefined>;
	/** Undefined when the user never talked to the bot or is unknown. */
	getUser(userId: number): Promise<UserInfo | undefined>;
	countProfilePhotos(userId: number): Promise<number>;
	getBotUsername(): Promise<string>;
}

/** Permissions applied when restricting a user (effectively mutes them). */
export const RESTRICTED_PERMISSIONS: ChatPermissions = {
	can_send_messages: false,
	can_send_audios: false,
	can_send_documents: false,
	can_send_photos: false,
	can_send_videos: false,
	can_send_video_notes: false,
	can_send_voice_notes: false,
	can_send_polls: false,
	can_send_other_messages: false,
	can_add_web_page_previews: false,
	can_change_info: false,
	can_invite_users: false,
	can_pin_messages: false,
	can_manage_topics: false,
};

/** Used when the group reports no default permissions of its own. */
const FALLBACK_MEMBER_PERMISSIONS: ChatPermissions = {
	can_send_messages: true,
	can_send_audios: true,
	can_send_documents: true,
	can_send_photos: true,
	can_send_videos: true,
	can_send_video_notes: true,
	can_send_voice_notes: true,
	can_send_polls: true,
	can_send_other_messages: true,
	can_add_web_page_previews: true,
};

/**
 * Gateway over telegraf's Bot API client. Errors propagate to the caller,
 * which decides whether a failed call matters.
 */
export class TelegramGateway implements MessagingGateway {
	private botUsername?: string;

	constructor(private readonly telegram: Telegram) {}

	async sendMessage(
		chatId: number,
		text: MessageText,
		options: SendOptions = {},
	): Promise<{ messageId: number }> {
		const sent = await this.telegram.sendMessage(chatId, text, {
			message_thread_id: options.threadId,
			reply_markup: options.replyMarkup,
			link_preview_options: { is_disabled: true },
		});
		return { messageId: sent.message_id };
	}

	async editMessage(
		chatId: number,
		messageId: number,
		text: MessageText,
	): Promise<void> {
		await this.telegram.editMessageText(chatId, messageId, undefined, text);
	}

	async deleteMessage(chatId: number, messageId: number): Promise<void> {
		await this.telegram.deleteMessage(chatId, messageId);
	}

	async restrictMember(chatId: number, userId: number): Promise<void> {
		await this.telegram.restrictChatMember(chatId, userId, {
			permissions: RESTRICTED_PERMISSIONS,
		});
	}

	async unrestrictMember(chatId: number, userId: number): Promise<void> {
		const chat = await this.telegram.getChat(chatId);
		const permissions =
			"permissions" in chat && chat.permissions
				? chat.permissions
				: FALLBACK_MEMBER_PERMISSIONS;
		await this.telegram.restrictChatMember(chatId, userId, { permissions });
	}

	async getMember(
		chatId: number,
		userId: number,
	): Promise<MemberInfo | undefined> {
		try {
			const member = await this.telegram.getChatMember(chatId, userId);
			return {
				status: member.status,
				userId: member.user.id,
				fullName: fullName(member.user),
				username: member.user.username,
				isBot: member.user.is_bot,
			};
		} catch (error) {
			if (isRefusal(error)) {
				logger.debug("Membership lookup refused", {
					chatId,
					userId,
					description: error.description,
				});
				return undefined;
			}
			throw error;
		}
	}

	async getUser(userId: number): Promise<UserInfo | undefined> {
		try {
			const chat = await this.telegram.getChat(userId);
			if (chat.type !== "private") return undefined;
			return {
				id: chat.id,
				fullName: fullName(chat),
				username: chat.username,
			};
		} catch (error) {
			if (isRefusal(error)) {
				logger.debug("User lookup refused", {
					userId,
					description: error.description,
				});
				return undefined;
			}
			throw error;
		}
	}

	async countProfilePhotos(userId: number): Promise<number> {
		const photos = await this.telegram.getUserProfilePhotos(userId, 0, 1);
		return photos.total_count;
	}

	async getBotUsername(): Promise<string> {
		if (!this.botUsername) {
			const me = await this.telegram.getMe();
			this.botUsername = me.username;
		}
		return this.botUsername;
	}
}

/** Bad Request and Forbidden: the platform will not answer for this target. */
function isRefusal(error: unknown): error is TelegramError {
	return (
		error instanceof TelegramError && (error.code === 400 || error.code === 403)
	);
}
