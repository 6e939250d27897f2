/**
 * Turns tracker and captcha decisions into platform actions and notices.
 *
 * The same executor serves the message handlers, the sweep, the captcha
 * deadline timers and recovery. Transport failures are logged and never
 * undo the decision already committed to the store.
 *
 * @module services/enforcementExecutor
 */

import type { GroupConfig } from "../config";
import type { CaptchaRecord, ModerationKey, ViolationDecision } from "../types";
import { StructuredLogger } from "../utils/logger";
import {
	captchaTimedOut,
	type MemberRef,
	probationRestricted,
	probationWarning,
	profileRestrictedAfterMessages,
	profileRestrictedAfterTime,
	profileWarning,
} from "../utils/messages";
import type { MessageText, MessagingGateway } from "./messagingGateway";

/** Receives sweep escalations. */
export interface DecisionExecutor {
	applyEscalation(decision: ViolationDecision): Promise<void>;
}

export class EnforcementExecutor implements DecisionExecutor {
	constructor(
		private readonly gateway: MessagingGateway,
		private readonly config: GroupConfig,
	) {}

	/** Message-count path of the profile tracker. */
	async applyProfileDecision(
		member: MemberRef,
		decision: ViolationDecision,
		missing: string[],
	): Promise<void> {
		const { profile, rulesLink } = this.config;

		switch (decision.action) {
			case "warn":
				await this.notify(
					profileWarning(
						member,
						missing,
						rulesLink,
						profile.restrictFailedUsers
							? {
									threshold: profile.warningThreshold,
									escalateAfterSeconds: profile.escalateAfterSeconds,
								}
							: undefined,
					),
					{ userId: member.id, action: "profile_warn" },
				);
				return;
			case "restrict": {
				await this.restrict(member.id, "profile");
				const dmLink = await this.dmLink();
				await this.notify(
					profileRestrictedAfterMessages(
						member,
						decision.count,
						missing,
						rulesLink,
						dmLink,
					),
					{ userId: member.id, action: "profile_restrict" },
				);
				return;
			}
			default:
				StructuredLogger.logDebug("No profile action", {
					userId: member.id,
					action: decision.action,
					count: decision.count,
				});
		}
	}

	/** Probation tracker decisions after a violating message was deleted. */
	async applyProbationDecision(
		member: MemberRef,
		decision: ViolationDecision,
	): Promise<void> {
		const { probation, rulesLink } = this.config;

		switch (decision.action) {
			case "warn":
				await this.notify(
					probationWarning(member, probation.windowSeconds, rulesLink),
					{ userId: member.id, action: "probation_warn" },
				);
				return;
			case "restrict":
				await this.restrict(member.id, "probation");
				await this.notify(
					probationRestricted(member, decision.count, rulesLink),
					{ userId: member.id, action: "probation_restrict" },
				);
				return;
			default:
				StructuredLogger.logDebug("No probation action", {
					userId: member.id,
					action: decision.action,
					count: decision.count,
				});
		}
	}

	/** Sweep path: time-based profile escalation. */
	async applyEscalation(decision: ViolationDecision): Promise<void> {
		if (decision.action !== "restrict") return;

		const member = await this.memberRef({
			groupId: decision.record.group_id,
			userId: decision.record.user_id,
		});
		await this.restrict(member.id, decision.record.kind);
		const dmLink = await this.dmLink();
		await this.notify(
			profileRestrictedAfterTime(
				member,
				this.config.profile.escalateAfterSeconds,
				this.config.rulesLink,
				dmLink,
			),
			{ userId: member.id, action: "profile_escalate" },
		);
	}

	/**
	 * Captcha expiry listener. The member stays restricted from join time;
	 * the challenge message is replaced with instructions to contact the bot.
	 */
	readonly onCaptchaExpired = async (record: CaptchaRecord): Promise<void> => {
		const member: MemberRef = {
			id: record.user_id,
			fullName: record.user_full_name ?? `User ${record.user_id}`,
		};
		const text = captchaTimedOut(member, await this.dmLink());

		if (record.chat_id !== null && record.message_id !== null) {
			try {
				await this.gateway.editMessage(record.chat_id, record.message_id, text);
				return;
			} catch (error) {
				StructuredLogger.logError(error, {
					userId: record.user_id,
					operation: "captcha_timeout_edit",
				});
			}
		}
		await this.notify(text, { userId: record.user_id, action: "captcha_timeout" });
	};

	/** Posts to the warning topic of this executor's group. */
	async notify(
		text: MessageText,
		context: { userId: number; action: string },
	): Promise<void> {
		try {
			await this.gateway.sendMessage(this.config.groupId, text, {
				threadId: this.config.warningTopicId,
			});
		} catch (error) {
			StructuredLogger.logError(error, {
				...context,
				operation: "send_notice",
			});
		}
	}

	/** Returns false when the platform call failed. */
	async restrict(userId: number, kind: string): Promise<boolean> {
		try {
			await this.gateway.restrictMember(this.config.groupId, userId);
			StructuredLogger.logSecurityEvent("User restricted", {
				groupId: this.config.groupId,
				userId,
				kind,
				action: "restrict",
			});
			return true;
		} catch (error) {
			StructuredLogger.logError(error, {
				groupId: this.config.groupId,
				userId,
				kind,
				operation: "restrict_member",
			});
			return false;
		}
	}

	async dmLink(): Promise<string> {
		try {
			return `https://t.me/${await this.gateway.getBotUsername()}`;
		} catch (error) {
			StructuredLogger.logError(error, { operation: "bot_username" });
			return "https://t.me";
		}
	}

	private async memberRef(key: ModerationKey): Promise<MemberRef> {
		try {
			const info = await this.gateway.getMember(key.groupId, key.userId);
			if (info) return { id: key.userId, fullName: info.fullName };
		} catch (error) {
			StructuredLogger.logError(error, { ...key, operation: "get_member" });
		}
		return { id: key.userId, fullName: `User ${key.userId}` };
	}
}
