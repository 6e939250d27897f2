/**
 * User-facing notice templates.
 * All text the bot posts lives here; entity formatting comes from
 * 'telegraf/format', so names and links never need escaping.
 *
 * @module utils/messages
 */

import { bold, code, fmt, type FmtString, link, mention } from "telegraf/format";

/** Who a notice is about. */
export interface MemberRef {
	id: number;
	fullName: string;
}

const who = (member: MemberRef) => mention(member.fullName, member.id);

/**
 * Human-readable duration: whole days from 24 hours up, whole hours from
 * 60 minutes up, otherwise minutes.
 *
 * @example
 * formatDuration(10800); // "3 hours"
 * formatDuration(259200); // "3 days"
 */
export function formatDuration(seconds: number): string {
	const minutes = Math.floor(seconds / 60);
	const hours = Math.floor(minutes / 60);
	const days = Math.floor(hours / 24);

	if (days >= 1) return days === 1 ? "1 day" : `${days} days`;
	if (hours >= 1) return hours === 1 ? "1 hour" : `${hours} hours`;
	return minutes === 1 ? "1 minute" : `${minutes} minutes`;
}

/** "public profile photo and username" */
export const joinMissing = (missing: string[]): string => missing.join(" and ");

export const profileWarning = (
	member: MemberRef,
	missing: string[],
	rulesLink: string,
	limits?: { threshold: number; escalateAfterSeconds: number },
): FmtString => {
	const header = fmt`⚠️ Hi ${who(member)}, please add a ${joinMissing(missing)} to follow the group rules.`;
	if (!limits) {
		return fmt`${header}\n\n📖 ${link("Read the group rules", rulesLink)}`;
	}
	return fmt`${header}
You will be restricted after ${limits.threshold} messages or ${formatDuration(limits.escalateAfterSeconds)}.

📖 ${link("Read the group rules", rulesLink)}`;
};

export const profileRestrictedAfterMessages = (
	member: MemberRef,
	count: number,
	missing: string[],
	rulesLink: string,
	dmLink: string,
): FmtString =>
	fmt`🚫 ${who(member)} has been restricted after ${count} messages.
Please add a ${joinMissing(missing)} to follow the group rules.

📖 ${link("Read the group rules", rulesLink)}
✉️ ${link("Message the bot to lift the restriction", dmLink)}`;

export const profileRestrictedAfterTime = (
	member: MemberRef,
	escalateAfterSeconds: number,
	rulesLink: string,
	dmLink: string,
): FmtString =>
	fmt`🚫 ${who(member)} has been restricted for not completing their profile within ${formatDuration(escalateAfterSeconds)}.

📖 ${link("Read the group rules", rulesLink)}
✉️ ${link("Message the bot to lift the restriction", dmLink)}`;

export const captchaWelcome = (
	member: MemberRef,
	timeoutSeconds: number,
): FmtString =>
	fmt`👋 Welcome ${who(member)}!

To confirm you are not a bot, press the button below within ${timeoutSeconds} seconds.`;

export const CAPTCHA_BUTTON_LABEL = "✅ I am not a bot";

export const captchaVerified = (member: MemberRef): FmtString =>
	fmt`✅ Thanks ${who(member)}, you are verified. Welcome to the group!`;

export const CAPTCHA_WRONG_USER = "❌ This button is not for you.";

export const CAPTCHA_VERIFY_FAILED = "Verification failed. Please try again.";

export const captchaTimedOut = (member: MemberRef, dmLink: string): FmtString =>
	fmt`🚫 ${who(member)} did not complete verification in time.

Please ${link("message the bot", dmLink)} to lift the restriction.`;

export const CAPTCHA_PENDING_DM =
	"⏳ You have a pending verification.\nPlease check the group and press the verification button.";

export const DM_NOT_IN_GROUP =
	"❌ You are not a member of the group.\nPlease join the group first.";

export const dmIncompleteProfile = (
	missing: string[],
	rulesLink: string,
): FmtString =>
	fmt`❌ You do not meet the requirements yet.

Please add a ${joinMissing(missing)}, then message this bot again.

📖 ${link("Read the group rules", rulesLink)}`;

export const DM_NO_RESTRICTION =
	"ℹ️ You have no restriction from this bot.\nIf an administrator restricted you, please contact the group administrators.";

export const DM_ALREADY_UNRESTRICTED =
	"ℹ️ You are no longer restricted in the group.\nWelcome back!";

export const DM_UNRESTRICTION_FAILED =
	"❌ Your restriction could not be lifted right now. Please try again later.";

export const DM_UNRESTRICTION_SUCCESS =
	"✅ You now meet the requirements.\nYour restriction in the group has been lifted. Welcome back!";

export const DM_OTHER_RESTRICTION =
	"ℹ️ Your profile warning has been cleared, but another restriction still applies in the group.\nPlease contact the group administrators.";

export const dmUnrestrictionNotice = (member: MemberRef): FmtString =>
	fmt`✅ ${who(member)} completed their profile and was unrestricted via DM.`;

export const verificationClearance = (member: MemberRef): FmtString =>
	fmt`✅ ${who(member)} has been verified by an administrator.`;

export const probationWarning = (
	member: MemberRef,
	windowSeconds: number,
	rulesLink: string,
): FmtString =>
	fmt`⚠️ ${who(member)} joined recently and is on probation.
For ${formatDuration(windowSeconds)} you may not forward messages or post links.
Messages that break this rule are deleted, and repeating it leads to a restriction.
Contact an administrator if you need help.

📖 ${link("Read the group rules", rulesLink)}`;

export const probationRestricted = (
	member: MemberRef,
	count: number,
	rulesLink: string,
): FmtString =>
	fmt`🚫 ${who(member)} has been restricted for posting forbidden content (forward/link/external quote) ${count} times during probation.

📖 ${link("Read the group rules", rulesLink)}`;

export const ADMIN_PRIVATE_ONLY =
	"❌ This command can only be used in a private chat with the bot.";

export const ADMIN_NOT_ALLOWED =
	"❌ You do not have permission to use this command.";

export const ADMIN_INVALID_USER_ID = "❌ The user ID must be a number.";

export const adminUsage = (command: string): FmtString =>
	fmt`❌ Usage: ${code(`/${command} USER_ID`)}`;

export const adminVerified = (userId: number): FmtString =>
	fmt`✅ User ${code(String(userId))} has been verified:
• Added to the profile photo whitelist
• Restriction lifted (if any)
• Warning history cleared

${bold("Their profile photo will no longer be checked.")}`;

export const adminAlreadyWhitelisted = (userId: number): FmtString =>
	fmt`ℹ️ User ${code(String(userId))} is already whitelisted.`;

export const adminUnverified = (userId: number): FmtString =>
	fmt`✅ User ${code(String(userId))} has been removed from the photo whitelist.`;

export const adminNotWhitelisted = (userId: number): FmtString =>
	fmt`ℹ️ User ${code(String(userId))} is not on the whitelist.`;

export const CHECK_HIDDEN_FORWARD =
	"❌ This user hides their account in forwarded messages.\nUse /check USER_ID instead.";

export const CHECK_USER_NOT_FOUND =
	"❌ That user could not be found. They must be a member of a monitored group or have messaged the bot.";

export const CHECK_NOT_IN_GROUP =
	"❌ The user is not a member of any monitored group.";

const mark = (present: boolean) => (present ? "✅" : "❌");

export const checkReport = (
	member: MemberRef,
	status: { hasProfilePhoto: boolean; hasUsername: boolean; whitelisted: boolean },
): FmtString => {
	const summary =
		status.hasProfilePhoto && status.hasUsername
			? status.whitelisted
				? "✅ Profile complete (photo whitelisted)."
				: "✅ Profile complete."
			: "Choose an action:";
	return fmt`📋 User: ${who(member)} (${code(String(member.id))})

Profile Status:
• Photo: ${mark(status.hasProfilePhoto)}
• Username: ${mark(status.hasUsername)}

${summary}`;
};

export const checkWarningSent = (member: MemberRef): FmtString =>
	fmt`✅ Warning sent to ${who(member)} in the group.`;
