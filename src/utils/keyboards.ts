/**
 * Inline keyboard layouts.
 *
 * @module utils/keyboards
 */

import type { InlineKeyboardMarkup } from "telegraf/types";
import {
	MISSING_PHOTO,
	MISSING_USERNAME,
	type ProfileCheckResult,
} from "../services/profileChecker";
import { CAPTCHA_BUTTON_LABEL } from "./messages";

/** Matches callback data produced by {@link captchaKeyboard}. */
export const CAPTCHA_CALLBACK_PATTERN = /^captcha:(\d+)$/;

/**
 * Single-button captcha keyboard; the callback carries the joining user's
 * ID so only that user can resolve it.
 */
export const captchaKeyboard = (userId: number): InlineKeyboardMarkup => ({
	inline_keyboard: [
		[{ text: CAPTCHA_BUTTON_LABEL, callback_data: `captcha:${userId}` }],
	],
});

export const WARN_CALLBACK_PATTERN = /^warn:(\d+):([pu]+)$/;
export const VERIFY_CALLBACK_PATTERN = /^verify:(\d+)$/;
export const UNVERIFY_CALLBACK_PATTERN = /^unverify:(\d+)$/;

/** "p" for a missing photo, "u" for a missing username. */
export function missingCodes(check: ProfileCheckResult): string {
	return `${check.hasProfilePhoto ? "" : "p"}${check.hasUsername ? "" : "u"}`;
}

export function missingFromCodes(codes: string): string[] {
	const missing: string[] = [];
	if (codes.includes("p")) missing.push(MISSING_PHOTO);
	if (codes.includes("u")) missing.push(MISSING_USERNAME);
	return missing;
}

/** Warn and verify buttons for a profile that failed /check. */
export const checkKeyboard = (
	userId: number,
	check: ProfileCheckResult,
): InlineKeyboardMarkup => ({
	inline_keyboard: [
		[
			{
				text: "⚠️ Warn User",
				callback_data: `warn:${userId}:${missingCodes(check)}`,
			},
			{ text: "✅ Verify User", callback_data: `verify:${userId}` },
		],
	],
});

export const unverifyKeyboard = (userId: number): InlineKeyboardMarkup => ({
	inline_keyboard: [
		[{ text: "❌ Unverify User", callback_data: `unverify:${userId}` }],
	],
});
