/**
 * Profile completeness: a username plus a public profile photo, where an
 * administrator's whitelist entry stands in for a photo hidden by privacy
 * settings.
 *
 * @module services/profileChecker
 */

import { StoreUnavailableError } from "../utils/errors";
import { logger } from "../utils/logger";
import type { MessagingGateway } from "./messagingGateway";
import type { PhotoWhitelistService } from "./photoWhitelistService";

export const MISSING_PHOTO = "public profile photo";
export const MISSING_USERNAME = "username";

export interface ProfileSubject {
	id: number;
	username?: string;
}

export interface ProfileCheckResult {
	hasProfilePhoto: boolean;
	hasUsername: boolean;
	complete: boolean;
	/** Missing items in display order */
	missing: string[];
}

export class ProfileChecker {
	constructor(
		private readonly gateway: MessagingGateway,
		private readonly whitelist: PhotoWhitelistService,
	) {}

	/**
	 * Checks the user's profile. Whitelisted users skip the photo lookup, so
	 * at most one platform call is made.
	 *
	 * @throws {StoreUnavailableError} If the whitelist cannot be read
	 * @throws Whatever the gateway throws for the photo lookup
	 */
	async check(user: ProfileSubject): Promise<ProfileCheckResult> {
		const hasUsername = Boolean(user.username);

		const whitelisted = this.whitelist.isWhitelisted(user.id);
		if (!whitelisted.ok) {
			throw new StoreUnavailableError(
				whitelisted.message ?? "Photo whitelist unavailable",
			);
		}

		const hasProfilePhoto =
			whitelisted.value || (await this.gateway.countProfilePhotos(user.id)) > 0;

		const missing: string[] = [];
		if (!hasProfilePhoto) missing.push(MISSING_PHOTO);
		if (!hasUsername) missing.push(MISSING_USERNAME);

		logger.debug("Profile checked", {
			userId: user.id,
			hasProfilePhoto,
			hasUsername,
			whitelisted: whitelisted.value,
		});

		return {
			hasProfilePhoto,
			hasUsername,
			complete: missing.length === 0,
			missing,
		};
	}
}
