/**
 * Detection of content new members may not post during probation:
 * forwards, external replies, stories and links outside the whitelist.
 *
 * @module utils/linkDetection
 */

import linkWhitelist from "../data/linkWhitelist.json";

/** Entity fields this module reads; structurally matches Telegram's MessageEntity. */
export interface LinkEntity {
	type: string;
	offset: number;
	length: number;
	url?: string;
}

/** The parts of an incoming message inspected for probation violations. */
export interface InspectableMessage {
	message_id: number;
	text?: string;
	caption?: string;
	entities?: LinkEntity[];
	caption_entities?: LinkEntity[];
	forward_origin?: unknown;
	external_reply?: unknown;
	story?: unknown;
}

const TELEGRAM_HOSTS = new Set(["t.me", "telegram.me"]);

const allowedDomains: ReadonlySet<string> = new Set(
	linkWhitelist.domains.map((domain) => domain.toLowerCase()),
);

const allowedTelegramPaths: ReadonlySet<string> = new Set(
	linkWhitelist.telegramPaths.map((path) => path.toLowerCase()),
);

/**
 * URLs in the message, both raw `url` entities and `text_link` targets.
 * Entity offsets are UTF-16 code units, the same unit JavaScript strings use.
 */
export function extractUrls(message: InspectableMessage): string[] {
	const text = message.text ?? message.caption ?? "";
	const entities = [
		...(message.entities ?? []),
		...(message.caption_entities ?? []),
	];

	const urls: string[] = [];
	for (const entity of entities) {
		if (entity.type === "url") {
			urls.push(text.slice(entity.offset, entity.offset + entity.length));
		} else if (entity.type === "text_link" && entity.url) {
			urls.push(entity.url);
		}
	}
	return urls;
}

/**
 * True if the URL's host is a whitelisted domain or a subdomain of one.
 * Telegram links are matched on their first path segment instead, so
 * `t.me/somegroup/12` is allowed only when `somegroup` is listed.
 */
export function isUrlWhitelisted(raw: string): boolean {
	const withScheme = /^https?:\/\//i.test(raw) ? raw : `https://${raw}`;

	let url: URL;
	try {
		url = new URL(withScheme);
	} catch {
		return false;
	}

	const hostname = url.hostname.toLowerCase();

	if (TELEGRAM_HOSTS.has(hostname)) {
		const [first = ""] = url.pathname.split("/").filter(Boolean);
		return allowedTelegramPaths.has(first.toLowerCase());
	}

	let candidate = hostname;
	while (candidate) {
		if (allowedDomains.has(candidate)) return true;
		const dot = candidate.indexOf(".");
		if (dot === -1) return false;
		candidate = candidate.slice(dot + 1);
	}
	return false;
}

export function hasNonWhitelistedLink(message: InspectableMessage): boolean {
	return extractUrls(message).some((url) => !isUrlWhitelisted(url));
}

export const isForwarded = (message: InspectableMessage): boolean =>
	message.forward_origin !== undefined && message.forward_origin !== null;

export const hasExternalReply = (message: InspectableMessage): boolean =>
	message.external_reply !== undefined && message.external_reply !== null;

export const hasStory = (message: InspectableMessage): boolean =>
	message.story !== undefined && message.story !== null;

/** Names of the probation rules the message breaks, empty when none. */
export function probationViolations(message: InspectableMessage): string[] {
	const found: string[] = [];
	if (isForwarded(message)) found.push("forward");
	if (hasNonWhitelistedLink(message)) found.push("link");
	if (hasExternalReply(message)) found.push("external_reply");
	if (hasStory(message)) found.push("story");
	return found;
}
