/**
 * Configuration module for the Groupkeeper bot.
 * Loads environment variables, and the optional `groups.json` file, into an
 * immutable, validated configuration value that is built once at startup and
 * passed to every service.
 *
 * @module config
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import * as dotenv from "dotenv";
import { ConfigError } from "./utils/errors";
import { logger } from "./utils/logger";

/** Settings of one monitored group. */
export interface GroupConfig {
	/** Telegram supergroup ID (negative) */
	groupId: number;

	/** Forum topic where warnings and restriction notices are posted */
	warningTopicId?: number;

	/** Link to the group rules, included in notices */
	rulesLink: string;

	/** Profile compliance tracker settings */
	profile: {
		/** Enforcement mode: restrict at threshold, or only warn */
		restrictFailedUsers: boolean;
		/** Messages before an incomplete profile is restricted */
		warningThreshold: number;
		/** Seconds after the first warning before the sweep restricts */
		escalateAfterSeconds: number;
	};

	/** Join captcha settings */
	captcha: {
		enabled: boolean;
		timeoutSeconds: number;
	};

	/** New member link/forward probation settings */
	probation: {
		windowSeconds: number;
		violationThreshold: number;
	};
}

/**
 * Configuration interface defining all bot settings.
 *
 * @interface Config
 */
export interface Config {
	/** Telegram bot API token from BotFather */
	botToken: string;

	/** File path to SQLite database */
	databasePath: string;

	/** Logging level (error, warn, info, debug) */
	logLevel: string;

	/** Where the multi-group file is looked for */
	groupsConfigPath: string;

	/**
	 * Monitored groups: every entry of `groups.json` when that file exists,
	 * otherwise the single group described by the environment.
	 */
	groups: GroupConfig[];

	/** Periodic sweep settings */
	sweep: {
		intervalSeconds: number;
		startupDelaySeconds: number;
	};
}

const parseNumber = (value: string | undefined, fallback: number): number => {
	if (value === undefined || value.trim() === "") return fallback;
	return Number(value);
};

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
	if (value === undefined || value.trim() === "") return fallback;
	return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
};

/**
 * Loads the `.env` file (when present) into `process.env`.
 * Values already set in the environment win.
 */
export function loadEnvFile(path = resolve(process.cwd(), ".env")): void {
	dotenv.config({ path });
}

/** The single group described by GROUP_ID and its companion variables. */
function groupFromEnv(env: NodeJS.ProcessEnv): GroupConfig {
	const warningTopic = env.WARNING_TOPIC_ID;

	return {
		groupId: parseNumber(env.GROUP_ID, 0),
		warningTopicId:
			warningTopic && warningTopic.trim() !== ""
				? parseNumber(warningTopic, 0)
				: undefined,
		rulesLink: env.RULES_LINK || "",
		profile: {
			restrictFailedUsers: parseBoolean(env.RESTRICT_FAILED_USERS, false),
			warningThreshold: parseNumber(env.WARNING_THRESHOLD, 3),
			escalateAfterSeconds:
				parseNumber(env.WARNING_TIME_THRESHOLD_MINUTES, 180) * 60,
		},
		captcha: {
			enabled: parseBoolean(env.CAPTCHA_ENABLED, false),
			timeoutSeconds: parseNumber(env.CAPTCHA_TIMEOUT_SECONDS, 120),
		},
		probation: {
			windowSeconds: parseNumber(env.NEW_USER_PROBATION_HOURS, 72) * 3600,
			violationThreshold: parseNumber(env.NEW_USER_VIOLATION_THRESHOLD, 3),
		},
	};
}

type JsonObject = Record<string, unknown>;

const isJsonObject = (value: unknown): value is JsonObject =>
	typeof value === "object" && value !== null && !Array.isArray(value);

function jsonNumber(entry: JsonObject, field: string, fallback: number): number {
	const value = entry[field];
	if (value === undefined) return fallback;
	if (typeof value !== "number") {
		throw new ConfigError(`groups.json: ${field} must be a number`);
	}
	return value;
}

function jsonBoolean(entry: JsonObject, field: string, fallback: boolean): boolean {
	const value = entry[field];
	if (value === undefined) return fallback;
	if (typeof value !== "boolean") {
		throw new ConfigError(`groups.json: ${field} must be true or false`);
	}
	return value;
}

function groupFromJson(entry: unknown): GroupConfig {
	if (!isJsonObject(entry)) {
		throw new ConfigError("groups.json: every group must be an object");
	}
	if (entry.group_id === undefined) {
		throw new ConfigError("groups.json: group_id is required");
	}
	const rulesLink = entry.rules_link ?? "";
	if (typeof rulesLink !== "string") {
		throw new ConfigError("groups.json: rules_link must be a string");
	}
	const warningTopicId =
		entry.warning_topic_id === undefined
			? undefined
			: jsonNumber(entry, "warning_topic_id", 0);

	return {
		groupId: jsonNumber(entry, "group_id", 0),
		warningTopicId,
		rulesLink,
		profile: {
			restrictFailedUsers: jsonBoolean(entry, "restrict_failed_users", false),
			warningThreshold: jsonNumber(entry, "warning_threshold", 3),
			escalateAfterSeconds:
				jsonNumber(entry, "warning_time_threshold_minutes", 180) * 60,
		},
		captcha: {
			enabled: jsonBoolean(entry, "captcha_enabled", false),
			timeoutSeconds: jsonNumber(entry, "captcha_timeout_seconds", 120),
		},
		probation: {
			windowSeconds: jsonNumber(entry, "new_user_probation_hours", 72) * 3600,
			violationThreshold: jsonNumber(entry, "new_user_violation_threshold", 3),
		},
	};
}

/**
 * Parses a `groups.json` file: a non-empty JSON array of group objects with
 * snake_case keys (`group_id`, `warning_topic_id`, `captcha_enabled`, ...).
 * Missing optional keys take the same defaults as the environment.
 *
 * @throws {ConfigError} If the file is not a non-empty array of valid groups
 */
export function loadGroupsFile(path: string): GroupConfig[] {
	let data: unknown;
	try {
		data = JSON.parse(readFileSync(path, "utf8"));
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ConfigError(`groups.json could not be read: ${reason}`);
	}

	if (!Array.isArray(data)) {
		throw new ConfigError(
			"groups.json must contain a JSON array of group objects",
		);
	}
	if (data.length === 0) {
		throw new ConfigError("groups.json must contain at least one group");
	}
	return data.map(groupFromJson);
}

/**
 * Builds the configuration object from an environment map.
 * Falls back to default values where appropriate.
 *
 * @param env - Environment variables (defaults to `process.env`)
 * @returns Frozen configuration, not yet validated
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	const groupsConfigPath = env.GROUPS_CONFIG_PATH || "groups.json";
	const fromFile = existsSync(groupsConfigPath);
	if (fromFile) {
		logger.info("Loading group configuration", { path: groupsConfigPath });
	}

	return deepFreeze({
		botToken: env.BOT_TOKEN || "",
		databasePath: env.DATABASE_PATH || "./data/bot.db",
		logLevel: env.LOG_LEVEL || "info",
		groupsConfigPath,
		groups: fromFile ? loadGroupsFile(groupsConfigPath) : [groupFromEnv(env)],
		sweep: {
			intervalSeconds: parseNumber(env.SWEEP_INTERVAL_SECONDS, 300),
			startupDelaySeconds: parseNumber(env.SWEEP_STARTUP_DELAY_SECONDS, 300),
		},
	});
}

/**
 * Validates that all required configuration values are present and valid.
 * Called once at bot startup, before any service is constructed.
 *
 * @throws {ConfigError} On the first invalid value
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * validateConfig(config);
 * ```
 */
export function validateConfig(config: Config): void {
	if (!config.botToken) {
		throw new ConfigError("BOT_TOKEN is required in environment variables");
	}
	if (config.groups.length === 0) {
		throw new ConfigError("At least one monitored group is required");
	}
	for (const group of config.groups) {
		validateGroup(group);
	}
	const registry = new GroupRegistry(config.groups);

	if (!(config.sweep.intervalSeconds > 0)) {
		throw new ConfigError("SWEEP_INTERVAL_SECONDS must be greater than 0");
	}
	if (!(config.sweep.startupDelaySeconds >= 0)) {
		throw new ConfigError("SWEEP_STARTUP_DELAY_SECONDS must be >= 0");
	}

	logger.debug("Configuration loaded", {
		groups: registry.all().map((group) => group.groupId),
		groupsConfigPath: config.groupsConfigPath,
		sweepIntervalSeconds: config.sweep.intervalSeconds,
	});
}

function validateGroup(group: GroupConfig): void {
	const invalid = (message: string) =>
		new ConfigError(`${message} (group ${group.groupId})`);

	if (!Number.isInteger(group.groupId) || group.groupId >= 0) {
		throw invalid(
			"GROUP_ID must be negative (Telegram supergroup IDs are negative)",
		);
	}
	if (
		group.warningTopicId !== undefined &&
		!Number.isInteger(group.warningTopicId)
	) {
		throw invalid("WARNING_TOPIC_ID must be an integer");
	}
	if (!isPositiveInteger(group.profile.warningThreshold)) {
		throw invalid("WARNING_THRESHOLD must be greater than 0");
	}
	if (!(group.profile.escalateAfterSeconds > 0)) {
		throw invalid("WARNING_TIME_THRESHOLD_MINUTES must be greater than 0");
	}
	const timeout = group.captcha.timeoutSeconds;
	if (!Number.isInteger(timeout) || timeout < 10 || timeout > 600) {
		throw invalid("CAPTCHA_TIMEOUT_SECONDS must be between 10 and 600 seconds");
	}
	if (!(group.probation.windowSeconds >= 0)) {
		throw invalid("NEW_USER_PROBATION_HOURS must be >= 0");
	}
	if (!isPositiveInteger(group.probation.violationThreshold)) {
		throw invalid("NEW_USER_VIOLATION_THRESHOLD must be greater than 0");
	}

	if (!group.rulesLink) {
		logger.warn("RULES_LINK not set - notices will not link to the rules", {
			groupId: group.groupId,
		});
	}
}

/**
 * Monitored groups by ID.
 *
 * @throws {ConfigError} From the constructor when two entries share an ID
 */
export class GroupRegistry {
	private readonly groups = new Map<number, GroupConfig>();

	constructor(groups: readonly GroupConfig[] = []) {
		for (const group of groups) {
			this.register(group);
		}
	}

	register(group: GroupConfig): void {
		if (this.groups.has(group.groupId)) {
			throw new ConfigError(`Duplicate group_id: ${group.groupId}`);
		}
		this.groups.set(group.groupId, group);
	}

	get(groupId: number): GroupConfig | undefined {
		return this.groups.get(groupId);
	}

	all(): GroupConfig[] {
		return [...this.groups.values()];
	}

	isMonitored(groupId: number): boolean {
		return this.groups.has(groupId);
	}
}

function isPositiveInteger(value: number): boolean {
	return Number.isInteger(value) && value > 0;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
	for (const child of Object.values(value)) {
		if (child !== null && typeof child === "object") {
			deepFreeze(child);
		}
	}
	return Object.freeze(value);
}
