/**
 * Wiring of the moderation services: one {@link ModerationServices} per
 * monitored group over a shared database, gateway and timer set, gathered in
 * {@link BotServices}.
 *
 * @module services/moderationServices
 */

import { type Config, type GroupConfig, GroupRegistry } from "../config";
import type { DatabaseHandle } from "../database";
import { CaptchaStore } from "../store/captchaStore";
import { ViolationStore } from "../store/violationStore";
import { CaptchaLifecycle } from "./captchaLifecycle";
import { DeadlineTimers } from "./deadlineTimers";
import { EnforcementExecutor } from "./enforcementExecutor";
import type { MessagingGateway } from "./messagingGateway";
import { PhotoWhitelistService } from "./photoWhitelistService";
import { ProbationTracker } from "./probationTracker";
import { ProfileChecker } from "./profileChecker";
import { RecoveryReconciler } from "./recoveryReconciler";
import { SweepScheduler } from "./sweepScheduler";
import { ViolationTracker } from "./violationTracker";

/** Everything one monitored group needs. */
export interface ModerationServices {
	config: GroupConfig;
	gateway: MessagingGateway;
	timers: DeadlineTimers;
	profile: ViolationTracker;
	probation: ProbationTracker;
	captcha: CaptchaLifecycle;
	whitelist: PhotoWhitelistService;
	checker: ProfileChecker;
	executor: EnforcementExecutor;
}

/** Services shared by every group. */
export interface SharedServices {
	gateway: MessagingGateway;
	timers: DeadlineTimers;
	whitelist: PhotoWhitelistService;
	checker: ProfileChecker;
	violations: ViolationStore;
	captchas: CaptchaStore;
}

export interface BotServices {
	config: Config;
	registry: GroupRegistry;
	gateway: MessagingGateway;
	timers: DeadlineTimers;
	whitelist: PhotoWhitelistService;
	checker: ProfileChecker;
	/** In registry order */
	groups: ModerationServices[];
	/** Undefined for a chat that is not monitored. */
	forGroup(chatId: number): ModerationServices | undefined;
	sweep: SweepScheduler;
	recovery: RecoveryReconciler;
}

/** Builds the trackers and lifecycle of one group over the shared stores. */
export function createModerationServices(
	config: GroupConfig,
	shared: SharedServices,
): ModerationServices {
	const { gateway, timers, whitelist, checker } = shared;
	const executor = new EnforcementExecutor(gateway, config);

	return {
		config,
		gateway,
		timers,
		whitelist,
		checker,
		executor,
		profile: new ViolationTracker(shared.violations, {
			kind: "profile",
			threshold: config.profile.warningThreshold,
			enforce: config.profile.restrictFailedUsers,
			escalateAfterSeconds: config.profile.escalateAfterSeconds,
			groupId: config.groupId,
		}),
		probation: new ProbationTracker(shared.violations, {
			threshold: config.probation.violationThreshold,
			windowSeconds: config.probation.windowSeconds,
			groupId: config.groupId,
		}),
		captcha: new CaptchaLifecycle(shared.captchas, {
			timeoutSeconds: config.captcha.timeoutSeconds,
			timers,
			onExpired: executor.onCaptchaExpired,
			groupId: config.groupId,
		}),
	};
}

/**
 * Builds every service over one database and gateway. Nothing is started:
 * the caller runs recovery, then starts the sweep.
 *
 * @throws {ConfigError} If two groups share an ID
 */
export function createBotServices(
	config: Config,
	db: DatabaseHandle,
	gateway: MessagingGateway,
): BotServices {
	const registry = new GroupRegistry(config.groups);
	const whitelist = new PhotoWhitelistService(db);
	const shared: SharedServices = {
		gateway,
		timers: new DeadlineTimers(),
		whitelist,
		checker: new ProfileChecker(gateway, whitelist),
		violations: new ViolationStore(db),
		captchas: new CaptchaStore(db),
	};

	const byId = new Map<number, ModerationServices>();
	for (const group of registry.all()) {
		byId.set(group.groupId, createModerationServices(group, shared));
	}
	const groups = [...byId.values()];

	return {
		config,
		registry,
		gateway,
		timers: shared.timers,
		whitelist,
		checker: shared.checker,
		groups,
		forGroup: (chatId) => byId.get(chatId),
		sweep: new SweepScheduler(groups, config.sweep),
		recovery: new RecoveryReconciler(groups.map((group) => group.captcha)),
	};
}
