/**
 * Main entry point for the Groupkeeper bot.
 * Loads configuration, opens the database, wires the moderation services of
 * every monitored group and the handlers, recovers captcha deadlines from the
 * previous run, then starts the sweep and polling. Handles graceful shutdown.
 *
 * @module bot
 */

import { Telegraf } from "telegraf";
import { loadConfig, loadEnvFile, validateConfig } from "./config";
import { DatabaseHandle } from "./database";
import { registerAdminHandlers } from "./handlers/admin";
import { registerCaptchaHandlers } from "./handlers/captcha";
import { registerChatMemberHandlers } from "./handlers/chatMember";
import { registerDirectMessageHandlers } from "./handlers/directMessages";
import { registerGroupMessageHandlers } from "./handlers/groupMessages";
import { registerTopicGuardHandlers } from "./handlers/topicGuard";
import { TelegramGateway } from "./services/messagingGateway";
import { createBotServices } from "./services/moderationServices";
import { logger, updateLogLevel } from "./utils/logger";

/**
 * Startup sequence:
 * 1. Loads `.env` and validates configuration
 * 2. Opens the SQLite database and creates tables
 * 3. Builds the services over a Telegram gateway
 * 4. Registers command, callback, topic guard, message and membership handlers
 * 5. Expires or re-arms captchas left pending by the previous process
 * 6. Starts the periodic sweep and launches polling
 *
 * @throws {Error} If configuration validation fails or the bot cannot start
 */
async function main() {
	let db: DatabaseHandle | undefined;
	try {
		loadEnvFile();
		const config = loadConfig();
		validateConfig(config);
		updateLogLevel(config.logLevel);

		db = new DatabaseHandle(config.databasePath);
		const database = db;

		const bot = new Telegraf(config.botToken);
		const services = createBotServices(
			config,
			database,
			new TelegramGateway(bot.telegram),
		);

		// Commands first: they answer without calling next()
		registerAdminHandlers(bot, services);
		registerCaptchaHandlers(bot, services);
		registerTopicGuardHandlers(bot, services);
		registerDirectMessageHandlers(bot, services);
		registerGroupMessageHandlers(bot, services);
		registerChatMemberHandlers(bot, services);

		bot.catch((err, ctx) => {
			logger.error("Bot error", { error: err, updateId: ctx.update.update_id });
		});

		await services.recovery.run();
		services.sweep.start();

		const shutdown = (signal: string) => {
			logger.info(`Received ${signal}, shutting down`);
			services.sweep.stop();
			services.timers.clear();
			bot.stop(signal);
			database.close();
		};
		process.once("SIGINT", () => shutdown("SIGINT"));
		process.once("SIGTERM", () => shutdown("SIGTERM"));

		logger.info("Bot starting", {
			groups: config.groups.map((group) => ({
				groupId: group.groupId,
				captchaEnabled: group.captcha.enabled,
			})),
		});
		await bot.launch({
			allowedUpdates: ["message", "callback_query", "chat_member"],
		});
	} catch (error) {
		logger.error("Failed to start bot", error);
		console.error("Failed to start bot:", error);
		db?.close();
		process.exit(1);
	}
}

main().catch((error) => {
	logger.error("Unhandled startup failure", error);
	process.exit(1);
});
