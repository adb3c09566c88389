import http from "http";
import dotenv from "dotenv";
import { createApp } from "./app";
import { AppConfig, loadConfig } from "./config";
import { attachRealtime } from "./realtime/ws.server";
import { BroadcastHub } from "./services/broadcast.service";
import { ContextRegistry } from "./services/context-registry.service";
import { LargeFileCoordinator } from "./services/coordinator.service";
import { IntakeHandler } from "./services/intake.service";
import { SessionStore } from "./services/session.service";
import { StorageService } from "./services/storage.service";
import { TelegramBotService } from "./telegram/bot.service";
import { MtprotoSession } from "./telegram/mtproto.session";
import logger from "./utils/logger";

// Load environment variables
dotenv.config();

async function startLargeFileSupport(
  config: AppConfig,
  deps: {
    registry: ContextRegistry;
    storage: StorageService;
    hub: BroadcastHub;
  },
): Promise<LargeFileCoordinator | undefined> {
  if (!config.mtproto) {
    logger.info(
      "TELEGRAM_API_ID / TELEGRAM_API_HASH / TELEGRAM_SESSION not set, running in Bot-API-only mode (20 MB limit applies)",
    );
    return undefined;
  }
  if (!config.botId) {
    logger.error("Could not extract the bot id from TELEGRAM_BOT_TOKEN");
    return undefined;
  }

  const coordinator = new LargeFileCoordinator({
    session: new MtprotoSession(config.mtproto, config.botId),
    ...deps,
  });

  try {
    await coordinator.start();
    logger.info("MTProto client started, large file downloads enabled");
    return coordinator;
  } catch (error) {
    logger.error("Failed to start MTProto client:", error);
    return undefined;
  }
}

async function startServer() {
  let config: AppConfig;
  try {
    config = loadConfig(process.env);
  } catch (error) {
    logger.error("Invalid configuration:", error);
    process.exit(1);
  }

  // Initialize services
  logger.info("Starting application...");

  const registry = new ContextRegistry();
  const storage = new StorageService(config.downloadsDir);
  const hub = new BroadcastHub();
  const sessions = new SessionStore(config.dashboard);

  await storage.ensureRoot();

  const coordinator = await startLargeFileSupport(config, {
    registry,
    storage,
    hub,
  });

  let bot: TelegramBotService | undefined;
  if (!config.botToken) {
    logger.error("TELEGRAM_BOT_TOKEN not set! Please configure the .env file.");
  } else {
    if (config.allowedChatIds.length > 0) {
      logger.info(`Allowed chat IDs: ${config.allowedChatIds.join(", ")}`);
    }
    const intake = new IntakeHandler({
      allowedChatIds: config.allowedChatIds,
      registry,
      storage,
      hub,
      largeFiles: coordinator,
    });
    bot = new TelegramBotService(config.botToken, intake, hub);
    await bot.start();
  }

  const app = createApp({
    sessions,
    storage,
    staticDir: config.staticDir,
    status: () => ({
      telegramBot: bot?.isRunning ?? false,
      largeFiles: coordinator?.isReady ?? false,
      websocketConnections: hub.size,
    }),
  });
  const server = http.createServer(app);
  const wss = attachRealtime(server, hub, sessions);

  // Start HTTP server
  server.listen(config.port, config.host, () => {
    logger.info(`Dashboard available at http://${config.host}:${config.port}`);
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`);
    try {
      await bot?.stop();
      await coordinator?.stop();
      registry.clear();
      wss.clients.forEach((client) => client.terminate());
      wss.close();
      server.close();
    } catch (error) {
      logger.error("Error during shutdown:", error);
    }
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

startServer().catch((error) => {
  logger.error("Failed to start server:", error);
  process.exit(1);
});
