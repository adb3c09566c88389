import fs from "fs";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import axios from "axios";
import { Api, Bot, BotError, Context } from "grammy";
import logger from "../utils/logger";
import { BroadcastHub } from "../services/broadcast.service";
import {
  ChatPort,
  IntakeHandler,
  UNAUTHORIZED_REPLY,
} from "../services/intake.service";

const WELCOME_MESSAGE =
  "🤖 *Welcome to the file drop bot!*\n\n" +
  "I can receive your files and show the activity on a live dashboard.\n\n" +
  "*Commands:*\n" +
  "/start - Show this message\n" +
  "/help - Show help information\n\n" +
  "*Send Files:*\n" +
  "Send any document, photo, video, audio or voice message to save it on the server.";

const HELP_MESSAGE =
  "📚 *Help*\n\n" +
  "*How to use:*\n" +
  "1. Send any file (document, photo, video, audio, voice) and the bot will save it to the server.\n" +
  "2. You can download files from the dashboard at `/downloads`.\n\n" +
  "*Status Updates:*\n" +
  "You'll receive a confirmation message when your file is saved.";

export function displayName(ctx: Context): string {
  return ctx.from?.username || ctx.from?.first_name || "unknown";
}

/** Bot API side: polling, commands, and the hand-over of media to intake. */
export class TelegramBotService {
  private bot: Bot;
  private running = false;

  constructor(
    private readonly token: string,
    private readonly intake: IntakeHandler,
    private readonly hub: BroadcastHub,
  ) {
    this.bot = new Bot(token);
    this.registerHandlers();
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    try {
      logger.info("Starting Telegram bot polling...");
      await this.bot.init();

      this.bot
        .start({
          drop_pending_updates: true,
          onStart: (me) => {
            logger.info(`Telegram bot @${me.username} is running!`);
          },
        })
        .catch(async (error: unknown) => {
          this.running = false;
          logger.error("Telegram bot polling stopped with an error:", error);
          await this.hub.error(`Telegram bot error: ${errorText(error)}`);
        });

      this.running = true;
      await this.hub.status("bot_started", "Telegram bot is now polling");
    } catch (error) {
      logger.error("Error starting Telegram bot:", error);
      await this.hub.error(`Telegram bot error: ${errorText(error)}`);
    }
  }

  async stop(): Promise<void> {
    if (!this.running) return;

    logger.info("Stopping Telegram bot...");
    this.running = false;
    await this.bot.stop();
    await this.hub.status("bot_stopped", "Telegram bot polling stopped");
  }

  private registerHandlers(): void {
    this.bot.command("start", async (ctx) => {
      if (!this.intake.isAuthorized(ctx.chat.id)) {
        await ctx.reply(UNAUTHORIZED_REPLY);
        return;
      }
      await ctx.reply(WELCOME_MESSAGE, { parse_mode: "Markdown" });
      await this.hub.status(
        "bot_command",
        `User ${displayName(ctx)} started the bot`,
      );
    });

    this.bot.command("help", async (ctx) => {
      if (!this.intake.isAuthorized(ctx.chat.id)) {
        await ctx.reply(UNAUTHORIZED_REPLY);
        return;
      }
      await ctx.reply(HELP_MESSAGE, { parse_mode: "Markdown" });
    });

    this.bot.on(
      [
        "message:document",
        "message:photo",
        "message:video",
        "message:audio",
        "message:voice",
        // answered as unsupported by intake
        "message:sticker",
        "message:video_note",
      ],
      async (ctx) => {
        await this.intake.handleMessage(ctx.message, this.chatPort(ctx, ctx.chat.id));
      },
    );

    this.bot.on("message::bot_command", async (ctx) => {
      await ctx.reply("Unknown command. Use /help to see available commands.");
    });

    this.bot.catch(async (err: BotError) => {
      logger.error(
        `Error while handling update ${err.ctx.update.update_id}:`,
        err.error,
      );
      await this.hub.error(`File handling failed: ${errorText(err.error)}`);
    });
  }

  private chatPort(ctx: Context, chatId: number): ChatPort {
    return {
      chatId,
      username: displayName(ctx),
      reply: async (text) => {
        const sent = await ctx.reply(text, { parse_mode: "Markdown" });
        return {
          edit: async (next) => {
            await ctx.api.editMessageText(sent.chat.id, sent.message_id, next, {
              parse_mode: "Markdown",
            });
          },
        };
      },
      fetchFile: (fileId, destination) =>
        this.fetchFile(ctx.api, fileId, destination),
    };
  }

  private async fetchFile(
    api: Api,
    fileId: string,
    destination: string,
  ): Promise<void> {
    const file = await api.getFile(fileId);
    if (!file.file_path) {
      throw new Error(`Telegram returned no file_path for ${fileId}`);
    }

    const url = `https://api.telegram.org/file/bot${this.token}/${file.file_path}`;
    const response = await axios.get<Readable>(url, { responseType: "stream" });
    await pipeline(response.data, fs.createWriteStream(destination));
  }
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
