import type { Message } from "grammy/types";
import logger from "../utils/logger";
import { formatMegabytes } from "../utils/format";
import { notifyBestEffort } from "../utils/notify";
import { sanitizeFilename } from "../utils/sanitizer";
import {
  FileKind,
  MAX_BOT_FILE_SIZE,
  StatusHandle,
} from "../models/download.model";
import { BroadcastHub } from "./broadcast.service";
import { ContextRegistry } from "./context-registry.service";
import { LargeFileSupport } from "./coordinator.service";
import { StorageService } from "./storage.service";

export interface IncomingMedia {
  kind: FileKind;
  fileId: string;
  fileUniqueId: string;
  fileName: string;
  /** Declared size; 0 when the Bot API omitted it. */
  fileSize: number;
}

/** The chat a message came from, as far as the intake handler needs it. */
export interface ChatPort {
  chatId: number;
  username: string;
  reply(text: string): Promise<StatusHandle>;
  /** Downloads a Bot API file (≤ 20 MiB) to `destination`. */
  fetchFile(fileId: string, destination: string): Promise<void>;
}

export type IntakeOutcome =
  | "unauthorized"
  | "unsupported"
  | "deferred"
  | "too_large"
  | "saved";

export interface IntakeOptions {
  allowedChatIds: number[];
  registry: ContextRegistry;
  storage: StorageService;
  hub: BroadcastHub;
  largeFiles?: LargeFileSupport;
}

export const UNAUTHORIZED_REPLY = "Sorry, you are not authorized to use this bot.";

/**
 * Picks the attachment of a message: document, photo (largest variant),
 * video, audio, voice, in that order.
 */
export function classifyMedia(message: Message): IncomingMedia | undefined {
  if (message.document) {
    const doc = message.document;
    return {
      kind: "document",
      fileId: doc.file_id,
      fileUniqueId: doc.file_unique_id,
      fileName: sanitizeFilename(doc.file_name, `document_${doc.file_unique_id}`),
      fileSize: doc.file_size ?? 0,
    };
  }
  if (message.photo && message.photo.length > 0) {
    const photo = message.photo[message.photo.length - 1];
    return {
      kind: "photo",
      fileId: photo.file_id,
      fileUniqueId: photo.file_unique_id,
      fileName: `photo_${photo.file_unique_id}.jpg`,
      fileSize: photo.file_size ?? 0,
    };
  }
  if (message.video) {
    const video = message.video;
    return {
      kind: "video",
      fileId: video.file_id,
      fileUniqueId: video.file_unique_id,
      fileName: sanitizeFilename(video.file_name, `video_${video.file_unique_id}.mp4`),
      fileSize: video.file_size ?? 0,
    };
  }
  if (message.audio) {
    const audio = message.audio;
    return {
      kind: "audio",
      fileId: audio.file_id,
      fileUniqueId: audio.file_unique_id,
      fileName: sanitizeFilename(audio.file_name, `audio_${audio.file_unique_id}.mp3`),
      fileSize: audio.file_size ?? 0,
    };
  }
  if (message.voice) {
    const voice = message.voice;
    return {
      kind: "voice",
      fileId: voice.file_id,
      fileUniqueId: voice.file_unique_id,
      fileName: `voice_${voice.file_unique_id}.ogg`,
      fileSize: voice.file_size ?? 0,
    };
  }
  return undefined;
}

/**
 * Handles every incoming media message once, on the Bot API connection:
 * small files are downloaded directly, large ones are handed to the MTProto
 * coordinator through the context registry.
 */
export class IntakeHandler {
  private allowedChatIds: Set<number>;
  private registry: ContextRegistry;
  private storage: StorageService;
  private hub: BroadcastHub;
  private largeFiles?: LargeFileSupport;

  constructor(options: IntakeOptions) {
    this.allowedChatIds = new Set(options.allowedChatIds);
    this.registry = options.registry;
    this.storage = options.storage;
    this.hub = options.hub;
    this.largeFiles = options.largeFiles;
  }

  isAuthorized(chatId: number): boolean {
    return this.allowedChatIds.size === 0 || this.allowedChatIds.has(chatId);
  }

  async handleMessage(message: Message, chat: ChatPort): Promise<IntakeOutcome> {
    if (!this.isAuthorized(chat.chatId)) {
      logger.warn(`Rejected message from unauthorized chat ${chat.chatId}`);
      await chat.reply(UNAUTHORIZED_REPLY);
      return "unauthorized";
    }

    const media = classifyMedia(message);
    if (!media) {
      await chat.reply("Unsupported file type.");
      return "unsupported";
    }

    if (media.fileSize > MAX_BOT_FILE_SIZE) {
      return this.deferLargeFile(media, chat);
    }

    return this.saveSmallFile(media, chat);
  }

  private async deferLargeFile(
    media: IncomingMedia,
    chat: ChatPort,
  ): Promise<IntakeOutcome> {
    const sizeMb = formatMegabytes(media.fileSize);

    if (!this.largeFiles?.isReady) {
      await chat.reply(
        `⚠️ *File too large* (${sizeMb} MB)\n\n` +
          "Telegram bots can only download files up to 20 MB.\n" +
          "To enable large file support, configure the MTProto credentials in `.env`.",
      );
      return "too_large";
    }

    const statusHandle = await chat.reply(
      `⏳ *Large file detected* (${sizeMb} MB)\n` +
        "Downloading via MTProto… this may take a while.",
    );

    this.registry.put(media.fileUniqueId, {
      username: chat.username,
      fileType: media.kind,
      originalName: media.fileName,
      statusHandle,
    });
    logger.info(
      `Deferred ${media.fileName} (${sizeMb} MB) to MTProto, unique=${media.fileUniqueId}`,
    );
    return "deferred";
  }

  private async saveSmallFile(
    media: IncomingMedia,
    chat: ChatPort,
  ): Promise<IntakeOutcome> {
    const target = await this.storage.resolveSavePath(
      media.fileName,
      media.fileUniqueId,
    );
    const staged = this.storage.stage(target.path);

    try {
      await chat.fetchFile(media.fileId, staged.tempPath);
      await staged.commit();
    } catch (error) {
      await staged.discard();
      throw error;
    }

    const size = await this.storage.sizeOf(target.path);
    logger.info(`File saved: ${target.path}`);

    await this.hub.fileReceived({
      username: chat.username,
      filename: target.name,
      fileType: media.kind,
      fileSize: size,
    });

    // the file is already saved and announced at this point
    await notifyBestEffort("saved confirmation", () =>
      chat.reply(
        `✅ *File saved:* \`${target.name}\`\nYou can download it from the dashboard.`,
      ),
    );
    return "saved";
  }
}
