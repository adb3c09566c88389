import { Api, TelegramClient, errors } from "telegram";
import { StringSession } from "telegram/sessions";
import { NewMessage, NewMessageEvent } from "telegram/events";
import logger from "../utils/logger";
import { RateLimitError } from "../errors";
import { MtprotoConfig } from "../config";
import { FileKind } from "../models/download.model";
import {
  MirroredMedia,
  MirroredMessage,
  ProtocolSession,
} from "../services/coordinator.service";
import { mediaUniqueId } from "./file-unique-id";

function toNumber(value: unknown): number {
  const n = Number(value);
  return Number.isFinite(n) ? n : 0;
}

function largestPhotoSize(photo: Api.Photo): number {
  let largest = 0;
  for (const size of photo.sizes) {
    if (size instanceof Api.PhotoSize) {
      largest = Math.max(largest, size.size);
    } else if (size instanceof Api.PhotoSizeProgressive) {
      largest = Math.max(largest, ...size.sizes);
    }
  }
  return largest;
}

function documentKind(message: Api.Message): FileKind {
  if (message.voice) return "voice";
  if (message.video) return "video";
  if (message.audio) return "audio";
  return "document";
}

/** Describes the attachment of an MTProto message, if it has one we handle. */
export function describeMedia(message: Api.Message): MirroredMedia | undefined {
  const photo = message.photo;
  if (photo instanceof Api.Photo) {
    return {
      kind: "photo",
      uniqueId: mediaUniqueId(BigInt(photo.id.toString())),
      size: largestPhotoSize(photo),
    };
  }

  const document = message.document;
  if (document instanceof Api.Document) {
    const name = message.file?.name;
    return {
      kind: documentKind(message),
      uniqueId: mediaUniqueId(BigInt(document.id.toString())),
      size: toNumber(document.size),
      fileName: typeof name === "string" && name ? name : undefined,
    };
  }

  return undefined;
}

/**
 * GramJS user session. Only outgoing messages in the private chat with the
 * bot are forwarded: those are the user's own copies of files sent to it.
 */
export class MtprotoSession implements ProtocolSession {
  private client: TelegramClient;
  private botId: string;

  constructor(config: MtprotoConfig, botId: string) {
    this.botId = botId;
    this.client = new TelegramClient(
      new StringSession(config.session),
      config.apiId,
      config.apiHash,
      { connectionRetries: 5, autoReconnect: true },
    );
  }

  async connect(
    onOutgoing: (message: MirroredMessage) => Promise<void>,
  ): Promise<string> {
    await this.client.connect();

    const authorized = await this.client.checkAuthorization();
    if (!authorized) {
      await this.client.disconnect();
      throw new Error(
        "MTProto session is not authorized; run `npm run session` to create TELEGRAM_SESSION",
      );
    }

    this.client.addEventHandler(
      (event: NewMessageEvent) => this.dispatch(event, onOutgoing),
      new NewMessage({ outgoing: true }),
    );

    const me = await this.client.getMe();
    const displayName =
      me instanceof Api.User ? me.firstName || "User" : "User";
    const handle = me instanceof Api.User && me.username ? ` (@${me.username})` : "";
    logger.info(`MTProto logged in as: ${displayName}${handle}`);
    return displayName;
  }

  async disconnect(): Promise<void> {
    await this.client.disconnect();
  }

  private async dispatch(
    event: NewMessageEvent,
    onOutgoing: (message: MirroredMessage) => Promise<void>,
  ): Promise<void> {
    const message = event.message;
    if (message.chatId?.toString() !== this.botId) return;

    try {
      await onOutgoing(this.mirror(message));
    } catch (error) {
      logger.error(`Error handling outgoing message ${message.id}:`, error);
    }
  }

  private mirror(message: Api.Message): MirroredMessage {
    const client = this.client;

    return {
      id: message.id,
      media: describeMedia(message),
      async download(destination, onProgress) {
        try {
          await client.downloadMedia(message, {
            outputFile: destination,
            progressCallback: (downloaded: unknown, total?: unknown) => {
              onProgress(toNumber(downloaded), toNumber(total));
            },
          });
        } catch (error) {
          if (error instanceof errors.FloodWaitError) {
            throw new RateLimitError(error.seconds);
          }
          throw error;
        }
      },
      async reply(text) {
        await client.sendMessage(message.peerId, {
          message: text,
          parseMode: "markdown",
        });
      },
    };
  }
}
