import logger from "../utils/logger";
import { notifyBestEffort } from "../utils/notify";
import { formatMegabytes, progressBar } from "../utils/format";
import { RateLimitError } from "../errors";
import {
  DownloadContext,
  FileKind,
  MAX_BOT_FILE_SIZE,
  ProgressEvent,
} from "../models/download.model";
import { BroadcastHub } from "./broadcast.service";
import { ClaimOptions, ContextRegistry } from "./context-registry.service";
import { ProgressReporter } from "./progress.service";
import { StorageService } from "./storage.service";

export interface MirroredMedia {
  kind: FileKind;
  /** Bot API compatible file_unique_id of the attachment. */
  uniqueId: string;
  /** Declared size in bytes; 0 when the platform did not report one. */
  size: number;
  fileName?: string;
}

/** The user account's own copy of a message it sent to the bot. */
export interface MirroredMessage {
  id: number;
  media?: MirroredMedia;
  download(
    destination: string,
    onProgress: (current: number, total: number) => void,
  ): Promise<void>;
  /** Sends a message into the same chat from the user account. */
  reply(text: string): Promise<void>;
}

/** The size-unlimited protocol connection the coordinator drives. */
export interface ProtocolSession {
  /**
   * Connects and starts delivering outgoing messages sent to the bot.
   * Resolves with the account's display name.
   */
  connect(
    onOutgoing: (message: MirroredMessage) => Promise<void>,
  ): Promise<string>;
  disconnect(): Promise<void>;
}

/** What the Bot API side needs to know about large-file support. */
export interface LargeFileSupport {
  readonly isReady: boolean;
}

export interface CoordinatorOptions {
  session: ProtocolSession;
  registry: ContextRegistry;
  storage: StorageService;
  hub: BroadcastHub;
  claim?: ClaimOptions;
  wait?: (ms: number) => Promise<void>;
}

const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Downloads files above the Bot API ceiling through the user account's
 * MTProto session. It only ever sees the account's outgoing copy of the
 * message, so attribution comes from the context the Bot API handler
 * registers under the same file_unique_id.
 */
export class LargeFileCoordinator implements LargeFileSupport {
  private session: ProtocolSession;
  private registry: ContextRegistry;
  private storage: StorageService;
  private hub: BroadcastHub;
  private claimOptions: ClaimOptions;
  private wait: (ms: number) => Promise<void>;
  private started = false;
  private selfName = "User";

  constructor(options: CoordinatorOptions) {
    this.session = options.session;
    this.registry = options.registry;
    this.storage = options.storage;
    this.hub = options.hub;
    this.claimOptions = options.claim ?? { attempts: 5, intervalMs: 500 };
    this.wait = options.wait ?? sleep;
  }

  get isReady(): boolean {
    return this.started;
  }

  async start(): Promise<void> {
    const name = await this.session.connect((message) =>
      this.handleOutgoing(message),
    );
    this.selfName = name || "User";
    this.started = true;
    logger.info(`MTProto session ready as ${this.selfName}`);
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    await this.session.disconnect();
    logger.info("MTProto session stopped");
  }

  /** Never throws: one failed transfer must not affect the next message. */
  async handleOutgoing(message: MirroredMessage): Promise<void> {
    const media = message.media;
    if (!media) {
      logger.debug(`Outgoing non-media message ${message.id}, skipping`);
      return;
    }

    logger.info(
      `Outgoing media msg=${message.id} unique=${media.uniqueId} size=${formatMegabytes(media.size)} MB`,
    );

    if (media.size > 0 && media.size <= MAX_BOT_FILE_SIZE) {
      logger.info(`File is small (${media.size} B), leaving it to the Bot API`);
      return;
    }

    const context = await this.registry.claim(media.uniqueId, this.claimOptions);
    logger.info(`Context found=${context !== undefined} for ${media.uniqueId}`);

    const username = context?.username ?? this.selfName;
    const fileType = context?.fileType ?? "document";
    const requestedName =
      context?.originalName || media.fileName || `file_${message.id}`;

    let filename = requestedName;
    try {
      const target = await this.storage.resolveSavePath(
        requestedName,
        message.id,
      );
      filename = target.name;
      await this.transfer(message, target.path, filename, username, fileType, context);
    } catch (error) {
      await this.reportFailure(filename, context, error);
    }
  }

  private async transfer(
    message: MirroredMessage,
    savePath: string,
    filename: string,
    username: string,
    fileType: FileKind,
    context: DownloadContext | undefined,
  ): Promise<void> {
    const reporter = new ProgressReporter(filename);
    const staged = this.storage.stage(savePath);
    // progress callbacks are synchronous; deliveries are chained to keep order
    let deliveries: Promise<void> = Promise.resolve();

    logger.info(`Downloading via MTProto → ${savePath}`);

    try {
      await message.download(staged.tempPath, (current, total) => {
        const event = reporter.report(current, total);
        if (!event) return;
        logger.info(
          `Progress ${event.percent}%: ${filename} (${formatMegabytes(current)}/${formatMegabytes(total)} MB)`,
        );
        deliveries = deliveries.then(() =>
          this.deliverProgress(event, context, true),
        );
      });
      await deliveries;
      await staged.commit();
    } catch (error) {
      await deliveries;
      await staged.discard();
      throw error;
    }

    if (!(await this.storage.exists(savePath))) {
      throw new Error(`Downloaded file missing: ${savePath}`);
    }

    const size = await this.storage.sizeOf(savePath);
    logger.info(`MTProto download complete: ${savePath} (${formatMegabytes(size)} MB)`);

    await this.deliverProgress(reporter.complete(size), context, false);
    await notifyBestEffort("file_received", () =>
      this.hub.fileReceived({ username, filename, fileType, fileSize: size }),
    );

    const handle = context?.statusHandle;
    if (handle) {
      await notifyBestEffort("status completion", () =>
        handle.edit(
          `✅ *Downloaded:* \`${filename}\`\nSize: ${formatMegabytes(size)} MB`,
        ),
      );
    } else {
      await notifyBestEffort("chat completion", () =>
        message.reply(
          `✅ Downloaded: \`${filename}\` (${formatMegabytes(size)} MB)`,
        ),
      );
    }
  }

  private async deliverProgress(
    event: ProgressEvent,
    context: DownloadContext | undefined,
    editStatus: boolean,
  ): Promise<void> {
    const handle = context?.statusHandle;
    if (editStatus && handle) {
      await notifyBestEffort("status progress", () =>
        handle.edit(
          `⏳ Downloading: [${progressBar(event.percent)}] ${event.percent}%\n\`${event.filename}\``,
        ),
      );
    }
    await notifyBestEffort("download_progress", () =>
      this.hub.downloadProgress(event),
    );
  }

  private async reportFailure(
    filename: string,
    context: DownloadContext | undefined,
    error: unknown,
  ): Promise<void> {
    const handle = context?.statusHandle;

    if (error instanceof RateLimitError) {
      logger.warn(`MTProto FloodWait: sleeping ${error.seconds}s`);
      await this.wait(error.seconds * 1000);
      if (handle) {
        await notifyBestEffort("status rate limit", () =>
          handle.edit("⚠️ Rate limited — please retry."),
        );
      }
      return;
    }

    logger.error(`MTProto download error for ${filename}:`, error);

    const reporter = new ProgressReporter(filename);
    await notifyBestEffort("download_progress", () =>
      this.hub.downloadProgress(reporter.aborted()),
    );
    await notifyBestEffort("error", () =>
      this.hub.error(`Download failed: ${filename}`),
    );
    if (handle) {
      await notifyBestEffort("status failure", () =>
        handle.edit("❌ Download failed. Check server logs."),
      );
    }
  }
}
