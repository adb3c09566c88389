import logger from "../utils/logger";
import {
  DashboardEvent,
  FileKind,
  ProgressEvent,
} from "../models/download.model";

/** One connected dashboard session, as seen by the hub. */
export interface HubMember {
  send(payload: string): Promise<void>;
}

type WithoutTimestamp<T> = T extends DashboardEvent
  ? Omit<T, "timestamp">
  : never;

export class BroadcastHub {
  private members: Set<HubMember> = new Set();

  get size(): number {
    return this.members.size;
  }

  async join(member: HubMember): Promise<void> {
    this.members.add(member);
    logger.info(`WebSocket connected. Total connections: ${this.members.size}`);

    await this.sendTo(member, {
      type: "system",
      message: "Connected to file drop dashboard",
    });
  }

  leave(member: HubMember): void {
    if (this.members.delete(member)) {
      logger.info(
        `WebSocket disconnected. Total connections: ${this.members.size}`,
      );
    }
  }

  /** Sends to one member; a failed send drops that member. */
  async sendTo(
    member: HubMember,
    event: WithoutTimestamp<DashboardEvent>,
  ): Promise<void> {
    try {
      await member.send(JSON.stringify(this.stamp(event)));
    } catch (error) {
      logger.warn("Error sending to dashboard client, dropping it:", error);
      this.leave(member);
    }
  }

  async broadcast(event: WithoutTimestamp<DashboardEvent>): Promise<void> {
    const payload = JSON.stringify(this.stamp(event));
    // members may join or leave while sends are pending
    const snapshot = [...this.members];

    await Promise.all(
      snapshot.map(async (member) => {
        try {
          await member.send(payload);
        } catch (error) {
          logger.warn("Error broadcasting to dashboard client:", error);
          this.leave(member);
        }
      }),
    );
  }

  async status(status: string, details = ""): Promise<void> {
    await this.broadcast({ type: "status", status, details });
  }

  async error(error: string): Promise<void> {
    await this.broadcast({ type: "error", error });
  }

  async fileReceived(file: {
    username: string;
    filename: string;
    fileType: FileKind;
    fileSize: number;
  }): Promise<void> {
    await this.broadcast({
      type: "file_received",
      username: file.username,
      filename: file.filename,
      file_type: file.fileType,
      file_size: file.fileSize,
    });
  }

  async downloadProgress(progress: ProgressEvent): Promise<void> {
    await this.broadcast({
      type: "download_progress",
      filename: progress.filename,
      current_bytes: progress.currentBytes,
      total_bytes: progress.totalBytes,
      pct: progress.percent,
      done: progress.done,
    });
  }

  private stamp(event: WithoutTimestamp<DashboardEvent>) {
    return { ...event, timestamp: new Date().toISOString() };
  }
}
