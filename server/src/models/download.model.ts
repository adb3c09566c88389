export type FileKind = "document" | "photo" | "video" | "audio" | "voice";

/** Hard download ceiling of the Bot API. */
export const MAX_BOT_FILE_SIZE = 20 * 1024 * 1024;

/** An editable message in the bot chat used to report progress. */
export interface StatusHandle {
  edit(text: string): Promise<void>;
}

/**
 * Attribution handed from the Bot API side to the MTProto side for one
 * pending large-file transfer, keyed by the attachment's file_unique_id.
 */
export interface DownloadContext {
  username: string;
  fileType: FileKind;
  originalName: string;
  statusHandle?: StatusHandle;
}

export interface ProgressEvent {
  filename: string;
  currentBytes: number;
  totalBytes: number;
  percent: number;
  done: boolean;
}

export interface FileRecord {
  name: string;
  size: number;
  modified: string;
}

export interface SystemEvent {
  type: "system";
  message: string;
  timestamp: string;
}

export interface StatusEvent {
  type: "status";
  status: string;
  details: string;
  timestamp: string;
}

export interface ErrorEvent {
  type: "error";
  error: string;
  timestamp: string;
}

export interface FileReceivedEvent {
  type: "file_received";
  username: string;
  filename: string;
  file_type: FileKind;
  file_size: number;
  timestamp: string;
}

export interface DownloadProgressEvent {
  type: "download_progress";
  filename: string;
  current_bytes: number;
  total_bytes: number;
  pct: number;
  done: boolean;
  timestamp: string;
}

export interface PongEvent {
  type: "pong";
  message: string;
  timestamp: string;
}

export type DashboardEvent =
  | SystemEvent
  | StatusEvent
  | ErrorEvent
  | FileReceivedEvent
  | DownloadProgressEvent
  | PongEvent;
