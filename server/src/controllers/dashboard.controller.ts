import path from "path";
import { Request, Response } from "express";

export interface ServiceStatus {
  telegramBot: boolean;
  largeFiles: boolean;
  websocketConnections: number;
}

export function createDashboardController(
  staticDir: string,
  status: () => ServiceStatus,
) {
  async function index(req: Request, res: Response): Promise<void> {
    res.sendFile(path.join(staticDir, "index.html"));
  }

  async function healthCheck(req: Request, res: Response): Promise<void> {
    const current = status();
    res.status(200).json({
      status: "healthy",
      telegram_bot: current.telegramBot,
      large_files: current.largeFiles,
      websocket_connections: current.websocketConnections,
      timestamp: new Date().toISOString(),
    });
  }

  return { index, healthCheck };
}
