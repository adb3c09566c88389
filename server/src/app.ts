import express, { Express } from "express";
import cors from "cors";
import { createAuthMiddleware } from "./middleware/auth.middleware";
import { createAuthController } from "./controllers/auth.controller";
import {
  createDashboardController,
  ServiceStatus,
} from "./controllers/dashboard.controller";
import { createDownloadController } from "./controllers/download.controller";
import { SessionStore } from "./services/session.service";
import { StorageService } from "./services/storage.service";

export interface AppDependencies {
  sessions: SessionStore;
  storage: StorageService;
  staticDir: string;
  status: () => ServiceStatus;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  const auth = createAuthController(deps.sessions, deps.staticDir);
  const dashboard = createDashboardController(deps.staticDir, deps.status);
  const downloads = createDownloadController(deps.storage);

  // Middleware
  app.disable("x-powered-by");
  app.use(cors());
  app.use(express.urlencoded({ extended: false }));
  app.use(createAuthMiddleware(deps.sessions));
  app.use("/static", express.static(deps.staticDir));

  // Public routes
  app.get("/health", dashboard.healthCheck);
  app.get("/login", auth.loginPage);
  app.post("/login", auth.login);
  app.get("/logout", auth.logout);

  // Protected routes
  app.get("/", dashboard.index);
  app.get("/downloads", downloads.listDownloads);
  app.get("/downloads/:name", downloads.getDownload);
  app.delete("/downloads/:name", downloads.deleteDownload);
  app.get("/stream/:name", downloads.streamDownload);

  return app;
}
