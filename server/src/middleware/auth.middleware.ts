import { Request, Response, NextFunction, RequestHandler } from "express";
import logger from "../utils/logger";
import { readSessionToken } from "../utils/session-cookie";
import { SessionStore } from "../services/session.service";

const PUBLIC_PATHS = new Set(["/login", "/logout", "/health", "/favicon.ico"]);

/** Sends requests without a dashboard session to the login page. */
export function createAuthMiddleware(sessions: SessionStore): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (PUBLIC_PATHS.has(req.path) || req.path.startsWith("/static/")) {
      next();
      return;
    }

    const token = readSessionToken(req.headers.cookie);
    const username = sessions.resolve(token);

    if (!username) {
      logger.debug(`Unauthenticated request to ${req.path}, redirecting to login`);
      res.redirect(302, "/login");
      return;
    }

    res.locals.username = username;
    next();
  };
}
