import path from "path";
import { Request, Response } from "express";
import Joi from "joi";
import logger from "../utils/logger";
import {
  SESSION_COOKIE,
  SESSION_MAX_AGE_MS,
  readSessionToken,
} from "../utils/session-cookie";
import { SessionStore } from "../services/session.service";

// Validation schemas
const loginSchema = Joi.object({
  username: Joi.string().max(128).required(),
  password: Joi.string().max(256).required(),
});

export function createAuthController(sessions: SessionStore, staticDir: string) {
  async function loginPage(req: Request, res: Response): Promise<void> {
    res.sendFile(path.join(staticDir, "login.html"));
  }

  async function login(req: Request, res: Response): Promise<void> {
    const { error, value } = loginSchema.validate(req.body || {});
    if (error) {
      logger.warn(`Invalid login form: ${error.message}`);
      res.redirect(302, "/login?error=1");
      return;
    }

    const token = sessions.login(value.username, value.password);
    if (!token) {
      res.redirect(302, "/login?error=1");
      return;
    }

    res.cookie(SESSION_COOKIE, token, {
      httpOnly: true,
      sameSite: "lax",
      maxAge: SESSION_MAX_AGE_MS,
    });
    res.redirect(302, "/");
  }

  async function logout(req: Request, res: Response): Promise<void> {
    sessions.revoke(readSessionToken(req.headers.cookie));
    res.clearCookie(SESSION_COOKIE);
    res.redirect(302, "/login");
  }

  return { loginPage, login, logout };
}
