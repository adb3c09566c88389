import crypto from "crypto";
import { v4 as uuidv4 } from "uuid";
import logger from "../utils/logger";

export interface DashboardCredentials {
  username: string;
  password: string;
}

/** In-memory dashboard sessions: token → username. Lost on restart. */
export class SessionStore {
  private sessions: Map<string, string> = new Map();

  constructor(private readonly credentials: DashboardCredentials) {}

  /** Returns a new session token, or undefined for wrong credentials. */
  login(username: string, password: string): string | undefined {
    if (
      !safeEqual(username, this.credentials.username) ||
      !safeEqual(password, this.credentials.password)
    ) {
      logger.warn(`Dashboard login failed for user ${username}`);
      return undefined;
    }

    const token = uuidv4();
    this.sessions.set(token, username);
    logger.info(`Dashboard login: ${username}`);
    return token;
  }

  resolve(token: string | undefined): string | undefined {
    return token ? this.sessions.get(token) : undefined;
  }

  revoke(token: string | undefined): void {
    if (token) {
      this.sessions.delete(token);
    }
  }

  get size(): number {
    return this.sessions.size;
  }
}

function safeEqual(a: string, b: string): boolean {
  const left = crypto.createHash("sha256").update(a).digest();
  const right = crypto.createHash("sha256").update(b).digest();
  return crypto.timingSafeEqual(left, right);
}
