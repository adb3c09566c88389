import path from "path";
import Joi from "joi";
import { ConfigError } from "./errors";

export interface MtprotoConfig {
  apiId: number;
  apiHash: string;
  session: string;
}

export interface AppConfig {
  host: string;
  port: number;
  botToken?: string;
  /** Numeric id of the bot account, taken from the token prefix. */
  botId?: string;
  allowedChatIds: number[];
  mtproto?: MtprotoConfig;
  downloadsDir: string;
  staticDir: string;
  dashboard: {
    username: string;
    password: string;
  };
}

const envSchema = Joi.object({
  HOST: Joi.string().default("0.0.0.0"),
  PORT: Joi.number().port().default(8000),
  TELEGRAM_BOT_TOKEN: Joi.string().trim().empty("").optional(),
  ALLOWED_CHAT_IDS: Joi.string()
    .trim()
    .empty("")
    .pattern(/^-?\d+(\s*,\s*-?\d+)*$/)
    .message("ALLOWED_CHAT_IDS must be a comma-separated list of chat ids")
    .optional(),
  TELEGRAM_API_ID: Joi.number().integer().positive().empty("").optional(),
  TELEGRAM_API_HASH: Joi.string().trim().empty("").optional(),
  TELEGRAM_SESSION: Joi.string().trim().empty("").optional(),
  DOWNLOADS_DIR: Joi.string().default("downloads"),
  STATIC_DIR: Joi.string().default(path.join("server", "static")),
  DASHBOARD_USERNAME: Joi.string().default("admin"),
  DASHBOARD_PASSWORD: Joi.string().default("changeme"),
}).unknown(true);

interface ValidatedEnv {
  HOST: string;
  PORT: number;
  TELEGRAM_BOT_TOKEN?: string;
  ALLOWED_CHAT_IDS?: string;
  TELEGRAM_API_ID?: number;
  TELEGRAM_API_HASH?: string;
  TELEGRAM_SESSION?: string;
  DOWNLOADS_DIR: string;
  STATIC_DIR: string;
  DASHBOARD_USERNAME: string;
  DASHBOARD_PASSWORD: string;
}

export function parseAllowedChatIds(value: string | undefined): number[] {
  if (!value) return [];
  return value.split(",").map((id) => parseInt(id.trim(), 10));
}

/** The part of a bot token before the colon is the bot's user id. */
export function botIdFromToken(token: string): string | undefined {
  const match = /^(\d+):/.exec(token);
  return match ? match[1] : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const { error, value } = envSchema.validate(env, { abortEarly: true });
  if (error) {
    throw new ConfigError(error.message);
  }
  const validated: ValidatedEnv = value;

  const mtproto =
    validated.TELEGRAM_API_ID !== undefined &&
    validated.TELEGRAM_API_HASH &&
    validated.TELEGRAM_SESSION
      ? {
          apiId: validated.TELEGRAM_API_ID,
          apiHash: validated.TELEGRAM_API_HASH,
          session: validated.TELEGRAM_SESSION,
        }
      : undefined;

  return {
    host: validated.HOST,
    port: validated.PORT,
    botToken: validated.TELEGRAM_BOT_TOKEN,
    botId: validated.TELEGRAM_BOT_TOKEN
      ? botIdFromToken(validated.TELEGRAM_BOT_TOKEN)
      : undefined,
    allowedChatIds: parseAllowedChatIds(validated.ALLOWED_CHAT_IDS),
    mtproto,
    downloadsDir: path.resolve(validated.DOWNLOADS_DIR),
    staticDir: path.resolve(validated.STATIC_DIR),
    dashboard: {
      username: validated.DASHBOARD_USERNAME,
      password: validated.DASHBOARD_PASSWORD,
    },
  };
}
