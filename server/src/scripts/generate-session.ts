/**
 * One-off login for the MTProto user account. Prints the string session to
 * put into TELEGRAM_SESSION; after that no login code is needed again.
 *
 * Usage: npm run build && npm run session
 */
import readline from "readline/promises";
import dotenv from "dotenv";
import Joi from "joi";
import { Api, TelegramClient } from "telegram";
import { StringSession } from "telegram/sessions";
import logger from "../utils/logger";

dotenv.config();

const envSchema = Joi.object({
  TELEGRAM_API_ID: Joi.number().integer().positive().required(),
  TELEGRAM_API_HASH: Joi.string().required(),
  TELEGRAM_PHONE: Joi.string().required(),
}).unknown(true);

async function main(): Promise<void> {
  const { error, value } = envSchema.validate(process.env);
  if (error) {
    logger.error(`Cannot generate a session: ${error.message}`);
    process.exit(1);
  }

  const session = new StringSession("");
  const client = new TelegramClient(
    session,
    value.TELEGRAM_API_ID,
    value.TELEGRAM_API_HASH,
    { connectionRetries: 5 },
  );
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  try {
    logger.info(`Logging in as ${value.TELEGRAM_PHONE}, Telegram will send a code to your app`);
    await client.start({
      phoneNumber: value.TELEGRAM_PHONE,
      phoneCode: () => rl.question("Login code: "),
      password: () => rl.question("2FA password (empty if none): "),
      onError: async (err) => {
        logger.error("Login failed:", err);
        return true;
      },
    });

    const me = await client.getMe();
    logger.info(
      `Authenticated as ${me instanceof Api.User ? me.firstName : "user"}`,
    );
    process.stdout.write(`\nTELEGRAM_SESSION=${session.save()}\n\n`);
  } finally {
    rl.close();
    await client.disconnect();
  }
}

main().catch((error) => {
  logger.error("Session generation failed:", error);
  process.exit(1);
});
