import { parse } from "cookie";

export const SESSION_COOKIE = "session_token";
export const SESSION_MAX_AGE_MS = 7 * 24 * 60 * 60 * 1000;

export function readSessionToken(cookieHeader: string | undefined): string | undefined {
  if (!cookieHeader) return undefined;
  return parse(cookieHeader)[SESSION_COOKIE];
}
