import { Server } from "http";
import { WebSocket, WebSocketServer } from "ws";
import logger from "../utils/logger";
import { readSessionToken } from "../utils/session-cookie";
import { BroadcastHub, HubMember } from "../services/broadcast.service";
import { SessionStore } from "../services/session.service";

function asMember(ws: WebSocket): HubMember {
  return {
    send: (payload) =>
      new Promise((resolve, reject) => {
        if (ws.readyState !== WebSocket.OPEN) {
          reject(new Error("WebSocket is not open"));
          return;
        }
        ws.send(payload, (error) => (error ? reject(error) : resolve()));
      }),
  };
}

/**
 * Dashboard push channel on `/ws`. Only logged-in dashboard sessions may
 * connect; a text message is answered with a pong.
 */
export function attachRealtime(
  server: Server,
  hub: BroadcastHub,
  sessions: SessionStore,
): WebSocketServer {
  const wss = new WebSocketServer({
    server,
    path: "/ws",
    verifyClient: (info, callback) => {
      const token = readSessionToken(info.req.headers.cookie);
      if (!sessions.resolve(token)) {
        logger.warn("Rejected WebSocket connection without a valid session");
        callback(false, 403, "Unauthorized");
        return;
      }
      callback(true);
    },
  });

  wss.on("connection", (ws) => {
    const member = asMember(ws);

    ws.on("message", (data) => {
      logger.info(`Received from dashboard client: ${data.toString()}`);
      hub
        .sendTo(member, {
          type: "pong",
          message: "Server received your message",
        })
        .catch((error: unknown) =>
          logger.error("Error answering dashboard client:", error),
        );
    });

    ws.on("close", () => hub.leave(member));
    ws.on("error", (error) => {
      logger.error("WebSocket error:", error);
      hub.leave(member);
    });

    hub
      .join(member)
      .catch((error: unknown) =>
        logger.error("Error welcoming dashboard client:", error),
      );
  });

  return wss;
}
