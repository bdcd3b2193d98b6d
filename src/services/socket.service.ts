import { Server as HttpServer, IncomingMessage } from "http";
import { Duplex } from "stream";
import { WebSocketServer, WebSocket } from "ws";
import { ConnectionRegistry } from "./connection-registry";

export interface RealtimeOptions {
  /** Sockets that miss one ping/pong round within this interval are terminated. */
  heartbeatInterval: number;
}

export interface RealtimeGateway {
  wss: WebSocketServer;
  close: () => Promise<void>;
}

/** Extracts the user id from `/ws/{userId}`; null for any other path. */
export const parseUserId = (url: string | undefined): string | null => {
  if (!url) return null;
  const pathname = url.split("?")[0].split("#")[0];
  const match = /^\/ws\/([^/]+)\/?$/.exec(pathname);
  if (!match) return null;
  try {
    const userId = decodeURIComponent(match[1]).trim();
    return userId || null;
  } catch {
    return null;
  }
};

const refuse = (socket: Duplex, status: string) => {
  socket.once("finish", () => socket.destroy());
  socket.end(`HTTP/1.1 ${status}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
};

export const attachRealtime = (
  server: HttpServer,
  registry: ConnectionRegistry,
  options: RealtimeOptions
): RealtimeGateway => {
  const wss = new WebSocketServer({ noServer: true });
  const alive = new WeakSet<WebSocket>();

  const onConnection = (ws: WebSocket, userId: string) => {
    registry.register(userId, ws);
    alive.add(ws);
    console.log(`WebSocket connected for user ${userId} (${registry.connectionCount(userId)} open)`);

    ws.on("pong", () => alive.add(ws));

    ws.on("message", (data) => {
      if (data.toString().trim() === "ping") {
        ws.send(JSON.stringify({ type: "pong" }));
      }
    });

    ws.on("close", () => {
      registry.unregister(userId, ws);
      console.log(`WebSocket disconnected for user ${userId}`);
    });

    ws.on("error", (error: Error) => {
      console.error(`WebSocket error for user ${userId}:`, error.message);
      registry.unregister(userId, ws);
    });

    ws.send(JSON.stringify({ type: "connected", userId }));
  };

  const onUpgrade = (request: IncomingMessage, socket: Duplex, head: Buffer) => {
    const userId = parseUserId(request.url);
    if (!userId) {
      refuse(socket, "404 Not Found");
      return;
    }
    wss.handleUpgrade(request, socket, head, (ws) => onConnection(ws, userId));
  };

  server.on("upgrade", onUpgrade);

  const heartbeat = setInterval(() => {
    for (const ws of wss.clients) {
      if (!alive.has(ws)) {
        ws.terminate();
        continue;
      }
      alive.delete(ws);
      ws.ping();
    }
  }, options.heartbeatInterval);
  heartbeat.unref();

  wss.on("error", (error: Error) => {
    console.error("WebSocketServer error:", error.message);
  });

  let closing: Promise<void> | null = null;

  /** Safe to call more than once; later calls share the first shutdown. */
  const close = () => {
    if (closing) return closing;
    closing = new Promise<void>((resolve, reject) => {
      clearInterval(heartbeat);
      server.off("upgrade", onUpgrade);
      registry.closeAll(1001, "Server shutting down");
      // Sockets that never made it into the registry have no close handshake under way.
      for (const ws of wss.clients) {
        if (ws.readyState === WebSocket.OPEN) ws.terminate();
      }
      wss.close((err) => (err ? reject(err) : resolve()));
    });
    return closing;
  };

  return { wss, close };
};
