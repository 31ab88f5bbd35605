/**
 * createServer, createRequestHandler, createWebSocketServer, createWebSocketHandler.
 */

import * as http from "node:http";
import { randomUUID } from "node:crypto";
import type { Duplex } from "node:stream";
import { WebSocketServer, type WebSocket } from "ws";
import { z } from "zod";
import { DEFAULT_HISTORY_LIMIT, type ChatService } from "./chat-service.js";
import { Connection } from "./connection.js";
import { componentLogger, type Logger } from "./logger.js";
import type { UserInfo } from "./protocol.js";
import { RoomManager } from "./room-manager.js";

const DEFAULT_PATH = "/live";
const DEFAULT_PORT = 3000;
const MAX_BODY_BYTES = 64 * 1024;
const MAX_PAGE_SIZE = 500;

export interface HttpHandlerOptions {
  chat: ChatService;
  logger?: Logger;
  /** Page size of GET /rooms/:id/messages without ?limit (default 50). */
  historyLimit?: number;
}

export interface WebSocketServerOptions extends HttpHandlerOptions {
  /** WebSocket upgrade path (default: "/live"). */
  path?: string;
  /**
   * Resolves the connecting user; null rejects with close code 4401.
   * Default: the `user` query parameter.
   */
  onAuth?: (request: http.IncomingMessage) => Promise<UserInfo | null>;
}

export interface ServerOptions extends WebSocketServerOptions {
  /** Port for standalone server (default: 3000). */
  port?: number;
}

export type ChatHttpServer = http.Server & { ws: WebSocketServer };

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

const createRoomBody = z.object({ name: z.string().trim().min(1).max(255) });
const limitParam = z.coerce.number().int().min(1).max(MAX_PAGE_SIZE);

function requestUrl(request: http.IncomingMessage): URL {
  return new URL(request.url ?? "/", "http://localhost");
}

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (err) {
    if (err instanceof URIError) throw new HttpError(400, "Malformed room id");
    throw err;
  }
}

async function userFromQuery(request: http.IncomingMessage): Promise<UserInfo | null> {
  const user = requestUrl(request).searchParams.get("user");
  return user ? { userId: user } : null;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new HttpError(413, "Request body too large");
    chunks.push(buf);
  }
  if (size === 0) return {};
  try {
    return JSON.parse(Buffer.concat(chunks).toString("utf8"));
  } catch {
    throw new HttpError(400, "Invalid JSON");
  }
}

/**
 * HTTP routes for rooms and their history:
 *   GET  /rooms
 *   POST /rooms               { name }
 *   GET  /rooms/:id/messages  ?limit=
 */
export function createRequestHandler(
  options: HttpHandlerOptions
): (req: http.IncomingMessage, res: http.ServerResponse) => void {
  const { chat } = options;
  const logger = componentLogger("http", options.logger);
  const historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;

  const route = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const url = requestUrl(req);
    const method = req.method ?? "GET";

    if (url.pathname === "/rooms") {
      if (method === "GET") {
        sendJson(res, 200, await chat.listRooms());
        return;
      }
      if (method === "POST") {
        const body = createRoomBody.safeParse(await readJsonBody(req));
        if (!body.success) throw new HttpError(400, "Room name is required");
        const room = await chat.createRoom(body.data.name);
        sendJson(res, 201, { id: room.id, name: room.name });
        return;
      }
      throw new HttpError(405, "Method not allowed");
    }

    const messagesMatch = /^\/rooms\/([^/]+)\/messages$/.exec(url.pathname);
    if (messagesMatch?.[1] !== undefined) {
      if (method !== "GET") throw new HttpError(405, "Method not allowed");
      const roomId = decodePathSegment(messagesMatch[1]);
      const rawLimit = url.searchParams.get("limit");
      let limit = historyLimit;
      if (rawLimit !== null) {
        const parsed = limitParam.safeParse(rawLimit);
        if (!parsed.success) throw new HttpError(400, `limit must be an integer between 1 and ${MAX_PAGE_SIZE}`);
        limit = parsed.data;
      }
      if (!(await chat.hasRoom(roomId))) throw new HttpError(404, "Room not found");
      sendJson(res, 200, await chat.recentMessages(roomId, limit));
      return;
    }

    throw new HttpError(404, "Not found");
  };

  return (req, res) => {
    route(req, res).catch((err: unknown) => {
      if (err instanceof HttpError) {
        sendJson(res, err.status, { error: err.message });
        return;
      }
      logger.error({ err, method: req.method, url: req.url }, "request failed");
      if (res.headersSent) {
        res.end();
        return;
      }
      sendJson(res, 500, { error: "Internal server error" });
    });
  };
}

function handleUpgrade(
  wss: WebSocketServer,
  options: WebSocketServerOptions,
  roomManager: RoomManager,
  logger: Logger,
  request: http.IncomingMessage,
  socket: Duplex,
  head: Buffer
): void {
  const onAuth = options.onAuth ?? userFromQuery;

  wss.handleUpgrade(request, socket, head, (ws: WebSocket) => {
    wss.emit("connection", ws, request);
    onAuth(request)
      .then((user) => {
        if (user === null) {
          ws.close(4401, "Unauthorized");
          return;
        }
        new Connection(ws, {
          connectionId: randomUUID(),
          userId: user.userId,
          roomManager,
          logger,
        });
      })
      .catch((err: unknown) => {
        logger.error({ err }, "auth failed");
        ws.close(4500, "Auth error");
      });
  });
}

function createRoomManager(options: WebSocketServerOptions, logger: Logger): RoomManager {
  return new RoomManager({
    chat: options.chat,
    historyLimit: options.historyLimit ?? DEFAULT_HISTORY_LIMIT,
    logger,
  });
}

/**
 * Returns the raw upgrade handler. Attach to your HTTP server with
 * server.on('upgrade', handler).
 */
export function createWebSocketHandler(
  options: WebSocketServerOptions
): (request: http.IncomingMessage, socket: Duplex, head: Buffer) => void {
  const logger = componentLogger("ws", options.logger);
  const roomManager = createRoomManager(options, logger);
  const wss = new WebSocketServer({ noServer: true });
  const path = options.path ?? DEFAULT_PATH;

  return (request, socket, head) => {
    if (requestUrl(request).pathname !== path) return;
    handleUpgrade(wss, options, roomManager, logger, request, socket, head);
  };
}

/**
 * Attaches WebSocket upgrade handling to an existing Node HTTP server.
 * Returns the WebSocketServer instance (e.g. for closing later).
 */
export function createWebSocketServer(server: http.Server, options: WebSocketServerOptions): WebSocketServer {
  const logger = componentLogger("ws", options.logger);
  const roomManager = createRoomManager(options, logger);
  const wss = new WebSocketServer({ noServer: true });
  const path = options.path ?? DEFAULT_PATH;

  server.on("upgrade", (request: http.IncomingMessage, socket: Duplex, head: Buffer) => {
    if (requestUrl(request).pathname !== path) return;
    handleUpgrade(wss, options, roomManager, logger, request, socket, head);
  });

  return wss;
}

/**
 * Creates an HTTP server with the room routes and WebSocket support, and
 * starts listening. Returns the server with its WebSocketServer as server.ws.
 */
export function createServer(options: ServerOptions): ChatHttpServer {
  const port = options.port ?? DEFAULT_PORT;
  const server = http.createServer(createRequestHandler(options));
  const wss = createWebSocketServer(server, options);
  server.listen(port);
  return Object.assign(server, { ws: wss });
}

/** Close every socket, then the HTTP server. */
export async function closeServer(server: ChatHttpServer): Promise<void> {
  for (const client of server.ws.clients) client.terminate();
  await new Promise<void>((resolve, reject) => {
    server.ws.close((err) => (err ? reject(err) : resolve()));
  });
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
