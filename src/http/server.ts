import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { handleRequest } from "@/http/routes";
import { log } from "@/logger";
import type { MemoryService } from "@/memory/service";

const MAX_BODY_BYTES = 1024 * 1024;

type JsonObject = Record<string, unknown>;

class BodyError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
  ) {
    super(code);
  }
}

function sendJson(res: ServerResponse, code: number, payload: JsonObject): void {
  res.statusCode = code;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.end(JSON.stringify(payload));
}

async function readBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new BodyError(413, "payload_too_large");
    chunks.push(buf);
  }
  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) return {};
  try {
    return JSON.parse(raw);
  } catch {
    throw new BodyError(400, "invalid_json");
  }
}

export type ServerOptions = {
  host: string;
  port: number;
};

export function startServer(service: MemoryService, options: ServerOptions, onClose?: () => void): Server {
  const server = createServer(async (req, res) => {
    const method = req.method ?? "GET";
    const url = req.url ?? "/";
    const startedAt = Date.now();

    let body: unknown = {};
    if (method === "POST" || method === "PUT" || method === "PATCH") {
      try {
        body = await readBody(req);
      } catch (error) {
        if (error instanceof BodyError) {
          sendJson(res, error.status, { error: error.code, message: "request body rejected" });
          return;
        }
        log.error({ err: error, url }, "failed to read request body");
        sendJson(res, 500, { error: "internal_error", message: "failed to read request body" });
        return;
      }
    }

    const response = await handleRequest(service, { method, url, headers: req.headers, body });
    sendJson(res, response.status, response.body);
    log.debug({ method, url, status: response.status, ms: Date.now() - startedAt }, "request");
  });

  server.listen(options.port, options.host, () => {
    log.info({ url: `http://${options.host}:${options.port}` }, "memory API listening");
  });

  const shutdown = () => {
    log.info("shutting down memory API");
    server.close(() => {
      onClose?.();
      process.exit(0);
    });
    // Force exit after 3s
    setTimeout(() => process.exit(1), 3000).unref();
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
  return server;
}
