import { promises as fs } from "node:fs";
import { IncomingMessage, ServerResponse } from "node:http";
import path from "node:path";
import { z } from "zod";
import { RagSystem } from "../services/ragSystem.js";
import { InvalidJsonError, readJsonBody } from "./body.js";

const MCP_PATH = "/mcp";
const SESSION_PATH = /^\/api\/session\/([^/]+)$/;

const queryRequestSchema = z.object({
  query: z.string(),
  session_id: z.string().nullish(),
});

const CONTENT_TYPES: Record<string, string> = {
  ".html": "text/html; charset=utf-8",
  ".css": "text/css; charset=utf-8",
  ".js": "text/javascript; charset=utf-8",
  ".json": "application/json; charset=utf-8",
  ".svg": "image/svg+xml",
  ".png": "image/png",
  ".ico": "image/x-icon",
  ".txt": "text/plain; charset=utf-8",
};

const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, POST, DELETE, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type, mcp-session-id, mcp-protocol-version",
  "Access-Control-Expose-Headers": "mcp-session-id",
};

export type RequestHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

export interface HttpApiOptions {
  rag: RagSystem;
  frontendPath: string;
  mcp?: RequestHandler;
}

export function createRequestHandler({ rag, frontendPath, mcp }: HttpApiOptions): RequestHandler {
  const frontendRoot = path.resolve(frontendPath);

  return async (req, res) => {
    for (const [name, value] of Object.entries(CORS_HEADERS)) {
      res.setHeader(name, value);
    }

    try {
      const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
      const method = req.method ?? "GET";

      if (method === "OPTIONS") {
        res.writeHead(204);
        res.end();
        return;
      }

      if (url.pathname === "/healthz") {
        writeJson(res, 200, { ok: true });
        return;
      }

      if (url.pathname === MCP_PATH && mcp) {
        await mcp(req, res);
        return;
      }

      if (url.pathname === "/api/query") {
        if (method !== "POST") {
          writeJson(res, 405, { detail: "Method Not Allowed" });
          return;
        }
        await handleQuery(req, res, rag);
        return;
      }

      if (url.pathname === "/api/courses") {
        if (method !== "GET") {
          writeJson(res, 405, { detail: "Method Not Allowed" });
          return;
        }
        writeJson(res, 200, await rag.getCourseAnalytics());
        return;
      }

      const sessionMatch = SESSION_PATH.exec(url.pathname);
      if (sessionMatch) {
        if (method !== "DELETE") {
          writeJson(res, 405, { detail: "Method Not Allowed" });
          return;
        }
        writeJson(res, 200, { cleared: rag.clearSession(decodeURIComponent(sessionMatch[1])) });
        return;
      }

      if (url.pathname.startsWith("/api/")) {
        writeJson(res, 404, { detail: "Not Found" });
        return;
      }

      if (method === "GET" || method === "HEAD") {
        await serveStatic(res, frontendRoot, url.pathname, method === "HEAD");
        return;
      }

      writeJson(res, 405, { detail: "Method Not Allowed" });
    } catch (error) {
      if (res.headersSent) {
        console.error("[http] request failed after headers were sent:", error);
        res.end();
        return;
      }
      if (error instanceof InvalidJsonError) {
        writeJson(res, 400, { detail: error.message });
        return;
      }
      console.error(`[http] ${req.method ?? "GET"} ${req.url ?? "/"} failed:`, error);
      writeJson(res, 500, {
        detail: error instanceof Error ? error.message : "Internal server error",
      });
    }
  };
}

async function handleQuery(req: IncomingMessage, res: ServerResponse, rag: RagSystem) {
  const parsed = queryRequestSchema.safeParse(await readJsonBody(req));
  if (!parsed.success) {
    writeJson(res, 422, {
      detail: parsed.error.issues.map((issue) => ({
        loc: ["body", ...issue.path],
        msg: issue.message,
      })),
    });
    return;
  }

  const sessionId = parsed.data.session_id || rag.createSession();
  const { answer, sources } = await rag.query(parsed.data.query, sessionId);
  writeJson(res, 200, { answer, sources, session_id: sessionId });
}

async function serveStatic(
  res: ServerResponse,
  root: string,
  pathname: string,
  headOnly: boolean,
) {
  let relative: string;
  try {
    relative = decodeURIComponent(pathname);
  } catch {
    writeJson(res, 400, { detail: "Malformed path" });
    return;
  }
  if (relative.endsWith("/")) {
    relative += "index.html";
  }

  const filePath = path.resolve(root, `.${relative}`);
  if (filePath !== root && !filePath.startsWith(`${root}${path.sep}`)) {
    writeJson(res, 403, { detail: "Forbidden" });
    return;
  }

  let content: Buffer;
  try {
    content = await fs.readFile(filePath);
  } catch (error) {
    if (error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "EISDIR")) {
      res.writeHead(404, { "Content-Type": "text/plain; charset=utf-8" });
      res.end("Not Found");
      return;
    }
    throw error;
  }

  res.writeHead(200, {
    "Content-Type": CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? "application/octet-stream",
    "Content-Length": content.length,
    "Cache-Control": "no-cache, no-store, must-revalidate",
  });
  res.end(headOnly ? undefined : content);
}

function writeJson(res: ServerResponse, status: number, payload: unknown) {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}
