import { randomUUID } from "node:crypto";
import { IncomingMessage, ServerResponse } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { readJsonBody } from "../http/body.js";

interface McpSession {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

/**
 * Streamable HTTP endpoint with one MCP server per session. Sessions start
 * with an initialize request and are addressed by the `mcp-session-id` header.
 */
export class McpHttpEndpoint {
  private readonly sessions = new Map<string, McpSession>();

  constructor(private readonly serverFactory: () => McpServer) {}

  async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const sessionId = readSessionId(req);
    const session = sessionId ? this.sessions.get(sessionId) : undefined;

    switch (req.method) {
      case "POST": {
        const body = await readJsonBody(req);
        if (session) {
          await session.transport.handleRequest(req, res, body);
        } else if (sessionId) {
          writeJsonRpcError(res, 404, -32001, "Session not found");
        } else if (!isInitializeRequest(body)) {
          writeJsonRpcError(res, 400, -32000, "Initialize request is required when session is not established");
        } else {
          await this.openSession(req, res, body);
        }
        return;
      }
      case "GET":
      case "DELETE":
        if (!session) {
          res.writeHead(400, { "Content-Type": "text/plain" });
          res.end("Missing or invalid mcp-session-id");
          return;
        }
        await session.transport.handleRequest(req, res);
        return;
      default:
        res.writeHead(405, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ detail: "Method Not Allowed" }));
    }
  }

  async close(): Promise<void> {
    const open = [...this.sessions.values()];
    this.sessions.clear();
    await Promise.all(
      open.map(async ({ server, transport }) => {
        await transport.close();
        await server.close();
      }),
    );
  }

  private async openSession(req: IncomingMessage, res: ServerResponse, body: unknown) {
    const server = this.serverFactory();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (newSessionId) => {
        this.sessions.set(newSessionId, { server, transport });
      },
    });

    transport.onclose = () => {
      const closedId = transport.sessionId;
      const closed = closedId ? this.sessions.get(closedId) : undefined;
      if (!closedId || !closed) {
        return;
      }
      this.sessions.delete(closedId);
      closed.server.close().catch((error: unknown) => {
        console.error(`[mcp] failed to close session ${closedId}:`, error);
      });
    };

    await server.connect(transport);
    await transport.handleRequest(req, res, body);
  }
}

function readSessionId(req: IncomingMessage): string | null {
  const header = req.headers["mcp-session-id"];
  if (Array.isArray(header)) {
    return header[0] ?? null;
  }
  return header || null;
}

function writeJsonRpcError(res: ServerResponse, status: number, code: number, message: string) {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify({ jsonrpc: "2.0", error: { code, message }, id: null }));
}
