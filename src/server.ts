import { createServer } from "node:http";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { AppConfig, loadConfig } from "./config/env.js";
import { createRequestHandler } from "./http/httpApi.js";
import { DefaultAiClient } from "./infra/ai/defaultAiClient.js";
import { createVectorStore } from "./infra/store/createVectorStore.js";
import { createMcpServer } from "./mcp/createMcpServer.js";
import { McpHttpEndpoint } from "./mcp/httpSessions.js";
import { RagSystem } from "./services/ragSystem.js";
import { SessionManager } from "./services/sessionManager.js";

async function main() {
  const config = loadConfig();
  const aiClient = new DefaultAiClient(config);
  const { vectorStore, backend } = await createVectorStore(config);
  const shutdownTasks: Array<() => Promise<void>> = [() => vectorStore.close()];

  const rag = new RagSystem(vectorStore, aiClient, new SessionManager(config.maxHistory), {
    chunkSize: config.chunkSize,
    chunkOverlap: config.chunkOverlap,
    maxResults: config.maxResults,
    maxToolRounds: config.maxToolRounds,
  });

  console.error(
    `[startup] store=${backend} embeddings=${config.embeddingProvider} generation=${aiClient.getGenerationProvider()}`,
  );

  const ingested = await rag.addCourseFolder(config.docsPath, {
    clearExisting: config.clearVectorDbOnStartup,
  });
  console.error(
    `[startup] loaded ${ingested.courses_added} new courses (${ingested.chunks_added} chunks), skipped ${ingested.skipped}, failed ${ingested.failed.length}`,
  );

  if (config.transport === "http") {
    shutdownTasks.unshift(await runHttpServer(config, rag));
  } else {
    const transport = new StdioServerTransport();
    const server = createMcpServer(rag);
    await server.connect(transport);
    shutdownTasks.unshift(() => server.close());
  }

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    for (const task of shutdownTasks) {
      await task();
    }
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      console.error("Shutdown failed:", error);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

async function runHttpServer(config: AppConfig, rag: RagSystem): Promise<() => Promise<void>> {
  const mcp = new McpHttpEndpoint(() => createMcpServer(rag));
  const handler = createRequestHandler({
    rag,
    frontendPath: config.frontendPath,
    mcp: (req, res) => mcp.handle(req, res),
  });

  const httpServer = createServer((req, res) => {
    handler(req, res).catch((error: unknown) => {
      console.error("[http] unhandled request error:", error);
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(config.port, config.host, () => resolve());
  });
  console.error(`Course chatbot listening on http://${config.host}:${config.port} (MCP at /mcp)`);

  return async () => {
    await mcp.close();
    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  };
}

main().catch((error) => {
  console.error("Failed to start course chatbot:", error);
  process.exit(1);
});
