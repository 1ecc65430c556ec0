import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { RagSystem } from "../services/ragSystem.js";

export function registerAskCourseQuestionTool(server: McpServer, rag: RagSystem) {
  server.registerTool(
    "ask_course_question",
    {
      title: "Ask Course Question",
      description: "Answers a question about the course materials and returns its sources.",
      inputSchema: {
        query: z.string().describe("Question about the course materials"),
        session_id: z
          .string()
          .optional()
          .describe("Session to continue; a new one is created when omitted"),
      },
    },
    async ({ query, session_id }) => {
      const startedAt = Date.now();
      const sessionId = session_id || rag.createSession();
      const result = await rag.query(query, sessionId);

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(
              {
                answer: result.answer,
                sources: result.sources,
                session_id: sessionId,
                latency_ms: Date.now() - startedAt,
              },
              null,
              2,
            ),
          },
        ],
      };
    },
  );
}
