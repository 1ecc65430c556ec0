import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { RagSystem } from "../services/ragSystem.js";
import { registerAskCourseQuestionTool } from "../tools/askCourseQuestion.js";
import { registerCourseOutlineTool } from "../tools/courseOutlineTool.js";
import { registerCourseSearchTool } from "../tools/courseSearchTool.js";
import { registerListCoursesTool } from "../tools/listCourses.js";

export const MCP_SERVER_NAME = "course-rag-chatbot";
export const MCP_SERVER_VERSION = "1.0.0";

export function createMcpServer(rag: RagSystem): McpServer {
  const server = new McpServer({
    name: MCP_SERVER_NAME,
    version: MCP_SERVER_VERSION,
  });

  registerCourseSearchTool(server, () => rag.createSearchTool());
  registerCourseOutlineTool(server, rag.createOutlineTool());
  registerListCoursesTool(server, rag);
  registerAskCourseQuestionTool(server, rag);

  return server;
}
