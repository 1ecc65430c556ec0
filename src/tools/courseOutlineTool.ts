import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { CourseRecord } from "../domain/types.js";
import { VectorStore } from "../domain/vectorStore.js";
import { EmbeddingClient, ToolDefinition } from "../infra/ai/types.js";
import { parseToolInput, Tool } from "./types.js";

const outlineInputShape = {
  course_name: z
    .string()
    .trim()
    .min(1)
    .describe("Course title (partial matches work, e.g. 'MCP', 'Introduction')"),
};

const outlineInputSchema = z.object(outlineInputShape);

export class CourseOutlineTool implements Tool {
  readonly definition: ToolDefinition = {
    name: "get_course_outline",
    description:
      "Get the complete outline of a course: title, course link, instructor and the numbered lesson list",
    inputSchema: {
      type: "object",
      properties: {
        course_name: {
          type: "string",
          description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
        },
      },
      required: ["course_name"],
    },
  };

  constructor(
    private readonly vectorStore: VectorStore,
    private readonly embeddings: EmbeddingClient,
  ) {}

  async execute(rawInput: Record<string, unknown>): Promise<string> {
    const { course_name: courseName } = parseToolInput(
      outlineInputSchema,
      this.definition.name,
      rawInput,
    );

    const nameEmbedding = this.embeddings.isEmbeddingConfigured()
      ? await this.embeddings.embedQuery(courseName)
      : null;
    const title = await this.vectorStore.resolveCourseName(courseName, nameEmbedding);
    const course = title ? await this.vectorStore.getCourse(title) : null;
    if (!course) {
      return `No course found matching '${courseName}'`;
    }

    return formatOutline(course);
  }
}

export function formatOutline(course: CourseRecord): string {
  const lines = [`Course Title: ${course.title}`];
  if (course.courseLink) {
    lines.push(`Course Link: ${course.courseLink}`);
  }
  if (course.instructor) {
    lines.push(`Course Instructor: ${course.instructor}`);
  }

  const lessons = [...course.lessons].sort((a, b) => a.lessonNumber - b.lessonNumber);
  lines.push("", `Lessons (${lessons.length} total):`);
  for (const lesson of lessons) {
    lines.push(`Lesson ${lesson.lessonNumber}: ${lesson.title}`);
  }

  return lines.join("\n");
}

export function registerCourseOutlineTool(server: McpServer, tool: CourseOutlineTool) {
  server.registerTool(
    "get_course_outline",
    {
      title: "Get Course Outline",
      description: "Returns a course's title, link, instructor and lesson list.",
      inputSchema: outlineInputShape,
    },
    async (args) => ({
      content: [
        {
          type: "text",
          text: await tool.execute(args),
        },
      ],
    }),
  );
}
