import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { ContentHit, Source } from "../domain/types.js";
import { VectorStore } from "../domain/vectorStore.js";
import { EmbeddingClient, ToolDefinition } from "../infra/ai/types.js";
import { parseToolInput, SourceTrackingTool } from "./types.js";

const searchInputShape = {
  query: z.string().trim().min(1).describe("What to search for in the course content"),
  course_name: z
    .string()
    .nullish()
    .describe("Course title (partial matches work, e.g. 'MCP', 'Introduction')"),
  lesson_number: z
    .number()
    .int()
    .min(0)
    .nullish()
    .describe("Specific lesson number to search within (e.g. 1, 2, 3)"),
};

const searchInputSchema = z.object(searchInputShape);

export interface CourseSearchToolOptions {
  maxResults: number;
}

export class CourseSearchTool implements SourceTrackingTool {
  readonly definition: ToolDefinition = {
    name: "search_course_content",
    description: "Search course materials with smart course name matching and lesson filtering",
    inputSchema: {
      type: "object",
      properties: {
        query: {
          type: "string",
          description: "What to search for in the course content",
        },
        course_name: {
          type: "string",
          description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
        },
        lesson_number: {
          type: "integer",
          description: "Specific lesson number to search within (e.g. 1, 2, 3)",
        },
      },
      required: ["query"],
    },
  };

  lastSources: Source[] = [];

  constructor(
    private readonly vectorStore: VectorStore,
    private readonly embeddings: EmbeddingClient,
    private readonly options: CourseSearchToolOptions,
  ) {}

  async execute(rawInput: Record<string, unknown>): Promise<string> {
    const input = parseToolInput(searchInputSchema, this.definition.name, rawInput);
    const courseName = input.course_name?.trim() || null;
    const lessonNumber = input.lesson_number ?? undefined;

    let hits: ContentHit[];
    try {
      let courseTitle: string | undefined;
      if (courseName) {
        const resolved = await this.vectorStore.resolveCourseName(
          courseName,
          await this.embedOrNull(courseName),
        );
        if (!resolved) {
          this.lastSources = [];
          return `No course found matching '${courseName}'`;
        }
        courseTitle = resolved;
      }

      hits = await this.vectorStore.search({
        query: input.query,
        queryEmbedding: await this.embedOrNull(input.query),
        courseTitle,
        lessonNumber,
        limit: this.options.maxResults,
      });
    } catch (error) {
      this.lastSources = [];
      return `Search error: ${error instanceof Error ? error.message : String(error)}`;
    }

    if (hits.length === 0) {
      this.lastSources = [];
      let filterInfo = "";
      if (courseName) {
        filterInfo += ` in course '${courseName}'`;
      }
      if (lessonNumber !== undefined) {
        filterInfo += ` in lesson ${lessonNumber}`;
      }
      return `No relevant content found${filterInfo}.`;
    }

    return this.formatResults(hits);
  }

  private formatResults(hits: ContentHit[]): string {
    const sources: Source[] = [];
    const blocks = hits.map(({ chunk, course }) => {
      const label =
        chunk.lessonNumber === null
          ? course.title
          : `${course.title} - Lesson ${chunk.lessonNumber}`;
      const lessonLink =
        chunk.lessonNumber === null
          ? null
          : (course.lessons.find((lesson) => lesson.lessonNumber === chunk.lessonNumber)
              ?.lessonLink ?? null);

      sources.push({ text: label, link: lessonLink ?? course.courseLink });
      return `[${label}]\n${chunk.content}`;
    });

    this.lastSources = sources;
    return blocks.join("\n\n");
  }

  private async embedOrNull(text: string): Promise<number[] | null> {
    return this.embeddings.isEmbeddingConfigured() ? this.embeddings.embedQuery(text) : null;
  }
}

export function registerCourseSearchTool(
  server: McpServer,
  createTool: () => CourseSearchTool,
) {
  server.registerTool(
    "search_course_content",
    {
      title: "Search Course Content",
      description: "Searches indexed course materials, optionally within one course or lesson.",
      inputSchema: searchInputShape,
    },
    async (args) => {
      const tool = createTool();
      const result = await tool.execute(args);

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify({ result, sources: tool.lastSources }, null, 2),
          },
        ],
      };
    },
  );
}
