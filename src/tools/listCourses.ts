import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { RagSystem } from "../services/ragSystem.js";

export function registerListCoursesTool(server: McpServer, rag: RagSystem) {
  server.registerTool(
    "list_courses",
    {
      title: "List Courses",
      description: "Lists indexed courses with their links, instructors and lesson counts.",
      inputSchema: {},
    },
    async () => {
      const courses = await rag.listCourses();

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(
              {
                total_courses: courses.length,
                courses: courses.map((course) => ({
                  title: course.title,
                  course_link: course.courseLink,
                  instructor: course.instructor,
                  lesson_count: course.lessons.length,
                  chunk_count: course.chunkCount,
                  indexed_at: course.indexedAt,
                })),
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
