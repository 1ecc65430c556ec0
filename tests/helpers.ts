import { Course, CourseChunk } from "../src/domain/types.js";
import { AiClient, ChatModel, EmbeddingClient } from "../src/infra/ai/types.js";
import { InMemoryVectorStore } from "../src/infra/store/inMemoryVectorStore.js";

export const RETRIEVAL_COURSE: Course = {
  title: "Building Retrieval Pipelines",
  courseLink: "https://example.com/retrieval",
  instructor: null,
  lessons: [
    {
      lessonNumber: 1,
      title: "Chunking",
      lessonLink: "https://example.com/retrieval/lesson-1",
      content: "Documents are split into chunks with a small overlap.",
    },
    {
      lessonNumber: 2,
      title: "Ranking",
      lessonLink: null,
      content: "Reciprocal rank fusion merges keyword and vector rankings.",
    },
  ],
};

export const PROMPT_COURSE: Course = {
  title: "Practical Prompt Design",
  courseLink: null,
  instructor: "Sam Lee",
  lessons: [
    {
      lessonNumber: 1,
      title: "Tools",
      lessonLink: "https://example.com/prompt/lesson-1",
      content: "Tool calling lets the model request a search.",
    },
  ],
};

export function chunksFor(course: Course): CourseChunk[] {
  return course.lessons.map((lesson, index) => ({
    content: `Course ${course.title} Lesson ${lesson.lessonNumber} content: ${lesson.content}`,
    courseTitle: course.title,
    lessonNumber: lesson.lessonNumber,
    chunkIndex: index,
  }));
}

export async function createSeededStore(): Promise<InMemoryVectorStore> {
  const store = new InMemoryVectorStore();
  await store.upsertCourse({ course: RETRIEVAL_COURSE, chunks: chunksFor(RETRIEVAL_COURSE) });
  await store.upsertCourse({ course: PROMPT_COURSE, chunks: chunksFor(PROMPT_COURSE) });
  return store;
}

export const noEmbeddings: EmbeddingClient = {
  isEmbeddingConfigured: () => false,
  embedTexts: async () => [],
  embedQuery: async () => {
    throw new Error("embeddings disabled");
  },
};

export function createAiClient(chatModel: ChatModel | null = null): AiClient {
  return {
    ...noEmbeddings,
    getGenerationProvider: () => (chatModel ? "openai" : "extractive"),
    getChatModel: () => chatModel,
  };
}
