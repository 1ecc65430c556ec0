import { promises as fs } from "node:fs";
import path from "node:path";
import { Course, CourseAnalytics, CourseRecord, Source } from "../domain/types.js";
import { ClearResult, VectorStore } from "../domain/vectorStore.js";
import { AiClient } from "../infra/ai/types.js";
import { listCourseDocuments } from "../infra/parsers/documentLoader.js";
import { ExtractiveGenerator } from "../pipelines/answering.js";
import { processCourseDocument, ProcessedCourseDocument } from "../pipelines/courseDocument.js";
import { AnswerGenerator, ToolCallingGenerator } from "../pipelines/generation.js";
import { CourseOutlineTool } from "../tools/courseOutlineTool.js";
import { CourseSearchTool } from "../tools/courseSearchTool.js";
import { ToolManager } from "../tools/toolManager.js";
import { SessionManager } from "./sessionManager.js";

export interface RagSystemOptions {
  chunkSize: number;
  chunkOverlap: number;
  maxResults: number;
  maxToolRounds: number;
  /** Overrides the generator picked from the AI client's provider. */
  generator?: AnswerGenerator;
}

export interface AddCourseDocumentResult {
  course: Course | null;
  chunkCount: number;
}

export interface FailedIngestion {
  path: string;
  reason: string;
}

export interface AddCourseFolderResult {
  courses_added: number;
  chunks_added: number;
  skipped: number;
  failed: FailedIngestion[];
}

export interface QueryResult {
  answer: string;
  sources: Source[];
}

export class RagSystem {
  private readonly generator: AnswerGenerator;

  constructor(
    private readonly vectorStore: VectorStore,
    private readonly aiClient: AiClient,
    private readonly sessions: SessionManager,
    private readonly options: RagSystemOptions,
  ) {
    this.generator = options.generator ?? createGenerator(aiClient, options.maxToolRounds);
  }

  async addCourseDocument(filePath: string): Promise<AddCourseDocumentResult> {
    try {
      const processed = await this.processFile(filePath);
      await this.indexCourse(processed);
      return { course: processed.course, chunkCount: processed.chunks.length };
    } catch (error) {
      console.warn(`[ingest] failed to add ${filePath}: ${describeError(error)}`);
      return { course: null, chunkCount: 0 };
    }
  }

  /**
   * Ingests every supported file in `folderPath`. Courses whose title is
   * already in the store are skipped, so repeated runs add nothing new.
   */
  async addCourseFolder(
    folderPath: string,
    options: { clearExisting?: boolean } = {},
  ): Promise<AddCourseFolderResult> {
    const result: AddCourseFolderResult = {
      courses_added: 0,
      chunks_added: 0,
      skipped: 0,
      failed: [],
    };

    if (options.clearExisting) {
      const cleared = await this.vectorStore.clear();
      console.error(
        `[ingest] cleared ${cleared.cleared_courses} courses and ${cleared.cleared_chunks} chunks`,
      );
    }

    if (!(await isDirectory(folderPath))) {
      console.warn(`[ingest] folder ${folderPath} does not exist`);
      return result;
    }

    const existingTitles = new Set(await this.vectorStore.getExistingCourseTitles());
    for (const filePath of await listCourseDocuments(folderPath)) {
      try {
        const processed = await this.processFile(filePath);
        if (existingTitles.has(processed.course.title)) {
          result.skipped += 1;
          continue;
        }

        await this.indexCourse(processed);
        existingTitles.add(processed.course.title);
        result.courses_added += 1;
        result.chunks_added += processed.chunks.length;
      } catch (error) {
        const reason = describeError(error);
        console.warn(`[ingest] failed to add ${path.basename(filePath)}: ${reason}`);
        result.failed.push({ path: filePath, reason });
      }
    }

    return result;
  }

  async query(query: string, sessionId?: string | null): Promise<QueryResult> {
    const toolManager = this.createToolManager();
    const answer = await this.generator.generateResponse({
      query,
      conversationHistory: this.sessions.getConversationHistory(sessionId),
      toolManager,
    });

    const sources = toolManager.getLastSources();
    toolManager.resetSources();

    if (sessionId) {
      this.sessions.addExchange(sessionId, query, answer);
    }
    return { answer, sources };
  }

  async getCourseAnalytics(): Promise<CourseAnalytics> {
    const titles = await this.vectorStore.getExistingCourseTitles();
    return {
      total_courses: titles.length,
      course_titles: titles,
    };
  }

  async listCourses(): Promise<CourseRecord[]> {
    return this.vectorStore.listCourses();
  }

  async clearCourses(): Promise<ClearResult> {
    return this.vectorStore.clear();
  }

  createSession(): string {
    return this.sessions.createSession();
  }

  clearSession(sessionId: string): boolean {
    return this.sessions.clearSession(sessionId);
  }

  createSearchTool(): CourseSearchTool {
    return new CourseSearchTool(this.vectorStore, this.aiClient, {
      maxResults: this.options.maxResults,
    });
  }

  createOutlineTool(): CourseOutlineTool {
    return new CourseOutlineTool(this.vectorStore, this.aiClient);
  }

  // A fresh manager per query keeps concurrent requests from reading each other's sources.
  private createToolManager(): ToolManager {
    return new ToolManager().register(this.createSearchTool()).register(this.createOutlineTool());
  }

  private processFile(filePath: string): Promise<ProcessedCourseDocument> {
    return processCourseDocument(filePath, {
      chunkSize: this.options.chunkSize,
      chunkOverlap: this.options.chunkOverlap,
    });
  }

  private async indexCourse({ course, chunks }: ProcessedCourseDocument): Promise<void> {
    if (!this.aiClient.isEmbeddingConfigured()) {
      await this.vectorStore.upsertCourse({ course, chunks });
      return;
    }

    const [titleEmbedding, ...chunkEmbeddings] = await this.aiClient.embedTexts([
      course.title,
      ...chunks.map((chunk) => chunk.content),
    ]);
    await this.vectorStore.upsertCourse({ course, chunks, chunkEmbeddings, titleEmbedding });
  }
}

function createGenerator(aiClient: AiClient, maxToolRounds: number): AnswerGenerator {
  const model = aiClient.getChatModel();
  return model ? new ToolCallingGenerator(model, { maxToolRounds }) : new ExtractiveGenerator();
}

async function isDirectory(folderPath: string): Promise<boolean> {
  try {
    return (await fs.stat(folderPath)).isDirectory();
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
