import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ClearResult, ContentSearchInput, UpsertCourseInput } from "../../domain/vectorStore.js";
import { ContentHit, CourseRecord } from "../../domain/types.js";
import { InMemoryVectorStore, InMemoryVectorStoreSnapshot } from "./inMemoryVectorStore.js";

const CURRENT_FORMAT_VERSION = 1;
const SNAPSHOT_FILE_NAME = "index.json";

const lessonRecordSchema = z.object({
  lessonNumber: z.number().int(),
  title: z.string(),
  lessonLink: z.string().nullable(),
});

const courseRecordSchema = z.object({
  title: z.string().min(1),
  courseLink: z.string().nullable(),
  instructor: z.string().nullable(),
  lessons: z.array(lessonRecordSchema),
  chunkCount: z.number().int().min(0),
  indexedAt: z.string(),
});

const storedChunkSchema = z.object({
  id: z.string(),
  content: z.string(),
  courseTitle: z.string(),
  lessonNumber: z.number().int().nullable(),
  chunkIndex: z.number().int(),
  embedding: z.array(z.number()).nullable().optional(),
});

const persistedSchema = z.object({
  format_version: z.number().int(),
  saved_at: z.string(),
  snapshot: z.object({
    courses: z.array(courseRecordSchema),
    chunksByCourse: z.record(z.array(storedChunkSchema)),
    titleEmbeddings: z.record(z.array(z.number())).default({}),
  }),
});

interface PersistedVectorStore {
  format_version: number;
  saved_at: string;
  snapshot: InMemoryVectorStoreSnapshot;
}

export interface PersistentInMemoryOptions {
  maxBytes: number;
}

/**
 * In-memory store mirrored to `<directory>/index.json` after every write.
 * Writes are serialized so concurrent ingestion cannot interleave snapshots.
 */
export class PersistentInMemoryVectorStore extends InMemoryVectorStore {
  private initialized = false;

  private writeChain: Promise<void> = Promise.resolve();

  private readonly absolutePath: string;

  constructor(
    directory: string,
    private readonly options: PersistentInMemoryOptions,
  ) {
    super();
    this.absolutePath = path.resolve(directory, SNAPSHOT_FILE_NAME);
  }

  get snapshotPath(): string {
    return this.absolutePath;
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });

    try {
      const raw = await fs.readFile(this.absolutePath, "utf-8");
      this.importSnapshot(parseSnapshotFromDisk(JSON.parse(raw)));
    } catch (error) {
      if (!isFileMissing(error)) {
        throw error;
      }
    }

    this.initialized = true;
  }

  async upsertCourse(input: UpsertCourseInput): Promise<CourseRecord> {
    await this.initialize();
    return this.commit(() => super.upsertCourse(input));
  }

  async search(input: ContentSearchInput): Promise<ContentHit[]> {
    await this.initialize();
    return super.search(input);
  }

  async listCourses(): Promise<CourseRecord[]> {
    await this.initialize();
    return super.listCourses();
  }

  async clear(): Promise<ClearResult> {
    await this.initialize();
    return this.commit(() => super.clear());
  }

  async close(): Promise<void> {
    await this.initialize();
    await this.enqueueWrite(() => this.persistNow());
  }

  // Memory and disk change together: a snapshot that cannot be written undoes the mutation.
  private async commit<T>(mutate: () => Promise<T>): Promise<T> {
    const previous = this.exportSnapshot();
    const result = await mutate();
    try {
      await this.enqueueWrite(() => this.persistNow());
    } catch (error) {
      this.importSnapshot(previous);
      throw error;
    }
    return result;
  }

  private enqueueWrite(task: () => Promise<void>): Promise<void> {
    this.writeChain = this.writeChain.then(task, task);
    return this.writeChain;
  }

  private async persistNow(): Promise<void> {
    const payload: PersistedVectorStore = {
      format_version: CURRENT_FORMAT_VERSION,
      saved_at: new Date().toISOString(),
      snapshot: this.exportSnapshot(),
    };

    const serialized = JSON.stringify(payload);
    const bytes = Buffer.byteLength(serialized, "utf-8");
    if (bytes > this.options.maxBytes) {
      throw new Error(
        `Vector store snapshot exceeds size limit (${bytes} > ${this.options.maxBytes} bytes).`,
      );
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });
    const tempPath = `${this.absolutePath}.tmp`;
    await fs.writeFile(tempPath, serialized, "utf-8");
    await replaceFileSafely(tempPath, this.absolutePath, serialized);
  }
}

function errorCode(error: unknown): string | null {
  if (!(error instanceof Error) || !("code" in error)) {
    return null;
  }
  return typeof error.code === "string" ? error.code : null;
}

function isFileMissing(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}

function isReplaceableRenameError(error: unknown): boolean {
  const code = errorCode(error);
  return code === "EPERM" || code === "EEXIST" || code === "EBUSY";
}

async function replaceFileSafely(
  tempPath: string,
  targetPath: string,
  content: string,
): Promise<void> {
  try {
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  try {
    await fs.rm(targetPath, { force: true });
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  // Windows can hold a lock on the target; fall back to an in-place write.
  await fs.writeFile(targetPath, content, "utf-8");
  await fs.rm(tempPath, { force: true });
}

function parseSnapshotFromDisk(raw: unknown): InMemoryVectorStoreSnapshot {
  const parsed = persistedSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error("Invalid vector store snapshot format.");
  }
  if (parsed.data.format_version !== CURRENT_FORMAT_VERSION) {
    throw new Error(
      `Unsupported vector store format version: ${parsed.data.format_version}. Expected ${CURRENT_FORMAT_VERSION}.`,
    );
  }
  return parsed.data.snapshot;
}
