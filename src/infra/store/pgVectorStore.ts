import { Pool } from "pg";
import {
  ClearResult,
  ContentSearchInput,
  UpsertCourseInput,
  VectorStore,
} from "../../domain/vectorStore.js";
import { ContentHit, CourseRecord, LessonRecord } from "../../domain/types.js";
import { createChunkId } from "./inMemoryVectorStore.js";

interface PgCourseRow {
  title: string;
  course_link: string | null;
  instructor: string | null;
  lessons: LessonRecord[];
  chunk_count: number;
  indexed_at: Date;
}

interface PgChunkRow extends PgCourseRow {
  chunk_id: string;
  lesson_number: number | null;
  chunk_index: number;
  content: string;
  score: number;
}

const COURSE_COLUMNS = "title, course_link, instructor, lessons, chunk_count, indexed_at";

export class PgVectorStore implements VectorStore {
  private initialized = false;

  constructor(
    private readonly pool: Pool,
    private readonly vectorDimension: number,
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS courses (
        title TEXT PRIMARY KEY,
        course_link TEXT,
        instructor TEXT,
        lessons JSONB NOT NULL DEFAULT '[]'::jsonb,
        chunk_count INTEGER NOT NULL,
        indexed_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        title_embedding VECTOR(${this.vectorDimension})
      )
    `);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS course_chunks (
        id TEXT PRIMARY KEY,
        course_title TEXT NOT NULL REFERENCES courses(title) ON DELETE CASCADE,
        lesson_number INTEGER,
        chunk_index INTEGER NOT NULL,
        content TEXT NOT NULL,
        embedding VECTOR(${this.vectorDimension}) NOT NULL
      )
    `);
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_course_chunks_course ON course_chunks(course_title, lesson_number)`,
    );
    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_course_chunks_embedding
      ON course_chunks USING ivfflat (embedding vector_cosine_ops)
      WITH (lists = 100)
    `);

    this.initialized = true;
  }

  async upsertCourse({
    course,
    chunks,
    chunkEmbeddings,
    titleEmbedding,
  }: UpsertCourseInput): Promise<CourseRecord> {
    await this.initialize();
    if (!chunkEmbeddings || chunkEmbeddings.length !== chunks.length) {
      throw new Error(
        "Missing chunk embeddings for pgvector upsert. Configure an embedding provider.",
      );
    }

    const lessons: LessonRecord[] = course.lessons.map((lesson) => ({
      lessonNumber: lesson.lessonNumber,
      title: lesson.title,
      lessonLink: lesson.lessonLink,
    }));

    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");

      const courseResult = await client.query<PgCourseRow>(
        `
          INSERT INTO courses (title, course_link, instructor, lessons, chunk_count, indexed_at, title_embedding)
          VALUES ($1, $2, $3, $4::jsonb, $5, NOW(), $6::vector)
          ON CONFLICT (title)
          DO UPDATE SET
            course_link = EXCLUDED.course_link,
            instructor = EXCLUDED.instructor,
            lessons = EXCLUDED.lessons,
            chunk_count = EXCLUDED.chunk_count,
            indexed_at = NOW(),
            title_embedding = EXCLUDED.title_embedding
          RETURNING ${COURSE_COLUMNS}
        `,
        [
          course.title,
          course.courseLink,
          course.instructor,
          JSON.stringify(lessons),
          chunks.length,
          titleEmbedding ? toVectorLiteral(titleEmbedding) : null,
        ],
      );

      await client.query(`DELETE FROM course_chunks WHERE course_title = $1`, [course.title]);

      for (let i = 0; i < chunks.length; i += 1) {
        const chunk = chunks[i];
        await client.query(
          `
            INSERT INTO course_chunks (id, course_title, lesson_number, chunk_index, content, embedding)
            VALUES ($1, $2, $3, $4, $5, $6::vector)
          `,
          [
            createChunkId(course.title, chunk.chunkIndex),
            course.title,
            chunk.lessonNumber,
            chunk.chunkIndex,
            chunk.content,
            toVectorLiteral(chunkEmbeddings[i]),
          ],
        );
      }

      await client.query("COMMIT");
      return toCourseRecord(courseResult.rows[0]);
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async search(input: ContentSearchInput): Promise<ContentHit[]> {
    await this.initialize();
    if (!input.queryEmbedding) {
      throw new Error(
        "Query embedding is required for pgvector search. Configure an embedding provider.",
      );
    }
    if (input.limit <= 0) {
      return [];
    }

    const result = await this.pool.query<PgChunkRow>(
      `
        SELECT
          c.id AS chunk_id,
          c.lesson_number,
          c.chunk_index,
          c.content,
          co.title,
          co.course_link,
          co.instructor,
          co.lessons,
          co.chunk_count,
          co.indexed_at,
          (1 - (c.embedding <=> $1::vector)) AS score
        FROM course_chunks c
        JOIN courses co ON co.title = c.course_title
        WHERE ($2::text IS NULL OR c.course_title = $2::text)
          AND ($3::int IS NULL OR c.lesson_number = $3::int)
        ORDER BY c.embedding <=> $1::vector
        LIMIT $4
      `,
      [
        toVectorLiteral(input.queryEmbedding),
        input.courseTitle ?? null,
        input.lessonNumber ?? null,
        input.limit,
      ],
    );

    return result.rows.map((row) => ({
      course: toCourseRecord(row),
      chunk: {
        id: row.chunk_id,
        content: row.content,
        courseTitle: row.title,
        lessonNumber: row.lesson_number,
        chunkIndex: row.chunk_index,
      },
      score: Number(row.score),
    }));
  }

  async resolveCourseName(
    name: string,
    nameEmbedding: number[] | null = null,
  ): Promise<string | null> {
    await this.initialize();
    const wanted = name.trim();
    if (!wanted) {
      return null;
    }

    const exact = await this.pool.query<{ title: string }>(
      `SELECT title FROM courses WHERE LOWER(title) = LOWER($1) LIMIT 1`,
      [wanted],
    );
    if (exact.rows[0]) {
      return exact.rows[0].title;
    }

    const partial = await this.pool.query<{ title: string }>(
      `
        SELECT title FROM courses
        WHERE title ILIKE '%' || $1 || '%' OR POSITION(LOWER(title) IN LOWER($2)) > 0
        ORDER BY title ASC
        LIMIT 1
      `,
      [escapeLikePattern(wanted), wanted],
    );
    if (partial.rows[0]) {
      return partial.rows[0].title;
    }

    if (!nameEmbedding) {
      return null;
    }

    const nearest = await this.pool.query<{ title: string; score: number }>(
      `
        SELECT title, (1 - (title_embedding <=> $1::vector)) AS score
        FROM courses
        WHERE title_embedding IS NOT NULL
        ORDER BY title_embedding <=> $1::vector
        LIMIT 1
      `,
      [toVectorLiteral(nameEmbedding)],
    );
    const best = nearest.rows[0];
    return best && Number(best.score) > 0 ? best.title : null;
  }

  async getCourse(title: string): Promise<CourseRecord | null> {
    await this.initialize();
    const result = await this.pool.query<PgCourseRow>(
      `SELECT ${COURSE_COLUMNS} FROM courses WHERE title = $1`,
      [title],
    );
    return result.rows[0] ? toCourseRecord(result.rows[0]) : null;
  }

  async listCourses(): Promise<CourseRecord[]> {
    await this.initialize();
    const result = await this.pool.query<PgCourseRow>(
      `SELECT ${COURSE_COLUMNS} FROM courses ORDER BY title ASC`,
    );
    return result.rows.map(toCourseRecord);
  }

  async getExistingCourseTitles(): Promise<string[]> {
    await this.initialize();
    const result = await this.pool.query<{ title: string }>(
      `SELECT title FROM courses ORDER BY title ASC`,
    );
    return result.rows.map((row) => row.title);
  }

  async getCourseCount(): Promise<number> {
    await this.initialize();
    const result = await this.pool.query<{ count: string }>(
      `SELECT COUNT(*)::text AS count FROM courses`,
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async getCourseLink(title: string): Promise<string | null> {
    return (await this.getCourse(title))?.courseLink ?? null;
  }

  async getLessonLink(title: string, lessonNumber: number): Promise<string | null> {
    const course = await this.getCourse(title);
    const lesson = course?.lessons.find((item) => item.lessonNumber === lessonNumber);
    return lesson?.lessonLink ?? null;
  }

  async clear(): Promise<ClearResult> {
    await this.initialize();
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");

      const courseCount = await client.query<{ count: string }>(
        "SELECT COUNT(*)::text AS count FROM courses",
      );
      const chunkCount = await client.query<{ count: string }>(
        "SELECT COUNT(*)::text AS count FROM course_chunks",
      );

      await client.query("TRUNCATE TABLE course_chunks, courses");
      await client.query("COMMIT");

      return {
        cleared_courses: Number(courseCount.rows[0]?.count ?? 0),
        cleared_chunks: Number(chunkCount.rows[0]?.count ?? 0),
      };
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

function toCourseRecord(row: PgCourseRow): CourseRecord {
  return {
    title: row.title,
    courseLink: row.course_link,
    instructor: row.instructor,
    lessons: row.lessons,
    chunkCount: row.chunk_count,
    indexedAt: row.indexed_at.toISOString(),
  };
}

function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

function toVectorLiteral(values: number[]): string {
  return `[${values.join(",")}]`;
}
