import {
  ClearResult,
  ContentSearchInput,
  UpsertCourseInput,
  VectorStore,
} from "../../domain/vectorStore.js";
import { ContentHit, CourseRecord, StoredChunk } from "../../domain/types.js";
import { scoreByTokenOverlap, tokenize, tokenizeForBm25 } from "../../utils/text.js";
import { cosineSimilarity } from "../../utils/vector.js";

export interface InMemoryVectorStoreSnapshot {
  courses: CourseRecord[];
  chunksByCourse: Record<string, StoredChunk[]>;
  titleEmbeddings: Record<string, number[]>;
}

interface Bm25Document {
  course: CourseRecord;
  chunk: StoredChunk;
  tf: Map<string, number>;
  uniqueTokens: string[];
  docLength: number;
}

interface Bm25Corpus {
  documents: Bm25Document[];
  docFreq: Map<string, number>;
  avgDocLength: number;
}

type ChunkFilter = (chunk: StoredChunk) => boolean;

export class InMemoryVectorStore implements VectorStore {
  protected courseByTitle = new Map<string, CourseRecord>();

  protected chunksByCourse = new Map<string, StoredChunk[]>();

  protected titleEmbeddings = new Map<string, number[]>();

  private bm25DocsByCourse = new Map<string, Bm25Document[]>();

  private bm25CorpusCache: Bm25Corpus | null = null;

  async upsertCourse({
    course,
    chunks,
    chunkEmbeddings,
    titleEmbedding,
  }: UpsertCourseInput): Promise<CourseRecord> {
    if (chunkEmbeddings && chunkEmbeddings.length !== chunks.length) {
      throw new Error(
        `Embedding count mismatch for '${course.title}' (${chunkEmbeddings.length} embeddings, ${chunks.length} chunks).`,
      );
    }

    const record: CourseRecord = {
      title: course.title,
      courseLink: course.courseLink,
      instructor: course.instructor,
      lessons: course.lessons.map((lesson) => ({
        lessonNumber: lesson.lessonNumber,
        title: lesson.title,
        lessonLink: lesson.lessonLink,
      })),
      chunkCount: chunks.length,
      indexedAt: new Date().toISOString(),
    };

    const stored: StoredChunk[] = chunks.map((chunk, index) => ({
      ...chunk,
      id: createChunkId(course.title, chunk.chunkIndex),
      embedding: chunkEmbeddings?.[index] ?? null,
    }));

    this.courseByTitle.set(record.title, record);
    this.chunksByCourse.set(record.title, stored);
    if (titleEmbedding) {
      this.titleEmbeddings.set(record.title, titleEmbedding);
    } else {
      this.titleEmbeddings.delete(record.title);
    }
    this.bm25DocsByCourse.set(record.title, this.buildBm25Documents(record, stored));
    this.bm25CorpusCache = null;

    return record;
  }

  async search(input: ContentSearchInput): Promise<ContentHit[]> {
    if (input.limit <= 0) {
      return [];
    }

    const filter = buildChunkFilter(input);
    const courseTitles = input.courseTitle ? [input.courseTitle] : null;

    if (input.queryEmbedding) {
      const hybrid = this.searchByHybrid(
        input.query,
        input.queryEmbedding,
        input.limit,
        courseTitles,
        filter,
      );
      if (hybrid.length > 0) {
        return hybrid;
      }
    }

    const bm25 = this.searchByBm25(input.query, input.limit, courseTitles, filter);
    if (bm25.length > 0) {
      return bm25;
    }

    return this.searchByLexical(input.query, input.limit, courseTitles, filter);
  }

  async resolveCourseName(
    name: string,
    nameEmbedding: number[] | null = null,
  ): Promise<string | null> {
    const wanted = name.trim().toLowerCase();
    if (!wanted) {
      return null;
    }

    const titles = [...this.courseByTitle.keys()].sort((a, b) => a.localeCompare(b));
    const exact = titles.find((title) => title.toLowerCase() === wanted);
    if (exact) {
      return exact;
    }

    const partial = titles.find((title) => {
      const lower = title.toLowerCase();
      return lower.includes(wanted) || wanted.includes(lower);
    });
    if (partial) {
      return partial;
    }

    let best: { title: string; score: number } | null = null;
    for (const title of titles) {
      const titleEmbedding = this.titleEmbeddings.get(title);
      const score =
        nameEmbedding && titleEmbedding
          ? cosineSimilarity(nameEmbedding, titleEmbedding)
          : scoreByTokenOverlap(name, title);
      if (score > 0 && (!best || score > best.score)) {
        best = { title, score };
      }
    }

    return best?.title ?? null;
  }

  async getCourse(title: string): Promise<CourseRecord | null> {
    return this.courseByTitle.get(title) ?? null;
  }

  async listCourses(): Promise<CourseRecord[]> {
    return [...this.courseByTitle.values()].sort((a, b) => a.title.localeCompare(b.title));
  }

  async getExistingCourseTitles(): Promise<string[]> {
    return (await this.listCourses()).map((course) => course.title);
  }

  async getCourseCount(): Promise<number> {
    return this.courseByTitle.size;
  }

  async getCourseLink(title: string): Promise<string | null> {
    return this.courseByTitle.get(title)?.courseLink ?? null;
  }

  async getLessonLink(title: string, lessonNumber: number): Promise<string | null> {
    const course = this.courseByTitle.get(title);
    const lesson = course?.lessons.find((item) => item.lessonNumber === lessonNumber);
    return lesson?.lessonLink ?? null;
  }

  async clear(): Promise<ClearResult> {
    const clearedCourses = this.courseByTitle.size;
    let clearedChunks = 0;
    for (const chunks of this.chunksByCourse.values()) {
      clearedChunks += chunks.length;
    }

    this.courseByTitle.clear();
    this.chunksByCourse.clear();
    this.titleEmbeddings.clear();
    this.bm25DocsByCourse.clear();
    this.bm25CorpusCache = null;
    return { cleared_courses: clearedCourses, cleared_chunks: clearedChunks };
  }

  async close(): Promise<void> {}

  protected exportSnapshot(): InMemoryVectorStoreSnapshot {
    const chunksByCourse: Record<string, StoredChunk[]> = {};
    for (const [title, chunks] of this.chunksByCourse.entries()) {
      chunksByCourse[title] = chunks.map((chunk) => ({ ...chunk }));
    }

    return {
      courses: [...this.courseByTitle.values()].sort((a, b) => a.title.localeCompare(b.title)),
      chunksByCourse,
      titleEmbeddings: Object.fromEntries(this.titleEmbeddings.entries()),
    };
  }

  protected importSnapshot(snapshot: InMemoryVectorStoreSnapshot): void {
    this.courseByTitle.clear();
    this.chunksByCourse.clear();
    this.titleEmbeddings.clear();
    this.bm25DocsByCourse.clear();
    this.bm25CorpusCache = null;

    for (const course of snapshot.courses) {
      this.courseByTitle.set(course.title, { ...course, lessons: [...course.lessons] });
    }

    for (const [title, chunks] of Object.entries(snapshot.chunksByCourse)) {
      if (this.courseByTitle.has(title)) {
        this.chunksByCourse.set(
          title,
          chunks.map((chunk) => ({ ...chunk })),
        );
      }
    }

    for (const [title, embedding] of Object.entries(snapshot.titleEmbeddings)) {
      if (this.courseByTitle.has(title)) {
        this.titleEmbeddings.set(title, embedding);
      }
    }

    for (const course of this.courseByTitle.values()) {
      this.bm25DocsByCourse.set(
        course.title,
        this.buildBm25Documents(course, this.chunksByCourse.get(course.title) ?? []),
      );
    }
  }

  private *iterateChunks(
    courseTitles: string[] | null,
    filter: ChunkFilter,
  ): Generator<{ course: CourseRecord; chunk: StoredChunk }> {
    const titles = courseTitles ?? [...this.courseByTitle.keys()];
    for (const title of titles) {
      const course = this.courseByTitle.get(title);
      if (!course) {
        continue;
      }
      for (const chunk of this.chunksByCourse.get(title) ?? []) {
        if (filter(chunk)) {
          yield { course, chunk };
        }
      }
    }
  }

  private searchBySemantic(
    queryEmbedding: number[],
    limit: number,
    courseTitles: string[] | null,
    filter: ChunkFilter,
  ): ContentHit[] {
    const candidates: ContentHit[] = [];

    for (const { course, chunk } of this.iterateChunks(courseTitles, filter)) {
      if (!chunk.embedding) {
        continue;
      }
      const score = cosineSimilarity(queryEmbedding, chunk.embedding);
      if (score <= 0) {
        continue;
      }
      candidates.push({ chunk, course, score });
    }

    return sortHits(candidates).slice(0, limit);
  }

  private searchByHybrid(
    query: string,
    queryEmbedding: number[],
    limit: number,
    courseTitles: string[] | null,
    filter: ChunkFilter,
  ): ContentHit[] {
    const poolSize = Math.max(limit, 24);
    const semantic = this.searchBySemantic(queryEmbedding, poolSize, courseTitles, filter);
    const bm25 = this.searchByBm25(query, poolSize, courseTitles, filter);

    if (semantic.length === 0) {
      return bm25.slice(0, limit);
    }
    if (bm25.length === 0) {
      return semantic.slice(0, limit);
    }

    return fuseByReciprocalRank(semantic, bm25, limit);
  }

  private searchByBm25(
    query: string,
    limit: number,
    courseTitles: string[] | null,
    filter: ChunkFilter,
  ): ContentHit[] {
    const queryTokens = tokenize(query);
    if (queryTokens.length === 0) {
      return [];
    }

    const corpus = this.resolveBm25Corpus(courseTitles, filter);
    if (corpus.documents.length === 0) {
      return [];
    }

    const k1 = 1.2;
    const b = 0.75;

    const scored: ContentHit[] = [];
    for (const doc of corpus.documents) {
      let score = 0;
      for (const term of queryTokens) {
        const tf = doc.tf.get(term) ?? 0;
        if (tf <= 0) {
          continue;
        }
        const df = corpus.docFreq.get(term) ?? 0;
        const idf = Math.log(1 + (corpus.documents.length - df + 0.5) / (df + 0.5));
        const numerator = tf * (k1 + 1);
        const denominator =
          tf + k1 * (1 - b + b * (doc.docLength / Math.max(corpus.avgDocLength, 1e-9)));
        score += idf * (numerator / Math.max(denominator, 1e-9));
      }

      if (score > 0) {
        scored.push({ course: doc.course, chunk: doc.chunk, score });
      }
    }

    return sortHits(scored).slice(0, limit);
  }

  private searchByLexical(
    query: string,
    limit: number,
    courseTitles: string[] | null,
    filter: ChunkFilter,
  ): ContentHit[] {
    const candidates: ContentHit[] = [];
    for (const { course, chunk } of this.iterateChunks(courseTitles, filter)) {
      const score = scoreByTokenOverlap(query, chunk.content);
      if (score > 0) {
        candidates.push({ chunk, course, score });
      }
    }

    return sortHits(candidates).slice(0, limit);
  }

  private buildBm25Documents(course: CourseRecord, chunks: StoredChunk[]): Bm25Document[] {
    const docs: Bm25Document[] = [];

    for (const chunk of chunks) {
      const tokens = tokenizeForBm25(chunk.content);
      if (tokens.length === 0) {
        continue;
      }

      const tf = new Map<string, number>();
      for (const token of tokens) {
        tf.set(token, (tf.get(token) ?? 0) + 1);
      }

      docs.push({
        course,
        chunk,
        tf,
        uniqueTokens: [...new Set(tokens)],
        docLength: tokens.length,
      });
    }

    return docs;
  }

  private resolveBm25Corpus(courseTitles: string[] | null, filter: ChunkFilter): Bm25Corpus {
    const unfiltered = !courseTitles && filter === acceptAll;
    if (unfiltered && this.bm25CorpusCache) {
      return this.bm25CorpusCache;
    }

    const titles = courseTitles ?? [...this.bm25DocsByCourse.keys()];
    const documents: Bm25Document[] = [];
    for (const title of titles) {
      for (const doc of this.bm25DocsByCourse.get(title) ?? []) {
        if (filter(doc.chunk)) {
          documents.push(doc);
        }
      }
    }

    const corpus = buildBm25Corpus(documents);
    if (unfiltered) {
      this.bm25CorpusCache = corpus;
    }
    return corpus;
  }
}

const acceptAll: ChunkFilter = () => true;

function buildChunkFilter(input: ContentSearchInput): ChunkFilter {
  if (input.lessonNumber === undefined) {
    return acceptAll;
  }
  const lessonNumber = input.lessonNumber;
  return (chunk) => chunk.lessonNumber === lessonNumber;
}

function buildBm25Corpus(documents: Bm25Document[]): Bm25Corpus {
  if (documents.length === 0) {
    return { documents: [], docFreq: new Map<string, number>(), avgDocLength: 0 };
  }

  const docFreq = new Map<string, number>();
  let totalDocLength = 0;
  for (const doc of documents) {
    totalDocLength += doc.docLength;
    for (const token of doc.uniqueTokens) {
      docFreq.set(token, (docFreq.get(token) ?? 0) + 1);
    }
  }

  return { documents, docFreq, avgDocLength: totalDocLength / documents.length };
}

function fuseByReciprocalRank(
  semantic: ContentHit[],
  bm25: ContentHit[],
  limit: number,
): ContentHit[] {
  const fused = new Map<string, ContentHit>();
  const rrfK = 60;

  const accumulate = (hits: ContentHit[], weight: number) => {
    for (let i = 0; i < hits.length; i += 1) {
      const item = hits[i];
      const prev = fused.get(item.chunk.id) ?? { course: item.course, chunk: item.chunk, score: 0 };
      prev.score += weight / (rrfK + i + 1);
      fused.set(item.chunk.id, prev);
    }
  };

  accumulate(semantic, 1);
  accumulate(bm25, 1.05);

  return sortHits([...fused.values()]).slice(0, limit);
}

// Ties keep document order so results are stable across runs.
function sortHits(hits: ContentHit[]): ContentHit[] {
  return hits.sort(
    (a, b) =>
      b.score - a.score ||
      a.course.title.localeCompare(b.course.title) ||
      a.chunk.chunkIndex - b.chunk.chunkIndex,
  );
}

// Titles are unique, so the encoded title keeps ids distinct across courses.
export function createChunkId(courseTitle: string, chunkIndex: number): string {
  return `${encodeURIComponent(courseTitle)}:${chunkIndex}`;
}
