import { ContentHit, Course, CourseChunk, CourseRecord } from "./types.js";

export interface UpsertCourseInput {
  course: Course;
  chunks: CourseChunk[];
  chunkEmbeddings?: number[][];
  titleEmbedding?: number[] | null;
}

export interface ContentSearchInput {
  query: string;
  queryEmbedding: number[] | null;
  courseTitle?: string;
  lessonNumber?: number;
  limit: number;
}

export interface ClearResult {
  cleared_courses: number;
  cleared_chunks: number;
}

export interface VectorStore {
  upsertCourse(input: UpsertCourseInput): Promise<CourseRecord>;
  search(input: ContentSearchInput): Promise<ContentHit[]>;
  resolveCourseName(name: string, nameEmbedding?: number[] | null): Promise<string | null>;
  getCourse(title: string): Promise<CourseRecord | null>;
  listCourses(): Promise<CourseRecord[]>;
  getExistingCourseTitles(): Promise<string[]>;
  getCourseCount(): Promise<number>;
  getCourseLink(title: string): Promise<string | null>;
  getLessonLink(title: string, lessonNumber: number): Promise<string | null>;
  clear(): Promise<ClearResult>;
  close(): Promise<void>;
}
