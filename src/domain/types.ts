export interface Lesson {
  lessonNumber: number;
  title: string;
  lessonLink: string | null;
  content: string;
}

export interface Course {
  title: string;
  courseLink: string | null;
  instructor: string | null;
  lessons: Lesson[];
}

export interface CourseChunk {
  content: string;
  courseTitle: string;
  lessonNumber: number | null;
  chunkIndex: number;
}

export interface LessonRecord {
  lessonNumber: number;
  title: string;
  lessonLink: string | null;
}

/** Catalog entry for a course; lesson bodies live in the chunks. */
export interface CourseRecord {
  title: string;
  courseLink: string | null;
  instructor: string | null;
  lessons: LessonRecord[];
  chunkCount: number;
  indexedAt: string;
}

export interface StoredChunk extends CourseChunk {
  id: string;
  embedding?: number[] | null;
}

export interface ContentHit {
  chunk: StoredChunk;
  course: CourseRecord;
  score: number;
}

export interface Source {
  text: string;
  link: string | null;
}

export interface CourseAnalytics {
  total_courses: number;
  course_titles: string[];
}
