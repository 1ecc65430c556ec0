import path from "node:path";
import { Course, CourseChunk, Lesson } from "../domain/types.js";
import { loadDocumentText } from "../infra/parsers/documentLoader.js";
import { chunkText, DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from "./chunking.js";

const COURSE_TITLE = /^Course Title:\s*(.*)$/i;
const COURSE_LINK = /^Course Link:\s*(.*)$/i;
const COURSE_INSTRUCTOR = /^Course Instructor:\s*(.*)$/i;
const LESSON_HEADER = /^Lesson\s+(\d+)\s*:\s*(.+)$/i;
const LESSON_LINK = /^Lesson Link:\s*(.*)$/i;
const HEADER_LINES = 4;

export class CourseDocumentError extends Error {
  constructor(
    message: string,
    readonly source: string,
  ) {
    super(`${source}: ${message}`);
    this.name = "CourseDocumentError";
  }
}

export interface ParsedCourse {
  course: Course;
  /** Body text of a document that has no `Lesson N:` markers. */
  untitledBody: string | null;
}

export interface ChunkingOptions {
  chunkSize?: number;
  chunkOverlap?: number;
}

export interface ProcessedCourseDocument {
  course: Course;
  chunks: CourseChunk[];
}

/**
 * Parses the course file format:
 *
 * ```
 * Course Title: <title>
 * Course Link: <url>
 * Course Instructor: <name>
 *
 * Lesson <n>: <lesson title>
 * Lesson Link: <url>
 * <lesson body text>
 * ```
 */
export function parseCourseDocument(text: string, source = "document"): ParsedCourse {
  const lines = text.replace(/\r\n/g, "\n").split("\n");

  const firstLine = lines[0]?.trim() ?? "";
  const titleMatch = COURSE_TITLE.exec(firstLine);
  const title = (titleMatch ? titleMatch[1] : firstLine).trim();
  if (!title) {
    throw new CourseDocumentError("missing course title on the first line.", source);
  }

  let courseLink: string | null = null;
  let instructor: string | null = null;
  let bodyStart = 1;

  for (let i = 1; i < Math.min(lines.length, HEADER_LINES); i += 1) {
    const line = lines[i].trim();
    const linkMatch = COURSE_LINK.exec(line);
    const instructorMatch = COURSE_INSTRUCTOR.exec(line);

    if (linkMatch) {
      courseLink = linkMatch[1].trim() || null;
    } else if (instructorMatch) {
      instructor = instructorMatch[1].trim() || null;
    } else if (line) {
      break;
    }
    bodyStart = i + 1;
  }

  const lessons: Lesson[] = [];
  const preamble: string[] = [];
  let current: { lessonNumber: number; title: string; lessonLink: string | null; body: string[] } | null =
    null;

  const flush = () => {
    if (!current) {
      return;
    }
    const content = current.body.join("\n").trim();
    if (content) {
      lessons.push({
        lessonNumber: current.lessonNumber,
        title: current.title,
        lessonLink: current.lessonLink,
        content,
      });
    }
    current = null;
  };

  for (let i = bodyStart; i < lines.length; i += 1) {
    const line = lines[i];
    const lessonMatch = LESSON_HEADER.exec(line.trim());

    if (lessonMatch) {
      flush();
      current = {
        lessonNumber: Number.parseInt(lessonMatch[1], 10),
        title: lessonMatch[2].trim(),
        lessonLink: null,
        body: [],
      };

      const linkMatch = LESSON_LINK.exec(lines[i + 1]?.trim() ?? "");
      if (linkMatch) {
        current.lessonLink = linkMatch[1].trim() || null;
        i += 1;
      }
      continue;
    }

    if (current) {
      current.body.push(line);
    } else {
      preamble.push(line);
    }
  }
  flush();

  const preambleText = preamble.join("\n").trim();
  const untitledBody = lessons.length === 0 && preambleText ? preambleText : null;

  if (lessons.length === 0 && !untitledBody) {
    throw new CourseDocumentError("no lesson content found.", source);
  }

  return {
    course: { title, courseLink, instructor, lessons },
    untitledBody,
  };
}

export function buildCourseChunks(
  parsed: ParsedCourse,
  options: ChunkingOptions = {},
): CourseChunk[] {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const chunkOverlap = options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;
  const { course } = parsed;
  const chunks: CourseChunk[] = [];

  const push = (body: string, lessonNumber: number | null) => {
    const prefix =
      lessonNumber === null
        ? `Course ${course.title} content: `
        : `Course ${course.title} Lesson ${lessonNumber} content: `;

    for (const piece of chunkText(body, chunkSize, chunkOverlap)) {
      chunks.push({
        content: `${prefix}${piece}`,
        courseTitle: course.title,
        lessonNumber,
        chunkIndex: chunks.length,
      });
    }
  };

  if (parsed.untitledBody) {
    push(parsed.untitledBody, null);
  }
  for (const lesson of course.lessons) {
    push(lesson.content, lesson.lessonNumber);
  }

  return chunks;
}

export async function processCourseDocument(
  filePath: string,
  options: ChunkingOptions = {},
): Promise<ProcessedCourseDocument> {
  const source = path.basename(filePath);
  const text = await loadDocumentText(filePath);
  if (!text) {
    throw new CourseDocumentError("file is empty.", source);
  }

  const parsed = parseCourseDocument(text, source);
  return {
    course: parsed.course,
    chunks: buildCourseChunks(parsed, options),
  };
}
