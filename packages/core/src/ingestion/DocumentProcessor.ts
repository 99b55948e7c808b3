import { readFile } from "node:fs/promises";
import path from "node:path";
import type { Course, CourseChunk, Lesson } from "@lectern/shared";

export interface DocumentProcessorOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export interface ProcessedDocument {
  course: Course;
  chunks: CourseChunk[];
}

const HEADER_PATTERNS = {
  title: /^Course Title:\s*(.+)$/i,
  link: /^Course Link:\s*(.+)$/i,
  instructor: /^Course Instructor:\s*(.+)$/i,
};
const LESSON_PATTERN = /^Lesson\s+(\d+):\s*(.+)$/i;
const LESSON_LINK_PATTERN = /^Lesson Link:\s*(.+)$/i;
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+(?=[A-Z"'(])/;

interface LessonSection {
  lesson: Lesson;
  lines: string[];
}

/**
 * Turns a plain-text course document into a Course and its content chunks.
 *
 * Expected layout: `Course Title:`, `Course Link:` and `Course Instructor:`
 * header lines, then `Lesson <n>: <title>` markers, each optionally followed
 * by a `Lesson Link:` line and the lesson body.
 */
export class DocumentProcessor {
  readonly chunkSize: number;
  readonly chunkOverlap: number;

  constructor(options: DocumentProcessorOptions) {
    if (options.chunkSize <= 0) {
      throw new Error(`Invalid chunk size: ${options.chunkSize}`);
    }
    if (options.chunkOverlap < 0 || options.chunkOverlap >= options.chunkSize) {
      throw new Error(`Invalid chunk overlap: ${options.chunkOverlap}`);
    }
    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
  }

  async processCourseDocument(filePath: string): Promise<ProcessedDocument> {
    const content = await readFile(filePath, "utf8");
    return this.parseCourseDocument(content, path.basename(filePath, path.extname(filePath)));
  }

  parseCourseDocument(content: string, fallbackTitle: string): ProcessedDocument {
    const lines = content.replace(/\r\n/g, "\n").split("\n");
    const course: Course = { title: fallbackTitle, lessons: [] };
    const preamble: string[] = [];
    const sections: LessonSection[] = [];
    let current: LessonSection | undefined;

    for (const rawLine of lines) {
      const line = rawLine.trim();
      const lessonMatch = LESSON_PATTERN.exec(line);
      if (lessonMatch) {
        current = {
          lesson: { lessonNumber: Number(lessonMatch[1]), title: lessonMatch[2].trim() },
          lines: [],
        };
        sections.push(current);
        course.lessons.push(current.lesson);
        continue;
      }
      if (current) {
        const linkMatch = LESSON_LINK_PATTERN.exec(line);
        if (linkMatch && !current.lines.length && !current.lesson.lessonLink) {
          current.lesson.lessonLink = linkMatch[1].trim();
        } else {
          current.lines.push(line);
        }
        continue;
      }
      const title = HEADER_PATTERNS.title.exec(line);
      const link = HEADER_PATTERNS.link.exec(line);
      const instructor = HEADER_PATTERNS.instructor.exec(line);
      if (title) course.title = title[1].trim();
      else if (link) course.courseLink = link[1].trim();
      else if (instructor) course.instructor = instructor[1].trim();
      else preamble.push(line);
    }

    const chunks: CourseChunk[] = [];
    const pushChunk = (text: string, lessonNumber?: number): void => {
      const chunk: CourseChunk = {
        content: lessonNumber !== undefined ? `Lesson ${lessonNumber} content: ${text}` : text,
        courseTitle: course.title,
        chunkIndex: chunks.length,
      };
      if (lessonNumber !== undefined) chunk.lessonNumber = lessonNumber;
      chunks.push(chunk);
    };

    if (!sections.length) {
      for (const text of this.chunkText(preamble.join("\n"))) pushChunk(text);
    }
    for (const section of sections) {
      for (const text of this.chunkText(section.lines.join("\n"))) {
        pushChunk(text, section.lesson.lessonNumber);
      }
    }
    return { course, chunks };
  }

  /**
   * Sentence-aware chunking: sentences are packed up to `chunkSize`
   * characters and each chunk after the first repeats the trailing sentences
   * of its predecessor, up to `chunkOverlap` characters.
   */
  chunkText(text: string): string[] {
    const normalized = text.replace(/\s+/g, " ").trim();
    if (!normalized) return [];
    const sentences = normalized.split(SENTENCE_BOUNDARY).flatMap((sentence) => this.splitLong(sentence));

    const chunks: string[] = [];
    let start = 0;
    while (start < sentences.length) {
      const current: string[] = [];
      let size = 0;
      for (let index = start; index < sentences.length; index += 1) {
        const sentence = sentences[index];
        const added = current.length ? sentence.length + 1 : sentence.length;
        if (current.length && size + added > this.chunkSize) break;
        current.push(sentence);
        size += added;
      }
      chunks.push(current.join(" "));
      if (start + current.length >= sentences.length) break;

      let overlapCount = 0;
      let overlapSize = 0;
      for (let index = current.length - 1; index > 0; index -= 1) {
        const added = current[index].length + (overlapCount ? 1 : 0);
        if (overlapSize + added > this.chunkOverlap) break;
        overlapSize += added;
        overlapCount += 1;
      }
      start += current.length - overlapCount;
    }
    return chunks;
  }

  private splitLong(sentence: string): string[] {
    const pieces: string[] = [];
    let rest = sentence;
    while (rest.length > this.chunkSize) {
      const cut = rest.lastIndexOf(" ", this.chunkSize);
      const end = cut > 0 ? cut : this.chunkSize;
      pieces.push(rest.slice(0, end).trim());
      rest = rest.slice(end).trim();
    }
    if (rest) pieces.push(rest);
    return pieces;
  }
}
