export interface Lesson {
  lessonNumber: number;
  title: string;
  lessonLink?: string;
}

/**
 * A course as produced by ingestion. The title doubles as the catalog id, so it
 * must be unique across the index.
 */
export interface Course {
  title: string;
  courseLink?: string;
  instructor?: string;
  lessons: Lesson[];
}

export interface CourseChunk {
  content: string;
  courseTitle: string;
  lessonNumber?: number;
  /** Position within the owning course's chunk stream. */
  chunkIndex: number;
}

/** Provenance entry shown next to an answer. */
export interface Source {
  text: string;
  link?: string;
}

export const buildChunkId = (chunk: Pick<CourseChunk, "courseTitle" | "chunkIndex">): string =>
  `${chunk.courseTitle.replace(/ /g, "_")}_${chunk.chunkIndex}`;

export const formatSourceText = (courseTitle: string, lessonNumber?: number): string =>
  lessonNumber !== undefined ? `${courseTitle} - Lesson ${lessonNumber}` : courseTitle;
