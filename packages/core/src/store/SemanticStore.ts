import {
  buildChunkId,
  isRecord,
  optionalNumber,
  optionalString,
  type Course,
  type CourseChunk,
  type Embedder,
  type Lesson,
  type MetadataFilter,
  type MetadataValue,
  type RecordMetadata,
  type VectorCollection,
} from "@lectern/shared";
import { SqliteVectorCollection, type Database } from "@lectern/db";
import type { RunLogger } from "../runtime/RunLogger.js";
import { SearchResults } from "./SearchResults.js";

export const CATALOG_COLLECTION = "course_catalog";
export const CONTENT_COLLECTION = "course_content";

export interface CourseOverview {
  title: string;
  instructor?: string;
  courseLink?: string;
  lessonCount: number;
  lessons: Lesson[];
}

export interface SemanticStoreOptions {
  maxResults: number;
  logger?: RunLogger;
}

export interface SearchRequest {
  query: string;
  courseName?: string;
  lessonNumber?: number;
  limit?: number;
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const parseLessons = (raw: MetadataValue | undefined): Lesson[] => {
  if (typeof raw !== "string" || !raw.trim()) return [];
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) return [];
  return parsed.flatMap((entry: unknown) => {
    if (!isRecord(entry)) return [];
    const lessonNumber = optionalNumber(entry.lesson_number);
    if (lessonNumber === undefined) return [];
    const lesson: Lesson = {
      lessonNumber,
      title: optionalString(entry.lesson_title) ?? "",
    };
    const lessonLink = optionalString(entry.lesson_link);
    if (lessonLink) lesson.lessonLink = lessonLink;
    return [lesson];
  });
};

export const buildFilter = (courseTitle?: string, lessonNumber?: number): MetadataFilter | undefined => {
  const clauses: MetadataFilter[] = [];
  if (courseTitle !== undefined) clauses.push({ course_title: courseTitle });
  if (lessonNumber !== undefined) clauses.push({ lesson_number: lessonNumber });
  if (clauses.length > 1) return { $and: clauses };
  return clauses[0];
};

/**
 * Course index backed by two collections: a catalog with one record per course
 * (used for fuzzy title resolution and lesson links) and the chunked content.
 */
export class SemanticStore {
  private readonly maxResults: number;
  private readonly logger?: RunLogger;

  constructor(
    readonly catalog: VectorCollection,
    readonly content: VectorCollection,
    options: SemanticStoreOptions,
  ) {
    this.maxResults = options.maxResults;
    this.logger = options.logger;
  }

  static async open(db: Database, embedder: Embedder, options: SemanticStoreOptions): Promise<SemanticStore> {
    const catalog = await SqliteVectorCollection.open(db, CATALOG_COLLECTION, embedder);
    const content = await SqliteVectorCollection.open(db, CONTENT_COLLECTION, embedder);
    return new SemanticStore(catalog, content, options);
  }

  async search(request: SearchRequest): Promise<SearchResults> {
    let courseTitle: string | undefined;
    if (request.courseName) {
      courseTitle = await this.resolveCourseName(request.courseName);
      if (!courseTitle) {
        return SearchResults.empty(`No course found matching '${request.courseName}'`);
      }
    }
    try {
      const where = buildFilter(courseTitle, request.lessonNumber);
      const matches = await this.content.query({
        text: request.query,
        limit: request.limit ?? this.maxResults,
        where,
      });
      return SearchResults.fromQuery(matches);
    } catch (error) {
      return SearchResults.empty(`Search error: ${errorMessage(error)}`);
    }
  }

  async resolveCourseName(name: string): Promise<string | undefined> {
    try {
      const [best] = await this.catalog.query({ text: name, limit: 1 });
      return optionalString(best?.metadata.title);
    } catch (error) {
      await this.logger
        ?.log("course_resolution_error", { name, error: errorMessage(error) }, "warn")
        .catch(() => undefined);
      return undefined;
    }
  }

  async addCourseMetadata(course: Course): Promise<void> {
    const metadata: RecordMetadata = {
      title: course.title,
      lesson_count: course.lessons.length,
      lessons_json: JSON.stringify(
        course.lessons.map((lesson) => ({
          lesson_number: lesson.lessonNumber,
          lesson_title: lesson.title,
          lesson_link: lesson.lessonLink ?? null,
        })),
      ),
    };
    if (course.instructor) metadata.instructor = course.instructor;
    if (course.courseLink) metadata.course_link = course.courseLink;
    await this.catalog.upsert([{ id: course.title, document: course.title, metadata }]);
  }

  async addCourseContent(chunks: CourseChunk[]): Promise<void> {
    if (!chunks.length) return;
    await this.content.upsert(
      chunks.map((chunk) => {
        const metadata: RecordMetadata = {
          course_title: chunk.courseTitle,
          chunk_index: chunk.chunkIndex,
        };
        if (chunk.lessonNumber !== undefined) metadata.lesson_number = chunk.lessonNumber;
        return { id: buildChunkId(chunk), document: chunk.content, metadata };
      }),
    );
  }

  async getCourseMetadata(title: string): Promise<RecordMetadata | undefined> {
    const [record] = await this.catalog.get([title]);
    return record?.metadata;
  }

  async getLessonLink(title: string, lessonNumber: number): Promise<string | undefined> {
    const metadata = await this.getCourseMetadata(title);
    if (!metadata) return undefined;
    const lesson = parseLessons(metadata.lessons_json).find((entry) => entry.lessonNumber === lessonNumber);
    return lesson?.lessonLink;
  }

  async getCourseLink(title: string): Promise<string | undefined> {
    const metadata = await this.getCourseMetadata(title);
    return optionalString(metadata?.course_link);
  }

  async getExistingCourseTitles(): Promise<string[]> {
    const records = await this.catalog.get();
    return records.map((record) => record.id);
  }

  async getCourseCount(): Promise<number> {
    return this.catalog.count();
  }

  async getAllCoursesMetadata(): Promise<CourseOverview[]> {
    const records = await this.catalog.get();
    return records.map((record) => {
      const { metadata } = record;
      const overview: CourseOverview = {
        title: optionalString(metadata.title) ?? record.id,
        lessonCount: optionalNumber(metadata.lesson_count) ?? 0,
        lessons: parseLessons(metadata.lessons_json),
      };
      const instructor = optionalString(metadata.instructor);
      if (instructor) overview.instructor = instructor;
      const courseLink = optionalString(metadata.course_link);
      if (courseLink) overview.courseLink = courseLink;
      return overview;
    });
  }

  async clearAllData(): Promise<void> {
    await this.catalog.clear();
    await this.content.clear();
  }
}
