import { formatSourceText, optionalNumber, optionalString, type Source } from "@lectern/shared";
import type { SearchResults } from "../../store/SearchResults.js";
import type { SemanticStore } from "../../store/SemanticStore.js";
import { ToolInputError, type SourceTracking, type Tool, type ToolDefinition, type ToolInput } from "../ToolTypes.js";

export const CONTENT_SEARCH_TOOL_NAME = "search_course_content";

const DEFINITION: ToolDefinition = {
  name: CONTENT_SEARCH_TOOL_NAME,
  description: "Search course materials with smart course name matching and lesson filtering",
  input_schema: {
    type: "object",
    properties: {
      query: {
        type: "string",
        description: "What to search for in the course content",
      },
      course_name: {
        type: "string",
        description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
      },
      lesson_number: {
        type: "integer",
        description: "Specific lesson number to search within (e.g. 1, 2, 3)",
      },
    },
    required: ["query"],
  },
};

const INTEGER_TEXT = /^\s*\d+\s*$/;

const parseCourseName = (value: unknown): string | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ToolInputError("Invalid argument 'course_name': expected string", CONTENT_SEARCH_TOOL_NAME);
  }
  return value;
};

// Models sometimes send the lesson number as text; accept it when it is a whole number.
const parseLessonNumber = (value: unknown): number | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && INTEGER_TEXT.test(value)) return Number(value);
  throw new ToolInputError("Invalid argument 'lesson_number': expected integer", CONTENT_SEARCH_TOOL_NAME);
};

export class ContentSearchTool implements Tool, SourceTracking {
  private lastSources: Source[] = [];

  constructor(private store: SemanticStore) {}

  getToolDefinition(): ToolDefinition {
    return DEFINITION;
  }

  getSources(): Source[] {
    return this.lastSources;
  }

  resetSources(): void {
    this.lastSources = [];
  }

  async execute(input: ToolInput): Promise<string> {
    const query = optionalString(input.query);
    if (query === undefined) {
      throw new ToolInputError("Invalid argument 'query': expected string", CONTENT_SEARCH_TOOL_NAME);
    }
    const courseName = parseCourseName(input.course_name);
    const lessonNumber = parseLessonNumber(input.lesson_number);

    const results = await this.store.search({ query, courseName, lessonNumber });
    if (results.error) {
      return results.error;
    }
    if (results.isEmpty()) {
      let filterInfo = "";
      if (courseName) filterInfo += ` in course '${courseName}'`;
      if (lessonNumber) filterInfo += ` in lesson ${lessonNumber}`;
      return `No relevant content found${filterInfo}.`;
    }
    return this.formatResults(results);
  }

  private async formatResults(results: SearchResults): Promise<string> {
    const blocks: string[] = [];
    const sources = new Map<string, Source>();

    for (const [index, document] of results.documents.entries()) {
      const metadata = results.metadata[index] ?? {};
      const courseTitle = optionalString(metadata.course_title) ?? "unknown";
      const lessonNumber = optionalNumber(metadata.lesson_number);
      const label = formatSourceText(courseTitle, lessonNumber);

      const key = `${courseTitle}|${lessonNumber ?? ""}`;
      if (!sources.has(key)) {
        const source: Source = { text: label };
        if (lessonNumber !== undefined) {
          const link = await this.store.getLessonLink(courseTitle, lessonNumber);
          if (link) source.link = link;
        }
        sources.set(key, source);
      }
      blocks.push(`[${label}]\n${document}`);
    }

    this.lastSources = Array.from(sources.values());
    return blocks.join("\n\n");
  }
}
