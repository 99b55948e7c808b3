import { optionalString } from "@lectern/shared";
import { parseLessons, type SemanticStore } from "../../store/SemanticStore.js";
import { ToolInputError, type Tool, type ToolDefinition, type ToolInput } from "../ToolTypes.js";

export const OUTLINE_TOOL_NAME = "get_course_outline";

const DEFINITION: ToolDefinition = {
  name: OUTLINE_TOOL_NAME,
  description: "Get the complete outline and lesson list for a specific course",
  input_schema: {
    type: "object",
    properties: {
      course_title: {
        type: "string",
        description: "Course title or partial title (e.g. 'MCP', 'RAG', 'Chroma')",
      },
    },
    required: ["course_title"],
  },
};

export class OutlineTool implements Tool {
  constructor(private store: SemanticStore) {}

  getToolDefinition(): ToolDefinition {
    return DEFINITION;
  }

  async execute(input: ToolInput): Promise<string> {
    const courseTitle = optionalString(input.course_title);
    if (courseTitle === undefined) {
      throw new ToolInputError("Invalid argument 'course_title': expected string", OUTLINE_TOOL_NAME);
    }

    const resolvedTitle = await this.store.resolveCourseName(courseTitle);
    if (!resolvedTitle) {
      return `No course found matching '${courseTitle}'`;
    }

    try {
      const metadata = await this.store.getCourseMetadata(resolvedTitle);
      if (!metadata) {
        return `Course metadata not found for '${resolvedTitle}'`;
      }
      const lessons = parseLessons(metadata.lessons_json);
      const lines = [
        `**Course:** ${resolvedTitle}`,
        `**Course Link:** ${optionalString(metadata.course_link) || "No link available"}`,
        "**Lessons:**",
      ];
      if (lessons.length) {
        for (const lesson of lessons) {
          lines.push(`  ${lesson.lessonNumber}. ${lesson.title}`);
        }
      } else {
        lines.push("  No lessons found");
      }
      return lines.join("\n");
    } catch (error) {
      return `Error retrieving course outline: ${error instanceof Error ? error.message : String(error)}`;
    }
  }
}
