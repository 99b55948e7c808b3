import type { Source } from "@lectern/shared";
import { isSourceTracking, ToolInputError, type Tool, type ToolDefinition, type ToolInput } from "./ToolTypes.js";

const missingArguments = (input: ToolInput, definition: ToolDefinition): string[] => {
  const required = definition.input_schema.required ?? [];
  return required.filter((key) => input[key] === undefined || input[key] === null);
};

/** Name-keyed tool registry; tools keep registration order. */
export class ToolManager {
  private tools = new Map<string, Tool>();

  registerTool(tool: Tool): void {
    const definition = tool.getToolDefinition();
    if (!definition.name) {
      throw new Error("Tool must have a 'name' in its definition");
    }
    this.tools.set(definition.name, tool);
  }

  getToolDefinitions(): ToolDefinition[] {
    return Array.from(this.tools.values()).map((tool) => tool.getToolDefinition());
  }

  async executeTool(name: string, input: ToolInput = {}): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      return `Tool '${name}' not found`;
    }
    const missing = missingArguments(input, tool.getToolDefinition());
    if (missing.length) {
      throw new ToolInputError(`Missing required arguments: ${missing.join(", ")}`, name);
    }
    return tool.execute(input);
  }

  /** Sources of the first tool (in registration order) that has any. */
  getLastSources(): Source[] {
    for (const tool of this.tools.values()) {
      if (isSourceTracking(tool)) {
        const sources = tool.getSources();
        if (sources.length) return sources;
      }
    }
    return [];
  }

  resetSources(): void {
    for (const tool of this.tools.values()) {
      if (isSourceTracking(tool)) tool.resetSources();
    }
  }
}
