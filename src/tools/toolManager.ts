import { Source } from "../domain/types.js";
import { ToolDefinition } from "../infra/ai/types.js";
import { Tool, tracksSources } from "./types.js";

export class ToolManager {
  private readonly tools = new Map<string, Tool>();

  register(tool: Tool): this {
    const { name } = tool.definition;
    if (!name) {
      throw new Error("Tool definition must have a name.");
    }
    this.tools.set(name, tool);
    return this;
  }

  getToolDefinitions(): ToolDefinition[] {
    return [...this.tools.values()].map((tool) => tool.definition);
  }

  async executeTool(name: string, input: Record<string, unknown>): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      return `Tool '${name}' not found`;
    }
    return tool.execute(input);
  }

  /** Sources from the first tool that recorded any during this query. */
  getLastSources(): Source[] {
    for (const tool of this.tools.values()) {
      if (tracksSources(tool) && tool.lastSources.length > 0) {
        return [...tool.lastSources];
      }
    }
    return [];
  }

  resetSources(): void {
    for (const tool of this.tools.values()) {
      if (tracksSources(tool)) {
        tool.lastSources = [];
      }
    }
  }
}
