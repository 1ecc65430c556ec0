import { z } from "zod";
import { Source } from "../domain/types.js";
import { ToolDefinition } from "../infra/ai/types.js";

export interface Tool {
  readonly definition: ToolDefinition;
  execute(input: Record<string, unknown>): Promise<string>;
}

/** A tool whose last execution produced sources for the UI. */
export interface SourceTrackingTool extends Tool {
  lastSources: Source[];
}

export function tracksSources(tool: Tool): tool is SourceTrackingTool {
  return "lastSources" in tool && Array.isArray(tool.lastSources);
}

export function parseToolInput<T extends z.ZodTypeAny>(
  schema: T,
  toolName: string,
  input: Record<string, unknown>,
): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid input for ${toolName}: ${issues}`);
  }
  return parsed.data;
}
