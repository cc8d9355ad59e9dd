import type { z } from "zod";
import { ToolInvocationError } from "../errors.js";

export interface JsonSchemaProperty {
  type: "string" | "integer" | "number" | "boolean";
  description: string;
}

/** Provider-neutral call schema; ToolRegistry translates it per backend. */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: {
    type: "object";
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
}

export interface ToolResult {
  text: string;
  /** Source labels of the material the result was built from, in order. */
  sources: string[];
}

export interface Tool {
  readonly definition: ToolDefinition;
  run(args: Record<string, unknown>): Promise<ToolResult>;
}

export function parseToolArguments<T extends z.ZodTypeAny>(
  toolName: string,
  schema: T,
  args: Record<string, unknown>
): z.infer<T> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`
    );
    throw new ToolInvocationError(toolName, `Invalid arguments for ${toolName}: ${issues.join("; ")}`, {
      cause: parsed.error
    });
  }
  return parsed.data;
}
