import type { AnthropicToolSchema, OpenAIToolSchema, ToolFormat, ToolSchemaSet } from "../llm/types.js";
import { ToolNotFoundError } from "../errors.js";
import type { Tool, ToolDefinition, ToolResult } from "./types.js";

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  /** Registering a name that already exists replaces the earlier tool. */
  register(tool: Tool): this {
    this.tools.set(tool.definition.name, tool);
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  definitions(): ToolDefinition[] {
    return [...this.tools.values()].map((tool) => tool.definition);
  }

  schemas(format: "anthropic"): AnthropicToolSchema[];
  schemas(format: "openai"): OpenAIToolSchema[];
  schemas(format: ToolFormat): AnthropicToolSchema[] | OpenAIToolSchema[];
  schemas(format: ToolFormat): AnthropicToolSchema[] | OpenAIToolSchema[] {
    const definitions = this.definitions();
    if (format === "anthropic") {
      return definitions.map((definition): AnthropicToolSchema => ({
        name: definition.name,
        description: definition.description,
        input_schema: {
          type: "object",
          properties: { ...definition.parameters.properties },
          required: [...definition.parameters.required]
        }
      }));
    }

    return definitions.map((definition): OpenAIToolSchema => ({
      type: "function",
      function: {
        name: definition.name,
        description: definition.description,
        parameters: {
          type: "object",
          properties: { ...definition.parameters.properties },
          required: [...definition.parameters.required]
        }
      }
    }));
  }

  schemaSet(format: ToolFormat): ToolSchemaSet {
    return format === "anthropic"
      ? { format, schemas: this.schemas(format) }
      : { format, schemas: this.schemas(format) };
  }

  async invoke(name: string, args: Record<string, unknown>): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolNotFoundError(name);
    }
    return tool.run(args);
  }
}
