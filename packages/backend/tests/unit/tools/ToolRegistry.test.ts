import { describe, expect, it } from "vitest";
import { ToolNotFoundError } from "../../../src/errors.js";
import { ToolRegistry } from "../../../src/tools/ToolRegistry.js";
import type { Tool, ToolResult } from "../../../src/tools/types.js";

function echoTool(name: string, reply: string): Tool {
  return {
    definition: {
      name,
      description: `Echo ${name}`,
      parameters: {
        type: "object",
        properties: { value: { type: "string", description: "Value to echo" } },
        required: ["value"]
      }
    },
    run: async (args): Promise<ToolResult> => ({ text: `${reply}:${String(args.value)}`, sources: [] })
  };
}

describe("ToolRegistry", () => {
  it("translates definitions into Anthropic tool schemas", () => {
    const registry = new ToolRegistry().register(echoTool("echo", "a"));

    expect(registry.schemas("anthropic")).toEqual([
      {
        name: "echo",
        description: "Echo echo",
        input_schema: {
          type: "object",
          properties: { value: { type: "string", description: "Value to echo" } },
          required: ["value"]
        }
      }
    ]);
  });

  it("translates definitions into function-calling schemas", () => {
    const registry = new ToolRegistry().register(echoTool("echo", "a"));

    expect(registry.schemaSet("openai")).toEqual({
      format: "openai",
      schemas: [
        {
          type: "function",
          function: {
            name: "echo",
            description: "Echo echo",
            parameters: {
              type: "object",
              properties: { value: { type: "string", description: "Value to echo" } },
              required: ["value"]
            }
          }
        }
      ]
    });
  });

  it("dispatches by name", async () => {
    const registry = new ToolRegistry().register(echoTool("first", "1")).register(echoTool("second", "2"));

    expect(await registry.invoke("second", { value: "x" })).toEqual({ text: "2:x", sources: [] });
    expect(registry.size).toBe(2);
  });

  it("replaces a tool registered under an existing name", async () => {
    const registry = new ToolRegistry().register(echoTool("echo", "old")).register(echoTool("echo", "new"));

    expect(registry.size).toBe(1);
    expect(await registry.invoke("echo", { value: "x" })).toEqual({ text: "new:x", sources: [] });
  });

  it("rejects an unknown tool", async () => {
    const registry = new ToolRegistry();

    await expect(registry.invoke("missing", {})).rejects.toBeInstanceOf(ToolNotFoundError);
    await expect(registry.invoke("missing", {})).rejects.toThrow("Unknown tool: missing");
    expect(registry.has("missing")).toBe(false);
  });
});
