import { z } from "zod";
import type { SearchFilter } from "@coursemate/shared";
import type { RetrievalIndex } from "../retrieval/RetrievalIndex.js";
import { parseToolArguments, type Tool, type ToolDefinition, type ToolResult } from "./types.js";

const searchArgumentsSchema = z.object({
  query: z.string().trim().min(1),
  course_name: z.string().trim().nullish(),
  lesson_number: z.coerce.number().int().nonnegative().nullish()
});

export class CourseSearchTool implements Tool {
  readonly definition: ToolDefinition = {
    name: "search_course_content",
    description:
      "Search the indexed course materials for passages relevant to a question. " +
      "Optionally restrict the search to one course (partial names work) and one lesson number.",
    parameters: {
      type: "object",
      properties: {
        query: {
          type: "string",
          description: "What to search for in the course content"
        },
        course_name: {
          type: "string",
          description: "Course title or part of it, e.g. 'MCP' or 'Introduction'"
        },
        lesson_number: {
          type: "integer",
          description: "Lesson number to search within, e.g. 0 for an introduction, 1 or 2"
        }
      },
      required: ["query"]
    }
  };

  constructor(
    private readonly index: RetrievalIndex,
    private readonly maxResults = 5
  ) {}

  async run(args: Record<string, unknown>): Promise<ToolResult> {
    const input = parseToolArguments(this.definition.name, searchArgumentsSchema, args);
    const courseName = input.course_name ? input.course_name : null;
    const lessonNumber = input.lesson_number ?? null;

    let courseTitle: string | null = null;
    if (courseName !== null) {
      courseTitle = this.index.resolveCourseTitle(courseName);
      if (courseTitle === null) {
        return { text: `No course found matching '${courseName}'.`, sources: [] };
      }
    }

    const filter: SearchFilter = { courseTitle, lessonNumber };
    const hits = await this.index.search(input.query, filter, this.maxResults);
    if (hits.length === 0) {
      return { text: `No relevant content found${describeFilter(filter)}.`, sources: [] };
    }

    const sources: string[] = [];
    for (const hit of hits) {
      if (!sources.includes(hit.chunk.sourceLabel)) {
        sources.push(hit.chunk.sourceLabel);
      }
    }

    return {
      text: hits.map((hit) => `[${hit.chunk.sourceLabel}]\n${hit.chunk.text}`).join("\n\n"),
      sources
    };
  }
}

function describeFilter(filter: SearchFilter): string {
  let description = "";
  if (filter.courseTitle !== null) {
    description += ` in course '${filter.courseTitle}'`;
  }
  if (filter.lessonNumber !== null) {
    description += ` in lesson ${filter.lessonNumber}`;
  }
  return description;
}
