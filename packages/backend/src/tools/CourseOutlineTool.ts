import { z } from "zod";
import type { RetrievalIndex } from "../retrieval/RetrievalIndex.js";
import { parseToolArguments, type Tool, type ToolDefinition, type ToolResult } from "./types.js";

const outlineArgumentsSchema = z.object({
  course_name: z.string().trim().min(1)
});

/** Returns a course's title, link, instructor and numbered lesson list. */
export class CourseOutlineTool implements Tool {
  readonly definition: ToolDefinition = {
    name: "get_course_outline",
    description:
      "Get the outline of a course: its title, link, instructor and the complete list of lessons " +
      "with their numbers and titles.",
    parameters: {
      type: "object",
      properties: {
        course_name: {
          type: "string",
          description: "Course title or part of it"
        }
      },
      required: ["course_name"]
    }
  };

  constructor(private readonly index: RetrievalIndex) {}

  async run(args: Record<string, unknown>): Promise<ToolResult> {
    const input = parseToolArguments(this.definition.name, outlineArgumentsSchema, args);
    const title = this.index.resolveCourseTitle(input.course_name);
    const course = title === null ? null : this.index.getCourse(title);
    if (!course) {
      return { text: `No course found matching '${input.course_name}'.`, sources: [] };
    }

    const lines = [`Course: ${course.title}`];
    if (course.link) {
      lines.push(`Link: ${course.link}`);
    }
    if (course.instructor) {
      lines.push(`Instructor: ${course.instructor}`);
    }

    if (course.lessons.length === 0) {
      lines.push("Lessons: none listed");
    } else {
      lines.push(`Lessons (${course.lessons.length}):`);
      for (const lesson of course.lessons) {
        lines.push(`  Lesson ${lesson.number}: ${lesson.title}`);
      }
    }

    return { text: lines.join("\n"), sources: [course.title] };
  }
}
