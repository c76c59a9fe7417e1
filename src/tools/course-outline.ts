import * as z from "zod";

import { defineTool, type ToolDescriptor } from "../tool-registry";
import type { CourseCatalog, CourseInfo } from "./course-catalog";

export const COURSE_OUTLINE_TOOL = "get_course_outline";

const inputSchema = z.object({
  course_title: z.string().trim().min(1, "course_title must not be empty"),
});

export function formatOutline(course: CourseInfo): string {
  const lines = [`**${course.title}**`];
  if (course.link) {
    lines.push(`Course Link: ${course.link}`);
  }

  if (course.lessons.length > 0) {
    lines.push("\n**Lessons:**");
    const sorted = [...course.lessons].sort((a, b) => a.number - b.number);
    for (const lesson of sorted) {
      lines.push(`${lesson.number}. ${lesson.title}`);
    }
  } else {
    lines.push("\nNo lessons found for this course.");
  }

  return lines.join("\n");
}

/** Course structure lookup. Its output is navigation, so it carries no sources. */
export function createCourseOutlineTool(catalog: CourseCatalog): ToolDescriptor {
  return defineTool({
    name: COURSE_OUTLINE_TOOL,
    description:
      "Get course outline showing title, link, and all lessons with their numbers and titles",
    parameters: {
      course_title: {
        type: "string",
        description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
        required: true,
      },
    },
    inputSchema,
    async execute({ course_title }) {
      const resolved = await catalog.resolveCourseName(course_title);
      if (!resolved) {
        return `No course found matching '${course_title}'`;
      }

      const course = await catalog.getCourse(resolved);
      if (!course) {
        return `Course '${resolved}' not found in metadata`;
      }

      return formatOutline(course);
    },
  });
}
