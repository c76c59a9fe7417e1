import * as z from "zod";

import { defineTool, type ToolDescriptor } from "../tool-registry";
import type { Source } from "../types";
import type { CourseCatalog, SearchHit } from "./course-catalog";

export const COURSE_SEARCH_TOOL = "search_course_content";

const inputSchema = z.object({
  query: z.string().trim().min(1, "query must not be empty"),
  course_name: z.string().optional(),
  lesson_number: z.number().int().optional(),
});

function label(hit: SearchHit): string {
  return hit.lessonNumber !== undefined
    ? `${hit.courseTitle} - Lesson ${hit.lessonNumber}`
    : hit.courseTitle;
}

export function createCourseSearchTool(
  catalog: CourseCatalog,
  maxResults = 5,
): ToolDescriptor {
  return defineTool({
    name: COURSE_SEARCH_TOOL,
    description:
      "Search course materials with smart course name matching and lesson filtering",
    parameters: {
      query: {
        type: "string",
        description: "What to search for in the course content",
        required: true,
      },
      course_name: {
        type: "string",
        description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
      },
      lesson_number: {
        type: "integer",
        description: "Specific lesson number to search within (e.g. 1, 2, 3)",
      },
    },
    inputSchema,
    async execute({ query, course_name, lesson_number }) {
      const result = await catalog.search({
        query,
        ...(course_name ? { courseName: course_name } : {}),
        ...(lesson_number !== undefined ? { lessonNumber: lesson_number } : {}),
        limit: maxResults,
      });

      if (!result.ok) {
        return result.error;
      }

      if (result.hits.length === 0) {
        let filterInfo = "";
        if (course_name) filterInfo += ` in course '${course_name}'`;
        if (lesson_number !== undefined) filterInfo += ` in lesson ${lesson_number}`;
        return `No relevant content found${filterInfo}.`;
      }

      const blocks: string[] = [];
      const sources: Source[] = [];

      for (const hit of result.hits) {
        const text = label(hit);
        blocks.push(`[${text}]\n${hit.content}`);

        const link =
          hit.lessonNumber !== undefined
            ? await catalog.getLessonLink(hit.courseTitle, hit.lessonNumber)
            : undefined;
        sources.push(link ? { displayText: text, link } : { displayText: text });
      }

      return { content: blocks.join("\n\n"), sources };
    },
  });
}
