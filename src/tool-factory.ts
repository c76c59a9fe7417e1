import { ToolRegistry } from "./tool-registry";
import type { CourseCatalog } from "./tools/course-catalog";
import { createCourseOutlineTool } from "./tools/course-outline";
import { createCourseSearchTool } from "./tools/course-search";

export interface CourseToolsOptions {
  maxResults?: number;
}

/** Registry with the course tools, search first. */
export function createCourseTools(
  catalog: CourseCatalog,
  options: CourseToolsOptions = {},
): ToolRegistry {
  return new ToolRegistry()
    .register(createCourseSearchTool(catalog, options.maxResults))
    .register(createCourseOutlineTool(catalog));
}
