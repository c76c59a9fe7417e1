// Course catalog: the store contract the course tools read from, plus a
// keyword-scoring in-memory implementation loaded from a JSON file.
// Chunking and embedding live elsewhere; only the query contract matters here.

import { readFile } from "node:fs/promises";
import * as z from "zod";

export interface LessonInfo {
  number: number;
  title: string;
  link?: string;
}

export interface CourseInfo {
  title: string;
  link?: string;
  instructor?: string;
  lessons: LessonInfo[];
}

export interface SearchHit {
  content: string;
  courseTitle: string;
  lessonNumber?: number;
}

export interface CatalogSearchParams {
  query: string;
  courseName?: string;
  lessonNumber?: number;
  limit?: number;
}

export type CatalogSearchResult =
  | { ok: true; hits: SearchHit[] }
  | { ok: false; error: string };

export interface CourseCatalog {
  search(params: CatalogSearchParams): Promise<CatalogSearchResult>;
  /** Best match for a partial, case-insensitive course name. */
  resolveCourseName(name: string): Promise<string | undefined>;
  getCourse(title: string): Promise<CourseInfo | undefined>;
  getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | undefined>;
  listCourses(): Promise<CourseInfo[]>;
}

const lessonSchema = z.object({
  number: z.number().int().nonnegative(),
  title: z.string().min(1),
  link: z.string().url().optional(),
  content: z.string(),
});

const courseSchema = z.object({
  title: z.string().min(1),
  link: z.string().url().optional(),
  instructor: z.string().optional(),
  lessons: z.array(lessonSchema),
});

export const catalogFileSchema = z.object({
  courses: z.array(courseSchema),
});

export type CatalogFile = z.infer<typeof catalogFileSchema>;

const DEFAULT_LIMIT = 5;
const CHUNK_SIZE = 800;

function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/** Split lesson text on paragraph breaks, packing paragraphs up to CHUNK_SIZE. */
function chunkLesson(content: string): string[] {
  const chunks: string[] = [];
  let current = "";
  for (const para of content.split(/\n\s*\n/)) {
    const trimmed = para.trim();
    if (!trimmed) continue;
    if (current && current.length + trimmed.length + 2 > CHUNK_SIZE) {
      chunks.push(current);
      current = trimmed;
    } else {
      current = current ? `${current}\n\n${trimmed}` : trimmed;
    }
  }
  if (current) chunks.push(current);
  return chunks;
}

interface IndexedChunk {
  hit: SearchHit;
  terms: Set<string>;
}

export class InMemoryCourseCatalog implements CourseCatalog {
  private courses: CourseInfo[];
  private chunks: IndexedChunk[] = [];

  constructor(data: CatalogFile) {
    this.courses = data.courses.map((c) => ({
      title: c.title,
      ...(c.link ? { link: c.link } : {}),
      ...(c.instructor ? { instructor: c.instructor } : {}),
      lessons: c.lessons.map((l) => ({
        number: l.number,
        title: l.title,
        ...(l.link ? { link: l.link } : {}),
      })),
    }));

    for (const course of data.courses) {
      for (const lesson of course.lessons) {
        for (const text of chunkLesson(lesson.content)) {
          this.chunks.push({
            hit: { content: text, courseTitle: course.title, lessonNumber: lesson.number },
            terms: new Set(tokenize(`${lesson.title} ${text}`)),
          });
        }
      }
    }
  }

  static async fromFile(path: string): Promise<InMemoryCourseCatalog> {
    const raw = await readFile(path, "utf8");
    const parsed = catalogFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.join(".") || "root";
      throw new Error(`Invalid course catalog ${path}: ${where}: ${issue?.message ?? "unknown"}`);
    }
    return new InMemoryCourseCatalog(parsed.data);
  }

  async search(params: CatalogSearchParams): Promise<CatalogSearchResult> {
    let courseTitle: string | undefined;
    if (params.courseName) {
      courseTitle = await this.resolveCourseName(params.courseName);
      if (!courseTitle) {
        return { ok: false, error: `No course found matching '${params.courseName}'` };
      }
    }

    const queryTerms = [...new Set(tokenize(params.query))];
    const scored: { hit: SearchHit; score: number }[] = [];

    for (const chunk of this.chunks) {
      if (courseTitle && chunk.hit.courseTitle !== courseTitle) continue;
      if (params.lessonNumber !== undefined && chunk.hit.lessonNumber !== params.lessonNumber) {
        continue;
      }
      const score = queryTerms.filter((t) => chunk.terms.has(t)).length;
      if (score > 0) scored.push({ hit: chunk.hit, score });
    }

    // Array.prototype.sort is stable, so equal scores keep catalog order
    scored.sort((a, b) => b.score - a.score);
    return { ok: true, hits: scored.slice(0, params.limit ?? DEFAULT_LIMIT).map((s) => s.hit) };
  }

  async resolveCourseName(name: string): Promise<string | undefined> {
    const needle = name.trim().toLowerCase();
    if (!needle) return undefined;

    const exact = this.courses.find((c) => c.title.toLowerCase() === needle);
    if (exact) return exact.title;

    const partial = this.courses.find((c) => c.title.toLowerCase().includes(needle));
    if (partial) return partial.title;

    // Fall back to the course sharing the most words with the name
    const terms = tokenize(needle);
    let best: { title: string; score: number } | undefined;
    for (const course of this.courses) {
      const titleTerms = new Set(tokenize(course.title));
      const score = terms.filter((t) => titleTerms.has(t)).length;
      if (score > 0 && (!best || score > best.score)) {
        best = { title: course.title, score };
      }
    }
    return best?.title;
  }

  async getCourse(title: string): Promise<CourseInfo | undefined> {
    return this.courses.find((c) => c.title === title);
  }

  async getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | undefined> {
    const course = await this.getCourse(courseTitle);
    return course?.lessons.find((l) => l.number === lessonNumber)?.link;
  }

  async listCourses(): Promise<CourseInfo[]> {
    return [...this.courses];
  }
}
