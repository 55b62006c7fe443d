// Course Search Tool
// Semantic search over course content with optional course and lesson filters

import { z } from 'zod';
import type { CourseIndex, SearchResults } from '../vector-store.js';
import type { Source, Tool, ToolOutput } from './types.js';
import { parseToolArgs } from './validation.js';

const SearchArgsSchema = z.object({
  query: z.string().min(1),
  course_name: z.string().nullish(),
  lesson_number: z.number().int().nonnegative().nullish(),
});

function describeEmptyResult(courseName?: string, lessonNumber?: number): string {
  let message = 'No relevant content found';
  if (courseName) {
    message += ` in course '${courseName}'`;
  }
  if (lessonNumber !== undefined) {
    message += ` in lesson ${lessonNumber}`;
  }
  return `${message}.`;
}

function formatResults(index: CourseIndex, results: SearchResults): ToolOutput {
  const blocks: string[] = [];
  const sources: Source[] = [];

  results.documents.forEach((document, i) => {
    const { courseTitle, lessonNumber } = results.metadata[i];

    const label = lessonNumber !== undefined ? `${courseTitle} - Lesson ${lessonNumber}` : courseTitle;
    blocks.push(`[${label}]\n${document}`);

    const link = (lessonNumber !== undefined ? index.getLessonLink(courseTitle, lessonNumber) : undefined)
      ?? index.getCourseLink(courseTitle);
    sources.push(link ? { name: label, link } : { name: label });
  });

  return { content: blocks.join('\n\n'), sources };
}

export function createCourseSearchTool(index: CourseIndex): Tool {
  return {
    schema: {
      name: 'search_course_content',
      description: 'Search course materials with smart course name matching and lesson filtering',
      parameters: [
        {
          name: 'query',
          type: 'string',
          description: 'What to search for in the course content',
          required: true,
        },
        {
          name: 'course_name',
          type: 'string',
          description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
          required: false,
        },
        {
          name: 'lesson_number',
          type: 'integer',
          description: 'Specific lesson number to search within (e.g. 0, 1, 2)',
          required: false,
        },
      ],
    },

    execute: async (args) => {
      const parsed = parseToolArgs('search_course_content', SearchArgsSchema, args);
      const courseName = parsed.course_name ?? undefined;
      const lessonNumber = parsed.lesson_number ?? undefined;

      const results = await index.search({ query: parsed.query, courseName, lessonNumber });

      if (results.error) {
        return { content: results.error, sources: [] };
      }

      if (results.documents.length === 0) {
        return { content: describeEmptyResult(courseName, lessonNumber), sources: [] };
      }

      return formatResults(index, results);
    },
  };
}
