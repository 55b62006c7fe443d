// Course Outline Tool
// Returns a course's title, instructor, link and lesson list

import { z } from 'zod';
import type { Course } from '../course-models.js';
import type { CourseIndex } from '../vector-store.js';
import type { Tool } from './types.js';
import { parseToolArgs } from './validation.js';

const OutlineArgsSchema = z.object({
  course_title: z.string().min(1),
});

export function formatCourseOutline(course: Course): string {
  const lines = [
    `Course: ${course.title}`,
    `Instructor: ${course.instructor || 'Unknown'}`,
    `Course Link: ${course.courseLink || 'N/A'}`,
    '',
    'Lessons:',
  ];

  if (course.lessons.length === 0) {
    lines.push('No lessons available');
  }

  for (const lesson of course.lessons) {
    const link = lesson.lessonLink ? ` (${lesson.lessonLink})` : '';
    lines.push(`- Lesson ${lesson.lessonNumber}: ${lesson.title}${link}`);
  }

  return lines.join('\n');
}

export function createCourseOutlineTool(index: CourseIndex): Tool {
  return {
    schema: {
      name: 'get_course_outline',
      description:
        'Get the complete outline of a course: title, instructor, course link and the numbered list of lessons. ' +
        'Use for questions about course structure, syllabus or which lessons a course contains.',
      parameters: [
        {
          name: 'course_title',
          type: 'string',
          description: "Course title to look up (partial matches work, e.g. 'MCP', 'Introduction')",
          required: true,
        },
      ],
    },

    execute: async (args) => {
      const { course_title: courseTitle } = parseToolArgs('get_course_outline', OutlineArgsSchema, args);

      const resolved = await index.resolveCourseName(courseTitle);
      const course = resolved ? index.getCourseOutline(resolved) : undefined;

      if (!course) {
        return { content: `No course found matching '${courseTitle}'`, sources: [] };
      }

      const name = `${course.title} - Course Outline`;
      return {
        content: formatCourseOutline(course),
        sources: [course.courseLink ? { name, link: course.courseLink } : { name }],
      };
    },
  };
}
