/**
 * Document Processor
 * Parses course text files into course metadata and overlapping content chunks
 */

import { readFile } from 'fs/promises';
import * as path from 'path';
import { env } from '../env.js';
import type { Course, CourseChunk, Lesson } from './course-models.js';

export interface ParsedCourseDocument {
  course: Course;
  chunks: CourseChunk[];
}

interface LessonDraft {
  lesson: Lesson;
  lines: string[];
}

const COURSE_TITLE = /^Course Title:\s*(.+)$/i;
const COURSE_LINK = /^Course Link:\s*(.+)$/i;
const COURSE_INSTRUCTOR = /^Course Instructor:\s*(.+)$/i;
const LESSON_HEADER = /^Lesson\s+(\d+):\s*(.+)$/i;
const LESSON_LINK = /^Lesson Link:\s*(.+)$/i;

function splitSentences(text: string): string[] {
  return text.split(/(?<=[.!?])\s+/).filter(Boolean);
}

export class DocumentProcessor {
  constructor(
    private chunkSize: number = env.CHUNK_SIZE,
    private chunkOverlap: number = env.CHUNK_OVERLAP
  ) {
    if (chunkOverlap >= chunkSize) {
      throw new Error(`Chunk overlap (${chunkOverlap}) must be smaller than chunk size (${chunkSize})`);
    }
  }

  /**
   * Packs whole sentences into chunks of at most `chunkSize` characters.
   * Each new chunk repeats trailing sentences of the previous one, up to
   * `chunkOverlap` characters. A sentence longer than the limit stands alone.
   */
  chunkText(text: string): string[] {
    const sentences = splitSentences(text.replace(/\s+/g, ' ').trim());
    const chunks: string[] = [];

    let start = 0;
    while (start < sentences.length) {
      const current: string[] = [];
      let size = 0;

      for (let i = start; i < sentences.length; i++) {
        const added = sentences[i].length + (current.length > 0 ? 1 : 0);
        if (size + added > this.chunkSize && current.length > 0) break;
        current.push(sentences[i]);
        size += added;
      }

      chunks.push(current.join(' '));

      if (start + current.length >= sentences.length) break;

      let overlapSize = 0;
      let overlapCount = 0;
      for (let k = current.length - 1; k >= 0; k--) {
        const added = current[k].length + (overlapCount > 0 ? 1 : 0);
        if (overlapSize + added > this.chunkOverlap) break;
        overlapSize += added;
        overlapCount++;
      }

      start = Math.max(start + 1, start + current.length - overlapCount);
    }

    return chunks;
  }

  parseCourseDocument(content: string, fileName: string): ParsedCourseDocument {
    const lines = content.split(/\r?\n/);

    let title: string | undefined;
    let courseLink: string | undefined;
    let instructor: string | undefined;
    let bodyStart = 0;

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (!line) continue;

      const titleMatch = line.match(COURSE_TITLE);
      const linkMatch = line.match(COURSE_LINK);
      const instructorMatch = line.match(COURSE_INSTRUCTOR);

      if (titleMatch) title = titleMatch[1].trim();
      else if (linkMatch) courseLink = linkMatch[1].trim();
      else if (instructorMatch) instructor = instructorMatch[1].trim();
      else break;

      bodyStart = i + 1;
    }

    const preamble: string[] = [];
    const drafts: LessonDraft[] = [];
    let current: LessonDraft | undefined;

    for (const rawLine of lines.slice(bodyStart)) {
      const line = rawLine.trim();
      const header = line.match(LESSON_HEADER);

      if (header) {
        current = { lesson: { lessonNumber: parseInt(header[1], 10), title: header[2].trim() }, lines: [] };
        drafts.push(current);
        continue;
      }

      const lessonLink = line.match(LESSON_LINK);
      if (current && lessonLink && !current.lesson.lessonLink && current.lines.every(l => !l)) {
        current.lesson.lessonLink = lessonLink[1].trim();
        continue;
      }

      (current ? current.lines : preamble).push(line);
    }

    const course: Course = {
      title: title || path.parse(fileName).name,
      lessons: drafts.map(d => d.lesson),
      ...(courseLink ? { courseLink } : {}),
      ...(instructor ? { instructor } : {}),
    };

    const chunks: CourseChunk[] = [];
    const pushChunks = (text: string, lessonNumber?: number) => {
      this.chunkText(text).forEach((chunk, i) => {
        chunks.push({
          content: i === 0 && lessonNumber !== undefined ? `Lesson ${lessonNumber} content: ${chunk}` : chunk,
          courseTitle: course.title,
          chunkIndex: chunks.length,
          ...(lessonNumber !== undefined ? { lessonNumber } : {}),
        });
      });
    };

    if (drafts.length === 0) {
      pushChunks(preamble.join('\n'));
    }

    for (const draft of drafts) {
      pushChunks(draft.lines.join('\n'), draft.lesson.lessonNumber);
    }

    return { course, chunks };
  }

  async processCourseDocument(filePath: string): Promise<ParsedCourseDocument> {
    const content = await readFile(filePath, 'utf-8');
    return this.parseCourseDocument(content, path.basename(filePath));
  }
}
