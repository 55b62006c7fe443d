import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { DocumentProcessor } from '../document-processor.js';

const COURSE_DOCUMENT = [
  'Course Title: Vector Search 101',
  'Course Link: https://example.com/vs',
  'Course Instructor: Sam Park',
  '',
  'Lesson 0: Welcome',
  'Lesson Link: https://example.com/vs/0',
  'Welcome to the course. We cover indexing.',
  '',
  'Lesson 1: Indexing',
  'Indexes speed up search.',
  'Lesson Link: https://example.com/not-a-link',
  '',
].join('\n');

describe('Document Processor', () => {
  describe('chunkText', () => {
    it('should pack sentences and repeat trailing ones as overlap', () => {
      const processor = new DocumentProcessor(40, 15);

      expect(processor.chunkText('One two three. Four five six. Seven eight nine. Ten.')).toEqual([
        'One two three. Four five six.',
        'Four five six. Seven eight nine. Ten.',
      ]);
    });

    it('should keep an oversized sentence whole', () => {
      const processor = new DocumentProcessor(10, 2);

      expect(processor.chunkText('Supercalifragilistic word. Hi.')).toEqual(['Supercalifragilistic word.', 'Hi.']);
    });

    it('should normalise whitespace', () => {
      const processor = new DocumentProcessor(40, 10);

      expect(processor.chunkText('A b.\n\n   C d.')).toEqual(['A b. C d.']);
    });

    it('should return nothing for blank text', () => {
      expect(new DocumentProcessor(40, 10).chunkText('  \n ')).toEqual([]);
    });
  });

  it('should reject an overlap that is not smaller than the chunk size', () => {
    expect(() => new DocumentProcessor(100, 100)).toThrow('Chunk overlap (100) must be smaller than chunk size (100)');
  });

  describe('parseCourseDocument', () => {
    it('should read course metadata and lessons', () => {
      const { course } = new DocumentProcessor(200, 20).parseCourseDocument(COURSE_DOCUMENT, 'vs.txt');

      expect(course).toEqual({
        title: 'Vector Search 101',
        courseLink: 'https://example.com/vs',
        instructor: 'Sam Park',
        lessons: [
          { lessonNumber: 0, title: 'Welcome', lessonLink: 'https://example.com/vs/0' },
          { lessonNumber: 1, title: 'Indexing' },
        ],
      });
    });

    it('should prefix the first chunk of each lesson', () => {
      const { chunks } = new DocumentProcessor(200, 20).parseCourseDocument(COURSE_DOCUMENT, 'vs.txt');

      expect(chunks).toEqual([
        {
          content: 'Lesson 0 content: Welcome to the course. We cover indexing.',
          courseTitle: 'Vector Search 101',
          lessonNumber: 0,
          chunkIndex: 0,
        },
        {
          content: 'Lesson 1 content: Indexes speed up search. Lesson Link: https://example.com/not-a-link',
          courseTitle: 'Vector Search 101',
          lessonNumber: 1,
          chunkIndex: 1,
        },
      ]);
    });

    it('should number chunks across a multi-chunk lesson', () => {
      const { chunks } = new DocumentProcessor(40, 15).parseCourseDocument(
        'Lesson 1: Counting\nOne two three. Four five six. Seven eight nine. Ten.',
        'counting.txt'
      );

      expect(chunks.map(c => [c.chunkIndex, c.lessonNumber, c.content])).toEqual([
        [0, 1, 'Lesson 1 content: One two three. Four five six.'],
        [1, 1, 'Four five six. Seven eight nine. Ten.'],
      ]);
    });

    it('should fall back to the file name and chunk a document without lessons', () => {
      const parsed = new DocumentProcessor(200, 20).parseCourseDocument(
        'Just some notes. Nothing else.',
        'notes/misc-notes.txt'
      );

      expect(parsed.course).toEqual({ title: 'misc-notes', lessons: [] });
      expect(parsed.chunks).toEqual([
        { content: 'Just some notes. Nothing else.', courseTitle: 'misc-notes', chunkIndex: 0 },
      ]);
    });
  });

  describe('processCourseDocument', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await mkdtemp(path.join(tmpdir(), 'course-docs-'));
      await writeFile(path.join(dir, 'vs.txt'), COURSE_DOCUMENT, 'utf-8');
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should parse a document from disk', async () => {
      const parsed = await new DocumentProcessor(200, 20).processCourseDocument(path.join(dir, 'vs.txt'));

      expect(parsed.course.title).toBe('Vector Search 101');
      expect(parsed.chunks).toHaveLength(2);
    });
  });
});
