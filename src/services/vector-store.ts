/**
 * Vector Store
 * In-process index of the course catalog and course content chunks.
 * Ranks chunks by cosine similarity against the query embedding.
 */

import { env } from '../env.js';
import type { Course, CourseChunk, Lesson } from './course-models.js';
import { OpenAIEmbedder, type Embedder } from './embeddings.js';

export interface SearchMetadata {
  courseTitle: string;
  lessonNumber?: number;
  chunkIndex: number;
}

export interface SearchResults {
  documents: string[];
  metadata: SearchMetadata[];
  distances: number[];
  error?: string;
}

export interface SearchParams {
  query: string;
  courseName?: string;
  lessonNumber?: number;
  limit?: number;
}

/**
 * The slice of the store the retrieval tools depend on.
 */
export interface CourseIndex {
  search(params: SearchParams): Promise<SearchResults>;
  resolveCourseName(courseName: string): Promise<string | null>;
  getCourseLink(courseTitle: string): string | undefined;
  getLessonLink(courseTitle: string, lessonNumber: number): string | undefined;
  getCourseOutline(courseTitle: string): Course | undefined;
}

export interface VectorStoreOptions {
  embedder?: Embedder;
  maxResults?: number;
  minTitleSimilarity?: number;
}

interface CatalogEntry {
  course: Course;
  embedding: number[];
}

interface IndexedChunk {
  chunk: CourseChunk;
  embedding: number[];
}

export function emptySearchResults(error?: string): SearchResults {
  return { documents: [], metadata: [], distances: [], ...(error ? { error } : {}) };
}

/**
 * Calculate cosine similarity between two vectors
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error('Vectors must have the same length');
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  normA = Math.sqrt(normA);
  normB = Math.sqrt(normB);

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dotProduct / (normA * normB);
}

export class VectorStore implements CourseIndex {
  private catalog: Map<string, CatalogEntry> = new Map();
  private chunks: IndexedChunk[] = [];
  private embedder: Embedder;
  private maxResults: number;
  private minTitleSimilarity: number;

  constructor(options: VectorStoreOptions = {}) {
    this.embedder = options.embedder ?? new OpenAIEmbedder();
    this.maxResults = options.maxResults ?? env.MAX_RESULTS;
    this.minTitleSimilarity = options.minTitleSimilarity ?? 0.35;
  }

  /**
   * Search course content, optionally scoped to a course (fuzzy-resolved)
   * and a lesson number. Distances are `1 - similarity`, ascending.
   */
  async search({ query, courseName, lessonNumber, limit }: SearchParams): Promise<SearchResults> {
    let courseTitle: string | undefined;
    if (courseName) {
      const resolved = await this.resolveCourseName(courseName);
      if (!resolved) {
        return emptySearchResults(`No course found matching '${courseName}'`);
      }
      courseTitle = resolved;
    }

    const candidates = this.chunks.filter(({ chunk }) => {
      if (courseTitle !== undefined && chunk.courseTitle !== courseTitle) return false;
      if (lessonNumber !== undefined && chunk.lessonNumber !== lessonNumber) return false;
      return true;
    });

    if (candidates.length === 0) {
      return emptySearchResults();
    }

    const [queryEmbedding] = await this.embedder.embed([query]);

    const ranked = candidates
      .map(({ chunk, embedding }) => ({ chunk, similarity: cosineSimilarity(queryEmbedding, embedding) }))
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, limit ?? this.maxResults);

    return {
      documents: ranked.map(r => r.chunk.content),
      metadata: ranked.map(r => ({
        courseTitle: r.chunk.courseTitle,
        chunkIndex: r.chunk.chunkIndex,
        ...(r.chunk.lessonNumber !== undefined ? { lessonNumber: r.chunk.lessonNumber } : {}),
      })),
      distances: ranked.map(r => 1 - r.similarity),
    };
  }

  /**
   * Resolve a partial or approximate course name to a catalog title.
   * Exact match first, then substring containment, then title embedding similarity.
   */
  async resolveCourseName(courseName: string): Promise<string | null> {
    const needle = courseName.trim().toLowerCase();
    if (!needle || this.catalog.size === 0) {
      return null;
    }

    const titles = Array.from(this.catalog.keys());

    const exact = titles.find(title => title.toLowerCase() === needle);
    if (exact) return exact;

    const partial = titles.find(title => {
      const haystack = title.toLowerCase();
      return haystack.includes(needle) || needle.includes(haystack);
    });
    if (partial) return partial;

    const [queryEmbedding] = await this.embedder.embed([courseName]);
    let best: { title: string; similarity: number } | null = null;

    for (const [title, entry] of this.catalog) {
      const similarity = cosineSimilarity(queryEmbedding, entry.embedding);
      if (similarity >= this.minTitleSimilarity && (!best || similarity > best.similarity)) {
        best = { title, similarity };
      }
    }

    return best ? best.title : null;
  }

  getCourseLink(courseTitle: string): string | undefined {
    return this.catalog.get(courseTitle)?.course.courseLink;
  }

  getLessonLink(courseTitle: string, lessonNumber: number): string | undefined {
    return this.findLesson(courseTitle, lessonNumber)?.lessonLink;
  }

  getCourseOutline(courseTitle: string): Course | undefined {
    return this.catalog.get(courseTitle)?.course;
  }

  async addCourseMetadata(course: Course): Promise<void> {
    const [embedding] = await this.embedder.embed([course.title]);
    this.catalog.set(course.title, { course, embedding });
  }

  async addCourseContent(chunks: CourseChunk[]): Promise<void> {
    if (chunks.length === 0) {
      return;
    }

    const embeddings = await this.embedder.embed(chunks.map(c => c.content));
    chunks.forEach((chunk, i) => {
      this.chunks.push({ chunk, embedding: embeddings[i] });
    });
  }

  getExistingCourseTitles(): string[] {
    return Array.from(this.catalog.keys());
  }

  getCourseCount(): number {
    return this.catalog.size;
  }

  get chunkCount(): number {
    return this.chunks.length;
  }

  clearAllData(): void {
    this.catalog.clear();
    this.chunks = [];
  }

  private findLesson(courseTitle: string, lessonNumber: number): Lesson | undefined {
    return this.catalog.get(courseTitle)?.course.lessons.find(l => l.lessonNumber === lessonNumber);
  }
}
