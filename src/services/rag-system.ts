/**
 * RAG System
 * Ties document ingestion, the vector store, the tool registry, the response
 * generator and session history together behind one query entry point.
 */

import { readdir } from 'fs/promises';
import * as path from 'path';
import { env } from '../env.js';
import { getModelForProvider, getProvider } from '../providers/index.js';
import type { Course } from './course-models.js';
import { DocumentProcessor } from './document-processor.js';
import { ResponseGenerator, type ConnectionCheck, type GenerationResult, type GenerateResponseParams } from './generator.js';
import { SessionManager } from './session-manager.js';
import { initializeTools, ToolRegistry, type Source } from './tools/index.js';
import { VectorStore } from './vector-store.js';

const COURSE_FILE_EXTENSIONS = new Set(['.txt', '.md']);

export interface QueryResult {
  answer: string;
  sources: Source[];
}

export interface CourseAnalytics {
  totalCourses: number;
  courseTitles: string[];
}

/** What the facade needs from the response generator. */
export interface AnswerGenerator {
  generate(params: GenerateResponseParams): Promise<GenerationResult>;
  testConnection(): Promise<ConnectionCheck>;
}

export interface RagSystemDeps {
  vectorStore: VectorStore;
  generator: AnswerGenerator;
  sessionManager?: SessionManager;
  documentProcessor?: DocumentProcessor;
  toolRegistry?: ToolRegistry;
}

export class RagSystem {
  readonly vectorStore: VectorStore;
  readonly sessionManager: SessionManager;
  readonly toolRegistry: ToolRegistry;
  private generator: AnswerGenerator;
  private documentProcessor: DocumentProcessor;
  // Queries share the registry's source state, so they run one at a time
  private queue: Promise<void> = Promise.resolve();

  constructor(deps: RagSystemDeps) {
    this.vectorStore = deps.vectorStore;
    this.generator = deps.generator;
    this.sessionManager = deps.sessionManager ?? new SessionManager();
    this.documentProcessor = deps.documentProcessor ?? new DocumentProcessor();
    this.toolRegistry = initializeTools(this.vectorStore, deps.toolRegistry);
  }

  query(query: string, sessionId?: string): Promise<QueryResult> {
    return this.runExclusive(() => this.answerQuery(query, sessionId));
  }

  async addCourseDocument(filePath: string): Promise<{ course: Course; chunkCount: number }> {
    const { course, chunks } = await this.documentProcessor.processCourseDocument(filePath);
    await this.vectorStore.addCourseMetadata(course);
    await this.vectorStore.addCourseContent(chunks);
    return { course, chunkCount: chunks.length };
  }

  /**
   * Indexes every course file in a folder. Courses whose title is already
   * indexed are skipped; a file that fails is logged and skipped.
   */
  async addCourseFolder(folderPath: string, clearExisting = false): Promise<{ courses: number; chunks: number }> {
    if (clearExisting) {
      console.log('[RAG] Clearing existing course data');
      this.vectorStore.clearAllData();
    }

    const entries = await readdir(folderPath, { withFileTypes: true });
    const files = entries
      .filter(e => e.isFile() && COURSE_FILE_EXTENSIONS.has(path.extname(e.name).toLowerCase()))
      .map(e => e.name)
      .sort();

    const existing = new Set(this.vectorStore.getExistingCourseTitles());
    let courses = 0;
    let chunks = 0;

    for (const file of files) {
      const filePath = path.join(folderPath, file);
      try {
        const parsed = await this.documentProcessor.processCourseDocument(filePath);
        if (existing.has(parsed.course.title)) {
          console.log(`[RAG] Course already indexed, skipping: ${parsed.course.title}`);
          continue;
        }

        await this.vectorStore.addCourseMetadata(parsed.course);
        await this.vectorStore.addCourseContent(parsed.chunks);
        existing.add(parsed.course.title);
        courses++;
        chunks += parsed.chunks.length;
        console.log(`[RAG] Added course: ${parsed.course.title} (${parsed.chunks.length} chunks)`);
      } catch (error) {
        console.error(`[RAG] Error processing ${filePath}:`, error);
      }
    }

    return { courses, chunks };
  }

  getCourseAnalytics(): CourseAnalytics {
    return {
      totalCourses: this.vectorStore.getCourseCount(),
      courseTitles: this.vectorStore.getExistingCourseTitles(),
    };
  }

  testConnection(): Promise<ConnectionCheck> {
    return this.generator.testConnection();
  }

  private async answerQuery(query: string, sessionId?: string): Promise<QueryResult> {
    this.toolRegistry.resetSources();

    try {
      const history = sessionId ? this.sessionManager.getConversationHistory(sessionId) : null;

      const result = await this.generator.generate({
        query: `Answer this question about course materials: ${query}`,
        conversationHistory: history,
        tools: this.toolRegistry.toProviderTools(),
        toolRegistry: this.toolRegistry,
      });

      const sources = result.aborted ? [] : this.toolRegistry.collectSources();
      console.log(
        `[RAG] Answered query (tools used: ${result.usedTools}, sources: ${sources.length}` +
          `${result.aborted ? ', aborted' : ''})`
      );

      if (sessionId) {
        this.sessionManager.addExchange(sessionId, query, result.answer);
      }

      return { answer: result.answer, sources };
    } finally {
      this.toolRegistry.resetSources();
    }
  }

  private runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

export function createRagSystem(): RagSystem {
  const generator = new ResponseGenerator(getProvider(env.LLM_PROVIDER), {
    model: getModelForProvider(env.LLM_PROVIDER),
    maxTokens: env.MAX_TOKENS,
    temperature: 0,
    maxToolRounds: env.MAX_TOOL_ROUNDS,
  });

  return new RagSystem({
    vectorStore: new VectorStore(),
    generator,
  });
}
