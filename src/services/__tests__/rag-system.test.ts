import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { ResponseGenerator } from '../generator.js';
import { RagSystem } from '../rag-system.js';
import { SessionManager } from '../session-manager.js';
import { VectorStore } from '../vector-store.js';
import { KeywordEmbedder, ScriptedModelClient, textResponse, toolUseResponse } from './fakes.js';

const VOCABULARY = ['vectors', 'numbers', 'graphs', 'nodes', 'edges', 'vector', 'graph', 'basics'];

const VECTOR_COURSE = [
  'Course Title: Vector Basics',
  'Course Link: https://example.com/vectors',
  'Course Instructor: Ada Example',
  '',
  'Lesson 1: What vectors are',
  'Lesson Link: https://example.com/vectors/1',
  'Vectors are lists of numbers.',
].join('\n');

const GRAPH_COURSE = ['Course Title: Graph Basics', 'Lesson 1: Nodes', 'Graphs connect nodes with edges.'].join('\n');

function searchCall(id: string, input: Record<string, unknown>) {
  return toolUseResponse({ id, name: 'search_course_content', input });
}

describe('RAG System', () => {
  let docsDir: string;
  let sessions: SessionManager;
  let store: VectorStore;

  beforeAll(async () => {
    docsDir = await mkdtemp(path.join(tmpdir(), 'rag-docs-'));
    await writeFile(path.join(docsDir, 'a-vectors.txt'), VECTOR_COURSE, 'utf-8');
    await writeFile(path.join(docsDir, 'b-graphs.md'), GRAPH_COURSE, 'utf-8');
    await writeFile(path.join(docsDir, 'notes.pdf'), 'not a course', 'utf-8');
  });

  afterAll(async () => {
    await rm(docsDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    sessions = new SessionManager({ maxHistory: 2 });
    store = new VectorStore({ embedder: new KeywordEmbedder(VOCABULARY) });
  });

  afterEach(() => {
    sessions.destroy();
    vi.restoreAllMocks();
  });

  function buildRag(client: ScriptedModelClient): RagSystem {
    return new RagSystem({
      vectorStore: store,
      sessionManager: sessions,
      generator: new ResponseGenerator(client, { model: 'test-model' }),
    });
  }

  describe('addCourseFolder', () => {
    it('should index course files and skip other files', async () => {
      const rag = buildRag(new ScriptedModelClient([]));

      const loaded = await rag.addCourseFolder(docsDir);

      expect(loaded).toEqual({ courses: 2, chunks: 2 });
      expect(rag.getCourseAnalytics()).toEqual({
        totalCourses: 2,
        courseTitles: ['Vector Basics', 'Graph Basics'],
      });
    });

    it('should skip courses that are already indexed', async () => {
      const rag = buildRag(new ScriptedModelClient([]));
      await rag.addCourseFolder(docsDir);

      await expect(rag.addCourseFolder(docsDir)).resolves.toEqual({ courses: 0, chunks: 0 });
      expect(store.chunkCount).toBe(2);
    });

    it('should rebuild the index when asked to clear it', async () => {
      const rag = buildRag(new ScriptedModelClient([]));
      await rag.addCourseFolder(docsDir);

      await expect(rag.addCourseFolder(docsDir, true)).resolves.toEqual({ courses: 2, chunks: 2 });
      expect(store.chunkCount).toBe(2);
    });
  });

  it('should index a single document', async () => {
    const rag = buildRag(new ScriptedModelClient([]));

    const added = await rag.addCourseDocument(path.join(docsDir, 'b-graphs.md'));

    expect(added.course.title).toBe('Graph Basics');
    expect(added.chunkCount).toBe(1);
  });

  describe('query', () => {
    it('should answer with the sources of the tools it ran', async () => {
      const client = new ScriptedModelClient([
        searchCall('t1', { query: 'vectors', course_name: 'Vector' }),
        textResponse('Vectors are lists of numbers.'),
      ]);
      const rag = buildRag(client);
      await rag.addCourseFolder(docsDir);
      const sessionId = sessions.createSession();

      const result = await rag.query('What are vectors?', sessionId);

      expect(result).toEqual({
        answer: 'Vectors are lists of numbers.',
        sources: [{ name: 'Vector Basics - Lesson 1', link: 'https://example.com/vectors/1' }],
      });
      expect(client.requests[0].messages).toEqual([
        { role: 'user', content: 'Answer this question about course materials: What are vectors?' },
      ]);
      expect(client.requests[0].tools?.map(t => t.name)).toEqual(['search_course_content', 'get_course_outline']);
      expect(sessions.getConversationHistory(sessionId)).toBe(
        'User: What are vectors?\nAssistant: Vectors are lists of numbers.'
      );
      expect(console.log).toHaveBeenCalledWith('[RAG] Answered query (tools used: true, sources: 1)');
    });

    it('should log a direct answer without tools', async () => {
      const rag = buildRag(new ScriptedModelClient([textResponse('Hello!')]));

      await rag.query('Hi');

      expect(console.log).toHaveBeenCalledWith('[RAG] Answered query (tools used: false, sources: 0)');
    });

    it('should include session history in later queries', async () => {
      const client = new ScriptedModelClient([textResponse('Hello!'), textResponse('Still here.')]);
      const rag = buildRag(client);
      const sessionId = sessions.createSession();

      await rag.query('Hi', sessionId);
      await rag.query('Are you there?', sessionId);

      expect(client.requests[0].system).not.toContain('Previous conversation:');
      expect(client.requests[1].system).toContain('Previous conversation:\nUser: Hi\nAssistant: Hello!');
    });

    it('should return sources in invocation order across rounds', async () => {
      const client = new ScriptedModelClient([
        toolUseResponse({ id: 't1', name: 'get_course_outline', input: { course_title: 'Vector' } }),
        searchCall('t2', { query: 'vectors', course_name: 'Vector', lesson_number: 1 }),
        textResponse('Lesson 1 explains vectors.'),
      ]);
      const rag = buildRag(client);
      await rag.addCourseFolder(docsDir);
      const dispatch = vi.spyOn(rag.toolRegistry, 'dispatch');

      const result = await rag.query('What does the first lesson of Vector Basics cover?');

      expect(client.requests).toHaveLength(3);
      expect(dispatch).toHaveBeenCalledTimes(2);
      expect(client.requests[2].tools).toBeUndefined();
      expect(result).toEqual({
        answer: 'Lesson 1 explains vectors.',
        sources: [
          { name: 'Vector Basics - Course Outline', link: 'https://example.com/vectors' },
          { name: 'Vector Basics - Lesson 1', link: 'https://example.com/vectors/1' },
        ],
      });
    });

    it('should search lesson 0 of an indexed course', async () => {
      const client = new ScriptedModelClient([
        searchCall('t1', { query: 'course', course_name: 'Retrieval Systems from Scratch', lesson_number: 0 }),
        textResponse('The introduction outlines the course.'),
      ]);
      const rag = buildRag(client);
      await rag.addCourseDocument(path.join(process.cwd(), 'docs', 'course1_script.txt'));

      const result = await rag.query('What does the introduction cover?');

      expect(result).toEqual({
        answer: 'The introduction outlines the course.',
        sources: [
          {
            name: 'Retrieval Systems from Scratch - Lesson 0',
            link: 'https://example.com/courses/retrieval-systems/lesson-0',
          },
        ],
      });
    });

    it('should not carry sources over to the next query', async () => {
      const client = new ScriptedModelClient([
        searchCall('t1', { query: 'vectors', course_name: 'Vector' }),
        textResponse('Vectors are lists of numbers.'),
        textResponse('Paris.'),
      ]);
      const rag = buildRag(client);
      await rag.addCourseFolder(docsDir);

      await rag.query('What are vectors?');
      const second = await rag.query('What is the capital of France?');

      expect(second).toEqual({ answer: 'Paris.', sources: [] });
    });

    it('should attribute no sources when a tool fails', async () => {
      const client = new ScriptedModelClient([
        toolUseResponse(
          { id: 't1', name: 'get_course_outline', input: { course_title: 'Vector' } },
          { id: 't2', name: 'search_course_content', input: { query: 'vectors', lesson_number: 'two' } }
        ),
      ]);
      const rag = buildRag(client);
      await rag.addCourseFolder(docsDir);

      const result = await rag.query('Outline and lesson two?');

      expect(result.answer).toMatch(
        /^I encountered an error while searching: Invalid arguments for search_course_content: lesson_number: /
      );
      expect(result.sources).toEqual([]);
      expect(console.log).toHaveBeenCalledWith('[RAG] Answered query (tools used: true, sources: 0, aborted)');
    });

    it('should keep concurrent queries apart', async () => {
      const client = new ScriptedModelClient([
        searchCall('t1', { query: 'vectors', course_name: 'Vector' }),
        textResponse('About vectors.'),
        searchCall('t2', { query: 'nodes', course_name: 'Graph' }),
        textResponse('About graphs.'),
      ]);
      const rag = buildRag(client);
      await rag.addCourseFolder(docsDir);

      const [first, second] = await Promise.all([
        rag.query('What are vectors?'),
        rag.query('What are nodes?'),
      ]);

      expect(first).toEqual({
        answer: 'About vectors.',
        sources: [{ name: 'Vector Basics - Lesson 1', link: 'https://example.com/vectors/1' }],
      });
      expect(second).toEqual({ answer: 'About graphs.', sources: [{ name: 'Graph Basics - Lesson 1' }] });
    });

    it('should keep serving after a failed query', async () => {
      const client = new ScriptedModelClient([new Error('model unavailable'), textResponse('Recovered.')]);
      const rag = buildRag(client);

      await expect(rag.query('First?')).rejects.toThrow('model unavailable');
      await expect(rag.query('Second?')).resolves.toEqual({ answer: 'Recovered.', sources: [] });
    });
  });

  it('should delegate the connection check to the generator', async () => {
    const rag = buildRag(new ScriptedModelClient([textResponse('ok')]));

    await expect(rag.testConnection()).resolves.toEqual({ success: true, message: 'Connection successful' });
  });
});
