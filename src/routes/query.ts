// Course Q&A routes
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { env } from '../env.js';
import { enforceRateLimitIfEnabled } from '../security/route-guards.js';
import type { RagSystem } from '../services/rag-system.js';
import { AppError, formatErrorResponse } from '../utils/errors.js';

const QuerySchema = z.object({
  query: z.string().trim().min(1),
  session_id: z.string().min(1).nullish(),
});

export interface QueryRoutesOptions {
  rag: RagSystem;
}

export async function queryRoutes(server: FastifyInstance, { rag }: QueryRoutesOptions) {
  // POST /api/query - Answer a question about the indexed courses
  server.post('/api/query', async (request, reply) => {
    if (!enforceRateLimitIfEnabled(request, reply, {
      routeKey: 'query',
      maxRequests: env.RATE_LIMIT_QUERY_PER_WINDOW,
    })) {
      return reply;
    }

    const parsed = QuerySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: 'Invalid request body',
        details: parsed.error.flatten(),
      });
    }

    const sessionId = parsed.data.session_id || rag.sessionManager.createSession();

    try {
      const result = await rag.query(parsed.data.query, sessionId);
      return {
        answer: result.answer,
        sources: result.sources,
        session_id: sessionId,
      };
    } catch (error) {
      request.log.error({ err: error }, 'Query failed');
      const appError = AppError.from(error);
      return reply.code(appError.statusCode).send(formatErrorResponse(appError));
    }
  });

  // GET /api/courses - Course catalog summary
  server.get('/api/courses', async () => {
    const analytics = rag.getCourseAnalytics();
    return {
      total_courses: analytics.totalCourses,
      course_titles: analytics.courseTitles,
    };
  });

  // POST /api/session/new - Start an empty conversation
  server.post('/api/session/new', async () => {
    return { session_id: rag.sessionManager.createSession() };
  });

  // DELETE /api/session/:id - Forget a conversation
  server.delete<{ Params: { id: string } }>('/api/session/:id', async (request) => {
    rag.sessionManager.clearSession(request.params.id);
    return { ok: true };
  });

  server.get('/api/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: '1.0.0',
    };
  });
}
