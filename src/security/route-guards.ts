import type { FastifyReply, FastifyRequest } from 'fastify';
import { env } from '../env.js';
import { AppError, formatErrorResponse } from '../utils/errors.js';

interface RateBucket {
  count: number;
  resetAt: number;
}

const rateBuckets = new Map<string, RateBucket>();

function cleanupExpiredBuckets(now: number) {
  if (rateBuckets.size < 5000) return;
  for (const [key, value] of rateBuckets.entries()) {
    if (value.resetAt <= now) {
      rateBuckets.delete(key);
    }
  }
}

const TRUSTED_PROXY_RANGES = [
  // Private IP ranges (RFC 1918)
  /^10\./,
  /^172\.(1[6-9]|2[0-9]|3[0-1])\./,
  /^192\.168\./,
  // Localhost
  /^127\./,
  /^::1$/,
];

function isTrustedProxy(ip: string): boolean {
  return TRUSTED_PROXY_RANGES.some(range => range.test(ip));
}

// Only trust forwarding headers when the direct peer is one of our proxies
function getRealClientIP(request: FastifyRequest): string {
  const clientIP = request.ip;
  if (!isTrustedProxy(clientIP)) {
    return clientIP;
  }

  const forwarded = request.headers['x-forwarded-for'];
  if (forwarded && typeof forwarded === 'string') {
    // X-Forwarded-For format: client, proxy1, proxy2, ...
    const ips = forwarded.split(',').map(ip => ip.trim());

    // Walk from right to left, the first untrusted address is the client
    for (let i = ips.length - 1; i >= 0; i--) {
      const ip = ips[i];
      if (ip && !isTrustedProxy(ip)) {
        return ip;
      }
    }

    return ips[0] || clientIP;
  }

  const realIP = request.headers['x-real-ip'];
  if (realIP && typeof realIP === 'string') {
    return realIP;
  }

  return clientIP;
}

interface RateLimitOptions {
  routeKey: string;
  maxRequests: number;
}

export function enforceRateLimitIfEnabled(
  request: FastifyRequest,
  reply: FastifyReply,
  options: RateLimitOptions,
): boolean {
  if (!env.RATE_LIMITING_ENABLED) return true;

  const now = Date.now();
  cleanupExpiredBuckets(now);

  const bucketKey = `${options.routeKey}:ip:${getRealClientIP(request)}`;

  const current = rateBuckets.get(bucketKey);
  if (!current || current.resetAt <= now) {
    rateBuckets.set(bucketKey, {
      count: 1,
      resetAt: now + env.RATE_LIMIT_WINDOW_MS,
    });
    return true;
  }

  if (current.count >= options.maxRequests) {
    const retryAfterSeconds = Math.max(1, Math.ceil((current.resetAt - now) / 1000));
    const error = AppError.rateLimited(retryAfterSeconds, 'Too many requests. Please try again later.');
    reply.header('Retry-After', String(retryAfterSeconds));
    reply.code(error.statusCode).send(formatErrorResponse(error));
    return false;
  }

  current.count += 1;
  return true;
}

export function resetRateLimits(): void {
  rateBuckets.clear();
}

// Exported for the guard tests
export { getRealClientIP, isTrustedProxy };
