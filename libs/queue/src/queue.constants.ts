/**
 * Injection token for the shared ioredis connection.
 *
 * String-based so the connection can be replaced in tests without
 * NestJS confusing it with a class provider.
 */
export const REDIS_CLIENT = 'REDIS_CLIENT';

/** List holding submitted, not yet reserved document jobs */
export const PENDING_QUEUE_KEY = 'queue:documents:pending';

/**
 * List holding reserved jobs until their outcome is recorded. A payload
 * left here belongs to a worker that stopped mid-job.
 */
export const PROCESSING_QUEUE_KEY = 'queue:documents:processing';

/**
 * Job status hash key factory.
 * Follows the project naming convention: {domain}:{id}:{type}
 */
export function jobStateKey(jobId: string): string {
  return `job:${jobId}:state`;
}
