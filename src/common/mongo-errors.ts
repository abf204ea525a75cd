import { Logger } from '@nestjs/common';
import { Types, mongo } from 'mongoose';

const logger = new Logger('MongoRetry');

export const asObjectId = (id: string | Types.ObjectId) =>
  typeof id === 'string' ? new Types.ObjectId(id) : id;

export function isDuplicateKeyError(err: unknown): boolean {
  return err instanceof mongo.MongoServerError && err.code === 11000;
}

/**
 * Reintenta `fn` cuando choca con un índice único (upserts concurrentes,
 * sortIndex calculado en paralelo). Otros errores se propagan tal cual.
 */
export async function retryOnDuplicateKey<T>(
  fn: () => Promise<T>,
  attempts = 3,
): Promise<T> {
  let lastError: unknown;
  for (let i = 0; i < attempts; i++) {
    try {
      return await fn();
    } catch (err) {
      if (!isDuplicateKeyError(err)) throw err;
      lastError = err;
      logger.warn(`Clave duplicada, reintento ${i + 1}/${attempts}`);
    }
  }
  throw lastError;
}
