import { vi } from 'vitest';

import { createLogger, type Logger } from '../../logger';
import { isObject } from '../../utils/type-guards';
import type { PlainObject } from '../../value/types';
import type { WrappedResource } from '../types';

export type LogRecord = Record<string, unknown>;

/**
 * A debug-level logger whose JSON lines are parsed into `records`.
 */
export function createCapturingLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = createLogger({
    level: 'debug',
    destination: {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (isObject(parsed)) records.push(parsed);
      }
    }
  });
  return { logger, records };
}

/**
 * In-process provider: echoes its inputs back, adding `outputs` on create.
 */
export function createFakeProvider(extraOutputs: PlainObject = {}) {
  const provider = {
    create: vi.fn(async (inputs: PlainObject) => ({
      id: 'db-1',
      outputs: { ...inputs, ...extraOutputs }
    })),
    update: vi.fn(async (_id: string, _olds: PlainObject, news: PlainObject) => ({ ...news }))
  } satisfies WrappedResource;

  return provider;
}
