import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { Decision, StoreUpdate } from '../types/decision';
import { OperationResult } from '../types/operations';
import { isRecord } from '../utils/coerce';
import { logger } from '../utils/logger';
import { ConversationLogRecord, ConversationLogRepository } from './types';

const recordSchema: z.ZodType<ConversationLogRecord> = z.object({
  timestamp: z.string(),
  sessionId: z.string(),
  userMessage: z.string(),
  rawDecision: z.string(),
  decision: z.custom<Decision>(isRecord).nullable(),
  operationResults: z.array(z.custom<OperationResult>(isRecord)),
  finalReply: z.string(),
  storeUpdate: z.custom<StoreUpdate>(isRecord),
});

/**
 * Append-only JSON-lines log. Appends from every session share one queue,
 * so lines are written whole and in call order.
 */
export class FileConversationLog implements ConversationLogRepository {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  append(record: ConversationLogRecord): Promise<void> {
    const write = this.queue.then(async () => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, `${JSON.stringify(record)}\n`, 'utf8');
    });
    // A failed write rejects its own caller but must not block later appends.
    this.queue = write.catch((error: unknown) => {
      logger.error('Conversation log append failed', {
        sessionId: record.sessionId,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    });
    return write;
  }

  async listBySession(sessionId: string): Promise<ConversationLogRecord[]> {
    await this.queue;
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const records: ConversationLogRecord[] = [];
    for (const line of text.split('\n')) {
      if (!line.trim()) {
        continue;
      }
      const parsed = this.parseLine(line);
      if (parsed && parsed.sessionId === sessionId) {
        records.push(parsed);
      }
    }
    return records;
  }

  private parseLine(line: string): ConversationLogRecord | null {
    try {
      const parsed = recordSchema.safeParse(JSON.parse(line));
      if (parsed.success) {
        return parsed.data;
      }
      logger.warn('Skipping malformed conversation log line', {
        issues: parsed.error.issues.length,
      });
    } catch (error) {
      logger.warn('Skipping unreadable conversation log line', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
    return null;
  }
}
