import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { deserializeSession, serializeSession } from '../services/SessionCodec';
import { Session } from '../types/session';
import { SessionDataCorruptError } from '../utils/errors';
import { logger } from '../utils/logger';
import { SessionRepository } from './types';

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * One JSON document per session under `directory`. Writes land in a temp
 * file first and are renamed into place so readers never see half a record.
 */
export class FileSessionRepository implements SessionRepository {
  constructor(private readonly directory: string) {}

  private fileFor(sessionId: string): string {
    return path.join(this.directory, `${encodeURIComponent(sessionId)}.json`);
  }

  async load(sessionId: string): Promise<Session | null> {
    let text: string;
    try {
      text = await fs.readFile(this.fileFor(sessionId), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new SessionDataCorruptError(
        sessionId,
        error instanceof Error ? error.message : 'invalid JSON'
      );
    }
    return deserializeSession(raw, sessionId);
  }

  async save(session: Session): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
    const target = this.fileFor(session.sessionId);
    const temp = `${target}.${uuidv4()}.tmp`;
    await fs.writeFile(temp, JSON.stringify(serializeSession(session), null, 2), 'utf8');
    await fs.rename(temp, target);
    logger.debug('Session persisted', { sessionId: session.sessionId, file: target });
  }

  async delete(sessionId: string): Promise<void> {
    try {
      await fs.unlink(this.fileFor(sessionId));
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
    }
  }
}
