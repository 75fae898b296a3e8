import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';
import { isSubtitleFormat } from '../subtitles/engine';
import { Position, SubtitleFormat } from '../subtitles/types';
import { EditingSession, SessionListItem } from './types';

export interface NewSession {
  name: string;
  format: SubtitleFormat;
  content: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Rebuilds a session from its JSON form, converting date strings back to
 * Date objects. Returns null if a field is missing or has the wrong type.
 */
function parseSession(value: unknown): EditingSession | null {
  if (!isRecord(value)) return null;
  const { id, name, format, content, position, createdAt, updatedAt } = value;
  if (
    typeof id !== 'string' ||
    typeof name !== 'string' ||
    !isSubtitleFormat(format) ||
    typeof content !== 'string' ||
    typeof position !== 'number' ||
    typeof createdAt !== 'string' ||
    typeof updatedAt !== 'string'
  ) {
    return null;
  }

  return {
    id,
    name,
    format,
    content,
    position,
    createdAt: new Date(createdAt),
    updatedAt: new Date(updatedAt),
  };
}

/**
 * Simple file-based session store
 */
export class SessionStore {
  private sessionsDir: string;

  constructor(sessionsDir?: string) {
    this.sessionsDir = sessionsDir ?? config.sessionsDir;
  }

  private ensureDirectory(): void {
    if (!fs.existsSync(this.sessionsDir)) {
      fs.mkdirSync(this.sessionsDir, { recursive: true });
    }
  }

  private getSessionPath(sessionId: string): string {
    return path.join(this.sessionsDir, `${sessionId}.json`);
  }

  /**
   * Creates a new session with the cursor at the start of the document
   */
  async create(request: NewSession): Promise<EditingSession> {
    const now = new Date();

    const session: EditingSession = {
      id: uuidv4(),
      name: request.name,
      format: request.format,
      content: request.content,
      position: 0,
      createdAt: now,
      updatedAt: now,
    };

    await this.save(session);
    return session;
  }

  /**
   * Gets a session by ID
   */
  async get(sessionId: string): Promise<EditingSession | null> {
    // Ids are uuids; anything else could point outside the directory
    if (!/^[0-9a-f-]+$/i.test(sessionId)) {
      return null;
    }

    const sessionPath = this.getSessionPath(sessionId);
    if (!fs.existsSync(sessionPath)) {
      return null;
    }

    try {
      const content = await fs.promises.readFile(sessionPath, 'utf-8');
      const session = parseSession(JSON.parse(content));
      if (!session) {
        console.error(`Session ${sessionId} has an unexpected shape`);
      }
      return session;
    } catch (error) {
      console.error(`Failed to read session ${sessionId}:`, error);
      return null;
    }
  }

  /**
   * Saves a session
   */
  async save(session: EditingSession): Promise<void> {
    this.ensureDirectory();
    session.updatedAt = new Date();
    await fs.promises.writeFile(this.getSessionPath(session.id), JSON.stringify(session, null, 2), 'utf-8');
  }

  /**
   * Stores the text and cursor left by an edit
   */
  async update(sessionId: string, content: string, position: Position): Promise<EditingSession> {
    const session = await this.get(sessionId);
    if (!session) {
      throw new Error(`Session ${sessionId} not found`);
    }

    session.content = content;
    session.position = position;
    await this.save(session);
    return session;
  }

  /**
   * Lists all sessions, newest first
   */
  async list(): Promise<SessionListItem[]> {
    this.ensureDirectory();
    const files = fs.readdirSync(this.sessionsDir).filter((f) => f.endsWith('.json'));

    const sessions: SessionListItem[] = [];

    for (const file of files) {
      const session = await this.get(file.replace('.json', ''));

      if (session) {
        sessions.push({
          id: session.id,
          name: session.name,
          format: session.format,
          size: session.content.length,
          createdAt: session.createdAt,
          updatedAt: session.updatedAt,
        });
      }
    }

    return sessions.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  /**
   * Deletes a session
   */
  async delete(sessionId: string): Promise<boolean> {
    const session = await this.get(sessionId);
    if (!session) {
      return false;
    }

    await fs.promises.unlink(this.getSessionPath(sessionId));
    return true;
  }
}

// Singleton instance
export const sessionStore = new SessionStore();
