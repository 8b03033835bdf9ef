import fs from "node:fs";
import path from "node:path";
import { createLogger } from "../observability/logger";
import { parseCheckpoint, serializeCheckpoint } from "./checkpoint";
import { CheckpointCorruptError, ValidationError } from "./errors";
import type { CheckpointRecord, SessionId } from "./types";

const log = createLogger("store");

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export const assertSessionId = (sessionId: string): void => {
  if (!SESSION_ID_PATTERN.test(sessionId)) {
    throw new ValidationError(
      `Session id must match ${SESSION_ID_PATTERN.source}: ${sessionId}`,
      { sessionId },
    );
  }
};

/**
 * Durable checkpoint storage keyed by session id. A `save` replaces the whole
 * record; readers never observe a partially written one.
 */
export interface SessionStore {
  save(record: CheckpointRecord): void;
  load(sessionId: SessionId): CheckpointRecord | null;
  list(): CheckpointRecord[];
}

const byCreation = (a: CheckpointRecord, b: CheckpointRecord): number =>
  a.created_at.localeCompare(b.created_at);

// Listing skips unreadable sessions; `load` still reports them.
const parseListed = (sessionId: string, raw: string): CheckpointRecord[] => {
  try {
    return [parseCheckpoint(sessionId, raw)];
  } catch (error) {
    if (error instanceof CheckpointCorruptError) {
      log("skipping %s: %s", sessionId, error.message);
      return [];
    }
    throw error;
  }
};

export class FileSessionStore implements SessionStore {
  constructor(private readonly rootDir: string) {}

  ensure(): void {
    fs.mkdirSync(path.join(this.rootDir, "sessions"), { recursive: true });
  }

  sessionDir(sessionId: string): string {
    assertSessionId(sessionId);
    return path.join(this.rootDir, "sessions", sessionId);
  }

  checkpointPath(sessionId: string): string {
    return path.join(this.sessionDir(sessionId), "checkpoint.json");
  }

  save(record: CheckpointRecord): void {
    const dir = this.sessionDir(record.session_id);
    fs.mkdirSync(dir, { recursive: true });
    const file = this.checkpointPath(record.session_id);
    const tmpFile = `${file}.${process.pid}.tmp`;
    fs.writeFileSync(tmpFile, serializeCheckpoint(record), "utf8");
    fs.renameSync(tmpFile, file);
    log(
      "saved %s next=%s status=%s",
      record.session_id,
      record.next_step,
      record.status,
    );
  }

  load(sessionId: SessionId): CheckpointRecord | null {
    const file = this.checkpointPath(sessionId);
    if (!fs.existsSync(file)) {
      return null;
    }

    return parseCheckpoint(sessionId, fs.readFileSync(file, "utf8"));
  }

  list(): CheckpointRecord[] {
    const sessionsDir = path.join(this.rootDir, "sessions");
    if (!fs.existsSync(sessionsDir)) {
      return [];
    }

    return fs
      .readdirSync(sessionsDir)
      .flatMap((entry) => {
        const file = path.join(sessionsDir, entry, "checkpoint.json");
        if (!fs.existsSync(file)) {
          return [];
        }
        return parseListed(entry, fs.readFileSync(file, "utf8"));
      })
      .sort(byCreation);
  }
}

/** Keeps serialized records so callers never share live objects with it. */
export class MemorySessionStore implements SessionStore {
  private readonly records = new Map<string, string>();

  save(record: CheckpointRecord): void {
    assertSessionId(record.session_id);
    this.records.set(record.session_id, serializeCheckpoint(record));
  }

  load(sessionId: SessionId): CheckpointRecord | null {
    const raw = this.records.get(sessionId);
    return raw === undefined ? null : parseCheckpoint(sessionId, raw);
  }

  list(): CheckpointRecord[] {
    return [...this.records.entries()]
      .flatMap(([sessionId, raw]) => parseListed(sessionId, raw))
      .sort(byCreation);
  }
}
