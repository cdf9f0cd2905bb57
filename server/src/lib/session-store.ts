import { randomUUID } from 'node:crypto';
import type { LogType, Persona, TestOutcome } from '../agent/types.js';

export type SessionStatus = 'started' | 'testing' | 'completed' | 'failed' | 'cancelled';

export const TERMINAL_STATUSES: ReadonlySet<SessionStatus> = new Set(['completed', 'failed', 'cancelled']);

export interface LogEvent {
  timestamp: string;
  session_id: string;
  persona_name: string | null;
  type: LogType;
  message: string;
  data: Record<string, unknown> | null;
}

export interface NewLogEvent {
  type: LogType;
  message: string;
  persona_name?: string | null;
  data?: Record<string, unknown>;
}

export interface NewTestSession {
  personas: Persona[];
  test_goal: string;
  api_url: string;
  max_steps: number;
}

export interface TestSession extends NewTestSession {
  id: string;
  status: SessionStatus;
  created_at: string;
  completed_at: string | null;
  results: TestOutcome[] | null;
  failed_personas: string[];
  report: string | null;
  error: string | null;
  /** Aborted when the session is cancelled; the runner checks it between steps */
  readonly abort: AbortController;
}

export type LogListener = (event: LogEvent) => void;

/**
 * Process-lifetime session and log storage. The session runner is the only
 * writer for a given session; routes read snapshots and subscribe to logs.
 */
export class SessionStore {
  private readonly sessions = new Map<string, TestSession>();
  private readonly logs = new Map<string, LogEvent[]>();
  private readonly listeners = new Map<string, Set<LogListener>>();
  private readonly now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  create(input: NewTestSession, id: string = randomUUID()): TestSession {
    const session: TestSession = {
      ...input,
      id,
      status: 'started',
      created_at: this.now().toISOString(),
      completed_at: null,
      results: null,
      failed_personas: [],
      report: null,
      error: null,
      abort: new AbortController(),
    };
    this.sessions.set(id, session);
    this.logs.set(id, []);
    return session;
  }

  get(id: string): TestSession | undefined {
    return this.sessions.get(id);
  }

  size(): number {
    return this.sessions.size;
  }

  /** Ids of sessions that have not reached a terminal status */
  activeIds(): string[] {
    return [...this.sessions.values()]
      .filter((session) => !TERMINAL_STATUSES.has(session.status))
      .map((session) => session.id);
  }

  update(id: string, patch: Partial<Omit<TestSession, 'id' | 'abort'>>): TestSession {
    const session = this.sessions.get(id);
    if (!session) {
      throw new Error(`Unknown session ${id}`);
    }
    Object.assign(session, patch);
    if (patch.status && TERMINAL_STATUSES.has(patch.status) && !session.completed_at) {
      session.completed_at = this.now().toISOString();
    }
    return session;
  }

  isFinished(id: string): boolean {
    const session = this.sessions.get(id);
    return session ? TERMINAL_STATUSES.has(session.status) : false;
  }

  /** Append a timestamped event and fan it out to live subscribers in order. */
  appendLog(id: string, event: NewLogEvent): LogEvent {
    const history = this.logs.get(id);
    if (!history) {
      throw new Error(`Unknown session ${id}`);
    }
    const entry: LogEvent = {
      timestamp: this.now().toISOString(),
      session_id: id,
      persona_name: event.persona_name ?? null,
      type: event.type,
      message: event.message,
      data: event.data ?? null,
    };
    history.push(entry);

    for (const listener of this.listeners.get(id) ?? []) {
      listener(entry);
    }
    return entry;
  }

  getLogs(id: string): readonly LogEvent[] {
    return this.logs.get(id) ?? [];
  }

  /**
   * Replay the history to the listener, then deliver every later event.
   * Both happen synchronously, so no event falls between replay and live.
   */
  subscribe(id: string, listener: LogListener): () => void {
    for (const entry of this.getLogs(id)) {
      listener(entry);
    }

    let set = this.listeners.get(id);
    if (!set) {
      set = new Set();
      this.listeners.set(id, set);
    }
    set.add(listener);

    return () => {
      const current = this.listeners.get(id);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) this.listeners.delete(id);
    };
  }

  subscriberCount(id: string): number {
    return this.listeners.get(id)?.size ?? 0;
  }
}
