/**
 * Process-wide session registry with per-key mutual exclusion.
 * One bounded state per session; a commit replaces it wholesale.
 * Sessions live until evicted explicitly (evict / sweepIdle); nothing expires on its own.
 */

import { cloneState, emptyState, type CognitiveState } from "./schema";

export type TurnPhase = "idle" | "recalling" | "qualifying" | "compressing" | "committed" | "responding";

const TRANSITIONS: Record<TurnPhase, readonly TurnPhase[]> = {
  idle: ["recalling"],
  recalling: ["qualifying", "idle"],
  qualifying: ["compressing", "idle"],
  compressing: ["committed", "idle"],
  committed: ["responding", "idle"],
  responding: ["idle"],
};

export interface Session {
  readonly id: string;
  readonly createdAt: number;
  state: CognitiveState;
  /** Number of committed turns. */
  turn: number;
  phase: TurnPhase;
  lastActiveAt: number;
}

export type ReadStateResult =
  | { found: true; sessionId: string; turn: number; state: CognitiveState }
  | { found: false; sessionId: string };

export class IllegalPhaseTransitionError extends Error {
  constructor(readonly from: TurnPhase, readonly to: TurnPhase) {
    super(`Illegal turn phase transition ${from} -> ${to}`);
    this.name = "IllegalPhaseTransitionError";
  }
}

export interface SessionStoreOptions {
  now?: () => number;
}

export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly locks = new Map<string, Promise<void>>();
  private readonly now: () => number;

  constructor(options: SessionStoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  /** Idempotent: an unseen id gets an empty state at turn 0. */
  getOrCreate(sessionId: string): Session {
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;
    const now = this.now();
    const session: Session = {
      id: sessionId,
      createdAt: now,
      state: emptyState(),
      turn: 0,
      phase: "idle",
      lastActiveAt: now,
    };
    this.sessions.set(sessionId, session);
    return session;
  }

  /**
   * Run `fn` with exclusive access to one session. Waiters on the same id queue in order;
   * other ids are never blocked. The guard is released on every exit path.
   */
  async withLock<T>(sessionId: string, fn: (session: Session) => Promise<T>): Promise<T> {
    const previousTail = this.locks.get(sessionId) ?? Promise.resolve();

    let release = () => {};
    const currentGate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const currentTail = previousTail.then(() => currentGate);
    this.locks.set(sessionId, currentTail);

    await previousTail;
    try {
      return await fn(this.getOrCreate(sessionId));
    } finally {
      release();
      if (this.locks.get(sessionId) === currentTail) {
        this.locks.delete(sessionId);
      }
    }
  }

  isLocked(sessionId: string): boolean {
    return this.locks.has(sessionId);
  }

  /** Snapshot of the committed state; callers cannot mutate the stored copy. */
  read(sessionId: string): ReadStateResult {
    const session = this.sessions.get(sessionId);
    if (!session) return { found: false, sessionId };
    return { found: true, sessionId, turn: session.turn, state: cloneState(session.state) };
  }

  /** Replace the session's state. Only the controller calls this, inside withLock. */
  commit(session: Session, next: CognitiveState): void {
    session.state = cloneState(next);
    session.turn += 1;
    session.lastActiveAt = this.now();
  }

  transition(session: Session, to: TurnPhase): void {
    if (!TRANSITIONS[session.phase].includes(to)) {
      throw new IllegalPhaseTransitionError(session.phase, to);
    }
    session.phase = to;
    session.lastActiveAt = this.now();
  }

  /** Remove a session. Refused while a turn holds it. */
  evict(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    if (session.phase !== "idle" || this.isLocked(sessionId)) return false;
    this.sessions.delete(sessionId);
    return true;
  }

  /** Evict every idle session untouched for longer than maxIdleMs. Returns evicted ids. */
  sweepIdle(maxIdleMs: number): string[] {
    const cutoff = this.now() - maxIdleMs;
    const evicted: string[] = [];
    for (const session of [...this.sessions.values()]) {
      if (session.lastActiveAt >= cutoff) continue;
      if (this.evict(session.id)) evicted.push(session.id);
    }
    return evicted;
  }

  list(): string[] {
    return [...this.sessions.keys()];
  }

  size(): number {
    return this.sessions.size;
  }
}
