/**
 * Rainflow Engine - Session Manager
 * =================================
 * Registry of counting sessions used by the CLI and the web server
 */

import { v4 as uuidv4 } from 'uuid';
import { CountingState, RainflowErrorCode, ResidualMethod, MatrixItem, ValueTuple } from '../types';
import { ConfigManager, getConfig } from '../core/config';
import { CreateSessionPayload } from '../core/schemas';
import { RainflowError, SessionNotFoundError } from '../core/errors';
import { RainflowSession } from '../engine/session';
import { LevelCrossingHistogram, RangePairHistogram } from '../engine/histograms';
import { getLogger } from '../utils/logger';

// ============================================================================
// TYPES
// ============================================================================

export interface SessionSummary {
  id: string;
  name: string;
  state: CountingState;
  error: RainflowErrorCode | null;
  samples: number;
  damage: number;
  damageResidue: number;
  residueLength: number;
  cycles: number;
  residualMethod: ResidualMethod;
  createdAt: string;
  updatedAt: string;
}

export interface SessionDetails {
  summary: SessionSummary;
  matrix: MatrixItem[] | null;
  rangePair: RangePairHistogram | null;
  levelCrossing: LevelCrossingHistogram | null;
  residue: ValueTuple[];
}

export type SessionEventType = 'created' | 'fed' | 'finalized' | 'deleted' | 'failed';

export interface SessionEvent {
  type: SessionEventType;
  sessionId: string;
  summary: SessionSummary | null;
}

export type SessionEventListener = (event: SessionEvent) => void;

interface SessionEntry {
  id: string;
  name: string;
  session: RainflowSession;
  residualMethod: ResidualMethod;
  createdAt: Date;
  updatedAt: Date;
}

// ============================================================================
// SESSION MANAGER
// ============================================================================

export class SessionManager {
  private readonly config: ConfigManager;
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly listeners = new Set<SessionEventListener>();
  private readonly logger = getLogger().child('sessions');

  constructor(options?: { config?: ConfigManager }) {
    this.config = options?.config ?? getConfig();
  }

  /**
   * Create a session from the configured defaults and the payload overrides
   */
  createSession(payload: CreateSessionPayload = {}): SessionSummary {
    const { maxSessions } = this.config.getServerConfig();
    if (this.sessions.size >= maxSessions) {
      throw new RainflowError('memory', `Session limit of ${maxSessions} reached`);
    }

    const counting = payload.counting ?? {};
    const options = this.config.getRainflowOptions(counting, payload.woehler);
    const session = new RainflowSession();

    if (!session.init(options)) {
      throw session.toError() ?? new RainflowError('unexpected', 'Session init failed');
    }

    const now = new Date();
    const id = uuidv4();
    const entry: SessionEntry = {
      id,
      name: payload.name ?? `session-${this.sessions.size + 1}`,
      session,
      residualMethod: counting.residualMethod ?? this.config.getCountingConfig().residualMethod,
      createdAt: now,
      updatedAt: now,
    };

    this.sessions.set(id, entry);
    this.logger.info(`Created session ${entry.name} (${id})`, {
      classCount: options.classCount,
      countingMethod: options.countingMethod,
    });

    const summary = this.summarize(entry);
    this.emit({ type: 'created', sessionId: id, summary });
    return summary;
  }

  /**
   * Look up a session, throws SessionNotFoundError
   */
  getSession(id: string): RainflowSession {
    return this.getEntry(id).session;
  }

  hasSession(id: string): boolean {
    return this.sessions.has(id);
  }

  /**
   * Feed samples, optionally scaled. Throws the session error on failure.
   */
  feed(id: string, values: readonly number[], scale?: number): SessionSummary {
    const entry = this.getEntry(id);
    const { maxFeedValues } = this.config.getServerConfig();

    if (values.length > maxFeedValues) {
      throw new RainflowError('invalid_argument', `At most ${maxFeedValues} values per feed`, entry.session.getState(), {
        count: values.length,
      });
    }

    const ok = scale === undefined ? entry.session.feed(values) : entry.session.feedScaled(values, scale);
    return this.afterOperation(entry, ok, 'fed');
  }

  /**
   * Finalize with the given residual method, or the one chosen at creation
   */
  finalize(id: string, residualMethod?: ResidualMethod): SessionSummary {
    const entry = this.getEntry(id);
    const method = residualMethod ?? entry.residualMethod;
    entry.residualMethod = method;

    const ok = entry.session.finalize(method);
    const summary = this.afterOperation(entry, ok, 'finalized');
    this.logger.info(`Finalized session ${entry.name} (${method})`, { damage: summary.damage });
    return summary;
  }

  getSummary(id: string): SessionSummary {
    return this.summarize(this.getEntry(id));
  }

  getDetails(id: string): SessionDetails {
    const entry = this.getEntry(id);
    const session = entry.session;
    return {
      summary: this.summarize(entry),
      matrix: session.rfmGet(),
      rangePair: session.getRangePair(),
      levelCrossing: session.getLevelCrossing(),
      residue: session.getResidue(true),
    };
  }

  /** Newest first */
  listSessions(): SessionSummary[] {
    return Array.from(this.sessions.values())
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map((entry) => this.summarize(entry));
  }

  deleteSession(id: string): void {
    const entry = this.getEntry(id);
    entry.session.deinit();
    this.sessions.delete(id);
    this.logger.info(`Deleted session ${entry.name} (${id})`);
    this.emit({ type: 'deleted', sessionId: id, summary: null });
  }

  /**
   * Subscribe to session events, returns the unsubscribe function
   */
  onEvent(listener: SessionEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get size(): number {
    return this.sessions.size;
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private getEntry(id: string): SessionEntry {
    const entry = this.sessions.get(id);
    if (!entry) {
      throw new SessionNotFoundError(id);
    }
    return entry;
  }

  private afterOperation(entry: SessionEntry, ok: boolean, type: SessionEventType): SessionSummary {
    entry.updatedAt = new Date();
    const summary = this.summarize(entry);

    if (!ok) {
      const error =
        entry.session.toError() ??
        new RainflowError('invalid_argument', `Operation rejected in state '${entry.session.getState()}'`, entry.session.getState());
      this.logger.warn(`Session ${entry.name} failed: ${error.message}`, { code: error.code });
      this.emit({ type: 'failed', sessionId: entry.id, summary });
      throw error;
    }

    this.emit({ type, sessionId: entry.id, summary });
    return summary;
  }

  private summarize(entry: SessionEntry): SessionSummary {
    const session = entry.session;
    const matrix = session.rfmGet();
    return {
      id: entry.id,
      name: entry.name,
      state: session.getState(),
      error: session.getError(),
      samples: session.getPosition(),
      damage: session.getDamage(),
      damageResidue: session.getDamageResidue(),
      residueLength: session.getResidue().length,
      cycles: matrix ? matrix.reduce((sum, item) => sum + item.counts, 0) : 0,
      residualMethod: entry.residualMethod,
      createdAt: entry.createdAt.toISOString(),
      updatedAt: entry.updatedAt.toISOString(),
    };
  }

  private emit(event: SessionEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error(`Session event listener failed on '${event.type}'`, error);
      }
    }
  }
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

export function createSessionManager(options?: { config?: ConfigManager }): SessionManager {
  return new SessionManager(options);
}
