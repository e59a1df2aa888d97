import * as crypto from "crypto";
import type { CalculationModel, DealInputs, ISO } from "./dto";

export type SessionEventType =
  | "analysis_run"
  | "report_generated"
  | "report_failed"
  | "configuration_saved"
  | "sample_loaded";

export interface SessionEvent {
  type: SessionEventType;
  at: ISO;
  detail?: Record<string, string | number | boolean>;
}

// Shape of the exported session JSON
export interface SessionSnapshot {
  sessionId: string;
  model: CalculationModel;
  purchasePrice: number;
  downPaymentPct: number;
  interestRate: number;
  timestamp: ISO;
}

export type Clock = () => Date;

export const DEFAULT_MAX_EVENTS = 500;

/**
 * Usage state for one caller. Owned by whoever created it; nothing here is module-level.
 * Only the newest `maxEvents` events are kept; counters cover every event recorded.
 */
export class SessionContext {
  readonly startedAt: ISO;
  private log: SessionEvent[] = [];
  private totals: Record<SessionEventType, number> = {
    analysis_run: 0,
    report_generated: 0,
    report_failed: 0,
    configuration_saved: 0,
    sample_loaded: 0,
  };
  private lastInputs: DealInputs | null = null;
  private lastInputsAt: ISO | null = null;
  private lastActive: number;

  constructor(
    readonly id: string,
    private clock: Clock = () => new Date(),
    private maxEvents: number = DEFAULT_MAX_EVENTS
  ) {
    const now = this.clock();
    this.startedAt = now.toISOString();
    this.lastActive = now.getTime();
  }

  /** Epoch millis of the last access through the store or a recorded event */
  get lastActiveAt(): number {
    return this.lastActive;
  }

  touch(): void {
    this.lastActive = this.clock().getTime();
  }

  record(
    type: SessionEventType,
    detail?: SessionEvent["detail"]
  ): SessionEvent {
    const now = this.clock();
    const event: SessionEvent = {
      type,
      at: now.toISOString(),
      ...(detail ? { detail } : {}),
    };
    this.lastActive = now.getTime();
    this.totals[type]++;
    this.log.push(event);
    if (this.log.length > this.maxEvents) {
      this.log.splice(0, this.log.length - this.maxEvents);
    }
    return event;
  }

  /**
   * Remember the inputs of the latest analysis and log the run
   */
  recordAnalysis(inputs: DealInputs): SessionEvent {
    const event = this.record("analysis_run", { model: inputs.model });
    this.lastInputs = inputs;
    this.lastInputsAt = event.at;
    return event;
  }

  snapshot(): SessionSnapshot | null {
    if (!this.lastInputs || !this.lastInputsAt) return null;

    const { model, financing } = this.lastInputs;
    return {
      sessionId: this.id,
      model,
      purchasePrice: financing.purchasePrice,
      downPaymentPct: financing.downPaymentPct,
      interestRate: financing.interestRatePct,
      timestamp: this.lastInputsAt,
    };
  }

  events(): SessionEvent[] {
    return [...this.log];
  }

  counters(): Record<SessionEventType, number> {
    return { ...this.totals };
  }
}

export interface SessionStoreOptions {
  maxSessions: number;
  idleTtlMs: number;
  maxEventsPerSession: number;
}

export const DEFAULT_SESSION_STORE_OPTIONS: SessionStoreOptions = {
  maxSessions: 1000,
  idleTtlMs: 30 * 60 * 1000,
  maxEventsPerSession: DEFAULT_MAX_EVENTS,
};

/**
 * Sessions held by one app instance
 *
 * Sessions idle for longer than `idleTtlMs` expire. Once `maxSessions` is
 * reached, creating a session evicts the least recently used one.
 */
export class SessionStore {
  // Map order doubles as recency order: oldest first
  private sessions = new Map<string, SessionContext>();
  private options: SessionStoreOptions;

  constructor(
    private clock: Clock = () => new Date(),
    private newId: () => string = () => crypto.randomUUID(),
    options: Partial<SessionStoreOptions> = {}
  ) {
    this.options = { ...DEFAULT_SESSION_STORE_OPTIONS, ...options };
  }

  create(): SessionContext {
    this.evictExpired();
    while (this.sessions.size >= this.options.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
    }

    const session = new SessionContext(
      this.newId(),
      this.clock,
      this.options.maxEventsPerSession
    );
    this.sessions.set(session.id, session);
    return session;
  }

  get(id: string): SessionContext | null {
    const session = this.sessions.get(id);
    if (!session) return null;

    this.sessions.delete(id);
    if (this.isExpired(session)) {
      return null;
    }

    session.touch();
    this.sessions.set(id, session);
    return session;
  }

  size(): number {
    return this.sessions.size;
  }

  private isExpired(session: SessionContext): boolean {
    return this.clock().getTime() - session.lastActiveAt > this.options.idleTtlMs;
  }

  private evictExpired(): void {
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session)) {
        this.sessions.delete(id);
      }
    }
  }
}
