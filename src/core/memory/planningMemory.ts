import { randomUUID } from 'node:crypto';

import type {
  DraftOrigin,
  GroupingAssignment,
  RankedActivity,
  Roster,
  SessionLogEntry,
  SessionLogType,
} from '../@types';
import type { RefinementStateMachine } from '../refinement/refinementStateMachine';
import { AppError } from '../shared/errors/app-error';
import type { RequestAnalysis } from '../stages/analystStage';

export interface PlanningSessionRecord {
  id: string;
  requestText: string;
  roster: Roster;
  analysis: RequestAnalysis;
  references: RankedActivity[];
  groupings: GroupingAssignment[];
  machine: RefinementStateMachine;
  origin: DraftOrigin;
  log: SessionLogEntry[];
  createdAt: string;
  updatedAt: string;
}

export type CreatePlanningSessionInput = Omit<PlanningSessionRecord, 'id' | 'log' | 'createdAt' | 'updatedAt'>;

export interface PlanningMemoryStore {
  create(input: CreatePlanningSessionInput): PlanningSessionRecord;
  mustGet(sessionId: string): PlanningSessionRecord;
  delete(sessionId: string): void;
  appendLog(sessionId: string, type: SessionLogType, detail?: Record<string, unknown>): PlanningSessionRecord;
}

const nowIso = (): string => new Date().toISOString();

export class PlanningMemory implements PlanningMemoryStore {
  private readonly sessions = new Map<string, PlanningSessionRecord>();

  public get size(): number {
    return this.sessions.size;
  }

  public create(input: CreatePlanningSessionInput): PlanningSessionRecord {
    const createdAt = nowIso();
    const session: PlanningSessionRecord = {
      ...input,
      id: randomUUID(),
      log: [],
      createdAt,
      updatedAt: createdAt,
    };

    this.sessions.set(session.id, session);
    return session;
  }

  public mustGet(sessionId: string): PlanningSessionRecord {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new AppError(404, `Planning session ${sessionId} was not found.`, 'PLANNING_SESSION_NOT_FOUND');
    }
    return session;
  }

  public delete(sessionId: string): void {
    this.mustGet(sessionId);
    this.sessions.delete(sessionId);
  }

  public appendLog(
    sessionId: string,
    type: SessionLogType,
    detail: Record<string, unknown> = {},
  ): PlanningSessionRecord {
    const session = this.mustGet(sessionId);
    const at = nowIso();
    session.log.push({ id: `log_${randomUUID()}`, type, at, detail });
    session.updatedAt = at;
    return session;
  }
}
