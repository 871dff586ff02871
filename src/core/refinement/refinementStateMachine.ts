import { randomUUID } from 'node:crypto';

import type {
  ActivityDraft,
  ConsistencyCorrection,
  FeedbackRecord,
  PlanningState,
  RefinementSnapshot,
  ValidationReport,
} from '../@types';
import type { ConsistencyValidator } from '../draft/consistencyValidator';
import type { FeedbackClassifier } from '../feedback/feedbackClassifier';
import { AppError } from '../shared/errors/app-error';

const TRANSITIONS: Record<PlanningState, readonly PlanningState[]> = {
  draft: ['awaiting_feedback'],
  awaiting_feedback: ['refining', 'finalized'],
  refining: ['validating', 'awaiting_feedback'],
  validating: ['awaiting_feedback'],
  finalized: [],
};

const nowIso = (): string => new Date().toISOString();

/**
 * Owns the canonical draft of one planning session. The draft only changes
 * through `start` and an accepted `submitCandidate`; a rejected candidate
 * leaves the previous draft in place and records a warning.
 */
export class RefinementStateMachine {
  private current: PlanningState = 'draft';
  private revisionNumber = 0;
  private activeDraft: ActivityDraft | undefined;
  private pendingFeedback: FeedbackRecord | undefined;
  private readonly feedbackLog: FeedbackRecord[] = [];
  private readonly warningLog: string[] = [];
  private lastCorrections: ConsistencyCorrection[] = [];

  public constructor(
    private readonly classifier: FeedbackClassifier,
    private readonly validator: ConsistencyValidator,
  ) {}

  public get state(): PlanningState {
    return this.current;
  }

  public get revision(): number {
    return this.revisionNumber;
  }

  public get draft(): ActivityDraft | undefined {
    return this.activeDraft;
  }

  public get pending(): FeedbackRecord | undefined {
    return this.pendingFeedback;
  }

  public start(draft: ActivityDraft): ValidationReport {
    this.assertState('draft');
    const report = this.validator.validate(draft);

    if (report.status === 'rejected') {
      throw new AppError(422, `Initial draft is inconsistent: ${report.reason}`, 'DRAFT_REJECTED', report.violations);
    }

    this.activeDraft = report.draft;
    this.revisionNumber = 1;
    this.lastCorrections = report.corrections;
    this.transition('awaiting_feedback');
    return report;
  }

  public receiveFeedback(text: string): FeedbackRecord {
    this.assertState('awaiting_feedback');

    const record: FeedbackRecord = {
      id: `fb_${randomUUID()}`,
      rawText: text,
      receivedAt: nowIso(),
      ...this.classifier.classify(text),
    };

    this.feedbackLog.push(record);
    this.pendingFeedback = record;
    this.transition('refining');
    return record;
  }

  public submitCandidate(candidate: ActivityDraft): ValidationReport {
    this.assertState('refining');
    this.transition('validating');

    const report = this.validator.validate(candidate);

    if (report.status === 'rejected') {
      this.warningLog.push(`Refinement kept revision ${this.revisionNumber}: ${report.reason}`);
      this.lastCorrections = [];
    } else {
      this.activeDraft = report.draft;
      this.revisionNumber += 1;
      this.lastCorrections = report.corrections;
    }

    this.pendingFeedback = undefined;
    this.transition('awaiting_feedback');
    return report;
  }

  /** Returns to awaiting feedback without touching the draft, e.g. when refinement threw. */
  public cancelRefinement(reason: string): void {
    this.assertState('refining');
    this.warningLog.push(`Refinement cancelled: ${reason}`);
    this.pendingFeedback = undefined;
    this.transition('awaiting_feedback');
  }

  public accept(): ActivityDraft {
    this.assertState('awaiting_feedback');
    const draft = this.activeDraft;
    if (!draft) {
      throw new AppError(409, 'There is no draft to accept.', 'INVALID_SESSION_STATE');
    }

    this.transition('finalized');
    return draft;
  }

  public addWarning(warning: string): void {
    this.warningLog.push(warning);
  }

  public snapshot(): RefinementSnapshot {
    return {
      state: this.current,
      revision: this.revisionNumber,
      draft: this.activeDraft,
      feedback: [...this.feedbackLog],
      lastCorrections: [...this.lastCorrections],
      warnings: [...this.warningLog],
    };
  }

  private assertState(expected: PlanningState): void {
    if (this.current !== expected) {
      throw new AppError(
        409,
        `Operation requires state ${expected}, but the session is ${this.current}.`,
        'INVALID_SESSION_STATE',
        { expected, actual: this.current },
      );
    }
  }

  private transition(next: PlanningState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new AppError(409, `Cannot move from ${this.current} to ${next}.`, 'INVALID_SESSION_STATE');
    }
    this.current = next;
  }
}
