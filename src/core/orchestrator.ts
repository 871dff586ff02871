import type {
  ActivityDraft,
  CreatePlanningSessionRequest,
  DraftOrigin,
  FeedbackRecord,
  MissingSection,
  PlanningSessionView,
  SubmitFeedbackResponse,
} from './@types';
import { ConsistencyValidator } from './draft/consistencyValidator';
import {
  inheritMissingSections,
  parseActivityDraft,
  type DraftParseContext,
} from './draft/draftParser';
import { buildTemplatedDraft, DEFAULT_DURATION_MINUTES } from './draft/templatedDraft';
import type { FeedbackClassifier } from './feedback/feedbackClassifier';
import type { GroupingOptimizer } from './grouping/groupingOptimizer';
import type { PlanningMemoryStore, PlanningSessionRecord } from './memory/planningMemory';
import { applyFeedbackAdjustments } from './refinement/feedbackAdjustments';
import { RefinementStateMachine } from './refinement/refinementStateMachine';
import type { RosterSource } from './roster/rosterSource';
import type { SimilaritySearchEngine } from './search/similaritySearch';
import { AppError } from './shared/errors/app-error';
import { MalformedResponseError, ProviderUnavailableError } from './shared/errors/planner-errors';
import { describeError, logger } from './shared/logger';
import { buildGenerationPrompt, PLANNER_SYSTEM_PROMPT, STRICT_FORMAT_REMINDER } from './shared/prompts';
import { callWithRetry, type RetryPolicy } from './shared/retry';
import { runAnalystStage } from './stages/analystStage';
import { runDesignerStage } from './stages/designerStage';
import { groupingsFromDraft, runRefinerStage } from './stages/refinerStage';
import { runResearcherStage } from './stages/researcherStage';
import type { LlmTool } from './tools/llm';

export interface PlanningOrchestratorDependencies {
  llmTool: LlmTool;
  search: SimilaritySearchEngine;
  optimizer: GroupingOptimizer;
  classifier: FeedbackClassifier;
  rosterSource: RosterSource;
  memory: PlanningMemoryStore;
}

export interface PlanningOrchestratorConfig {
  topK: number;
  defaultGroupSize: number;
  maxCompletionTokens: number;
  retry: RetryPolicy;
}

type GenerationOutcome =
  | { kind: 'parsed'; draft: ActivityDraft; missing: MissingSection[] }
  | { kind: 'failed'; reason: string };

/**
 * Runs the planning pipeline (analyst, researcher, designer, generation) and
 * routes feedback through each session's refinement state machine.
 */
export class PlanningOrchestrator {
  public constructor(
    private readonly deps: PlanningOrchestratorDependencies,
    private readonly config: PlanningOrchestratorConfig,
  ) {}

  public async createSession(input: CreatePlanningSessionRequest): Promise<PlanningSessionView> {
    const roster = await this.deps.rosterSource.load(input.classroomId);
    const analysis = runAnalystStage(input.requestText, roster);
    const references = await runResearcherStage(this.deps.search, analysis, input.topK ?? this.config.topK);
    const design = runDesignerStage(
      this.deps.optimizer,
      analysis,
      references,
      roster,
      this.config.defaultGroupSize,
    );

    const validator = new ConsistencyValidator(roster.learners, this.deps.optimizer, {
      focusSubject: analysis.focusSubject,
    });
    const warnings: string[] = [];
    let draft: ActivityDraft | undefined;

    const outcome = await this.generateDraft(
      buildGenerationPrompt({
        requestText: input.requestText,
        learners: roster.learners,
        references,
        groupings: design.groupings,
        focusSubject: analysis.focusSubject,
      }),
      {
        roster: roster.learners,
        groupings: design.groupings,
        defaultGroupSize: this.config.defaultGroupSize,
        defaultDurationMinutes: references[0]?.activity.durationMinutes ?? DEFAULT_DURATION_MINUTES,
      },
    );

    if (outcome.kind === 'parsed') {
      if (outcome.missing.length > 0) {
        const paths = outcome.missing.map((entry) => entry.path).join(', ');
        warnings.push(`The generated plan left out ${paths}; defaults were used.`);
      }

      const report = validator.validate(outcome.draft);
      if (report.status === 'rejected') {
        warnings.push(`The generated plan was inconsistent (${report.reason}); a template was used instead.`);
      } else {
        draft = outcome.draft;
      }
    } else {
      warnings.push(`Generation failed (${outcome.reason}); a template was used instead.`);
    }

    const origin: DraftOrigin = draft ? 'generated' : 'templated';
    draft ??= buildTemplatedDraft({
      requestText: input.requestText,
      roster: roster.learners,
      groupings: design.groupings,
      references,
    });

    const machine = new RefinementStateMachine(this.deps.classifier, validator);
    machine.start(draft);
    for (const warning of warnings) {
      machine.addWarning(warning);
    }

    const session = this.deps.memory.create({
      requestText: input.requestText,
      roster,
      analysis,
      references,
      groupings: machine.draft ? groupingsFromDraft(machine.draft) : design.groupings,
      machine,
      origin,
    });
    this.deps.memory.appendLog(session.id, 'session_created', {
      origin,
      references: references.map(({ activity }) => activity.id),
      mode: design.mode,
    });

    logger.info('planning_session_created', {
      sessionId: session.id,
      classroomId: roster.classroomId,
      origin,
      references: references.length,
      mode: design.mode,
    });

    return this.toView(session);
  }

  public getSession(sessionId: string): PlanningSessionView {
    return this.toView(this.deps.memory.mustGet(sessionId));
  }

  public async submitFeedback(sessionId: string, text: string): Promise<SubmitFeedbackResponse> {
    const session = this.deps.memory.mustGet(sessionId);
    const { machine } = session;
    const feedback = machine.receiveFeedback(text);
    this.deps.memory.appendLog(sessionId, 'feedback_received', {
      feedbackId: feedback.id,
      intents: feedback.intents,
    });

    try {
      const current = machine.draft;
      if (!current) {
        throw new AppError(409, 'The session has no draft to refine.', 'INVALID_SESSION_STATE');
      }

      const candidate = await this.refineDraft(session, current, feedback);
      const report = machine.submitCandidate(candidate.draft);

      if (report.status === 'rejected') {
        this.deps.memory.appendLog(sessionId, 'draft_retained', {
          feedbackId: feedback.id,
          reason: report.reason,
        });
      } else {
        session.origin = candidate.origin;
        session.groupings = groupingsFromDraft(report.draft);
        this.deps.memory.appendLog(sessionId, 'draft_revised', {
          feedbackId: feedback.id,
          revision: machine.revision,
          status: report.status,
          origin: candidate.origin,
        });
      }

      logger.info('planning_feedback_processed', {
        sessionId,
        intents: feedback.intents,
        validation: report.status,
        revision: machine.revision,
      });

      return {
        session: this.toView(session),
        feedback,
        validation: report.status,
        violations: report.violations,
      };
    } catch (error: unknown) {
      machine.cancelRefinement(describeError(error));
      this.deps.memory.appendLog(sessionId, 'refinement_cancelled', {
        feedbackId: feedback.id,
        error: describeError(error),
      });
      throw error;
    }
  }

  /** Finalizes the plan and discards the session; the returned view is the last one. */
  public accept(sessionId: string): PlanningSessionView {
    const session = this.deps.memory.mustGet(sessionId);
    session.machine.accept();
    this.deps.memory.appendLog(sessionId, 'session_finalized', { revision: session.machine.revision });

    const view = this.toView(session);
    this.deps.memory.delete(sessionId);
    logger.info('planning_session_finalized', { sessionId, revision: view.revision });
    return view;
  }

  public abandon(sessionId: string): void {
    this.deps.memory.delete(sessionId);
    logger.info('planning_session_abandoned', { sessionId });
  }

  private async refineDraft(
    session: PlanningSessionRecord,
    current: ActivityDraft,
    feedback: FeedbackRecord,
  ): Promise<{ draft: ActivityDraft; origin: DraftOrigin }> {
    const refined = runRefinerStage({
      requestText: session.requestText,
      draft: current,
      feedback,
      learners: session.roster.learners,
      optimizer: this.deps.optimizer,
      defaultGroupSize: this.config.defaultGroupSize,
      focusSubject: session.analysis.focusSubject,
    });

    const outcome = await this.generateDraft(refined.prompt, {
      roster: session.roster.learners,
      groupings: refined.groupings,
      defaultGroupSize: this.config.defaultGroupSize,
      defaultDurationMinutes: current.durationMinutes,
    });

    if (outcome.kind === 'parsed') {
      return { draft: inheritMissingSections(outcome.draft, current, outcome.missing), origin: 'generated' };
    }

    const adjusted = applyFeedbackAdjustments(current, feedback, {
      roster: session.roster.learners,
      optimizer: this.deps.optimizer,
      defaultGroupSize: this.config.defaultGroupSize,
      focusSubject: session.analysis.focusSubject,
    });

    session.machine.addWarning(
      `Generation failed (${outcome.reason}); applied ${adjusted.applied.join(', ') || 'no changes'} locally` +
        (adjusted.skipped.length > 0 ? ` and could not apply ${adjusted.skipped.join(', ')}.` : '.'),
    );

    return { draft: adjusted.draft, origin: 'adjusted' };
  }

  /**
   * One generation attempt plus one stricter re-prompt when the output cannot
   * be parsed. Provider outages end the attempt immediately.
   */
  private async generateDraft(userPrompt: string, context: DraftParseContext): Promise<GenerationOutcome> {
    if (!this.deps.llmTool.available) {
      return { kind: 'failed', reason: 'no generation provider configured' };
    }

    let prompt = userPrompt;
    let lastReason = 'unknown';

    for (let attempt = 1; attempt <= 2; attempt += 1) {
      let text: string | undefined;

      try {
        const output = await callWithRetry(
          'generation',
          (signal) =>
            this.deps.llmTool.generateChatCompletion({
              systemPrompt: PLANNER_SYSTEM_PROMPT,
              userPrompt: prompt,
              maxTokens: this.config.maxCompletionTokens,
              signal,
            }),
          this.config.retry,
        );
        text = output.text;
      } catch (error: unknown) {
        if (error instanceof ProviderUnavailableError) {
          logger.warn('generation_unavailable', { error: error.message });
          return { kind: 'failed', reason: 'provider unavailable' };
        }
        if (!(error instanceof MalformedResponseError)) {
          throw error;
        }
        lastReason = error.message;
      }

      if (text !== undefined) {
        const parsed = parseActivityDraft(text, context);
        if (parsed.status !== 'malformed') {
          return {
            kind: 'parsed',
            draft: parsed.draft,
            missing: parsed.status === 'incomplete' ? parsed.missing : [],
          };
        }
        lastReason = parsed.reason;
      }

      logger.warn('generation_malformed', { attempt, reason: lastReason });
      prompt = `${userPrompt}\n\n${STRICT_FORMAT_REMINDER}`;
    }

    return { kind: 'failed', reason: `malformed output: ${lastReason}` };
  }

  private toView(session: PlanningSessionRecord): PlanningSessionView {
    const snapshot = session.machine.snapshot();

    return {
      id: session.id,
      classroomId: session.roster.classroomId,
      requestText: session.requestText,
      state: snapshot.state,
      revision: snapshot.revision,
      origin: session.origin,
      draft: snapshot.draft,
      references: session.references,
      groupings: session.groupings,
      feedback: snapshot.feedback,
      corrections: snapshot.lastCorrections,
      warnings: snapshot.warnings,
      log: [...session.log],
      createdAt: session.createdAt,
      updatedAt: session.updatedAt,
    };
  }
}
