import type { ActivityDraft, FeedbackRecord, GroupingMode, LearnerProfile, RefinementIntent } from '../@types';
import type { GroupingOptimizer } from '../grouping/groupingOptimizer';

export const DURATION_STEP_MINUTES = 15;
export const MIN_DURATION_MINUTES = 15;

export interface AdjustmentContext {
  roster: readonly LearnerProfile[];
  optimizer: GroupingOptimizer;
  defaultGroupSize: number;
  focusSubject?: string;
}

export interface AdjustmentResult {
  draft: ActivityDraft;
  applied: RefinementIntent[];
  skipped: RefinementIntent[];
}

const groupSizeFor = (mode: GroupingMode, requested: number | undefined, fallback: number): number => {
  if (mode === 'pair') {
    return 2;
  }
  return mode === 'individual' ? 1 : (requested ?? fallback);
};

/**
 * Applies the parts of a feedback record that need no text generation:
 * duration steps and regrouping. Everything else is reported as skipped.
 */
export const applyFeedbackAdjustments = (
  current: ActivityDraft,
  feedback: FeedbackRecord,
  context: AdjustmentContext,
): AdjustmentResult => {
  const draft = structuredClone(current);
  const applied: RefinementIntent[] = [];
  const skipped: RefinementIntent[] = [];

  for (const intent of feedback.intents) {
    if (intent === 'duration-change' && feedback.durationDirection) {
      const delta = feedback.durationDirection === 'longer' ? DURATION_STEP_MINUTES : -DURATION_STEP_MINUTES;
      draft.durationMinutes = Math.max(MIN_DURATION_MINUTES, draft.durationMinutes + delta);
      applied.push(intent);
      continue;
    }

    if (intent === 'grouping-change' && feedback.targetMode) {
      const mode = feedback.targetMode;
      const size = groupSizeFor(mode, feedback.targetGroupSize, context.defaultGroupSize);

      for (const phase of draft.phases) {
        const assignment = context.optimizer.assign(context.roster, mode, size, {
          phaseId: phase.id,
          focusSubject: context.focusSubject,
        });
        phase.groupingMode = mode;
        phase.groupSize = assignment.groupSize;
        phase.groups = assignment.groups;
        for (const task of phase.tasks) {
          task.assignment = assignment.groups.map((group) => group.id);
        }
      }

      applied.push(intent);
      continue;
    }

    skipped.push(intent);
  }

  return { draft, applied, skipped };
};
