import type { ActivityDraft, FeedbackRecord, GroupingAssignment, LearnerProfile } from '../@types';
import type { GroupingOptimizer } from '../grouping/groupingOptimizer';
import { buildRefinementPrompt } from '../shared/prompts';

export interface RefinerStageInput {
  requestText: string;
  draft: ActivityDraft;
  feedback: FeedbackRecord;
  learners: readonly LearnerProfile[];
  optimizer: GroupingOptimizer;
  defaultGroupSize: number;
  focusSubject?: string;
}

export interface RefinerStageOutput {
  prompt: string;
  /** Groupings the refined draft should use, by phase position. */
  groupings: GroupingAssignment[];
}

/** Reads the groupings a draft currently uses, phase by phase. */
export const groupingsFromDraft = (draft: ActivityDraft): GroupingAssignment[] => {
  return draft.phases.map((phase) => ({
    phaseId: phase.id,
    mode: phase.groupingMode,
    groupSize: phase.groupSize,
    groups: phase.groups,
    membership: Object.fromEntries(
      phase.groups.flatMap((group) => group.learnerIds.map((learnerId) => [learnerId, group.id])),
    ),
    relaxations: [],
  }));
};

/** Regroups up front when the feedback asks for a new mode, so the prompt carries the new groups. */
export const runRefinerStage = (input: RefinerStageInput): RefinerStageOutput => {
  const { feedback, draft } = input;
  let groupings = groupingsFromDraft(draft);

  if (feedback.intents.includes('grouping-change') && feedback.targetMode) {
    const mode = feedback.targetMode;
    const size = mode === 'group' ? (feedback.targetGroupSize ?? input.defaultGroupSize) : mode === 'pair' ? 2 : 1;
    groupings = draft.phases.map((phase) =>
      input.optimizer.assign(input.learners, mode, size, {
        phaseId: phase.id,
        focusSubject: input.focusSubject,
      }),
    );
  }

  return {
    prompt: buildRefinementPrompt({
      requestText: input.requestText,
      draft,
      feedbackText: feedback.rawText,
      instructions: feedback.instructions,
      learners: input.learners,
      groupings,
    }),
    groupings,
  };
};
