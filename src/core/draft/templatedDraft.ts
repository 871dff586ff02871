import type { ActivityDraft, DraftPhase, GroupingAssignment, LearnerProfile, RankedActivity } from '../@types';
import { defaultAdaptationsFor } from '../roster/categories';
import { truncateText } from '../shared/text';

export const DEFAULT_DURATION_MINUTES = 90;

const PHASE_NAMES: Record<string, string> = {
  preparation: 'Preparation',
  execution: 'Execution',
};

const PHASE_TASKS: Record<string, string> = {
  preparation: 'Read the task together, share out the roles and gather the materials.',
  execution: 'Carry out the activity and present the result to the class.',
};

export interface TemplatedDraftInput {
  requestText: string;
  roster: readonly LearnerProfile[];
  groupings: readonly GroupingAssignment[];
  references: readonly RankedActivity[];
}

/** Minimal plan used when generation is unavailable; valid by construction. */
export const buildTemplatedDraft = ({
  requestText,
  roster,
  groupings,
  references,
}: TemplatedDraftInput): ActivityDraft => {
  const reference = references[0]?.activity;
  const topic = truncateText(requestText, 80);

  const phases: DraftPhase[] = groupings.map((grouping) => ({
    id: grouping.phaseId,
    name: PHASE_NAMES[grouping.phaseId] ?? grouping.phaseId,
    groupingMode: grouping.mode,
    groupSize: grouping.groupSize,
    groups: grouping.groups.map((group) => ({ id: group.id, learnerIds: [...group.learnerIds] })),
    tasks: [
      {
        id: `${grouping.phaseId}-t1`,
        description: PHASE_TASKS[grouping.phaseId] ?? `Work on: ${topic}`,
        assignment: grouping.groups.map((group) => group.id),
      },
    ],
  }));

  return {
    title: reference ? `${topic} (based on "${reference.title}")` : topic,
    objective: `Work on "${topic}" with every learner taking part.`,
    durationMinutes: reference?.durationMinutes ?? DEFAULT_DURATION_MINUTES,
    phases,
    adaptations: defaultAdaptationsFor(roster),
  };
};
