import type { GroupingAssignment, GroupingMode, RankedActivity, Roster } from '../@types';
import type { GroupingOptimizer } from '../grouping/groupingOptimizer';
import type { RequestAnalysis } from './analystStage';

export const PLAN_PHASES = ['preparation', 'execution'] as const;

export interface DesignedGrouping {
  mode: GroupingMode;
  groupSize: number;
  groupings: GroupingAssignment[];
}

/**
 * Mode comes from the request when it declares one, otherwise from the best
 * reference activity, otherwise pairs. One assignment per plan phase.
 */
export const runDesignerStage = (
  optimizer: GroupingOptimizer,
  analysis: RequestAnalysis,
  references: readonly RankedActivity[],
  roster: Roster,
  defaultGroupSize: number,
): DesignedGrouping => {
  const mode: GroupingMode = analysis.declaredMode ?? references[0]?.activity.groupingMode ?? 'pair';
  const groupSize = mode === 'group' ? (analysis.requestedGroupSize ?? defaultGroupSize) : mode === 'pair' ? 2 : 1;

  const groupings = PLAN_PHASES.map((phaseId) =>
    optimizer.assign(roster.learners, mode, groupSize, {
      phaseId,
      focusSubject: analysis.focusSubject,
    }),
  );

  return { mode, groupSize, groupings };
};
