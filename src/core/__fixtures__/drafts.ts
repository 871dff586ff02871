import type { ActivityDraft, GroupingAssignment } from '../@types';
import { buildTemplatedDraft } from '../draft/templatedDraft';
import { GroupingOptimizer } from '../grouping/groupingOptimizer';
import { classroomLearners } from './roster';

export const classroomPairings = (): GroupingAssignment[] => {
  const optimizer = new GroupingOptimizer();
  return ['preparation', 'execution'].map((phaseId) =>
    optimizer.assign(classroomLearners, 'pair', 2, { phaseId, focusSubject: 'matematicas' }),
  );
};

/** A consistent two-phase pair draft for the classroom fixture. */
export const consistentDraft = (): ActivityDraft =>
  buildTemplatedDraft({
    requestText: 'Fracciones en parejas',
    roster: classroomLearners,
    groupings: classroomPairings(),
    references: [],
  });
