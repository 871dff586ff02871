import type { GroupingAssignment } from '../../core/@types';
import { plannerContainer } from '../../container';
import type { GroupingOptimizer } from '../../core/grouping/groupingOptimizer';
import type { RosterSource } from '../../core/roster/rosterSource';
import { foldText } from '../../core/shared/text';
import type { CreateGroupingBody } from './grouping.schema';

export class GroupingService {
  public constructor(
    private readonly optimizer: GroupingOptimizer,
    private readonly rosterSource: RosterSource,
    private readonly defaultGroupSize: number,
  ) {}

  public async assign(payload: CreateGroupingBody): Promise<GroupingAssignment> {
    const roster = await this.rosterSource.load(payload.classroomId);
    const groupSize =
      payload.mode === 'group' ? (payload.groupSize ?? this.defaultGroupSize) : payload.mode === 'pair' ? 2 : 1;

    return this.optimizer.assign(roster.learners, payload.mode, groupSize, {
      phaseId: 'adhoc',
      focusSubject: payload.focusSubject ? foldText(payload.focusSubject) : undefined,
    });
  }
}

export const groupingService = new GroupingService(
  plannerContainer.optimizer,
  plannerContainer.rosterSource,
  plannerContainer.config.grouping.defaultGroupSize,
);
