import type {
  GroupingAssignment,
  GroupingMode,
  GroupingRelaxation,
  LearnerGroup,
  LearnerProfile,
} from '../@types';
import { isNeedsSupport } from '../roster/categories';
import { InvalidGroupingRequestError } from '../shared/errors/planner-errors';
import { logger } from '../shared/logger';

export interface GroupingTuning {
  /** Preferred level gap between a learner and the partner placed with them. */
  zpdStep: number;
  /** Partners further ahead than this are used only when nobody closer is left. */
  zpdMaxGap: number;
}

export const DEFAULT_GROUPING_TUNING: GroupingTuning = {
  zpdStep: 1,
  zpdMaxGap: 2,
};

export interface AssignOptions {
  phaseId?: string;
  /** Competency key used for complementary matching; the mean level is used otherwise. */
  focusSubject?: string;
}

const NEUTRAL_LEVEL = 3;

export const competencyLevel = (learner: LearnerProfile, focusSubject?: string): number => {
  if (focusSubject !== undefined) {
    const focused = learner.competencies[focusSubject];
    if (typeof focused === 'number') {
      return focused;
    }
  }

  const levels = Object.values(learner.competencies);
  if (levels.length === 0) {
    return NEUTRAL_LEVEL;
  }

  return levels.reduce((sum, level) => sum + level, 0) / levels.length;
};

const effectiveGroupSize = (mode: GroupingMode, groupSize: number): number => {
  if (mode === 'individual') {
    return 1;
  }

  return mode === 'pair' ? 2 : groupSize;
};

const groupId = (index: number): string => `g${index + 1}`;

interface Slot {
  capacity: number;
  members: LearnerProfile[];
  needsSupport: number;
}

export class GroupingOptimizer {
  public constructor(private readonly tuning: GroupingTuning = DEFAULT_GROUPING_TUNING) {}

  /**
   * Partitions the roster for one phase. Needs-support learners seed separate
   * groups; partners are added round-robin, each chosen to sit one step above
   * the group's seed level in the focus subject. Roster order breaks every tie.
   */
  public assign(
    roster: readonly LearnerProfile[],
    mode: GroupingMode,
    groupSize: number,
    options: AssignOptions = {},
  ): GroupingAssignment {
    this.validate(roster, groupSize);

    const phaseId = options.phaseId ?? 'phase';
    const size = effectiveGroupSize(mode, groupSize);

    if (size === 1) {
      return this.toAssignment(
        phaseId,
        mode,
        size,
        roster.map((learner, index) => ({ id: groupId(index), learnerIds: [learner.id] })),
        [],
      );
    }

    const needsSupport = roster.filter(isNeedsSupport);
    const partners = roster.filter((learner) => !isNeedsSupport(learner));
    const slots = this.createSlots(roster.length, size, mode, needsSupport.length);
    const relaxed = new Set<number>();

    needsSupport.forEach((learner, index) => {
      if (index < slots.length) {
        this.place(slots, index, learner, true);
        return;
      }

      const target = this.leastSupportedOpenSlot(slots);
      this.place(slots, target, learner, true);
      relaxed.add(target);
    });

    const remaining = [...partners];
    while (remaining.length > 0) {
      let placedInRound = false;

      for (let index = 0; index < slots.length && remaining.length > 0; index += 1) {
        const slot = slots[index];
        if (!slot || slot.members.length >= slot.capacity) {
          continue;
        }

        const anchor = slot.members[0];
        const pickIndex = anchor
          ? this.pickPartner(competencyLevel(anchor, options.focusSubject), remaining, options.focusSubject)
          : 0;
        const [partner] = remaining.splice(pickIndex, 1);
        if (partner) {
          this.place(slots, index, partner, false);
          placedInRound = true;
        }
      }

      if (!placedInRound) {
        break;
      }
    }

    const groups = slots.map((slot, index) => ({
      id: groupId(index),
      learnerIds: slot.members.map((learner) => learner.id),
    }));

    const relaxations: GroupingRelaxation[] = [...relaxed].sort((a, b) => a - b).map((index) => {
      const slot = slots[index];
      return {
        groupId: groupId(index),
        needsSupportLearnerIds: (slot?.members ?? []).filter(isNeedsSupport).map((learner) => learner.id),
        reason: 'Not enough groups to give each needs-support learner their own group.',
      };
    });

    for (const relaxation of relaxations) {
      logger.warn('grouping_constraint_relaxed', { phaseId, mode, ...relaxation });
    }

    return this.toAssignment(phaseId, mode, size, groups, relaxations);
  }

  private validate(roster: readonly LearnerProfile[], groupSize: number): void {
    if (roster.length === 0) {
      throw new InvalidGroupingRequestError('The roster is empty.');
    }

    if (!Number.isInteger(groupSize) || groupSize < 1) {
      throw new InvalidGroupingRequestError('groupSize must be an integer of at least 1.', { groupSize });
    }

    const ids = new Set(roster.map((learner) => learner.id));
    if (ids.size !== roster.length) {
      throw new InvalidGroupingRequestError('Learner ids must be unique within a roster.');
    }
  }

  /**
   * Group count is the smallest that respects the size cap, raised (up to one
   * group per two learners) so every needs-support learner can lead a group.
   * Extra seats go to the first groups, which yields the odd-roster trio.
   */
  private createSlots(total: number, size: number, mode: GroupingMode, needsSupport: number): Slot[] {
    const base = mode === 'pair' ? Math.max(1, Math.floor(total / 2)) : Math.ceil(total / size);
    const count = Math.max(base, Math.min(needsSupport, Math.floor(total / 2)));
    const minimum = Math.floor(total / count);
    const extra = total % count;

    return Array.from({ length: count }, (_unused, index) => ({
      capacity: minimum + (index < extra ? 1 : 0),
      members: [],
      needsSupport: 0,
    }));
  }

  private place(slots: Slot[], index: number, learner: LearnerProfile, needsSupport: boolean): void {
    const slot = slots[index];
    if (!slot) {
      return;
    }

    slot.members.push(learner);
    if (needsSupport) {
      slot.needsSupport += 1;
    }
  }

  private leastSupportedOpenSlot(slots: readonly Slot[]): number {
    let best = -1;

    slots.forEach((slot, index) => {
      if (slot.members.length >= slot.capacity) {
        return;
      }

      const current = slots[best];
      if (!current || slot.needsSupport < current.needsSupport) {
        best = index;
      }
    });

    return best;
  }

  private pickPartner(anchorLevel: number, candidates: readonly LearnerProfile[], focusSubject?: string): number {
    const target = anchorLevel + this.tuning.zpdStep;
    const ceiling = anchorLevel + this.tuning.zpdMaxGap;
    let bestIndex = 0;
    let bestKey: [number, number] | undefined;

    candidates.forEach((candidate, index) => {
      const level = competencyLevel(candidate, focusSubject);
      const key: [number, number] = [level > ceiling ? 1 : 0, Math.abs(level - target)];

      if (!bestKey || key[0] < bestKey[0] || (key[0] === bestKey[0] && key[1] < bestKey[1])) {
        bestKey = key;
        bestIndex = index;
      }
    });

    return bestIndex;
  }

  private toAssignment(
    phaseId: string,
    mode: GroupingMode,
    groupSize: number,
    groups: LearnerGroup[],
    relaxations: GroupingRelaxation[],
  ): GroupingAssignment {
    const membership: Record<string, string> = {};
    for (const group of groups) {
      for (const learnerId of group.learnerIds) {
        membership[learnerId] = group.id;
      }
    }

    return { phaseId, mode, groupSize, groups, membership, relaxations };
  }
}
