import type {
  ActivityDraft,
  ConsistencyCorrection,
  ConsistencyViolation,
  DraftPhase,
  LearnerProfile,
  ValidationReport,
} from '../@types';
import type { GroupingOptimizer } from '../grouping/groupingOptimizer';
import { categoriesNeedingAdaptations, DEFAULT_ADAPTATIONS, isNeedsSupport } from '../roster/categories';
import { describeError, logger } from '../shared/logger';

export interface ConsistencyValidatorOptions {
  focusSubject?: string;
}

const PHASE_LEVEL_KINDS = new Set<ConsistencyViolation['kind']>([
  'unknown_assignee',
  'missing_groups',
  'group_partition',
  'mode_shape_mismatch',
  'support_constraint',
  'learner_omitted',
]);

/**
 * Checks a draft against the roster: every assignee exists, groups match the
 * phase mode and partition the roster, and nobody is left out of a phase.
 * Mechanical problems are repaired; anything else rejects the draft.
 */
export class ConsistencyValidator {
  private readonly rosterIds: ReadonlySet<string>;
  private readonly needsSupportIds: ReadonlySet<string>;
  /** One needs-support learner per group is only enforceable with enough partners. */
  private readonly enforceSupportSpread: boolean;

  public constructor(
    private readonly roster: readonly LearnerProfile[],
    private readonly optimizer: GroupingOptimizer,
    private readonly options: ConsistencyValidatorOptions = {},
  ) {
    this.rosterIds = new Set(roster.map((learner) => learner.id));
    this.needsSupportIds = new Set(roster.filter(isNeedsSupport).map((learner) => learner.id));
    this.enforceSupportSpread = roster.length - this.needsSupportIds.size >= this.needsSupportIds.size;
  }

  public validate(draft: ActivityDraft): ValidationReport {
    const violations = this.inspect(draft);

    if (violations.length === 0) {
      return { status: 'valid', draft, violations: [], corrections: [] };
    }

    if (violations.some((violation) => violation.kind === 'missing_phases')) {
      return { status: 'rejected', reason: 'The draft has no phases.', violations, corrections: [] };
    }

    const corrected = structuredClone(draft);
    const corrections: ConsistencyCorrection[] = [];

    for (const phase of corrected.phases) {
      const phaseViolations = violations.filter(
        (violation) => violation.phaseId === phase.id && PHASE_LEVEL_KINDS.has(violation.kind),
      );
      if (phaseViolations.length === 0) {
        continue;
      }

      const coverageOnly = phaseViolations.every((violation) => violation.kind === 'learner_omitted');

      try {
        corrections.push(coverageOnly ? this.patchCoverage(phase) : this.regroup(phase));
      } catch (error: unknown) {
        return {
          status: 'rejected',
          reason: `Phase ${phase.id} could not be regrouped: ${describeError(error)}`,
          violations,
          corrections,
        };
      }
    }

    for (const category of categoriesNeedingAdaptations(this.roster)) {
      if ((corrected.adaptations[category] ?? []).length > 0) {
        continue;
      }

      corrected.adaptations[category] = [...DEFAULT_ADAPTATIONS[category]];
      corrections.push({
        kind: 'adaptations_added',
        description: `Added default adaptations for ${category}.`,
      });
    }

    const remaining = this.inspect(corrected);
    if (remaining.length > 0) {
      return {
        status: 'rejected',
        reason: 'Violations remain after automatic correction.',
        violations: [...violations, ...remaining],
        corrections,
      };
    }

    logger.info('draft_auto_corrected', {
      violations: violations.map((violation) => violation.kind),
      corrections: corrections.map((correction) => correction.kind),
    });

    return { status: 'corrected', draft: corrected, violations, corrections };
  }

  public inspect(draft: ActivityDraft): ConsistencyViolation[] {
    if (draft.phases.length === 0) {
      return [{ kind: 'missing_phases', message: 'The draft has no phases.' }];
    }

    const violations = draft.phases.flatMap((phase) => this.inspectPhase(phase));

    for (const category of categoriesNeedingAdaptations(this.roster)) {
      if ((draft.adaptations[category] ?? []).length === 0) {
        violations.push({
          kind: 'missing_adaptations',
          message: `No adaptations for ${category}, which is present in the roster.`,
          tokens: [category],
        });
      }
    }

    return violations;
  }

  private inspectPhase(phase: DraftPhase): ConsistencyViolation[] {
    const violations: ConsistencyViolation[] = [];
    const groupIds = new Set(phase.groups.map((group) => group.id));

    const unknown = phase.tasks.flatMap((task) =>
      task.assignment.filter((token) => !this.rosterIds.has(token) && !groupIds.has(token)),
    );
    if (unknown.length > 0) {
      violations.push({
        kind: 'unknown_assignee',
        phaseId: phase.id,
        message: `Assignments reference ids that are neither learners nor groups of the phase: ${unknown.join(', ')}.`,
        tokens: [...new Set(unknown)],
      });
    }

    violations.push(...this.inspectGroups(phase));

    const covered = new Set<string>();
    const membersById = new Map(phase.groups.map((group) => [group.id, group.learnerIds]));
    for (const token of phase.tasks.flatMap((task) => task.assignment)) {
      for (const learnerId of membersById.get(token) ?? [token]) {
        covered.add(learnerId);
      }
    }

    const omitted = [...this.rosterIds].filter((learnerId) => !covered.has(learnerId));
    if (omitted.length > 0) {
      violations.push({
        kind: 'learner_omitted',
        phaseId: phase.id,
        message: `Learners without any task in phase ${phase.id}: ${omitted.join(', ')}.`,
        tokens: omitted,
      });
    }

    return violations;
  }

  private inspectGroups(phase: DraftPhase): ConsistencyViolation[] {
    if (phase.groups.length === 0) {
      return phase.groupingMode === 'individual'
        ? []
        : [
            {
              kind: 'missing_groups',
              phaseId: phase.id,
              message: `Phase ${phase.id} is declared as ${phase.groupingMode} work but defines no groups.`,
            },
          ];
    }

    const violations: ConsistencyViolation[] = [];
    const seen = new Map<string, number>();
    for (const learnerId of phase.groups.flatMap((group) => group.learnerIds)) {
      seen.set(learnerId, (seen.get(learnerId) ?? 0) + 1);
    }

    const duplicated = [...seen].filter(([, count]) => count > 1).map(([learnerId]) => learnerId);
    const foreign = [...seen.keys()].filter((learnerId) => !this.rosterIds.has(learnerId));
    const ungrouped = [...this.rosterIds].filter((learnerId) => !seen.has(learnerId));

    if (duplicated.length > 0 || foreign.length > 0 || ungrouped.length > 0) {
      violations.push({
        kind: 'group_partition',
        phaseId: phase.id,
        message: 'Groups must contain every roster learner exactly once.',
        tokens: [...duplicated, ...foreign, ...ungrouped],
      });
    }

    const sizes = phase.groups.map((group) => group.learnerIds.length);
    if (!this.shapeMatches(phase, sizes)) {
      violations.push({
        kind: 'mode_shape_mismatch',
        phaseId: phase.id,
        message: `Group sizes [${sizes.join(', ')}] do not fit ${phase.groupingMode} mode.`,
      });
    }

    if (this.enforceSupportSpread) {
      const crowded = phase.groups.filter(
        (group) => group.learnerIds.filter((learnerId) => this.needsSupportIds.has(learnerId)).length > 1,
      );
      if (crowded.length > 0) {
        violations.push({
          kind: 'support_constraint',
          phaseId: phase.id,
          message: `Groups ${crowded.map((group) => group.id).join(', ')} hold more than one needs-support learner.`,
          tokens: crowded.flatMap((group) =>
            group.learnerIds.filter((learnerId) => this.needsSupportIds.has(learnerId)),
          ),
        });
      }
    }

    return violations;
  }

  /**
   * Pairs allow one trio on odd rosters. Groups of two allow one single learner
   * on odd rosters; any other group has at least two members. A one-learner
   * roster always fits.
   */
  private shapeMatches(phase: DraftPhase, sizes: readonly number[]): boolean {
    if (phase.groupingMode === 'individual') {
      return sizes.every((size) => size === 1);
    }

    if (phase.groupingMode === 'group') {
      if (sizes.some((size) => size < 1 || size > phase.groupSize)) {
        return false;
      }

      const singles = sizes.filter((size) => size === 1).length;
      const oddRosterInTwos = phase.groupSize === 2 && this.rosterIds.size % 2 === 1;
      return singles === 0 || (singles === 1 && (this.rosterIds.size === 1 || oddRosterInTwos));
    }

    if (this.rosterIds.size === 1) {
      return sizes.length === 1 && sizes[0] === 1;
    }

    const trios = sizes.filter((size) => size === 3).length;
    const allowedTrios = this.rosterIds.size % 2 === 1 ? 1 : 0;
    return trios === allowedTrios && sizes.every((size) => size === 2 || size === 3);
  }

  private patchCoverage(phase: DraftPhase): ConsistencyCorrection {
    const covered = new Set<string>();
    const membersById = new Map(phase.groups.map((group) => [group.id, group.learnerIds]));
    for (const token of phase.tasks.flatMap((task) => task.assignment)) {
      for (const learnerId of membersById.get(token) ?? [token]) {
        covered.add(learnerId);
      }
    }

    const tokens: string[] = [];
    for (const learnerId of this.rosterIds) {
      if (covered.has(learnerId)) {
        continue;
      }

      const group = phase.groups.find((candidate) => candidate.learnerIds.includes(learnerId));
      const token = group?.id ?? learnerId;
      if (!tokens.includes(token)) {
        tokens.push(token);
      }
    }

    let target = phase.tasks[0];
    for (const task of phase.tasks) {
      if (target && task.assignment.length < target.assignment.length) {
        target = task;
      }
    }

    if (!target) {
      target = { id: `${phase.id}-t1`, description: phase.name, assignment: [] };
      phase.tasks.push(target);
    }

    target.assignment.push(...tokens);

    return {
      kind: 'coverage_patched',
      phaseId: phase.id,
      description: `Assigned ${tokens.join(', ')} to task ${target.id}.`,
    };
  }

  private regroup(phase: DraftPhase): ConsistencyCorrection {
    const assignment = this.optimizer.assign(this.roster, phase.groupingMode, phase.groupSize, {
      phaseId: phase.id,
      focusSubject: this.options.focusSubject,
    });

    phase.groups = assignment.groups;
    phase.groupSize = assignment.groupSize;
    const everyGroup = assignment.groups.map((group) => group.id);

    if (phase.tasks.length === 0) {
      phase.tasks.push({ id: `${phase.id}-t1`, description: phase.name, assignment: [] });
    }

    for (const task of phase.tasks) {
      task.assignment = [...everyGroup];
    }

    return {
      kind: 'phase_regrouped',
      phaseId: phase.id,
      description: `Re-derived ${assignment.groups.length} ${phase.groupingMode} groups and assigned every task to all of them.`,
    };
  }
}
