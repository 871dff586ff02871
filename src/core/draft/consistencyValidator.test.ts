import { describe, expect, it, vi } from 'vitest';

import { consistentDraft } from '../__fixtures__/drafts';
import { buildLearner, classroomLearners } from '../__fixtures__/roster';
import { GroupingOptimizer } from '../grouping/groupingOptimizer';
import { DEFAULT_ADAPTATIONS } from '../roster/categories';
import { ConsistencyValidator } from './consistencyValidator';

const createValidator = (): ConsistencyValidator =>
  new ConsistencyValidator(classroomLearners, new GroupingOptimizer(), { focusSubject: 'matematicas' });

describe('ConsistencyValidator', () => {
  it('accepts a consistent draft as is', () => {
    const draft = consistentDraft();

    const report = createValidator().validate(draft);

    expect(report.status).toBe('valid');
    expect(report.status === 'valid' ? report.draft : undefined).toBe(draft);
  });

  it('regroups a pair phase that contains trios on an even roster', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const draft = consistentDraft();
    const execution = draft.phases[1];
    if (!execution) {
      throw new Error('fixture has two phases');
    }
    execution.groups = [
      { id: 'g1', learnerIds: ['003', '005', '001'] },
      { id: 'g2', learnerIds: ['004', '002'] },
      { id: 'g3', learnerIds: ['008', '006', '007'] },
    ];
    execution.tasks = [{ id: 'execution-t1', description: 'Servir pedidos', assignment: ['g1', 'g2', 'g3'] }];

    const report = createValidator().validate(draft);

    expect(report.status).toBe('corrected');
    if (report.status !== 'corrected') {
      return;
    }
    expect(report.violations.map((violation) => violation.kind)).toEqual(['mode_shape_mismatch']);
    expect(report.corrections).toEqual([
      {
        kind: 'phase_regrouped',
        phaseId: 'execution',
        description: 'Re-derived 4 pair groups and assigned every task to all of them.',
      },
    ]);
    expect(report.draft.phases[1]?.groups.map((group) => group.learnerIds)).toEqual([
      ['003', '005'],
      ['004', '001'],
      ['002', '008'],
      ['006', '007'],
    ]);
    expect(report.draft.phases[1]?.tasks[0]?.assignment).toEqual(['g1', 'g2', 'g3', 'g4']);
    expect(execution.groups).toHaveLength(3);
  });

  it('splits up a pair of two needs-support learners', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const draft = consistentDraft();
    const execution = draft.phases[1];
    if (!execution) {
      throw new Error('fixture has two phases');
    }
    execution.groups = [
      { id: 'g1', learnerIds: ['001', '002'] },
      { id: 'g2', learnerIds: ['003', '004'] },
      { id: 'g3', learnerIds: ['005', '006'] },
      { id: 'g4', learnerIds: ['007', '008'] },
    ];

    const report = createValidator().validate(draft);

    expect(report.status).toBe('corrected');
    if (report.status !== 'corrected') {
      return;
    }
    expect(report.violations).toEqual([
      {
        kind: 'support_constraint',
        phaseId: 'execution',
        message: 'Groups g2 hold more than one needs-support learner.',
        tokens: ['003', '004'],
      },
    ]);
    expect(report.corrections.map((correction) => correction.kind)).toEqual(['phase_regrouped']);
    expect(report.draft.phases[1]?.groups.map((group) => group.learnerIds)).toEqual([
      ['003', '005'],
      ['004', '001'],
      ['002', '008'],
      ['006', '007'],
    ]);
  });

  it('allows needs-support learners to share a group when partners run short', () => {
    const roster = [
      buildLearner({ id: 'a', diagnosticCategory: 'support_need_a' }),
      buildLearner({ id: 'b', diagnosticCategory: 'support_need_b' }),
      buildLearner({ id: 'c', diagnosticCategory: 'dual_exceptionality' }),
      buildLearner({ id: 'd' }),
    ];
    const validator = new ConsistencyValidator(roster, new GroupingOptimizer());

    const report = validator.validate({
      title: 'Apoyo',
      objective: 'Trabajar en parejas',
      durationMinutes: 45,
      phases: [
        {
          id: 'execution',
          name: 'Execution',
          groupingMode: 'pair',
          groupSize: 2,
          groups: [
            { id: 'g1', learnerIds: ['a', 'b'] },
            { id: 'g2', learnerIds: ['c', 'd'] },
          ],
          tasks: [{ id: 'execution-t1', description: 'Trabajar', assignment: ['g1', 'g2'] }],
        },
      ],
      adaptations: {
        support_need_a: ['Pausas'],
        support_need_b: ['Agenda visual'],
        dual_exceptionality: ['Reto con apoyo'],
      },
    });

    expect(report.status).toBe('valid');
  });

  it('regroups a group phase made of single learners', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const draft = consistentDraft();
    const execution = draft.phases[1];
    if (!execution) {
      throw new Error('fixture has two phases');
    }
    execution.groupingMode = 'group';
    execution.groupSize = 4;
    execution.groups = classroomLearners.map((learner, index) => ({ id: `g${index + 1}`, learnerIds: [learner.id] }));
    execution.tasks = [
      { id: 'execution-t1', description: 'Trabajar', assignment: execution.groups.map((group) => group.id) },
    ];

    const report = createValidator().validate(draft);

    expect(report.status).toBe('corrected');
    if (report.status !== 'corrected') {
      return;
    }
    expect(report.violations).toEqual([
      {
        kind: 'mode_shape_mismatch',
        phaseId: 'execution',
        message: 'Group sizes [1, 1, 1, 1, 1, 1, 1, 1] do not fit group mode.',
      },
    ]);
    expect(report.draft.phases[1]?.groups.map((group) => group.learnerIds.length)).toEqual([4, 4]);
  });

  it('accepts one single learner in groups of two on an odd roster', () => {
    const roster = ['a', 'b', 'c', 'd', 'e'].map((id) => buildLearner({ id }));
    const optimizer = new GroupingOptimizer();
    const grouping = optimizer.assign(roster, 'group', 2, { phaseId: 'execution' });

    const report = new ConsistencyValidator(roster, optimizer).validate({
      title: 'Impar',
      objective: 'Trabajar en grupos de dos',
      durationMinutes: 45,
      phases: [
        {
          id: 'execution',
          name: 'Execution',
          groupingMode: 'group',
          groupSize: 2,
          groups: grouping.groups,
          tasks: [{ id: 'execution-t1', description: 'Trabajar', assignment: grouping.groups.map((group) => group.id) }],
        },
      ],
      adaptations: {},
    });

    expect(grouping.groups.map((group) => group.learnerIds.length)).toEqual([2, 2, 1]);
    expect(report.status).toBe('valid');
  });

  it('accepts a single trio when the roster is odd', () => {
    const roster = classroomLearners.slice(0, 7);
    const optimizer = new GroupingOptimizer();
    const grouping = optimizer.assign(roster, 'pair', 2, { phaseId: 'execution' });
    const validator = new ConsistencyValidator(roster, optimizer);

    const report = validator.validate({
      title: 'Impar',
      objective: 'Trabajar en parejas',
      durationMinutes: 45,
      phases: [
        {
          id: 'execution',
          name: 'Execution',
          groupingMode: 'pair',
          groupSize: 2,
          groups: grouping.groups,
          tasks: [{ id: 'execution-t1', description: 'Trabajar', assignment: grouping.groups.map((group) => group.id) }],
        },
      ],
      adaptations: {
        support_need_a: ['Pausas'],
        support_need_b: ['Agenda visual'],
        high_capability: ['Reto extra'],
      },
    });

    expect(report.status).toBe('valid');
  });

  it('assigns omitted groups to the least loaded task', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const draft = consistentDraft();
    const execution = draft.phases[1];
    if (!execution) {
      throw new Error('fixture has two phases');
    }
    execution.tasks = [
      { id: 'execution-t1', description: 'Servir pedidos', assignment: ['g1', 'g2'] },
      { id: 'execution-t2', description: 'Cobrar', assignment: ['g3'] },
    ];

    const report = createValidator().validate(draft);

    expect(report.status).toBe('corrected');
    if (report.status !== 'corrected') {
      return;
    }
    expect(report.violations).toEqual([
      {
        kind: 'learner_omitted',
        phaseId: 'execution',
        message: 'Learners without any task in phase execution: 006, 007.',
        tokens: ['006', '007'],
      },
    ]);
    expect(report.corrections).toEqual([
      { kind: 'coverage_patched', phaseId: 'execution', description: 'Assigned g4 to task execution-t2.' },
    ]);
    expect(report.draft.phases[1]?.tasks[1]?.assignment).toEqual(['g3', 'g4']);
  });

  it('replaces assignments to unknown learners', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const draft = consistentDraft();
    draft.phases[0]?.tasks[0]?.assignment.push('Pepe');

    const report = createValidator().validate(draft);

    expect(report.status).toBe('corrected');
    if (report.status !== 'corrected') {
      return;
    }
    expect(report.violations[0]).toMatchObject({ kind: 'unknown_assignee', phaseId: 'preparation', tokens: ['Pepe'] });
    expect(report.draft.phases[0]?.tasks[0]?.assignment).toEqual(['g1', 'g2', 'g3', 'g4']);
  });

  it('fills in adaptations for categories present in the roster', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const draft = { ...consistentDraft(), adaptations: {} };

    const report = createValidator().validate(draft);

    expect(report.status).toBe('corrected');
    if (report.status !== 'corrected') {
      return;
    }
    expect(report.corrections.map((correction) => correction.description)).toEqual([
      'Added default adaptations for support_need_a.',
      'Added default adaptations for support_need_b.',
      'Added default adaptations for high_capability.',
    ]);
    expect(report.draft.adaptations.support_need_a).toEqual(DEFAULT_ADAPTATIONS.support_need_a);
  });

  it('regroups a pair phase that defines no groups', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const roster = [buildLearner({ id: 'a' }), buildLearner({ id: 'b' })];
    const validator = new ConsistencyValidator(roster, new GroupingOptimizer());

    const report = validator.validate({
      title: 'Dúo',
      objective: 'Leer juntos',
      durationMinutes: 30,
      phases: [
        {
          id: 'phase_1',
          name: 'Lectura',
          groupingMode: 'pair',
          groupSize: 2,
          groups: [],
          tasks: [{ id: 'phase_1-t1', description: 'Leer', assignment: ['a', 'b'] }],
        },
      ],
      adaptations: {},
    });

    expect(report.status).toBe('corrected');
    if (report.status !== 'corrected') {
      return;
    }
    expect(report.violations.map((violation) => violation.kind)).toEqual(['missing_groups']);
    expect(report.draft.phases[0]?.groups).toEqual([{ id: 'g1', learnerIds: ['a', 'b'] }]);
  });

  it('rejects a draft without phases', () => {
    const report = createValidator().validate({ ...consistentDraft(), phases: [] });

    expect(report).toEqual({
      status: 'rejected',
      reason: 'The draft has no phases.',
      violations: [{ kind: 'missing_phases', message: 'The draft has no phases.' }],
      corrections: [],
    });
  });
});
