import { beforeEach, describe, expect, it, vi } from 'vitest';

import { consistentDraft } from '../__fixtures__/drafts';
import { classroomLearners } from '../__fixtures__/roster';
import { ConsistencyValidator } from '../draft/consistencyValidator';
import { FeedbackClassifier } from '../feedback/feedbackClassifier';
import { GroupingOptimizer } from '../grouping/groupingOptimizer';
import { AppError } from '../shared/errors/app-error';
import { RefinementStateMachine } from './refinementStateMachine';

const createMachine = (): RefinementStateMachine =>
  new RefinementStateMachine(
    new FeedbackClassifier(),
    new ConsistencyValidator(classroomLearners, new GroupingOptimizer(), { focusSubject: 'matematicas' }),
  );

const startedMachine = (): RefinementStateMachine => {
  const machine = createMachine();
  machine.start(consistentDraft());
  return machine;
};

describe('RefinementStateMachine', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  it('starts awaiting feedback at revision 1', () => {
    const machine = startedMachine();

    expect(machine.state).toBe('awaiting_feedback');
    expect(machine.revision).toBe(1);
    expect(machine.draft?.phases).toHaveLength(2);
  });

  it('refuses to start from an inconsistent draft', () => {
    const machine = createMachine();

    expect(() => machine.start({ ...consistentDraft(), phases: [] })).toThrow(AppError);
    expect(machine.state).toBe('draft');
  });

  it('classifies feedback and moves to refining', () => {
    const machine = startedMachine();

    const feedback = machine.receiveFeedback('No entiendo las reglas del juego y ¿cuánto dura?');

    expect(machine.state).toBe('refining');
    expect(machine.pending).toBe(feedback);
    expect(feedback.id.startsWith('fb_')).toBe(true);
    expect(feedback.rawText).toBe('No entiendo las reglas del juego y ¿cuánto dura?');
    expect(feedback.intents).toEqual(['rule-definition', 'duration-change']);
  });

  it('adopts a consistent candidate as the next revision', () => {
    const machine = startedMachine();
    machine.receiveFeedback('Que dure menos tiempo');
    const candidate = { ...consistentDraft(), durationMinutes: 75 };

    const report = machine.submitCandidate(candidate);

    expect(report.status).toBe('valid');
    expect(machine.state).toBe('awaiting_feedback');
    expect(machine.revision).toBe(2);
    expect(machine.draft?.durationMinutes).toBe(75);
    expect(machine.pending).toBeUndefined();
  });

  it('keeps the current draft when the candidate is rejected', () => {
    const machine = startedMachine();
    const before = machine.draft;
    machine.receiveFeedback('Cambia todo');

    const report = machine.submitCandidate({ ...consistentDraft(), phases: [] });

    expect(report.status).toBe('rejected');
    expect(machine.revision).toBe(1);
    expect(machine.draft).toBe(before);
    expect(machine.snapshot().warnings).toEqual(['Refinement kept revision 1: The draft has no phases.']);
  });

  it('returns to awaiting feedback when refinement is cancelled', () => {
    const machine = startedMachine();
    machine.receiveFeedback('Más corto');

    machine.cancelRefinement('provider exploded');

    expect(machine.state).toBe('awaiting_feedback');
    expect(machine.revision).toBe(1);
    expect(machine.snapshot().warnings).toEqual(['Refinement cancelled: provider exploded']);
  });

  it('records the corrections of the last accepted revision', () => {
    const machine = startedMachine();
    machine.receiveFeedback('Sin adaptaciones');

    machine.submitCandidate({ ...consistentDraft(), adaptations: {} });

    expect(machine.snapshot().lastCorrections.map((correction) => correction.kind)).toEqual([
      'adaptations_added',
      'adaptations_added',
      'adaptations_added',
    ]);
  });

  it('rejects operations out of order', () => {
    const machine = startedMachine();

    expect(() => machine.submitCandidate(consistentDraft())).toThrow(
      'Operation requires state refining, but the session is awaiting_feedback.',
    );

    machine.receiveFeedback('Más corto');
    expect(() => machine.receiveFeedback('Otra cosa')).toThrow(AppError);
    expect(() => machine.accept()).toThrow(AppError);
  });

  it('finalizes on accept and accepts nothing afterwards', () => {
    const machine = startedMachine();

    const accepted = machine.accept();

    expect(accepted).toBe(machine.draft);
    expect(machine.state).toBe('finalized');
    expect(() => machine.receiveFeedback('Una cosa más')).toThrow(
      expect.objectContaining({ statusCode: 409, code: 'INVALID_SESSION_STATE' }),
    );
  });
});
