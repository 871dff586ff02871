import { describe, expect, it } from 'vitest';

import { classroomPairings } from '../__fixtures__/drafts';
import { classroomLearners } from '../__fixtures__/roster';
import { buildTemplatedDraft, DEFAULT_DURATION_MINUTES } from './templatedDraft';

describe('buildTemplatedDraft', () => {
  it('builds one task per designed phase, assigned to every group', () => {
    const draft = buildTemplatedDraft({
      requestText: 'Fracciones en parejas',
      roster: classroomLearners,
      groupings: classroomPairings(),
      references: [],
    });

    expect(draft.title).toBe('Fracciones en parejas');
    expect(draft.durationMinutes).toBe(DEFAULT_DURATION_MINUTES);
    expect(draft.phases.map((phase) => [phase.id, phase.name])).toEqual([
      ['preparation', 'Preparation'],
      ['execution', 'Execution'],
    ]);
    expect(draft.phases[1]?.tasks).toEqual([
      {
        id: 'execution-t1',
        description: 'Carry out the activity and present the result to the class.',
        assignment: ['g1', 'g2', 'g3', 'g4'],
      },
    ]);
    expect(Object.keys(draft.adaptations)).toEqual(['support_need_a', 'support_need_b', 'high_capability']);
  });

  it('borrows title and duration from the best reference', () => {
    const draft = buildTemplatedDraft({
      requestText: 'Fracciones en parejas',
      roster: classroomLearners,
      groupings: classroomPairings(),
      references: [
        {
          activity: {
            id: 'pizzeria',
            title: 'Pizzería de fracciones',
            subjects: ['matematicas'],
            description: 'Reparten pizzas.',
            durationMinutes: 60,
            groupingMode: 'pair',
            sourceText: 'Pizzería de fracciones',
          },
          score: 0.85,
          cosine: 0.6,
          boosts: [],
        },
      ],
    });

    expect(draft.title).toBe('Fracciones en parejas (based on "Pizzería de fracciones")');
    expect(draft.durationMinutes).toBe(60);
  });
});
