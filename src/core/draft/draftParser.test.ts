import { describe, expect, it } from 'vitest';

import type { ActivityDraft } from '../@types';
import { classroomLearners } from '../__fixtures__/roster';
import { GroupingOptimizer } from '../grouping/groupingOptimizer';
import {
  extractJsonObject,
  inheritMissingSections,
  parseActivityDraft,
  parseDurationMinutes,
  type DraftParseContext,
} from './draftParser';

const optimizer = new GroupingOptimizer();
const designed = ['preparation', 'execution'].map((phaseId) =>
  optimizer.assign(classroomLearners, 'pair', 2, { phaseId, focusSubject: 'matematicas' }),
);

const context: DraftParseContext = {
  roster: classroomLearners,
  groupings: designed,
  defaultGroupSize: 4,
  defaultDurationMinutes: 60,
};

const allLearnerIds = classroomLearners.map((learner) => learner.id);

describe('extractJsonObject', () => {
  it('prefers a fenced block', () => {
    expect(extractJsonObject('Aquí va:\n```json\n{"a": 1}\n```\nFin')).toBe('{"a": 1}');
  });

  it('finds balanced braces around prose and ignores braces inside strings', () => {
    expect(extractJsonObject('Aquí tienes: {"a": "}", "b": {"c": 2}} gracias')).toBe('{"a": "}", "b": {"c": 2}}');
  });

  it('returns undefined without an object', () => {
    expect(extractJsonObject('Lo siento, no puedo ayudarte.')).toBeUndefined();
  });
});

describe('parseDurationMinutes', () => {
  it.each([
    ['2 sesiones de 45 minutos', 90],
    ['1 hora y 30 minutos', 90],
    ['1,5 horas', 90],
    ['45 min', 45],
    ['75', 75],
    [50, 50],
  ] as const)('reads %s as %d minutes', (value, expected) => {
    expect(parseDurationMinutes(value)).toBe(expected);
  });

  it('returns undefined for text without a duration', () => {
    expect(parseDurationMinutes('un buen rato')).toBeUndefined();
    expect(parseDurationMinutes(undefined)).toBeUndefined();
  });
});

describe('parseActivityDraft', () => {
  it('reads a complete draft and adopts the designed groups', () => {
    const output = [
      '```json',
      JSON.stringify({
        titulo: 'Pizzería de fracciones',
        objetivo: 'Comparar fracciones equivalentes',
        duracion: '2 sesiones de 45 minutos',
        fases: [
          {
            nombre: 'Preparación',
            modalidad: 'parejas',
            tareas: [{ descripcion: 'Recortar las pizzas', asignacion: ['g1', 'Grupo 2', 'g3', 'g4'] }],
          },
          {
            name: 'Pedidos',
            groupingMode: 'pair',
            tasks: [{ description: 'Servir los pedidos', assignment: 'g1, g2, g3, g4' }],
          },
        ],
        adaptaciones: { TEA: ['Agenda visual'], TDAH: 'Pausas activas', 'altas capacidades': ['Reto extra'] },
      }),
      '```',
    ].join('\n');

    const result = parseActivityDraft(output, context);

    expect(result.status).toBe('complete');
    if (result.status !== 'complete') {
      return;
    }

    const { draft } = result;
    expect(draft.title).toBe('Pizzería de fracciones');
    expect(draft.durationMinutes).toBe(90);
    expect(draft.phases.map((phase) => phase.id)).toEqual(['preparation', 'execution']);
    expect(draft.phases[0]?.groups).toEqual(designed[0]?.groups);
    expect(draft.phases[0]?.tasks).toEqual([
      { id: 'preparation-t1', description: 'Recortar las pizzas', assignment: ['g1', 'g2', 'g3', 'g4'] },
    ]);
    expect(draft.phases[1]?.tasks[0]?.assignment).toEqual(['g1', 'g2', 'g3', 'g4']);
    expect(draft.adaptations).toEqual({
      support_need_b: ['Agenda visual'],
      support_need_a: ['Pausas activas'],
      high_capability: ['Reto extra'],
    });
  });

  it('fills defaults and lists what was missing', () => {
    const output = JSON.stringify({ title: 'Mapas', phases: [{ name: 'Única', tasks: ['Dibujar el mapa'] }] });

    const result = parseActivityDraft(output, context);

    expect(result.status).toBe('incomplete');
    if (result.status !== 'incomplete') {
      return;
    }

    expect(result.missing).toEqual([
      { section: 'grouping_mode', path: 'phases[0].groupingMode' },
      { section: 'assignment', path: 'phases[0].tasks[0].assignment' },
      { section: 'objective', path: 'objective' },
      { section: 'duration', path: 'duration' },
      { section: 'adaptations', path: 'adaptations' },
    ]);
    expect(result.draft.durationMinutes).toBe(60);
    expect(result.draft.phases[0]?.groupingMode).toBe('pair');
    expect(result.draft.phases[0]?.tasks[0]?.assignment).toEqual(allLearnerIds);
  });

  it('builds groups from learner names when no groups were designed', () => {
    const output = JSON.stringify({
      title: 'Mural',
      objective: 'Crear un mural',
      duration: 60,
      phases: [
        {
          name: 'Diseño',
          groupingMode: 'pair',
          tasks: [
            { description: 'Bocetar', assignment: ['Elena y Ana', 'Luis & Alex'] },
            { description: 'Pintar', assignment: 'Elena y Ana; Pepe' },
          ],
        },
      ],
      adaptations: { tea: 'Agenda visual' },
    });

    const result = parseActivityDraft(output, { ...context, groupings: [] });

    expect(result.status).toBe('complete');
    if (result.status !== 'complete') {
      return;
    }

    const [phase] = result.draft.phases;
    expect(phase?.id).toBe('phase_1');
    expect(phase?.groups).toEqual([
      { id: 'g1', learnerIds: ['003', '005'] },
      { id: 'g2', learnerIds: ['004', '001'] },
    ]);
    expect(phase?.tasks.map((task) => task.assignment)).toEqual([
      ['g1', 'g2'],
      ['g1', 'Pepe'],
    ]);
  });

  it('reports output without JSON as malformed', () => {
    expect(parseActivityDraft('Lo siento, no puedo.', context)).toEqual({
      status: 'malformed',
      reason: 'No JSON object found in the response.',
    });
  });

  it('reports missing phases as malformed', () => {
    expect(parseActivityDraft('{"title": "Sin fases"}', context)).toEqual({
      status: 'malformed',
      reason: 'Missing or invalid required sections: phases.',
    });
    expect(parseActivityDraft('{"title": "X", "phases": [{"foo": 1}]}', context)).toEqual({
      status: 'malformed',
      reason: 'No phase could be read from the response.',
    });
  });

  it('reports invalid JSON as malformed', () => {
    const result = parseActivityDraft('{"title": "X",}', context);

    expect(result.status).toBe('malformed');
    if (result.status === 'malformed') {
      expect(result.reason.startsWith('Invalid JSON: ')).toBe(true);
    }
  });
});

describe('inheritMissingSections', () => {
  it('copies only the sections that were missing', () => {
    const previous: ActivityDraft = {
      title: 'Antes',
      objective: 'Objetivo previo',
      durationMinutes: 90,
      phases: [],
      adaptations: { support_need_a: ['Pausas'] },
    };
    const next: ActivityDraft = { ...previous, title: 'Después', objective: '', durationMinutes: 45, adaptations: {} };

    const merged = inheritMissingSections(next, previous, [
      { section: 'objective', path: 'objective' },
      { section: 'adaptations', path: 'adaptations' },
    ]);

    expect(merged).toEqual({
      title: 'Después',
      objective: 'Objetivo previo',
      durationMinutes: 45,
      phases: [],
      adaptations: { support_need_a: ['Pausas'] },
    });
  });
});
