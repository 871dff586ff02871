import { describe, expect, it } from 'vitest';

import { FeedbackClassifier } from './feedbackClassifier';

describe('FeedbackClassifier', () => {
  const classifier = new FeedbackClassifier();

  it('reads rules and duration out of one combined message', () => {
    const result = classifier.classify('No entiendo las reglas del juego y ¿cuánto dura?');

    expect(result.intents).toEqual(['rule-definition', 'duration-change']);
    expect(result.instructions).toEqual([
      'Add an explicit list of rules to each phase, stating what is allowed and how disagreements are settled.',
      'State the total duration and the time assigned to each phase explicitly.',
    ]);
    expect(result.durationDirection).toBeUndefined();
  });

  it('keeps a plain clarification request', () => {
    expect(classifier.classify('No me queda claro').intents).toEqual(['clarification']);
  });

  it('drops clarification when a specific explanation is asked for', () => {
    expect(classifier.classify('No lo entiendo, ¿cómo se juega?').intents).toEqual(['mechanics-explanation']);
  });

  it('falls back to other and echoes the text', () => {
    const result = classifier.classify('  Me parece   bien ');

    expect(result.intents).toEqual(['other']);
    expect(result.instructions).toEqual([`Apply the teacher's feedback as written: "Me parece bien".`]);
  });

  it('extracts the target grouping and size', () => {
    const result = classifier.classify('Mejor en grupos de tres');

    expect(result.intents).toEqual(['grouping-change']);
    expect(result.targetMode).toBe('group');
    expect(result.targetGroupSize).toBe(3);
    expect(result.instructions).toEqual([
      'Switch every phase to work in groups of 3 and reassign each task to the new groups.',
    ]);
  });

  it('treats a size with mixed modes as a request for groups', () => {
    const result = classifier.classify('Cambia de parejas a grupos de 4');

    expect(result.targetMode).toBe('group');
    expect(result.targetGroupSize).toBe(4);
  });

  it('combines grouping and materials in declaration order', () => {
    const result = classifier.classify('Que trabajen en parejas y dime qué materiales hacen falta');

    expect(result.intents).toEqual(['grouping-change', 'materials-query']);
    expect(result.targetMode).toBe('pair');
    expect(result.targetGroupSize).toBeUndefined();
  });

  it('does not read a passing mention of groups as a grouping change', () => {
    const result = classifier.classify('¿Qué materiales necesita cada grupo?');

    expect(result.intents).toEqual(['materials-query']);
    expect(result.targetMode).toBeUndefined();
  });

  it('needs change wording before switching the grouping mode', () => {
    expect(classifier.classify('Las parejas funcionan bien').intents).toEqual(['other']);

    const result = classifier.classify('Prefiero que lo hagan individualmente');
    expect(result.intents).toEqual(['grouping-change']);
    expect(result.targetMode).toBe('individual');
  });

  it('detects the duration direction', () => {
    const shorter = classifier.classify('Hazlo más corto, por favor');
    const longer = classifier.classify('Necesitamos más tiempo');

    expect(shorter.durationDirection).toBe('shorter');
    expect(shorter.instructions).toEqual([
      'Shorten the activity by about 15 minutes and update the time of each phase.',
    ]);
    expect(longer.intents).toEqual(['duration-change']);
    expect(longer.durationDirection).toBe('longer');
  });

  it('is deterministic', () => {
    const text = 'Explica las normas y cuántos minutos dura cada fase';

    expect(classifier.classify(text)).toEqual(classifier.classify(text));
  });
});
