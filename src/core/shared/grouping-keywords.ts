import type { GroupingMode } from '../@types';

const MODES: readonly GroupingMode[] = ['individual', 'pair', 'group'];

const MODE_KEYWORDS: Record<GroupingMode, readonly string[]> = {
  individual: ['individual', 'individualmente', 'autonomo', 'autonoma', 'individually'],
  pair: ['pareja', 'parejas', 'duo', 'duos', 'pair', 'pairs'],
  group: ['grupo', 'grupos', 'equipo', 'equipos', 'group', 'groups', 'team', 'teams', 'colaborativo', 'cooperativo'],
};

const NUMBER_WORDS: Record<string, number> = {
  dos: 2,
  tres: 3,
  cuatro: 4,
  cinco: 5,
  seis: 6,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
};

/** Modes whose keywords appear in the folded tokens, in individual/pair/group order. */
export const detectGroupingModes = (tokens: readonly string[]): GroupingMode[] => {
  const present = new Set(tokens);
  return MODES.filter((mode) => MODE_KEYWORDS[mode].some((keyword) => present.has(keyword)));
};

/** A mode counts as declared only when exactly one mode is mentioned. */
export const detectDeclaredMode = (tokens: readonly string[]): GroupingMode | undefined => {
  const modes = detectGroupingModes(tokens);
  return modes.length === 1 ? modes[0] : undefined;
};

/** Parses "grupos de 3", "equipos de cuatro", "groups of 3" from folded text. */
export const extractGroupSize = (foldedText: string): number | undefined => {
  const match = /\b(?:grupos?|equipos?|groups?|teams?)\s+(?:de|of)\s+([a-z0-9]+)\b/.exec(foldedText);
  if (!match?.[1]) {
    return undefined;
  }

  const raw = match[1];
  const value = /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : NUMBER_WORDS[raw];
  return value !== undefined && value >= 2 ? value : undefined;
};
