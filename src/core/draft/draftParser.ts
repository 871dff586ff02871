import { z } from 'zod';

import type {
  ActivityDraft,
  AdaptationMap,
  DraftParseResult,
  DraftPhase,
  DraftTask,
  GroupingAssignment,
  GroupingMode,
  LearnerGroup,
  LearnerProfile,
  MissingSection,
} from '../@types';
import { resolveCategoryKey } from '../roster/categories';
import { detectGroupingModes } from '../shared/grouping-keywords';
import { collapseWhitespace, foldText, isRecord, tokenize } from '../shared/text';

export interface DraftParseContext {
  roster: readonly LearnerProfile[];
  /** Groupings designed for the prompt, by phase position. */
  groupings: readonly GroupingAssignment[];
  defaultGroupSize: number;
  defaultDurationMinutes: number;
}

const renameKeys = (aliases: Record<string, string>) => (value: unknown): unknown => {
  if (!isRecord(value)) {
    return value;
  }

  const renamed: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const target = aliases[foldText(key)] ?? key;
    if (!(target in renamed)) {
      renamed[target] = entry;
    }
  }
  return renamed;
};

const assignmentSchema = z.union([
  z.string(),
  z.array(z.union([z.string(), z.number(), z.array(z.union([z.string(), z.number()]))])),
]);

const taskSchema = z.union([
  z.string().trim().min(1).transform((description) => ({ description, assignment: undefined })),
  z.preprocess(
    renameKeys({
      descripcion: 'description',
      tarea: 'description',
      task: 'description',
      asignacion: 'assignment',
      asignados: 'assignment',
      parejas_asignadas: 'assignment',
      grupos_asignados: 'assignment',
      assignedto: 'assignment',
      assignees: 'assignment',
    }),
    z.object({
      description: z.string().trim().min(1),
      assignment: assignmentSchema.optional().catch(undefined),
    }),
  ),
]);

const phaseSchema = z.preprocess(
  renameKeys({
    nombre: 'name',
    fase: 'name',
    modalidad: 'groupingMode',
    agrupamiento: 'groupingMode',
    mode: 'groupingMode',
    groupingmode: 'groupingMode',
    tamano_grupo: 'groupSize',
    groupsize: 'groupSize',
    tareas: 'tasks',
  }),
  z.object({
    name: z.string().trim().min(1),
    groupingMode: z.string().optional().catch(undefined),
    groupSize: z.coerce.number().int().min(2).optional().catch(undefined),
    tasks: z.array(z.unknown()).optional().catch(undefined),
  }),
);

const draftSchema = z.preprocess(
  renameKeys({
    titulo: 'title',
    objetivo: 'objective',
    duracion: 'duration',
    durationminutes: 'duration',
    fases: 'phases',
    adaptaciones: 'adaptations',
  }),
  z.object({
    title: z.string().trim().min(1),
    objective: z.string().optional().catch(undefined),
    duration: z.union([z.number(), z.string()]).optional().catch(undefined),
    phases: z.array(z.unknown()).min(1),
    adaptations: z.record(z.union([z.string(), z.array(z.string())])).optional().catch(undefined),
  }),
);

/** Finds the JSON object in a completion: a fenced block first, then the first balanced braces. */
export const extractJsonObject = (text: string): string | undefined => {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  if (fenced?.[1] && fenced[1].includes('{')) {
    return extractJsonObject(fenced[1]) ?? fenced[1].trim();
  }

  const start = text.indexOf('{');
  if (start < 0) {
    return undefined;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < text.length; index += 1) {
    const char = text[index];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      depth += 1;
    } else if (char === '}') {
      depth -= 1;
      if (depth === 0) {
        return text.slice(start, index + 1);
      }
    }
  }

  return undefined;
};

/** "2 sesiones de 45 minutos" -> 90, "1 hora y 30 minutos" -> 90, 75 -> 75. */
export const parseDurationMinutes = (value: number | string | undefined): number | undefined => {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value > 0 ? Math.round(value) : undefined;
  }

  if (typeof value !== 'string') {
    return undefined;
  }

  const folded = foldText(value).replace(/(\d),(\d)/g, '$1.$2');

  const sessions = /(\d+)\s*(?:sesion(?:es)?|sessions?|clases?)\s*(?:de|of)\s*(\d+)\s*min/.exec(folded);
  if (sessions?.[1] && sessions[2]) {
    return Number.parseInt(sessions[1], 10) * Number.parseInt(sessions[2], 10);
  }

  const hours = /(\d+(?:\.\d+)?)\s*(?:h\b|horas?|hours?)/.exec(folded);
  const minutes = /(\d+)\s*(?:min|minutos?|minutes?)\b/.exec(folded);
  if (hours?.[1] || minutes?.[1]) {
    const total =
      (hours?.[1] ? Number.parseFloat(hours[1]) * 60 : 0) + (minutes?.[1] ? Number.parseInt(minutes[1], 10) : 0);
    return total > 0 ? Math.round(total) : undefined;
  }

  const bare = /^\s*(\d+)\s*$/.exec(folded);
  return bare?.[1] ? Number.parseInt(bare[1], 10) || undefined : undefined;
};

const parseGroupingMode = (value: string | undefined): GroupingMode | undefined => {
  if (!value) {
    return undefined;
  }

  const [mode] = detectGroupingModes(tokenize(value));
  if (mode) {
    return mode;
  }

  const folded = foldText(value);
  if (folded.startsWith('pair')) {
    return 'pair';
  }
  return folded.startsWith('group') ? 'group' : undefined;
};

const parseAdaptations = (raw: Record<string, string | string[]>): AdaptationMap => {
  const adaptations: AdaptationMap = {};

  for (const [key, value] of Object.entries(raw)) {
    const category = resolveCategoryKey(foldText(key));
    if (!category) {
      continue;
    }

    const items = (Array.isArray(value) ? value : [value]).map(collapseWhitespace).filter(Boolean);
    if (items.length > 0) {
      adaptations[category] = [...(adaptations[category] ?? []), ...items];
    }
  }

  return adaptations;
};

const ALL_TOKENS: ReadonlySet<string> = new Set([
  'all',
  'everyone',
  'all groups',
  'all learners',
  'todos',
  'todas',
  'toda la clase',
  'todos los grupos',
  'todas las parejas',
  'clase completa',
]);

const ALL_MARKER = '*';

const MEMBER_SEPARATOR = /\s*(?:&|\+|\/|\by\b|\band\b|\be\b)\s*/;

/** Resolves assignment tokens of one phase onto learner ids and group ids. */
class PhaseAssignmentResolver {
  private readonly groups: LearnerGroup[] = [];
  private readonly byMemberKey = new Map<string, string>();

  public constructor(
    private readonly roster: readonly LearnerProfile[],
    private readonly designedGroups: readonly LearnerGroup[],
  ) {}

  public get phaseGroups(): LearnerGroup[] {
    return this.groups;
  }

  /** Returns the resolved tokens; `all` is left as a marker for `expandAll`. */
  public resolve(raw: z.infer<typeof assignmentSchema>): string[] {
    const entries: Array<Array<string>> = typeof raw === 'string'
      ? raw.split(/[,;\n]+/).map((entry) => [entry])
      : raw.map((entry) => (Array.isArray(entry) ? entry.map(String) : [String(entry)]));

    const tokens: string[] = [];
    for (const entry of entries) {
      const joined = collapseWhitespace(entry.join(' & '));
      if (!joined) {
        continue;
      }

      if (ALL_TOKENS.has(foldText(joined))) {
        tokens.push(ALL_MARKER);
        continue;
      }

      const designed = this.findDesignedGroup(joined);
      if (designed) {
        tokens.push(this.adoptGroup(designed.learnerIds, designed.id));
        continue;
      }

      const members = entry.flatMap((part) => part.split(MEMBER_SEPARATOR)).map(collapseWhitespace).filter(Boolean);
      const resolved = members.map((member) => this.findLearner(member)?.id ?? member);

      if (resolved.length === 1 && resolved[0]) {
        tokens.push(resolved[0]);
        continue;
      }

      const unresolved = resolved.filter((member) => !this.roster.some((learner) => learner.id === member));
      if (unresolved.length > 0) {
        // Unknown names stay visible to the validator instead of being dropped.
        tokens.push(...resolved);
        continue;
      }

      tokens.push(this.adoptGroup(resolved));
    }

    return tokens;
  }

  public expandAll(tokens: string[]): string[] {
    if (!tokens.includes(ALL_MARKER)) {
      return tokens;
    }

    const everyone = this.groups.length > 0
      ? this.groups.map((group) => group.id)
      : this.roster.map((learner) => learner.id);
    return [...new Set([...tokens.filter((token) => token !== ALL_MARKER), ...everyone])];
  }

  private adoptGroup(learnerIds: readonly string[], preferredId?: string): string {
    const key = [...learnerIds].sort().join('|');
    const existing = this.byMemberKey.get(key);
    if (existing) {
      return existing;
    }

    const taken = new Set(this.groups.map((group) => group.id));
    let id = preferredId && !taken.has(preferredId) ? preferredId : undefined;
    for (let index = this.groups.length + 1; !id; index += 1) {
      id = taken.has(`g${index}`) ? undefined : `g${index}`;
    }

    this.groups.push({ id, learnerIds: [...learnerIds] });
    this.byMemberKey.set(key, id);
    return id;
  }

  private findDesignedGroup(token: string): LearnerGroup | undefined {
    const folded = foldText(token).replace(/^(?:grupo|group|pareja|pair)\s*/, 'g').replace(/\s+/g, '');
    return this.designedGroups.find((group) => group.id.toLowerCase() === folded);
  }

  private findLearner(token: string): LearnerProfile | undefined {
    const folded = foldText(token);
    const byId = this.roster.find((learner) => learner.id.toLowerCase() === folded);
    if (byId) {
      return byId;
    }

    const byName = this.roster.find((learner) => foldText(learner.name) === folded);
    if (byName) {
      return byName;
    }

    const byFirstName = this.roster.filter((learner) => tokenize(learner.name)[0] === tokenize(token)[0]);
    return byFirstName.length === 1 && tokenize(token).length === 1 ? byFirstName[0] : undefined;
  }
}

const defaultGroupSize = (mode: GroupingMode, designed: GroupingAssignment | undefined, fallback: number): number => {
  if (mode === 'individual') {
    return 1;
  }
  if (mode === 'pair') {
    return 2;
  }
  return designed?.mode === 'group' ? designed.groupSize : fallback;
};

/**
 * Parses generation output into a draft. `malformed` means no usable JSON object
 * with a title and at least one phase; `incomplete` means the structure is there
 * but sections were filled with defaults (listed in `missing`).
 */
export const parseActivityDraft = (text: string, context: DraftParseContext): DraftParseResult => {
  const json = extractJsonObject(text);
  if (!json) {
    return { status: 'malformed', reason: 'No JSON object found in the response.' };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error: unknown) {
    return {
      status: 'malformed',
      reason: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const parsed = draftSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(', ');
    return { status: 'malformed', reason: `Missing or invalid required sections: ${fields || 'root'}.` };
  }

  const missing: MissingSection[] = [];
  const phases: DraftPhase[] = [];

  parsed.data.phases.forEach((rawPhase, position) => {
    const phase = phaseSchema.safeParse(rawPhase);
    if (!phase.success) {
      return;
    }

    const index = phases.length;
    const designed = context.groupings[index] ?? context.groupings[position];
    const phaseId = designed?.phaseId ?? `phase_${index + 1}`;
    const path = `phases[${index}]`;

    let mode = parseGroupingMode(phase.data.groupingMode);
    if (!mode) {
      missing.push({ section: 'grouping_mode', path: `${path}.groupingMode` });
      mode = designed?.mode ?? 'pair';
    }

    const groupSize =
      mode === 'group' && phase.data.groupSize !== undefined
        ? phase.data.groupSize
        : defaultGroupSize(mode, designed, context.defaultGroupSize);

    const resolver = new PhaseAssignmentResolver(context.roster, designed?.groups ?? []);
    const pendingTasks: Array<{ description: string; tokens: string[] }> = [];

    (phase.data.tasks ?? []).forEach((rawTask) => {
      const task = taskSchema.safeParse(rawTask);
      if (!task.success) {
        return;
      }

      if (task.data.assignment === undefined) {
        missing.push({ section: 'assignment', path: `${path}.tasks[${pendingTasks.length}].assignment` });
      }

      pendingTasks.push({
        description: task.data.description,
        tokens: task.data.assignment === undefined ? [ALL_MARKER] : resolver.resolve(task.data.assignment),
      });
    });

    if (pendingTasks.length === 0) {
      missing.push({ section: 'tasks', path: `${path}.tasks` });
      pendingTasks.push({ description: phase.data.name, tokens: [ALL_MARKER] });
    }

    const tasks: DraftTask[] = pendingTasks.map((task, taskIndex) => ({
      id: `${phaseId}-t${taskIndex + 1}`,
      description: task.description,
      assignment: resolver.expandAll(task.tokens),
    }));

    phases.push({
      id: phaseId,
      name: phase.data.name,
      groupingMode: mode,
      groupSize,
      groups: resolver.phaseGroups,
      tasks,
    });
  });

  if (phases.length === 0) {
    return { status: 'malformed', reason: 'No phase could be read from the response.' };
  }

  const objective = parsed.data.objective ? collapseWhitespace(parsed.data.objective) : '';
  if (!objective) {
    missing.push({ section: 'objective', path: 'objective' });
  }

  let durationMinutes = parseDurationMinutes(parsed.data.duration);
  if (durationMinutes === undefined) {
    missing.push({ section: 'duration', path: 'duration' });
    durationMinutes = context.defaultDurationMinutes;
  }

  const adaptations = parsed.data.adaptations ? parseAdaptations(parsed.data.adaptations) : {};
  if (Object.keys(adaptations).length === 0) {
    missing.push({ section: 'adaptations', path: 'adaptations' });
  }

  const draft: ActivityDraft = {
    title: collapseWhitespace(parsed.data.title),
    objective,
    durationMinutes,
    phases,
    adaptations,
  };

  return missing.length === 0 ? { status: 'complete', draft } : { status: 'incomplete', draft, missing };
};

/** Refinement output that left sections out inherits them from the draft it refines. */
export const inheritMissingSections = (
  draft: ActivityDraft,
  previous: ActivityDraft,
  missing: readonly MissingSection[],
): ActivityDraft => {
  const sections = new Set(missing.map((entry) => entry.section));

  return {
    ...draft,
    objective: sections.has('objective') ? previous.objective : draft.objective,
    durationMinutes: sections.has('duration') ? previous.durationMinutes : draft.durationMinutes,
    adaptations: sections.has('adaptations') ? structuredClone(previous.adaptations) : draft.adaptations,
  };
};
