import type { ActivityDraft, GroupingAssignment, LearnerProfile, RankedActivity } from '../@types';
import { truncateText } from './text';

export const PLANNER_SYSTEM_PROMPT = [
  'You are an instructional designer helping a primary-school teacher plan one classroom activity.',
  'Design for the real learners listed in the prompt and keep every learner involved in every phase.',
  'Write all human-readable text in the language of the teacher request.',
  'Answer with a single JSON object and nothing else.',
].join('\n');

export const OUTPUT_SCHEMA_DESCRIPTION = `{
  "title": string,
  "objective": string,
  "duration": number of minutes, or text such as "2 sessions of 45 minutes",
  "phases": [
    {
      "name": string,
      "groupingMode": "individual" | "pair" | "group",
      "groupSize": number,
      "tasks": [
        { "description": string, "assignment": [group ids such as "g1", or learner ids] }
      ]
    }
  ],
  "adaptations": {
    "support_need_a": [string],
    "support_need_b": [string],
    "high_capability": [string],
    "dual_exceptionality": [string]
  }
}`;

export const STRICT_FORMAT_REMINDER = [
  'Your previous answer could not be parsed.',
  'Return ONLY a JSON object that follows the schema exactly: no markdown, no comments, no text before or after it.',
  'The object must contain a non-empty "title" and a non-empty "phases" array.',
].join('\n');

const formatLearner = (learner: LearnerProfile): string => {
  const levels = Object.entries(learner.competencies)
    .map(([subject, level]) => `${subject} ${level}`)
    .join(', ');

  return `- ${learner.id} ${learner.name}: ${learner.diagnosticCategory}, channel ${learner.preferredChannel}, activity ${learner.activityLevel}, frustration tolerance ${learner.frustrationTolerance}${levels ? `, levels: ${levels}` : ''}`;
};

export const formatRoster = (learners: readonly LearnerProfile[]): string => {
  return learners.map(formatLearner).join('\n');
};

export const formatReferences = (references: readonly RankedActivity[]): string => {
  if (references.length === 0) {
    return 'No reference activities matched; design from scratch.';
  }

  return references
    .map(({ activity, score }) =>
      [
        `### ${activity.title} (score ${score.toFixed(2)}, ${activity.groupingMode}, ${activity.durationMinutes} min)`,
        truncateText(activity.description, 600),
      ].join('\n'),
    )
    .join('\n\n');
};

export const formatGroupings = (
  groupings: readonly GroupingAssignment[],
  learners: readonly LearnerProfile[],
): string => {
  const names = new Map(learners.map((learner) => [learner.id, learner.name]));

  return groupings
    .map((grouping) => {
      const groups = grouping.groups
        .map((group) => `  ${group.id}: ${group.learnerIds.map((id) => `${names.get(id) ?? id} (${id})`).join(' + ')}`)
        .join('\n');
      return `Phase "${grouping.phaseId}" (${grouping.mode}, size ${grouping.groupSize}):\n${groups}`;
    })
    .join('\n');
};

export interface GenerationPromptInput {
  requestText: string;
  learners: readonly LearnerProfile[];
  references: readonly RankedActivity[];
  groupings: readonly GroupingAssignment[];
  focusSubject?: string;
}

export const buildGenerationPrompt = (input: GenerationPromptInput): string => {
  return [
    `## Teacher request\n${input.requestText}`,
    input.focusSubject ? `## Focus subject\n${input.focusSubject}` : '',
    `## Learners\n${formatRoster(input.learners)}`,
    `## Reference activities\n${formatReferences(input.references)}`,
    `## Groups to use\nUse these groups for the phases, in this order, and assign tasks by group id.\n${formatGroupings(input.groupings, input.learners)}`,
    `## Output schema\n${OUTPUT_SCHEMA_DESCRIPTION}`,
  ]
    .filter(Boolean)
    .join('\n\n');
};

export interface RefinementPromptInput {
  requestText: string;
  draft: ActivityDraft;
  feedbackText: string;
  instructions: readonly string[];
  learners: readonly LearnerProfile[];
  groupings: readonly GroupingAssignment[];
}

export const buildRefinementPrompt = (input: RefinementPromptInput): string => {
  return [
    `## Original request\n${input.requestText}`,
    `## Current plan\n${JSON.stringify(input.draft, null, 2)}`,
    `## Teacher feedback\n${input.feedbackText}`,
    `## Changes to make\n${input.instructions.map((instruction, index) => `${index + 1}. ${instruction}`).join('\n')}`,
    `## Learners\n${formatRoster(input.learners)}`,
    `## Groups to use\n${formatGroupings(input.groupings, input.learners)}`,
    'Return the complete updated plan, keeping every section that the feedback does not touch.',
    `## Output schema\n${OUTPUT_SCHEMA_DESCRIPTION}`,
  ].join('\n\n');
};
