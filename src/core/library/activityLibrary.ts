import { readdir, readFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';

import { z } from 'zod';

import type { ActivityRecord, GroupingMode } from '../@types';
import { describeError, logger } from '../shared/logger';

const GROUPING_MODES = ['individual', 'pair', 'group'] as const satisfies readonly GroupingMode[];

export const activityFileSchema = z.object({
  title: z.string().trim().min(1).max(200),
  subjects: z.array(z.string().trim().min(1)).default([]),
  description: z.string().trim().min(1),
  durationMinutes: z.coerce.number().int().positive().max(24 * 60),
  groupingMode: z.enum(GROUPING_MODES),
});

export type ActivityFile = z.infer<typeof activityFileSchema>;

export type ActivityRecordInput = ActivityFile & { id: string; sourceText?: string };

const GROUPING_LABELS: Record<GroupingMode, string> = {
  individual: 'individual work',
  pair: 'work in pairs',
  group: 'work in groups',
};

export const buildSourceText = (activity: ActivityFile): string => {
  return [
    `Title: ${activity.title}`,
    `Subjects: ${activity.subjects.join(', ')}`,
    `Grouping: ${GROUPING_LABELS[activity.groupingMode]}`,
    `Duration: ${activity.durationMinutes} minutes`,
    activity.description,
  ].join('\n');
};

const toRecord = (input: ActivityRecordInput): ActivityRecord => ({
  id: input.id,
  title: input.title,
  subjects: [...input.subjects],
  description: input.description,
  durationMinutes: input.durationMinutes,
  groupingMode: input.groupingMode,
  sourceText: input.sourceText ?? buildSourceText(input),
});

const loadDirectory = async (directory: string): Promise<ActivityRecord[]> => {
  const fileNames = (await readdir(directory))
    .filter((fileName) => extname(fileName).toLowerCase() === '.json')
    .sort();

  const records: ActivityRecord[] = [];

  for (const fileName of fileNames) {
    const filePath = join(directory, fileName);
    let raw: unknown;

    try {
      raw = JSON.parse(await readFile(filePath, 'utf8'));
    } catch (error: unknown) {
      logger.warn('activity_file_unreadable', { file: fileName, error: describeError(error) });
      continue;
    }

    const parsed = activityFileSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('activity_file_invalid', {
        file: fileName,
        fieldErrors: parsed.error.flatten().fieldErrors,
      });
      continue;
    }

    records.push(toRecord({ ...parsed.data, id: basename(fileName, extname(fileName)) }));
  }

  logger.info('activity_library_loaded', {
    directory,
    records: records.length,
    skipped: fileNames.length - records.length,
  });

  return records;
};

/**
 * Read-only activity collection. Insertion order (file-name order for directories)
 * is the tie-breaker for ranking, so it is fixed at load time.
 */
export class ActivityLibrary {
  private loaded: Promise<readonly ActivityRecord[]> | undefined;

  private constructor(private readonly loader: () => Promise<ActivityRecord[]>) {}

  public static fromDirectory(directory: string): ActivityLibrary {
    return new ActivityLibrary(() => loadDirectory(directory));
  }

  public static fromRecords(records: readonly ActivityRecordInput[]): ActivityLibrary {
    return new ActivityLibrary(() => Promise.resolve(records.map(toRecord)));
  }

  public list(): Promise<readonly ActivityRecord[]> {
    this.loaded ??= this.loader().catch((error: unknown) => {
      this.loaded = undefined;
      throw error;
    });
    return this.loaded;
  }
}
