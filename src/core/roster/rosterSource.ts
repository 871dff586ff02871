import { readFile } from 'node:fs/promises';

import type { Roster } from '../@types';
import { AppError } from '../shared/errors/app-error';
import { logger } from '../shared/logger';
import { rosterFileSchema } from './roster.schema';

export interface RosterSource {
  /** Callers load the roster once and keep it for the whole planning session. */
  load(classroomId?: string): Promise<Roster>;
}

export class FileRosterSource implements RosterSource {
  private cached: Promise<Roster> | undefined;

  public constructor(private readonly filePath: string) {}

  public async load(classroomId?: string): Promise<Roster> {
    this.cached ??= this.readRoster();
    let roster: Roster;
    try {
      roster = await this.cached;
    } catch (error: unknown) {
      this.cached = undefined;
      throw error;
    }

    if (classroomId !== undefined && classroomId !== roster.classroomId) {
      throw new AppError(404, `Classroom ${classroomId} was not found.`, 'CLASSROOM_NOT_FOUND');
    }

    return { ...roster, learners: [...roster.learners] };
  }

  private async readRoster(): Promise<Roster> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(this.filePath, 'utf8'));
    } catch (error: unknown) {
      throw new AppError(500, `Roster file ${this.filePath} could not be read.`, 'ROSTER_UNREADABLE', {
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = rosterFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AppError(500, `Roster file ${this.filePath} is invalid.`, 'ROSTER_INVALID', parsed.error.flatten());
    }

    logger.info('roster_loaded', {
      classroomId: parsed.data.classroomId,
      learners: parsed.data.learners.length,
      source: 'file',
    });

    return parsed.data;
  }
}
