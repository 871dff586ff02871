import type { DataSource } from 'typeorm';

import type { LearnerProfile, Roster } from '../@types';
import { AppError } from '../shared/errors/app-error';
import { Classroom } from '../../database/entities/Classroom';
import type { Learner } from '../../database/entities/Learner';
import type { RosterSource } from './rosterSource';

export const toLearnerProfile = (learner: Learner): LearnerProfile => ({
  id: learner.id,
  name: learner.name,
  diagnosticCategory: learner.diagnosticCategory,
  competencies: { ...learner.competencies },
  preferredChannel: learner.preferredChannel,
  activityLevel: learner.activityLevel,
  frustrationTolerance: learner.frustrationTolerance,
});

export class DatabaseRosterSource implements RosterSource {
  public constructor(private readonly dataSource: DataSource) {}

  public async load(classroomId?: string): Promise<Roster> {
    const id = Number(classroomId);
    if (classroomId === undefined || !Number.isInteger(id) || id < 1) {
      throw new AppError(400, 'A numeric classroomId is required.', 'CLASSROOM_ID_REQUIRED');
    }

    const classroom = await this.dataSource.getRepository(Classroom).findOne({
      where: { id },
      relations: { learners: true },
      order: { learners: { name: 'ASC' } },
    });

    if (!classroom) {
      throw new AppError(404, `Classroom with id ${id} was not found.`, 'CLASSROOM_NOT_FOUND');
    }

    if (classroom.learners.length === 0) {
      throw new AppError(422, `Classroom with id ${id} has no learners.`, 'EMPTY_ROSTER');
    }

    return {
      classroomId: String(classroom.id),
      name: classroom.name,
      learners: classroom.learners.map(toLearnerProfile),
    };
  }
}
