import { AppError } from '../../core/shared/errors/app-error';
import { foldCompetencyKeys } from '../../core/roster/roster.schema';
import { AppDataSource } from '../../database/data-source';
import { Classroom } from '../../database/entities/Classroom';
import { Learner } from '../../database/entities/Learner';
import type { CreateLearnerBody, UpdateLearnerBody } from './learner.schema';

/** Competency keys are stored folded so they match the subjects requests mention. */
export class LearnerService {
  public async getAll(classroomId?: number): Promise<Learner[]> {
    return AppDataSource.getRepository(Learner).find({
      where: classroomId !== undefined ? { classroom: { id: classroomId } } : {},
      relations: { classroom: true },
      order: { name: 'ASC' },
    });
  }

  public async getById(id: string): Promise<Learner> {
    const learner = await AppDataSource.getRepository(Learner).findOne({
      where: { id },
      relations: { classroom: true },
    });

    if (!learner) {
      throw new AppError(404, `Learner with id ${id} was not found.`, 'LEARNER_NOT_FOUND');
    }

    return learner;
  }

  public async create(payload: CreateLearnerBody): Promise<Learner> {
    const repository = AppDataSource.getRepository(Learner);
    const learner = repository.create({
      name: payload.name,
      diagnosticCategory: payload.diagnosticCategory ?? 'typical',
      competencies: foldCompetencyKeys(payload.competencies ?? {}),
      preferredChannel: payload.preferredChannel ?? 'multisensory',
      activityLevel: payload.activityLevel ?? 'medium',
      frustrationTolerance: payload.frustrationTolerance ?? 'medium',
      classroom: await this.resolveClassroom(payload.classroomId),
    });

    return repository.save(learner);
  }

  public async update(id: string, payload: UpdateLearnerBody): Promise<Learner> {
    const repository = AppDataSource.getRepository(Learner);
    const learner = await this.getById(id);

    if (payload.name !== undefined) {
      learner.name = payload.name;
    }
    if (payload.diagnosticCategory !== undefined) {
      learner.diagnosticCategory = payload.diagnosticCategory;
    }
    if (payload.competencies !== undefined) {
      learner.competencies = foldCompetencyKeys(payload.competencies);
    }
    if (payload.preferredChannel !== undefined) {
      learner.preferredChannel = payload.preferredChannel;
    }
    if (payload.activityLevel !== undefined) {
      learner.activityLevel = payload.activityLevel;
    }
    if (payload.frustrationTolerance !== undefined) {
      learner.frustrationTolerance = payload.frustrationTolerance;
    }
    if (payload.classroomId !== undefined) {
      learner.classroom = await this.resolveClassroom(payload.classroomId);
    }

    return repository.save(learner);
  }

  public async delete(id: string): Promise<void> {
    const learner = await this.getById(id);
    await AppDataSource.getRepository(Learner).remove(learner);
  }

  private async resolveClassroom(classroomId?: number | null): Promise<Classroom | null> {
    if (classroomId === undefined || classroomId === null) {
      return null;
    }

    const classroom = await AppDataSource.getRepository(Classroom).findOneBy({ id: classroomId });
    if (!classroom) {
      throw new AppError(404, `Classroom with id ${classroomId} was not found.`, 'CLASSROOM_NOT_FOUND');
    }

    return classroom;
  }
}

export const learnerService = new LearnerService();
