import type { LearnerProfile } from '../../core/@types';
import { toLearnerProfile } from '../../core/roster/databaseRosterSource';
import { AppError } from '../../core/shared/errors/app-error';
import { AppDataSource } from '../../database/data-source';
import { Classroom } from '../../database/entities/Classroom';
import { Learner } from '../../database/entities/Learner';
import type { CreateClassroomBody, UpdateClassroomBody } from './classroom.schema';

export class ClassroomService {
  public async getAll(): Promise<Classroom[]> {
    return AppDataSource.getRepository(Classroom).find({ order: { id: 'ASC' } });
  }

  public async getById(id: number): Promise<Classroom> {
    const classroom = await AppDataSource.getRepository(Classroom).findOne({
      where: { id },
      relations: { learners: true },
    });

    if (!classroom) {
      throw new AppError(404, `Classroom with id ${id} was not found.`, 'CLASSROOM_NOT_FOUND');
    }

    return classroom;
  }

  public async create(payload: CreateClassroomBody): Promise<Classroom> {
    const repository = AppDataSource.getRepository(Classroom);
    return repository.save(repository.create({ name: payload.name }));
  }

  public async update(id: number, payload: UpdateClassroomBody): Promise<Classroom> {
    const repository = AppDataSource.getRepository(Classroom);
    const classroom = await this.findOrFail(id);

    if (payload.name !== undefined) {
      classroom.name = payload.name;
    }

    return repository.save(classroom);
  }

  public async delete(id: number): Promise<void> {
    const classroom = await this.findOrFail(id);
    await AppDataSource.getRepository(Classroom).remove(classroom);
  }

  /** The roster as the planner sees it. */
  public async getLearnerProfiles(id: number): Promise<LearnerProfile[]> {
    await this.findOrFail(id);

    const learners = await AppDataSource.getRepository(Learner).find({
      where: { classroom: { id } },
      order: { name: 'ASC' },
    });

    return learners.map(toLearnerProfile);
  }

  private async findOrFail(id: number): Promise<Classroom> {
    const classroom = await AppDataSource.getRepository(Classroom).findOneBy({ id });

    if (!classroom) {
      throw new AppError(404, `Classroom with id ${id} was not found.`, 'CLASSROOM_NOT_FOUND');
    }

    return classroom;
  }
}

export const classroomService = new ClassroomService();
