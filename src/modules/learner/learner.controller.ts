import type { RequestHandler } from 'express';

import type { CreateLearnerBody, UpdateLearnerBody } from './learner.schema';
import {
  createLearnerSchema,
  getLearnersQuerySchema,
  learnerIdParamSchema,
  updateLearnerSchema,
} from './learner.schema';
import { learnerService } from './learner.service';

export const getLearners: RequestHandler = async (req, res, next) => {
  try {
    const { classroomId } = getLearnersQuerySchema.parse(req.query);
    res.status(200).json(await learnerService.getAll(classroomId));
  } catch (error: unknown) {
    next(error);
  }
};

export const getLearnerById: RequestHandler<{ id: string }> = async (req, res, next) => {
  try {
    const { id } = learnerIdParamSchema.parse(req.params);
    res.status(200).json(await learnerService.getById(id));
  } catch (error: unknown) {
    next(error);
  }
};

export const createLearner: RequestHandler<never, unknown, CreateLearnerBody> = async (req, res, next) => {
  try {
    const payload = createLearnerSchema.parse(req.body);
    res.status(201).json(await learnerService.create(payload));
  } catch (error: unknown) {
    next(error);
  }
};

export const updateLearner: RequestHandler<{ id: string }, unknown, UpdateLearnerBody> = async (
  req,
  res,
  next,
) => {
  try {
    const { id } = learnerIdParamSchema.parse(req.params);
    const payload = updateLearnerSchema.parse(req.body);
    res.status(200).json(await learnerService.update(id, payload));
  } catch (error: unknown) {
    next(error);
  }
};

export const deleteLearner: RequestHandler<{ id: string }> = async (req, res, next) => {
  try {
    const { id } = learnerIdParamSchema.parse(req.params);
    await learnerService.delete(id);
    res.status(204).send();
  } catch (error: unknown) {
    next(error);
  }
};
