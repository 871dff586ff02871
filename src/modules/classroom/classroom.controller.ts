import type { RequestHandler } from 'express';

import type { CreateClassroomBody, UpdateClassroomBody } from './classroom.schema';
import { classroomIdParamSchema, createClassroomSchema, updateClassroomSchema } from './classroom.schema';
import { classroomService } from './classroom.service';

export const getClassrooms: RequestHandler = async (_req, res, next) => {
  try {
    res.status(200).json(await classroomService.getAll());
  } catch (error: unknown) {
    next(error);
  }
};

export const getClassroomById: RequestHandler<{ id: string }> = async (req, res, next) => {
  try {
    const { id } = classroomIdParamSchema.parse(req.params);
    res.status(200).json(await classroomService.getById(id));
  } catch (error: unknown) {
    next(error);
  }
};

export const getClassroomRoster: RequestHandler<{ id: string }> = async (req, res, next) => {
  try {
    const { id } = classroomIdParamSchema.parse(req.params);
    res.status(200).json(await classroomService.getLearnerProfiles(id));
  } catch (error: unknown) {
    next(error);
  }
};

export const createClassroom: RequestHandler<never, unknown, CreateClassroomBody> = async (req, res, next) => {
  try {
    const payload = createClassroomSchema.parse(req.body);
    res.status(201).json(await classroomService.create(payload));
  } catch (error: unknown) {
    next(error);
  }
};

export const updateClassroom: RequestHandler<{ id: string }, unknown, UpdateClassroomBody> = async (
  req,
  res,
  next,
) => {
  try {
    const { id } = classroomIdParamSchema.parse(req.params);
    const payload = updateClassroomSchema.parse(req.body);
    res.status(200).json(await classroomService.update(id, payload));
  } catch (error: unknown) {
    next(error);
  }
};

export const deleteClassroom: RequestHandler<{ id: string }> = async (req, res, next) => {
  try {
    const { id } = classroomIdParamSchema.parse(req.params);
    await classroomService.delete(id);
    res.status(204).send();
  } catch (error: unknown) {
    next(error);
  }
};
