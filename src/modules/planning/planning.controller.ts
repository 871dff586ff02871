import type { RequestHandler } from 'express';

import type { CreatePlanningSessionBody, SubmitFeedbackBody } from './planning.schema';
import {
  createPlanningSessionSchema,
  planningSessionIdParamSchema,
  submitFeedbackSchema,
} from './planning.schema';
import { planningService } from './planning.service';

export const createPlanningSession: RequestHandler<never, unknown, CreatePlanningSessionBody> = async (
  req,
  res,
  next,
) => {
  try {
    const payload = createPlanningSessionSchema.parse(req.body);
    const response = await planningService.createSession(payload);
    res.status(201).json(response);
  } catch (error: unknown) {
    next(error);
  }
};

export const getPlanningSession: RequestHandler<{ id: string }> = (req, res, next) => {
  try {
    const { id } = planningSessionIdParamSchema.parse(req.params);
    res.status(200).json(planningService.getSession(id));
  } catch (error: unknown) {
    next(error);
  }
};

export const submitFeedback: RequestHandler<{ id: string }, unknown, SubmitFeedbackBody> = async (
  req,
  res,
  next,
) => {
  try {
    const { id } = planningSessionIdParamSchema.parse(req.params);
    const payload = submitFeedbackSchema.parse(req.body);
    const response = await planningService.submitFeedback(id, payload);
    res.status(200).json(response);
  } catch (error: unknown) {
    next(error);
  }
};

export const acceptPlanningSession: RequestHandler<{ id: string }> = (req, res, next) => {
  try {
    const { id } = planningSessionIdParamSchema.parse(req.params);
    res.status(200).json(planningService.accept(id));
  } catch (error: unknown) {
    next(error);
  }
};

export const abandonPlanningSession: RequestHandler<{ id: string }> = (req, res, next) => {
  try {
    const { id } = planningSessionIdParamSchema.parse(req.params);
    planningService.abandon(id);
    res.status(204).send();
  } catch (error: unknown) {
    next(error);
  }
};
