import type { RequestHandler } from 'express';

export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json({
    requestId: req.requestId,
    error: {
      message: `No route for ${req.method} ${req.originalUrl}.`,
      code: 'ROUTE_NOT_FOUND',
    },
  });
};
