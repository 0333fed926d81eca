import { NextFunction, Request, Response } from "express";
import logger from "../../lib/logger";

// Error class for structured error handling
export class HttpError extends Error {
  constructor(
    public message: string,
    public statusCode: number = 500,
  ) {
    super(message);
  }
}

export const notFoundHandler = (_req: Request, _res: Response, next: NextFunction) => {
  next(new HttpError("Route not found", 404));
};

// Error handling middleware
export const errorHandler = (
  err: Error | HttpError,
  req: Request,
  res: Response,
  // Express only treats four-argument middleware as an error handler
  _next: NextFunction,
) => {
  const statusCode = err instanceof HttpError ? err.statusCode : 500;
  const context = {
    url: req.originalUrl,
    method: req.method,
    statusCode,
  };

  if (statusCode >= 500) {
    logger.error(`[API] ${req.method} ${req.originalUrl} failed: ${err.message}`);
  }

  res.status(statusCode).json({
    data: {
      ...context,
      stack: process.env.NODE_ENV !== "production" ? err.stack : undefined,
    },
    message: err.message,
    error: true,
  });
};
