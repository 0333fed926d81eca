import cors from "cors";
import express, { NextFunction, Request, Response } from "express";
import logger from "../lib/logger";
import { ImageUrlQueryParams, WordImageResolver } from "../types";
import { errorHandler, notFoundHandler } from "./lib/error";
import { firstQueryValue } from "./lib/helpers";

// Returned in place of a URL whenever no image could be found
export const IMAGE_URL_ERROR = "ERROR";

export function createApp(resolver: WordImageResolver) {
  const app = express();

  app.get("/", (_req: Request, res: Response) => {
    res.send("<h1>Welcome to the word image service!</h1>");
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.send({ status: "ok" });
  });

  app.get(
    "/get_image_url/",
    cors(),
    async (
      req: Request<object, object, object, ImageUrlQueryParams>,
      res: Response,
      next: NextFunction,
    ) => {
      try {
        const word = firstQueryValue(req.query.word);
        logger.info(`[API] Word received: ${word ?? "<none>"}`);

        const resolution = await resolver.resolve(word);
        const imageUrl = resolution.state === "Resolved" ? resolution.imageUrl : IMAGE_URL_ERROR;

        res.send({ IMAGE_URL: imageUrl });
      } catch (error) {
        next(error);
      }
    },
  );

  app.use(notFoundHandler);
  // Error Handler Middleware
  app.use(errorHandler);

  return app;
}
