import type { Context, ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import type { Logger } from "pino";
import { HttpError } from "@blogsync/core/errors";

/** Renders HttpError with its own status; anything else unexpected is a 500. */
export function createErrorHandler(logger: Logger): ErrorHandler {
  return (err, c) => {
    if (err instanceof HttpError) {
      logger.warn({ code: err.code, path: c.req.path }, err.message);
      return c.json(err.toJSON(), err.status);
    }

    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    logger.error({ err }, "Unhandled error");
    return c.json(
      {
        error: {
          code: "INTERNAL_ERROR",
          message: "Internal server error",
        },
      },
      500,
    );
  };
}

export function notFound(c: Context) {
  return c.json(
    {
      error: {
        code: "NOT_FOUND",
        message: "Not found",
      },
    },
    404,
  );
}
