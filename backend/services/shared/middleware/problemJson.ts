// backend/services/shared/middleware/problemJson.ts

/**
 * Why:
 * - Every error response is RFC 7807 Problem+JSON so clients/tests can rely
 *   on one shape across routes.
 * - 404s for unknown paths are only formatted under known prefixes; anything
 *   else gets a bare 404.
 *
 * Notes:
 * - Transport-level formatting only, not business logic.
 * - 5xx detail is generic; the real error goes to the log with the request id.
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from "express";
import { ZodError } from "zod";
import { logger, requestIdOf } from "../utils/logger";
import { isHttpProblemError } from "../http/errors";
import { zodIssues, type Problem } from "../contracts/common";

const PROBLEM_TYPE = "application/problem+json";

function sendProblem(res: Response, problem: Problem) {
  if (problem.status === 401) {
    res.setHeader("WWW-Authenticate", "Bearer");
  }
  return res.status(problem.status).type(PROBLEM_TYPE).json(problem);
}

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    const raw =
      "statusCode" in err
        ? err.statusCode
        : "status" in err
          ? err.status
          : undefined;
    const n = Number(raw);
    if (Number.isInteger(n) && n >= 400 && n <= 599) return n;
  }
  return 500;
}

/**
 * 404 formatter: only emits Problem+JSON for known API/health prefixes.
 */
export function notFoundProblemJson(validPrefixes: string[]) {
  return (req: Request, res: Response) => {
    if (validPrefixes.some((p) => req.path.startsWith(p))) {
      return sendProblem(res, {
        type: "about:blank",
        title: "Not Found",
        status: 404,
        code: "ROUTE_NOT_FOUND",
        detail: "Route not found",
        instance: requestIdOf(req) || undefined,
      });
    }
    return res.status(404).end();
  };
}

/**
 * Error formatter: converts any thrown/next(err) into Problem+JSON.
 */
export function errorProblemJson(): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const instance = requestIdOf(req) || undefined;

    if (isHttpProblemError(err)) {
      logger.debug(
        { requestId: instance, status: err.status, code: err.code },
        "[problemJson] request failed"
      );
      return sendProblem(res, {
        type: "about:blank",
        title: err.title,
        status: err.status,
        code: err.code,
        detail: err.message,
        instance,
      });
    }

    if (err instanceof ZodError) {
      return sendProblem(res, {
        type: "about:blank",
        title: "Bad Request",
        status: 400,
        code: "VALIDATION_ERROR",
        detail: "Validation failed",
        instance,
        errors: zodIssues(err),
      });
    }

    const status = statusOf(err);
    if (status < 500) {
      // body-parser and friends: malformed JSON, payload too large, ...
      return sendProblem(res, {
        type: "about:blank",
        title: "Bad Request",
        status,
        code: "VALIDATION_ERROR",
        detail: err instanceof Error ? err.message : "Malformed request",
        instance,
      });
    }

    logger.error(
      { requestId: instance, path: req.originalUrl, method: req.method, err },
      "[problemJson] unhandled error"
    );
    return sendProblem(res, {
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      detail: "An unexpected error occurred.",
      instance,
    });
  };
}
