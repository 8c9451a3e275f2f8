import type { NextFunction, Request, RequestHandler, Response } from "express";
import { z } from "zod";
import type { PaginatedResponse, Paginated, PaginationParams } from "@relaymail/types";
import { NotFoundError } from "@relaymail/errors";
import { parseInput } from "@relaymail/core";

/**
 * Express 4 does not await handlers; route rejections to the error handler.
 */
export function asyncHandler(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res).catch(next);
  };
}

export function routeParam(req: Request, name: string): string {
  const value = req.params[name];
  if (!value) {
    throw new NotFoundError();
  }
  return value;
}

/** A top-level field of a JSON body that may not be an object at all. */
export function bodyField(body: unknown, name: string): unknown {
  if (typeof body !== "object" || body === null || Array.isArray(body)) return undefined;
  return Reflect.get(body, name);
}

export const paginationSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export function parsePagination(query: unknown): PaginationParams {
  return parseInput(paginationSchema, query, "Invalid query parameters");
}

export function paginated<T, R>(
  page: Paginated<T>,
  params: PaginationParams,
  map: (item: T) => R,
): PaginatedResponse<R> {
  return { data: page.items.map(map), page: params.page, limit: params.limit, total: page.total };
}
