/** @format */

import { Request, Response, NextFunction, RequestHandler } from "express";
import { IdentityService } from "../services/identity-service";
import { AuthError, sendError } from "./errors";

/**
 * Reads the access token from `Authorization: Bearer <token>` (or `JWT <token>`).
 * Throws AuthError when the header is missing or malformed.
 */
export const readBearerToken = (authorization: string | undefined): string => {
  if (!authorization) {
    throw new AuthError("Unauthorized - Missing authorization header");
  }
  const parts = authorization.split(" ");
  if (parts.length !== 2) {
    throw new AuthError('Unauthorized - Invalid authorization format. Expected "Bearer [token]" or "JWT [token]"');
  }
  const [prefix, token] = parts;
  if (prefix !== "Bearer" && prefix !== "JWT") {
    throw new AuthError('Unauthorized - Invalid token prefix. Expected "Bearer" or "JWT"');
  }
  if (!token) {
    throw new AuthError("Unauthorized - Empty token");
  }
  return token;
};

/** Verifies the access token and stores the caller's id in `res.locals.userId`. */
export const createVerifyToken =
  (identity: IdentityService): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    try {
      const token = readBearerToken(req.header("authorization"));
      res.locals.userId = identity.verify(token).userId;
      next();
    } catch (error) {
      if (error instanceof AuthError) {
        console.error(`Auth error: ${error.message}`);
      }
      sendError(res, error, "Error verifying token");
    }
  };

/** The caller id set by `createVerifyToken`. */
export const currentUserId = (res: Response): string => {
  const userId: unknown = res.locals.userId;
  if (typeof userId !== "string") {
    throw new AuthError("Unauthorized");
  }
  return userId;
};
