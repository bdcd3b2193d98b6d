import { Response } from "express";

export class HttpError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends HttpError {
  constructor(message: string) {
    super(400, message);
  }
}

/** Invalid credentials or token (401), or an action the caller may not take (403). */
export class AuthError extends HttpError {
  constructor(message: string, status: 401 | 403 = 401) {
    super(status, message);
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message);
  }
}

export class ConflictError extends HttpError {
  constructor(message: string) {
    super(409, message);
  }
}

export class StorageError extends HttpError {
  constructor(message: string) {
    super(502, message);
  }
}

export class ServiceUnavailableError extends HttpError {
  constructor(message: string) {
    super(503, message);
  }
}

export const sendError = (res: Response, error: unknown, context: string) => {
  if (error instanceof HttpError) {
    if (error.status >= 500) {
      console.error(`${context}:`, error.message);
    }
    res.status(error.status).json({ success: false, error: error.message });
    return;
  }
  console.error(`${context}:`, error);
  res.status(500).json({ success: false, error: "Internal server error" });
};
