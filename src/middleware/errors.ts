import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { ZodError } from "zod";

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export function badRequest(error: ZodError): HttpError {
  return new HttpError(
    400,
    "Invalid request",
    error.issues.map((i) => ({ path: i.path.join("."), message: i.message }))
  );
}

// Express 4 does not forward rejected promises to the error handler on its own.
export function asyncRoute(handler: (req: Request, res: Response) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function exposedClientStatus(err: unknown): number | null {
  if (!(err instanceof Error) || !("status" in err) || !("expose" in err)) return null;
  const { status, expose } = err;
  if (typeof status !== "number" || expose !== true) return null;
  return status >= 400 && status < 500 ? status : null;
}

export function notFound(_req: Request, res: Response) {
  res.status(404).json({ error: "Not found" });
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof HttpError) {
    return res.status(err.status).json(
      err.details === undefined ? { error: err.message } : { error: err.message, issues: err.details }
    );
  }
  // express.json() parse failures carry a 400 status
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    return res.status(400).json({ error: "Malformed JSON body" });
  }
  // body-parser's own client errors: 413 too large, 415 charset or encoding
  const status = exposedClientStatus(err);
  if (status !== null && err instanceof Error) {
    return res.status(status).json({ error: err.message });
  }

  console.error(`[api] ${req.method} ${req.originalUrl} failed:`, err);
  return res.status(500).json({ error: "Internal server error" });
}
