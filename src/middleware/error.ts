import { ErrorRequestHandler, Response } from "express";
import { CredentialError, ERROR_STATUS } from "../auth/errors";
import logger from "./requestLogger";

export function sendError(res: Response, error: CredentialError) {
  res.status(ERROR_STATUS[error.kind]).json({ error: { code: error.kind, message: error.message } });
}

// body-parser tags its failures with a status (malformed JSON, payload too large)
function clientStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  const status = clientStatus(err);
  if (status) {
    res.status(status).json({ error: { message: "Invalid request" } });
    return;
  }
  (req.log ?? logger).error({ err }, "unhandled error");
  res.status(500).json({ error: { message: "Internal server error" } });
};
