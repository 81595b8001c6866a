// src/middleware/requireJWT.ts
import { Request, Response, NextFunction, RequestHandler } from "express";
import { CredentialService } from "../auth/credentialService";
import { sendError } from "./error";

/** Access tokens the request carries: the httpOnly cookie first, then a Bearer header. */
export function readAccessTokens(req: Request, cookieName: string): string[] {
  const tokens: string[] = [];
  const fromCookie: unknown = req.cookies?.[cookieName];
  if (typeof fromCookie === "string" && fromCookie) tokens.push(fromCookie);

  const header = req.headers.authorization || "";
  const bearer = header.startsWith("Bearer ") ? header.slice(7).trim() : "";
  if (bearer && !tokens.includes(bearer)) tokens.push(bearer);
  return tokens;
}

export function requireJWT(credentials: CredentialService, cookieName: string): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const [first, ...rest] = readAccessTokens(req, cookieName);
      let result = await credentials.authenticate(first);
      // a stale cookie must not mask a valid Bearer header
      for (const token of rest) {
        if (result.ok) break;
        result = await credentials.authenticate(token);
      }
      if (!result.ok) {
        res.setHeader("WWW-Authenticate", "Bearer");
        sendError(res, result.error);
        return;
      }
      req.auth = result.value;
      next();
    } catch (err) {
      next(err);
    }
  };
}
