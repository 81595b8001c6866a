import { Router, Request, Response, NextFunction, CookieOptions } from "express";
import { z } from "zod";
import { AccountProfile, AuthSession, CredentialService } from "../auth/credentialService";
import { SessionMeta } from "../auth/refreshStore";
import { requireJWT } from "../middleware/requireJWT";
import { RateCounter, rateLimit } from "../middleware/rateLimit";
import { sendError } from "../middleware/error";

export type CookieSettings = {
  accessName: string;
  refreshName: string;
  secure: boolean;
  sameSite: "lax" | "strict" | "none";
  domain?: string;
};

export type AuthRouteDeps = {
  credentials: CredentialService;
  cookies: CookieSettings;
  rateCounter: RateCounter;
  rateLimit: { windowSec: number; max: number };
};

const emailField = z.string().trim().email().max(254);

const sendCodeSchema = z.object({
  email: emailField,
  teacher_name: z.string().trim().min(1).max(100),
});

const signupSchema = z.object({
  email: emailField,
  teacher_name: z.string().trim().min(1).max(100),
  password: z.string().min(1).max(128),
  verification_code: z.string().trim().min(1).max(16),
});

const loginSchema = z.object({
  email: emailField,
  password: z.string().min(1).max(128),
});

const forgotSchema = z.object({ email: emailField });

const resetSchema = z.object({
  email: emailField,
  code: z.string().trim().min(1).max(16),
  new_password: z.string().min(1).max(128),
});

const refreshBodySchema = z.object({ refreshToken: z.string().min(1).optional() }).passthrough();

type Handler = (req: Request, res: Response) => Promise<void>;

// express 4 does not forward rejected promises on its own
const handle = (fn: Handler) => (req: Request, res: Response, next: NextFunction) => {
  fn(req, res).catch(next);
};

function invalidInput(res: Response, details?: unknown) {
  res.status(400).json({ error: { message: "Invalid input", details } });
}

function sessionMeta(req: Request): SessionMeta {
  return { ua: req.headers["user-agent"], ip: req.ip };
}

function profileBody(account: AccountProfile) {
  return { teacher_id: account.id, email: account.email, teacher_name: account.name };
}

export function authRoutes(deps: AuthRouteDeps) {
  const router = Router();
  const { credentials, cookies } = deps;

  const baseCookie: CookieOptions = {
    httpOnly: true,
    sameSite: cookies.sameSite,
    secure: cookies.secure,
    domain: cookies.domain,
    path: "/",
  };

  const setSessionCookies = (res: Response, session: AuthSession) => {
    const now = Date.now();
    res.cookie(cookies.accessName, session.accessToken, {
      ...baseCookie,
      maxAge: Math.max(0, session.accessExpiresAt.getTime() - now),
    });
    res.cookie(cookies.refreshName, session.refreshToken, {
      ...baseCookie,
      maxAge: Math.max(0, session.refreshExpiresAt.getTime() - now),
    });
  };

  const clearSessionCookies = (res: Response) => {
    res.clearCookie(cookies.accessName, baseCookie);
    res.clearCookie(cookies.refreshName, baseCookie);
  };

  const readRefreshToken = (req: Request): string | undefined => {
    const fromCookie: unknown = req.cookies?.[cookies.refreshName];
    if (typeof fromCookie === "string" && fromCookie) return fromCookie;
    const body = refreshBodySchema.safeParse(req.body ?? {});
    return body.success ? body.data.refreshToken : undefined;
  };

  const limited = (name: string) =>
    rateLimit({
      counter: deps.rateCounter,
      windowSec: deps.rateLimit.windowSec,
      max: deps.rateLimit.max,
      bucket: (req) => `${name}:${req.ip || "unknown"}`,
    });

  const authenticated = requireJWT(credentials, cookies.accessName);

  /** SEND SIGNUP VERIFICATION CODE */
  router.post(
    "/send-verification-code",
    limited("send-code"),
    handle(async (req, res) => {
      const parsed = sendCodeSchema.safeParse(req.body);
      if (!parsed.success) return invalidInput(res, parsed.error.flatten());

      const result = await credentials.requestSignupCode(parsed.data.email, parsed.data.teacher_name);
      if (!result.ok) return sendError(res, result.error);

      res.json({ message: "Verification code sent to your email", email: result.value.email });
    })
  );

  /** SIGNUP */
  router.post(
    "/signup",
    handle(async (req, res) => {
      const parsed = signupSchema.safeParse(req.body);
      if (!parsed.success) return invalidInput(res, parsed.error.flatten());

      const { email, teacher_name, password, verification_code } = parsed.data;
      const result = await credentials.signup(
        { email, name: teacher_name, password, code: verification_code },
        sessionMeta(req)
      );
      if (!result.ok) return sendError(res, result.error);

      setSessionCookies(res, result.value);
      res.status(201).json({
        message: "Account created successfully",
        ...profileBody(result.value.account),
        accessToken: result.value.accessToken,
      });
    })
  );

  /** LOGIN */
  router.post(
    "/login",
    limited("login"),
    handle(async (req, res) => {
      const parsed = loginSchema.safeParse(req.body);
      if (!parsed.success) return invalidInput(res);

      const result = await credentials.login(parsed.data, sessionMeta(req));
      if (!result.ok) return sendError(res, result.error);

      setSessionCookies(res, result.value);
      res.json({
        message: "Login successful",
        ...profileBody(result.value.account),
        accessToken: result.value.accessToken,
      });
    })
  );

  /** FORGOT PASSWORD (same answer for unknown emails) */
  router.post(
    "/forgot-password",
    limited("forgot-password"),
    handle(async (req, res) => {
      const parsed = forgotSchema.safeParse(req.body);
      if (!parsed.success) return invalidInput(res, parsed.error.flatten());

      await credentials.forgotPassword(parsed.data.email);
      res.json({ message: "If the email is registered, a reset code has been sent" });
    })
  );

  /** RESET PASSWORD */
  router.post(
    "/reset-password",
    handle(async (req, res) => {
      const parsed = resetSchema.safeParse(req.body);
      if (!parsed.success) return invalidInput(res, parsed.error.flatten());

      const { email, code, new_password } = parsed.data;
      const result = await credentials.resetPassword({ email, code, newPassword: new_password });
      if (!result.ok) return sendError(res, result.error);

      res.json({ message: "Password reset successful" });
    })
  );

  /** REFRESH (rotate RT) */
  router.post(
    "/refresh",
    handle(async (req, res) => {
      const result = await credentials.refresh(readRefreshToken(req), sessionMeta(req));
      if (!result.ok) return sendError(res, result.error);

      setSessionCookies(res, result.value);
      res.json({ accessToken: result.value.accessToken });
    })
  );

  /** CURRENT USER */
  router.get("/me", authenticated, (req, res) => {
    if (!req.auth) return sendError(res, { kind: "Unauthenticated", message: "Not authenticated" });

    const account = credentials.currentAccount(req.auth);
    res.json({ ...profileBody(account), created_at: account.createdAt.toISOString() });
  });

  /** LOGOUT (this session) */
  router.post(
    "/logout",
    authenticated,
    handle(async (req, res) => {
      if (!req.auth) return sendError(res, { kind: "Unauthenticated", message: "Not authenticated" });

      await credentials.logout(req.auth, readRefreshToken(req));
      clearSessionCookies(res);
      res.json({ message: "Logout successful" });
    })
  );

  /** LOGOUT ALL (revoke every refresh session) */
  router.post(
    "/logout-all",
    authenticated,
    handle(async (req, res) => {
      if (!req.auth) return sendError(res, { kind: "Unauthenticated", message: "Not authenticated" });

      await credentials.logoutAll(req.auth);
      clearSessionCookies(res);
      res.json({ message: "Logged out of all sessions" });
    })
  );

  return router;
}
