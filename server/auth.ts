import jwt from "jsonwebtoken";
import type { JwtPayload } from "jsonwebtoken";
import bcrypt from "bcryptjs";
import type { NextFunction, Request, Response } from "express";
import { getConfig } from "./config.js";
import { getUserById } from "./storage.js";
import { HttpError } from "./errors.js";

export type AuthPayload = {
  userId: string;
  email: string;
};

function readBearerToken(req: Request): string | null {
  const raw = req.headers.authorization;
  if (typeof raw !== "string") return null;

  const v = raw.trim();
  if (!v) return null;

  // "Bearer <token>" with any extra whitespace
  const m = v.match(/^Bearer\s+(.+)$/i);
  if (!m) return null;

  const token = (m[1] || "").trim();
  return token || null;
}

/** Password helpers */
export function hashPassword(password: string) {
  return bcrypt.hashSync(password, 10);
}

export function verifyPassword(password: string, hash: string) {
  return bcrypt.compareSync(password, hash);
}

/** JWT helpers */
export function signToken(payload: AuthPayload, expiresInSeconds?: number) {
  const { jwtSecret, jwtExpiresInSeconds } = getConfig();
  return jwt.sign({ userId: payload.userId, email: payload.email }, jwtSecret, {
    expiresIn: expiresInSeconds ?? jwtExpiresInSeconds,
  });
}

function coerceAuthPayload(decoded: JwtPayload | string): AuthPayload {
  if (!decoded || typeof decoded !== "object") {
    throw new Error("Invalid token payload");
  }

  const { userId, email } = decoded;
  if (typeof userId !== "string" || typeof email !== "string" || !userId.trim()) {
    throw new Error("Invalid token payload shape");
  }

  return { userId, email };
}

export function verifyToken(token: string): AuthPayload {
  const { jwtSecret } = getConfig();
  // clockTolerance keeps proxy / dev clock drift from causing random 401s
  const decoded = jwt.verify(token, jwtSecret, { clockTolerance: 10 });
  return coerceAuthPayload(decoded);
}

/** Short-lived signed value carried through an OAuth redirect. */
export function signOAuthState(provider: string) {
  const { jwtSecret } = getConfig();
  return jwt.sign({ oauth: provider }, jwtSecret, { expiresIn: 600 });
}

export function verifyOAuthState(state: string, provider: string) {
  const { jwtSecret } = getConfig();
  try {
    const decoded = jwt.verify(state, jwtSecret, { clockTolerance: 10 });
    return typeof decoded === "object" && decoded.oauth === provider;
  } catch {
    return false;
  }
}

/** Middleware */
export function requireAuth(req: Request, res: Response, next: NextFunction) {
  const token = readBearerToken(req);
  if (!token) {
    return res.status(401).json({ error: "Missing token" });
  }

  let payload: AuthPayload;
  try {
    payload = verifyToken(token);
  } catch {
    return res.status(401).json({ error: "Invalid token" });
  }

  getUserById(payload.userId)
    .then((user) => {
      if (!user || !user.isActive) {
        res.status(401).json({ error: "Invalid token" });
        return;
      }
      req.auth = { userId: user.id, email: user.email };
      next();
    })
    .catch(next);
}

/** The authenticated identity; only valid behind requireAuth. */
export function authOf(req: Request) {
  if (!req.auth) throw new HttpError(401, "Missing token");
  return req.auth;
}
