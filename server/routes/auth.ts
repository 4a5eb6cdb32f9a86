import type { Express } from "express";
import { z } from "zod";
import { authOf, hashPassword, requireAuth, signOAuthState, signToken, verifyOAuthState, verifyPassword } from "../auth.js";
import { getConfig } from "../config.js";
import { badRequest, HttpError, notFound, validationError, wrap } from "../errors.js";
import { errorContext, logger } from "../logger.js";
import {
  authorizeUrl,
  fetchGithubProfile,
  fetchGoogleProfile,
  findOrCreateOAuthUser,
  type OAuthProvider,
} from "../oauth.js";
import { publicUser } from "../serializers.js";
import { createUser, findUserByEmail, getUserById, updateUser } from "../storage.js";

const RegisterSchema = z.object({
  email: z.string().trim().email().max(255),
  password: z.string().min(8).max(128),
  name: z.string().trim().max(100).optional(),
});

const LoginSchema = z.object({
  email: z.string().trim().min(1),
  password: z.string().min(1),
});

const UpdateMeSchema = z.object({
  name: z.string().trim().max(100).nullable().optional(),
  avatar_url: z.string().trim().url().max(500).nullable().optional(),
});

const CallbackQuery = z.object({
  code: z.string().min(1),
  state: z.string().min(1),
});

const invalidLogin = () => new HttpError(401, "Invalid email or password");

export function registerAuthRoutes(app: Express) {
  app.post(
    "/api/auth/register",
    wrap(async (req, res) => {
      const parsed = RegisterSchema.safeParse(req.body);
      if (!parsed.success) throw validationError(parsed.error);

      const existing = await findUserByEmail(parsed.data.email);
      if (existing) throw badRequest("Email already registered");

      const user = await createUser({
        email: parsed.data.email,
        passwordHash: hashPassword(parsed.data.password),
        name: parsed.data.name,
        authProvider: "email",
      });
      logger.info("User registered", { userId: user.id });

      const token = signToken({ userId: user.id, email: user.email });
      return res.status(201).json({ token, user: publicUser(user) });
    }),
  );

  app.post(
    "/api/auth/login",
    wrap(async (req, res) => {
      const parsed = LoginSchema.safeParse(req.body);
      if (!parsed.success) throw validationError(parsed.error);

      const user = await findUserByEmail(parsed.data.email);
      // OAuth-only accounts have no password to check
      if (!user || !user.passwordHash || !user.isActive) throw invalidLogin();
      if (!verifyPassword(parsed.data.password, user.passwordHash)) throw invalidLogin();

      const token = signToken({ userId: user.id, email: user.email });
      return res.json({ token, user: publicUser(user) });
    }),
  );

  app.get(
    "/api/auth/me",
    requireAuth,
    wrap(async (req, res) => {
      const user = await getUserById(authOf(req).userId);
      if (!user) throw notFound("User not found");
      return res.json(publicUser(user));
    }),
  );

  app.put(
    "/api/auth/me",
    requireAuth,
    wrap(async (req, res) => {
      const parsed = UpdateMeSchema.safeParse(req.body);
      if (!parsed.success) throw validationError(parsed.error);

      const user = await updateUser(authOf(req).userId, {
        name: parsed.data.name,
        avatarUrl: parsed.data.avatar_url,
      });
      if (!user) throw notFound("User not found");
      return res.json(publicUser(user));
    }),
  );

  // -----------------------------
  // OAuth
  // -----------------------------
  const providers: Array<{ provider: OAuthProvider; fetchProfile: typeof fetchGoogleProfile }> = [
    { provider: "google", fetchProfile: fetchGoogleProfile },
    { provider: "github", fetchProfile: fetchGithubProfile },
  ];

  for (const { provider, fetchProfile } of providers) {
    app.get(
      `/api/auth/${provider}`,
      wrap(async (_req, res) => {
        return res.redirect(authorizeUrl(provider, signOAuthState(provider)));
      }),
    );

    app.get(
      `/api/auth/${provider}/callback`,
      wrap(async (req, res) => {
        const { frontendUrl } = getConfig();
        try {
          const parsed = CallbackQuery.safeParse(req.query);
          if (!parsed.success) throw new Error("Missing code or state");
          if (!verifyOAuthState(parsed.data.state, provider)) throw new Error("Invalid OAuth state");

          const profile = await fetchProfile(parsed.data.code);
          const user = await findOrCreateOAuthUser(provider, profile);
          if (!user.isActive) throw new Error("Account is disabled");

          const token = signToken({ userId: user.id, email: user.email });
          return res.redirect(`${frontendUrl}/oauth/callback?token=${encodeURIComponent(token)}`);
        } catch (err) {
          logger.warn("OAuth login failed", { provider, ...errorContext(err) });
          return res.redirect(`${frontendUrl}/login?error=oauth_failed`);
        }
      }),
    );
  }
}
