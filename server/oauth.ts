// Google / GitHub OAuth: authorize URLs, code exchange, profile lookup and find-or-create.
import axios from "axios";
import { z } from "zod";
import { getConfig, type OAuthClientConfig } from "./config.js";
import { serviceUnavailable } from "./errors.js";
import { createUser, findUserByEmail, updateUser } from "./storage.js";

export type OAuthProvider = "google" | "github";

const GOOGLE_AUTH_URL = "https://accounts.google.com/o/oauth2/v2/auth";
const GOOGLE_TOKEN_URL = "https://oauth2.googleapis.com/token";
const GOOGLE_USERINFO_URL = "https://www.googleapis.com/oauth2/v2/userinfo";

const GITHUB_AUTH_URL = "https://github.com/login/oauth/authorize";
const GITHUB_TOKEN_URL = "https://github.com/login/oauth/access_token";
const GITHUB_USER_URL = "https://api.github.com/user";
const GITHUB_EMAILS_URL = "https://api.github.com/user/emails";

const http = axios.create({ timeout: 10_000 });

const PROVIDER_LABEL: Record<OAuthProvider, string> = { google: "Google", github: "GitHub" };

export function providerConfig(provider: OAuthProvider): OAuthClientConfig {
  const cfg = getConfig()[provider];
  if (!cfg) throw serviceUnavailable(`${PROVIDER_LABEL[provider]} login is not configured`);
  return cfg;
}

export function authorizeUrl(provider: OAuthProvider, state: string) {
  const cfg = providerConfig(provider);
  const params =
    provider === "google"
      ? new URLSearchParams({
          client_id: cfg.clientId,
          redirect_uri: cfg.redirectUri,
          response_type: "code",
          scope: "openid email profile",
          access_type: "offline",
          prompt: "consent",
          state,
        })
      : new URLSearchParams({
          client_id: cfg.clientId,
          redirect_uri: cfg.redirectUri,
          scope: "read:user user:email",
          state,
        });
  return `${provider === "google" ? GOOGLE_AUTH_URL : GITHUB_AUTH_URL}?${params.toString()}`;
}

export type OAuthProfile = { email: string; name: string | null; avatarUrl: string | null };

const TokenResponse = z.object({ access_token: z.string().min(1) });

const GoogleUser = z.object({
  email: z.string().email(),
  name: z.string().nullish(),
  picture: z.string().nullish(),
});

const GithubUser = z.object({
  login: z.string(),
  email: z.string().nullish(),
  name: z.string().nullish(),
  avatar_url: z.string().nullish(),
});

const GithubEmails = z.array(z.object({ email: z.string(), primary: z.boolean(), verified: z.boolean() }));

export async function fetchGoogleProfile(code: string): Promise<OAuthProfile> {
  const cfg = providerConfig("google");
  const tokenRes = await http.post(
    GOOGLE_TOKEN_URL,
    new URLSearchParams({
      client_id: cfg.clientId,
      client_secret: cfg.clientSecret,
      code,
      grant_type: "authorization_code",
      redirect_uri: cfg.redirectUri,
    }),
  );
  const { access_token } = TokenResponse.parse(tokenRes.data);

  const userRes = await http.get(GOOGLE_USERINFO_URL, { headers: { Authorization: `Bearer ${access_token}` } });
  const user = GoogleUser.parse(userRes.data);
  return { email: user.email, name: user.name ?? null, avatarUrl: user.picture ?? null };
}

/** Primary verified address when the public profile hides the email. */
export function pickGithubEmail(emails: z.infer<typeof GithubEmails>) {
  return emails.find((e) => e.primary && e.verified)?.email ?? null;
}

export async function fetchGithubProfile(code: string): Promise<OAuthProfile> {
  const cfg = providerConfig("github");
  const tokenRes = await http.post(
    GITHUB_TOKEN_URL,
    { client_id: cfg.clientId, client_secret: cfg.clientSecret, code, redirect_uri: cfg.redirectUri },
    { headers: { Accept: "application/json" } },
  );
  const { access_token } = TokenResponse.parse(tokenRes.data);
  const headers = { Authorization: `Bearer ${access_token}`, Accept: "application/vnd.github+json" };

  const user = GithubUser.parse((await http.get(GITHUB_USER_URL, { headers })).data);
  let email = user.email ?? null;
  if (!email) {
    email = pickGithubEmail(GithubEmails.parse((await http.get(GITHUB_EMAILS_URL, { headers })).data));
  }
  if (!email) throw new Error("GitHub account has no verified primary email");

  return { email, name: user.name || user.login, avatarUrl: user.avatar_url ?? null };
}

/** Existing account by email (missing name/avatar filled in), or a new passwordless one. */
export async function findOrCreateOAuthUser(provider: OAuthProvider, profile: OAuthProfile) {
  const existing = await findUserByEmail(profile.email);
  if (!existing) {
    return createUser({
      email: profile.email,
      passwordHash: null,
      name: profile.name,
      avatarUrl: profile.avatarUrl,
      authProvider: provider,
    });
  }

  const patch: { name?: string | null; avatarUrl?: string | null } = {};
  if (!existing.name && profile.name) patch.name = profile.name;
  if (!existing.avatarUrl && profile.avatarUrl) patch.avatarUrl = profile.avatarUrl;
  if (Object.keys(patch).length === 0) return existing;
  return (await updateUser(existing.id, patch)) ?? existing;
}
