// Seeds the default system prompts and, optionally, a demo account.
import { hashPassword } from "./auth.js";
import { closeDb, ensureDb } from "./db.js";
import { logger } from "./logger.js";
import { DEFAULT_PROMPTS, type PromptKey } from "./prompts.js";
import { createUser, findUserByEmail, insertSystemPromptIfMissing } from "./storage.js";

await ensureDb();

const keys = Object.keys(DEFAULT_PROMPTS).filter((k): k is PromptKey => k in DEFAULT_PROMPTS);
let inserted = 0;
for (const key of keys) {
  const { description, content } = DEFAULT_PROMPTS[key];
  if (await insertSystemPromptIfMissing(key, description, content)) inserted += 1;
}
logger.info("Seeded system prompts", { inserted, total: keys.length });

const email = process.env.SEED_EMAIL;
const password = process.env.SEED_PASSWORD;
if (email && password) {
  const existing = await findUserByEmail(email.toLowerCase());
  if (existing) {
    logger.info("Seed user already exists", { email: existing.email });
  } else {
    const user = await createUser({
      email: email.toLowerCase(),
      passwordHash: hashPassword(password),
      name: process.env.SEED_NAME || "Demo User",
      authProvider: "email",
    });
    logger.info("Seeded user", { id: user.id, email: user.email });
  }
}

await closeDb();
