import path from "node:path";
import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { createApp } from "./app.js";
import { getConfig } from "./config.js";
import { ensureDb } from "./db.js";
import { errorContext, logger } from "./logger.js";

/** Vite output next to the compiled server, or under the working directory. */
function findFrontend() {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [path.resolve(here, "../public"), path.resolve(process.cwd(), "dist", "public")];
  const dir = candidates.find((p) => fs.existsSync(path.join(p, "index.html"))) ?? null;
  return { dir, candidates };
}

async function main() {
  const config = getConfig();
  const frontend = findFrontend();
  const app = createApp({ frontendDir: frontend.dir, frontendCandidates: frontend.candidates });

  // DB must be ready before the first request
  await ensureDb();

  app.listen(config.port, "0.0.0.0", () => {
    logger.info("Server listening", { port: config.port, env: config.env, origins: config.corsOrigins });
  });
}

main().catch((err: unknown) => {
  logger.error("Fatal startup error", errorContext(err));
  process.exit(1);
});
