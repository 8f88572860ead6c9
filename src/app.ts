import fs from "node:fs/promises";

import Fastify from "fastify";
import cors from "@fastify/cors";

import { env } from "./config/env.js";
import { registerPodcastRoutes, type PodcastRouteOptions } from "./routes/podcasts.js";
import type { TtsProvider } from "./types/provider.js";
import { requireApiKey } from "./utils/auth.js";

export type BuildAppOptions = {
  outputDir?: string;
  defaultProvider?: TtsProvider;
  serverApiKey?: string;
  /** Fastify request logging; disabled in tests. */
  logger?: boolean;
  pipeline?: PodcastRouteOptions["pipeline"];
};

const PUBLIC_ROUTES = new Set(["/health"]);

export async function buildApp(options: BuildAppOptions = {}) {
  const outputDir = options.outputDir ?? env.outputDir;
  const serverApiKey = options.serverApiKey ?? env.serverApiKey;

  const app = Fastify({
    logger: options.logger === false ? false : { level: env.logLevel },
  });

  await fs.mkdir(outputDir, { recursive: true });

  await app.register(cors, {
    origin: true,
    credentials: true,
  });

  app.addHook("onRequest", async (request, reply) => {
    if (PUBLIC_ROUTES.has(request.url)) {
      return;
    }
    if (!requireApiKey(request, reply, serverApiKey)) {
      return reply;
    }
  });

  app.get("/health", async () => ({
    status: "ok",
    defaultProvider: options.defaultProvider ?? env.ttsProvider,
  }));

  await registerPodcastRoutes(app, {
    outputDir,
    defaultProvider: options.defaultProvider ?? env.ttsProvider,
    pipeline: options.pipeline,
  });

  return app;
}
