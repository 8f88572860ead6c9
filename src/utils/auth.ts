import type { FastifyReply, FastifyRequest } from "fastify";

import { env } from "../config/env.js";

/** Validates the X-API-Key header against the configured server API key. */
export function requireApiKey(
  request: FastifyRequest,
  reply: FastifyReply,
  expectedKey: string = env.serverApiKey
): boolean {
  if (!expectedKey) {
    return true;
  }

  const apiKey = request.headers["x-api-key"];
  if (!apiKey) {
    request.log.warn({ url: request.url }, "Missing API key");
    void reply.status(401).send({ message: "Missing API key" });
    return false;
  }

  if (apiKey !== expectedKey) {
    request.log.warn({ url: request.url }, "Invalid API key");
    void reply.status(401).send({ message: "Invalid API key" });
    return false;
  }

  return true;
}
