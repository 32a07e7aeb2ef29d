/**
 * HTTP surface of the topic service.
 *
 *   GET  /base-anchors      { anchors }
 *   GET  /topics[?anchors]  { topics, anchors? }
 *   GET  /vocab             { vocab }
 *   GET  /vocabsize         "Vocabulary size: N"
 *   GET  /cooccurrences     { cooccurrences }
 *   POST /finished          "OK", body stored under userDataDir
 *
 * Everything else is served from staticDir when it exists.
 */

import { existsSync } from "node:fs";
import { resolve } from "node:path";
import Fastify, { type FastifyInstance } from "fastify";
import fastifyStatic from "@fastify/static";
import { z } from "zod";

import { InvalidAnchorError } from "../anchors/index.js";
import type { TopicService } from "../service/index.js";
import type { Logger } from "../logging/index.js";
import { toErrorResponse } from "./errors.js";
import { saveUserData } from "./user-data.js";

export interface AppOptions {
  /** Browser client files; skipped when the directory does not exist */
  staticDir: string;
  userDataDir: string;
  logger: Logger;
}

const TopicsQuerySchema = z.object({
  anchors: z.string().optional(),
});

function badRequest(message: string): Error & { statusCode: number } {
  return Object.assign(new Error(message), { statusCode: 400 });
}

export async function createApp(service: TopicService, options: AppOptions): Promise<FastifyInstance> {
  const logger = options.logger.child("http");
  const app = Fastify({ logger: false });

  // Submissions are parsed as JSON whatever their declared content type.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser("*", { parseAs: "string" }, (_request, body, done) => {
    try {
      done(null, JSON.parse(body.toString()));
    } catch (err) {
      done(badRequest(`Request body must be JSON: ${err instanceof Error ? err.message : String(err)}`));
    }
  });

  app.addHook("onResponse", async (request, reply) => {
    logger.debug("Request handled", {
      method: request.method,
      url: request.url,
      status: reply.statusCode,
      ms: Math.round(reply.elapsedTime),
    });
  });

  app.setErrorHandler(async (error, request, reply) => {
    const { status, body } = toErrorResponse(error);
    if (status >= 500) {
      logger.error("Request failed", { method: request.method, url: request.url, message: error.message });
    } else {
      logger.warn("Request rejected", { method: request.method, url: request.url, code: body.error.code });
    }
    return reply.status(status).send(body);
  });

  app.setNotFoundHandler(async (request, reply) => {
    return reply.status(404).send({ error: { code: "not_found", message: `No route for ${request.method} ${request.url}` } });
  });

  app.get("/base-anchors", async () => service.baseAnchors());

  app.get("/topics", async (request) => {
    const query = TopicsQuerySchema.safeParse(request.query);
    if (!query.success) {
      throw new InvalidAnchorError("Anchors must be given at most once, as a JSON string");
    }
    return service.topics(query.data.anchors);
  });

  app.get("/vocab", async () => service.vocab());

  app.get("/vocabsize", async (_request, reply) => {
    reply.type("text/plain; charset=utf-8");
    return `Vocabulary size: ${service.vocabSize()}`;
  });

  app.get("/cooccurrences", async () => service.cooccurrences());

  app.post("/finished", async (request, reply) => {
    if (request.body === undefined) {
      throw badRequest("Request body must be JSON");
    }
    const filePath = saveUserData(options.userDataDir, request.body);
    logger.info("User data saved", { path: filePath });
    reply.type("text/plain; charset=utf-8");
    return "OK";
  });

  if (existsSync(options.staticDir)) {
    await app.register(fastifyStatic, { root: resolve(options.staticDir) });
  } else {
    logger.warn("Static directory not found; browser client not served", { staticDir: options.staticDir });
  }

  return app;
}
