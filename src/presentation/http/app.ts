import express, { type Express } from "express";
import cors from "cors";
import swaggerUi from "swagger-ui-express";
import { readFileSync } from "fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { PostStore } from "../../application/services/PostStore.js";
import type { HttpConfig } from "../../shared/config/index.js";
import { createPostsRouter } from "./routes/posts.js";
import { createRateLimiter } from "./middleware/rateLimit.js";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// Holds openapi.json; same relative location from src/ and dist/
export const STATIC_DIR = path.resolve(__dirname, "../../../static");
export const OPENAPI_FILE = path.join(STATIC_DIR, "openapi.json");

export const DOCS_TITLE = "Blog Posts API";

const openApiDocumentSchema = z.object({ openapi: z.string() }).passthrough();

function loadOpenApiDocument(): z.infer<typeof openApiDocumentSchema> {
  return openApiDocumentSchema.parse(JSON.parse(readFileSync(OPENAPI_FILE, "utf-8")));
}

export interface AppDependencies {
  store: PostStore;
  config: HttpConfig;
}

export function createApp({ store, config }: AppDependencies): Express {
  const app = express();

  app.use(cors({ origin: config.corsAllowOrigin }));
  app.use(createRateLimiter(config.rateLimit));
  app.use(express.json());

  app.get("/healthz", (_req, res) => {
    res.json({ status: "ok", uptime: process.uptime() });
  });

  app.use("/static", express.static(STATIC_DIR));
  app.use(
    "/api/docs",
    swaggerUi.serve,
    swaggerUi.setup(loadOpenApiDocument(), { customSiteTitle: DOCS_TITLE })
  );

  app.post("/api/posts", createRateLimiter(config.createRateLimit));
  app.use("/api/posts", createPostsRouter(store));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
