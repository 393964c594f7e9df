import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Server } from "node:http";
import { createApp } from "./app.js";
import { PostStore } from "../../application/services/PostStore.js";
import { InMemoryPostRepository } from "../../infrastructure/persistence/InMemoryPostRepository.js";
import type { HttpConfig } from "../../shared/config/index.js";

vi.mock("../../shared/utils/logger.js", () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const config: HttpConfig = {
  corsAllowOrigin: "*",
  rateLimit: { windowMs: 60_000, max: 1000 },
  createRateLimit: { windowMs: 60_000, max: 1000 },
};

const SECOND = { id: 2, title: "Second post", content: "This is the second post." };

async function startServer(httpConfig: HttpConfig): Promise<Server> {
  const app = createApp({
    store: new PostStore(new InMemoryPostRepository()),
    config: httpConfig,
  });
  return new Promise<Server>((resolve) => {
    const server = app.listen(0, "127.0.0.1", () => resolve(server));
  });
}

function portOf(server: Server): number {
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Server is not listening on a TCP port");
  }
  return address.port;
}

function closeServer(server: Server): Promise<void> {
  return new Promise<void>((resolve) => {
    server.close(() => resolve());
  });
}

describe("HTTP API", () => {
  let server: Server;
  let baseUrl: string;

  const send = (method: string, path: string, body?: unknown) =>
    fetch(`${baseUrl}${path}`, {
      method,
      headers: { "Content-Type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

  beforeEach(async () => {
    server = await startServer(config);
    baseUrl = `http://127.0.0.1:${portOf(server)}`;
  });

  afterEach(() => closeServer(server));

  describe("GET /api/posts", () => {
    it("should list posts with CORS headers", async () => {
      const response = await fetch(`${baseUrl}/api/posts`);

      expect(response.status).toBe(200);
      expect(response.headers.get("access-control-allow-origin")).toBe("*");
      expect(await response.json()).toEqual([
        { id: 1, title: "First post", content: "This is the first post." },
        SECOND,
      ]);
    });

    it("should sort and paginate", async () => {
      const response = await fetch(
        `${baseUrl}/api/posts?sort=title&direction=desc&page=1&limit=1`
      );

      expect(await response.json()).toEqual([SECOND]);
    });

    it("should answer 400 for an invalid sort field", async () => {
      const response = await fetch(`${baseUrl}/api/posts?sort=author`);

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        status: 400,
        message: "Invalid sort field",
      });
    });

    it("should answer 400 for an invalid direction", async () => {
      const response = await fetch(`${baseUrl}/api/posts?direction=up`);

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        status: 400,
        message: "Invalid sort direction",
      });
    });
  });

  describe("GET /api/posts/search", () => {
    it("should return matching posts", async () => {
      const response = await fetch(`${baseUrl}/api/posts/search?title=SECOND`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual([SECOND]);
    });

    it("should return an empty array without a query", async () => {
      const response = await fetch(`${baseUrl}/api/posts/search`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual([]);
    });
  });

  describe("GET /api/posts/:id", () => {
    it("should return a single post", async () => {
      const response = await fetch(`${baseUrl}/api/posts/2`);

      expect(await response.json()).toEqual(SECOND);
    });

    it("should answer 404 for a non-numeric id", async () => {
      const response = await fetch(`${baseUrl}/api/posts/abc`);

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ status: 404, message: "Post not found" });
    });
  });

  describe("POST /api/posts", () => {
    it("should create a post", async () => {
      const response = await send("POST", "/api/posts", {
        title: "Third",
        content: "Body",
      });

      expect(response.status).toBe(201);
      expect(await response.json()).toEqual({ id: 3, title: "Third", content: "Body" });
    });

    it("should answer 400 listing missing fields", async () => {
      const response = await send("POST", "/api/posts", { title: "Third" });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        status: 400,
        message: "Missing field: content",
      });
    });

    it("should answer 400 for a malformed body", async () => {
      const response = await fetch(`${baseUrl}/api/posts`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        status: 400,
        message: "Malformed JSON body",
      });
    });
  });

  describe("PUT /api/posts/:id", () => {
    it("should update a post", async () => {
      const response = await send("PUT", "/api/posts/1", {
        title: "Edited",
        content: "Changed",
      });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ id: 1, title: "Edited", content: "Changed" });
    });

    it("should answer 404 for an unknown id", async () => {
      const response = await send("PUT", "/api/posts/42", {
        title: "Edited",
        content: "Changed",
      });

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ status: 404, message: "Post not found" });
    });
  });

  describe("DELETE /api/posts/:id", () => {
    it("should delete once and 404 afterwards", async () => {
      const first = await send("DELETE", "/api/posts/1");
      const second = await send("DELETE", "/api/posts/1");

      expect(first.status).toBe(200);
      expect(await first.json()).toEqual({ message: "Post deleted" });
      expect(second.status).toBe(404);
    });
  });

  it("should answer 404 for unknown routes", async () => {
    const response = await fetch(`${baseUrl}/unknown`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ status: 404, message: "Resource not found" });
  });

  it("should report health", async () => {
    const response = await fetch(`${baseUrl}/healthz`);
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: "ok" });
  });

  it("should serve the interactive API docs", async () => {
    const response = await fetch(`${baseUrl}/api/docs/`);
    const html = await response.text();

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toContain("text/html");
    expect(html).toContain("<title>Blog Posts API</title>");
    expect(html).toContain('<div id="swagger-ui"></div>');
  });

  it("should feed the docs page from the OpenAPI document", async () => {
    const response = await fetch(`${baseUrl}/api/docs/swagger-ui-init.js`);

    expect(response.status).toBe(200);
    expect(await response.text()).toContain("/api/posts/search");
  });

  it("should serve the OpenAPI document", async () => {
    const response = await fetch(`${baseUrl}/static/openapi.json`);
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ openapi: "3.0.3" });
  });
});

describe("HTTP API rate limiting", () => {
  let server: Server;

  beforeEach(async () => {
    server = await startServer({
      ...config,
      createRateLimit: { windowMs: 60_000, max: 1 },
    });
  });

  afterEach(() => closeServer(server));

  it("should answer 429 once the create limit is used up", async () => {
    const port = portOf(server);
    const create = () =>
      fetch(`http://127.0.0.1:${port}/api/posts`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ title: "Limited", content: "Body" }),
      });

    const first = await create();
    const second = await create();

    expect(first.status).toBe(201);
    expect(second.status).toBe(429);
    expect(await second.json()).toEqual({ status: 429, message: "Too many requests" });
  });
});
