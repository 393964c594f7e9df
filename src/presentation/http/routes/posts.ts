import express, {
  type NextFunction,
  type Request,
  type Response,
  type Router,
} from "express";
import type { PostStore } from "../../../application/services/PostStore.js";
import { NotFoundError } from "../../../domain/errors/PostErrors.js";
import type { PostInput } from "../../../domain/entities/Post.js";

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error middleware
function asyncHandler(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

/**
 * Takes the first string for a query key; repeated keys arrive as arrays.
 */
function queryString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) {
    const [first] = value;
    return typeof first === "string" ? first : undefined;
  }
  return undefined;
}

function parseId(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new NotFoundError();
  }
  return Number(raw);
}

function postInput(body: unknown): PostInput {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return {};
  }
  return { title: Reflect.get(body, "title"), content: Reflect.get(body, "content") };
}

export function createPostsRouter(store: PostStore): Router {
  const router = express.Router();

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const posts = await store.list({
        sort: queryString(req.query.sort),
        direction: queryString(req.query.direction),
        page: queryString(req.query.page),
        limit: queryString(req.query.limit),
      });
      res.json(posts);
    })
  );

  // Registered before "/:id" so "search" is not read as an id
  router.get(
    "/search",
    asyncHandler(async (req, res) => {
      const posts = await store.search({
        title: queryString(req.query.title),
        content: queryString(req.query.content),
      });
      res.json(posts);
    })
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      res.json(await store.get(parseId(req.params.id)));
    })
  );

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const post = await store.create(postInput(req.body));
      res.status(201).json(post);
    })
  );

  router.put(
    "/:id",
    asyncHandler(async (req, res) => {
      const id = parseId(req.params.id);
      res.json(await store.update(id, postInput(req.body)));
    })
  );

  router.delete(
    "/:id",
    asyncHandler(async (req, res) => {
      await store.delete(parseId(req.params.id));
      res.json({ message: "Post deleted" });
    })
  );

  return router;
}
