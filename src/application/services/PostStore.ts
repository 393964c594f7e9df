import type { Post, PostInput } from "../../domain/entities/Post.js";
import { NotFoundError } from "../../domain/errors/PostErrors.js";
import type { PostRepository } from "../../domain/repositories/PostRepository.js";
import { PostQueryService } from "../../domain/services/PostQueryService.js";
import { Mutex } from "../../shared/utils/mutex.js";
import { logger } from "../../shared/utils/logger.js";
import {
  parseListQuery,
  parsePostDraft,
  toPost,
  type ListQuery,
  type SearchQuery,
} from "../schemas/postSchemas.js";

/**
 * Owns the post collection. Every operation loads the whole collection from the
 * repository and, for mutations, persists it again, all under one lock so that
 * concurrent callers cannot interleave a read-modify-write.
 */
export class PostStore {
  private readonly mutex = new Mutex();
  private readonly queryService = new PostQueryService();

  constructor(private readonly repository: PostRepository) {}

  async list(query: ListQuery = {}): Promise<Post[]> {
    const options = parseListQuery(query);
    return this.mutex.runExclusive(async () => {
      const posts = await this.repository.load();
      return this.queryService.list(posts, options);
    });
  }

  async get(id: number): Promise<Post> {
    return this.mutex.runExclusive(async () => {
      const posts = await this.repository.load();
      const post = posts.find((candidate) => candidate.id === id);
      if (!post) {
        throw new NotFoundError();
      }
      return post;
    });
  }

  async search(query: SearchQuery = {}): Promise<Post[]> {
    const terms = { title: query.title ?? "", content: query.content ?? "" };
    return this.mutex.runExclusive(async () => {
      const posts = await this.repository.load();
      return this.queryService.search(posts, terms);
    });
  }

  async create(input: PostInput): Promise<Post> {
    const draft = parsePostDraft(input);
    return this.mutex.runExclusive(async () => {
      const posts = await this.repository.load();
      const post = toPost(this.queryService.nextId(posts), draft);
      await this.repository.save([...posts, post]);
      logger.info({ id: post.id }, "Created post");
      return post;
    });
  }

  async update(id: number, input: PostInput): Promise<Post> {
    const draft = parsePostDraft(input);
    return this.mutex.runExclusive(async () => {
      const posts = await this.repository.load();
      const index = posts.findIndex((post) => post.id === id);
      if (index === -1) {
        throw new NotFoundError();
      }

      // Only title and content change; id and any stored extras stay
      const updated: Post = { ...posts[index], ...draft };
      const next = posts.map((post, position) =>
        position === index ? updated : post
      );
      await this.repository.save(next);
      logger.info({ id }, "Updated post");
      return updated;
    });
  }

  async delete(id: number): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const posts = await this.repository.load();
      const next = posts.filter((post) => post.id !== id);
      if (next.length === posts.length) {
        throw new NotFoundError();
      }

      await this.repository.save(next);
      logger.info({ id }, "Deleted post");
    });
  }
}
