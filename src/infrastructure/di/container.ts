import { PostStore } from "../../application/services/PostStore.js";
import type { PostRepository } from "../../domain/repositories/PostRepository.js";
import { InMemoryPostRepository } from "../persistence/InMemoryPostRepository.js";
import { JsonFilePostRepository } from "../persistence/JsonFilePostRepository.js";
import { env, getDataFilePath, PostStorage } from "../../shared/config/index.js";
import { logger } from "../../shared/utils/logger.js";

/**
 * Dependency Injection Container
 * Provides instances of infrastructure implementations
 */
export class Container {
  private postRepository: PostRepository | null = null;
  private postStore: PostStore | null = null;

  constructor(private readonly storage: PostStorage = env.POST_STORAGE) {}

  getPostRepository(): PostRepository {
    if (!this.postRepository) {
      if (this.storage === PostStorage.MEMORY) {
        logger.info("Using in-memory post storage");
        this.postRepository = new InMemoryPostRepository();
      } else {
        const filePath = getDataFilePath();
        logger.info({ filePath }, "Using JSON file post storage");
        this.postRepository = new JsonFilePostRepository(filePath);
      }
    }
    return this.postRepository;
  }

  getPostStore(): PostStore {
    if (!this.postStore) {
      this.postStore = new PostStore(this.getPostRepository());
    }
    return this.postStore;
  }
}

// Singleton instance
export const container = new Container();
