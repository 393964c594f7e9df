// Main entrypoint - exports for embedding the store or the HTTP app
export { PostStore } from "./application/services/PostStore.js";
export type { ListQuery, SearchQuery } from "./application/schemas/postSchemas.js";
export { createApp } from "./presentation/http/app.js";
export { Container, container } from "./infrastructure/di/container.js";

// Domain exports
export type { Post, PostDraft, PostInput } from "./domain/entities/Post.js";
export type { PostRepository } from "./domain/repositories/PostRepository.js";
export {
  PostStoreError,
  ValidationError,
  NotFoundError,
} from "./domain/errors/PostErrors.js";
export { SortField, SortDirection } from "./domain/value-objects/SortOptions.js";

// Storage adapters
export { InMemoryPostRepository } from "./infrastructure/persistence/InMemoryPostRepository.js";
export { JsonFilePostRepository } from "./infrastructure/persistence/JsonFilePostRepository.js";
