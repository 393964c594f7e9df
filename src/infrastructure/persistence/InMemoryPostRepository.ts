import type { Post } from "../../domain/entities/Post.js";
import type { PostRepository } from "../../domain/repositories/PostRepository.js";
import { SEED_POSTS } from "./seedPosts.js";

/**
 * Process-local storage. Contents are lost on restart.
 */
export class InMemoryPostRepository implements PostRepository {
  private posts: Post[];

  constructor(initial: readonly Post[] = SEED_POSTS) {
    this.posts = initial.map((post) => ({ ...post }));
  }

  async load(): Promise<Post[]> {
    return this.posts.map((post) => ({ ...post }));
  }

  async save(posts: Post[]): Promise<void> {
    this.posts = posts.map((post) => ({ ...post }));
  }
}
