import type { Post } from "../entities/Post.js";

export interface PostRepository {
  load(): Promise<Post[]>;
  save(posts: Post[]): Promise<void>;
}
