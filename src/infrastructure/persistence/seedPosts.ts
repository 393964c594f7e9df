import type { Post } from "../../domain/entities/Post.js";

export const SEED_POSTS: readonly Post[] = [
  { id: 1, title: "First post", content: "This is the first post." },
  { id: 2, title: "Second post", content: "This is the second post." },
];
