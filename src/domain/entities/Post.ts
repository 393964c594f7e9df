export interface Post {
  id: number;
  title: string;
  content: string;
}

export type PostDraft = Omit<Post, "id">;

// Raw create/update payload, typically a parsed JSON request body
export interface PostInput {
  title?: unknown;
  content?: unknown;
}
