import type { Post } from "../entities/Post.js";
import {
  SortDirection,
  type ListOptions,
  type SortField,
} from "../value-objects/SortOptions.js";

export interface SearchTerms {
  title: string;
  content: string;
}

/**
 * Orders strings by Unicode code point. Plain `<` compares UTF-16 code units,
 * which puts astral characters (emoji) before BMP characters above U+D7FF.
 */
export function compareCodePoints(left: string, right: string): number {
  let index = 0;
  while (index < left.length && index < right.length) {
    const l = left.codePointAt(index) ?? 0;
    const r = right.codePointAt(index) ?? 0;
    if (l !== r) return l < r ? -1 : 1;
    index += l > 0xffff ? 2 : 1;
  }
  if (left.length === right.length) return 0;
  return index >= left.length ? -1 : 1;
}

export class PostQueryService {
  /**
   * Returns a sorted copy. Array.prototype.sort is stable, so posts with equal
   * keys keep their collection order in both directions.
   */
  sort(posts: Post[], field: SortField, direction: SortDirection): Post[] {
    const factor = direction === SortDirection.DESC ? -1 : 1;
    return [...posts].sort(
      (a, b) => compareCodePoints(a[field], b[field]) * factor
    );
  }

  paginate(posts: Post[], page: number, limit: number): Post[] {
    const start = (page - 1) * limit;
    return posts.slice(start, start + limit);
  }

  list(posts: Post[], options: ListOptions): Post[] {
    const ordered = options.sort
      ? this.sort(posts, options.sort, options.direction)
      : posts;
    return this.paginate(ordered, options.page, options.limit);
  }

  // An empty term never matches; with both empty nothing is returned
  search(posts: Post[], terms: SearchTerms): Post[] {
    const title = terms.title.toLowerCase();
    const content = terms.content.toLowerCase();

    return posts.filter(
      (post) =>
        (title !== "" && post.title.toLowerCase().includes(title)) ||
        (content !== "" && post.content.toLowerCase().includes(content))
    );
  }

  nextId(posts: Post[]): number {
    return posts.reduce((max, post) => Math.max(max, post.id), 0) + 1;
  }
}
