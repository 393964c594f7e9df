import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import { dirname } from "path";
import { z } from "zod";
import type { Post } from "../../domain/entities/Post.js";
import { StorageError } from "../../domain/errors/PostErrors.js";
import type { PostRepository } from "../../domain/repositories/PostRepository.js";
import { logger } from "../../shared/utils/logger.js";

// Unknown keys on a stored post are kept and written back unchanged
const postListSchema = z.array(
  z
    .object({
      id: z.number().int().positive(),
      title: z.string(),
      content: z.string(),
    })
    .passthrough()
);

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Stores the whole collection as a pretty-printed JSON array. A missing file or
 * one that is not JSON at all loads as an empty collection; JSON that is not a
 * list of posts is refused so it never gets overwritten.
 */
export class JsonFilePostRepository implements PostRepository {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Post[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        logger.debug({ filePath: this.filePath }, "Data file not found, starting empty");
        return [];
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      logger.warn(
        { filePath: this.filePath, error: error instanceof Error ? error.message : String(error) },
        "Data file is not valid JSON, starting empty"
      );
      return [];
    }

    const result = postListSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? issue.path.join(".") : "";
      logger.error(
        { filePath: this.filePath, issues: result.error.issues.length, path: where },
        "Data file does not contain a list of posts"
      );
      throw new StorageError(
        `Data file ${this.filePath} does not contain a list of posts${where ? ` (at ${where})` : ""}`
      );
    }
    return result.data;
  }

  async save(posts: Post[]): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });

    // Target always holds either the previous or the new document
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await writeFile(tempPath, `${JSON.stringify(posts, null, 4)}\n`, "utf-8");
      await rename(tempPath, this.filePath);
    } catch (error) {
      await this.removeTempFile(tempPath);
      throw error;
    }
    logger.debug({ filePath: this.filePath, count: posts.length }, "Saved posts");
  }

  private async removeTempFile(tempPath: string): Promise<void> {
    try {
      await rm(tempPath, { force: true });
    } catch (cleanupError) {
      logger.warn(
        {
          tempPath,
          error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
        },
        "Could not remove temporary data file"
      );
    }
  }
}
