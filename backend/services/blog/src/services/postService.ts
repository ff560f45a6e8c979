// backend/services/blog/src/services/postService.ts
import type { Logger } from "@shared/utils/logger";
import type { IPostRepository } from "../repo/postRepo";
import type { Post } from "../models/Post";
import type { PostRequestDto } from "../contracts/post";
import { postFromRequest } from "../mappers/post.mapper";

/**
 * Post use-cases. Not-found is a value (null/false), never an exception.
 * Storage failures are logged and rethrown untouched.
 */
export class PostService {
  constructor(
    private readonly repo: IPostRepository,
    private readonly log: Logger
  ) {}

  async list(): Promise<Post[]> {
    this.log.info("[PostService.list] fetching all posts");
    return this.guard("list", {}, () => this.repo.getAll());
  }

  async getById(id: string): Promise<Post | null> {
    this.log.info({ postId: id }, "[PostService.getById] fetching post");
    const post = await this.guard("getById", { postId: id }, () =>
      this.repo.getById(id)
    );
    if (!post) this.log.warn({ postId: id }, "[PostService.getById] not found");
    return post;
  }

  async add(request: PostRequestDto): Promise<Post> {
    const post = postFromRequest(request);
    this.log.info({ postId: post.id }, "[PostService.add] adding post");
    await this.guard("add", { postId: post.id }, () => this.repo.add(post));
    return post;
  }

  async update(id: string, request: PostRequestDto): Promise<boolean> {
    this.log.info({ postId: id }, "[PostService.update] updating post");
    return this.guard("update", { postId: id }, async () => {
      const existing = await this.repo.getById(id);
      if (!existing) {
        this.log.warn({ postId: id }, "[PostService.update] not found");
        return false;
      }
      existing.title = request.title;
      existing.content = request.content;
      existing.touch();
      await this.repo.update(existing);
      return true;
    });
  }

  async delete(id: string): Promise<boolean> {
    this.log.info({ postId: id }, "[PostService.delete] deleting post");
    return this.guard("delete", { postId: id }, async () => {
      const existing = await this.repo.getById(id);
      if (!existing) {
        this.log.warn({ postId: id }, "[PostService.delete] not found");
        return false;
      }
      await this.repo.delete(existing);
      return true;
    });
  }

  private async guard<T>(
    op: string,
    ctx: Record<string, unknown>,
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      this.log.error({ err, ...ctx }, `[PostService.${op}] failed`);
      throw err;
    }
  }
}
