// backend/services/blog/src/services/commentService.ts
import type { Logger } from "@shared/utils/logger";
import type { ICommentRepository } from "../repo/commentRepo";
import type {
  CommentRequestDto,
  CommentResponseDto,
} from "../contracts/comment";
import {
  commentFromRequest,
  toCommentResponse,
} from "../mappers/comment.mapper";

export class CommentService {
  constructor(
    private readonly repo: ICommentRepository,
    private readonly log: Logger
  ) {}

  async list(): Promise<CommentResponseDto[]> {
    this.log.info("[CommentService.list] fetching all comments");
    const all = await this.guard("list", {}, () => this.repo.getAll());
    return all.map(toCommentResponse);
  }

  async getById(id: string): Promise<CommentResponseDto | null> {
    this.log.info({ commentId: id }, "[CommentService.getById] fetching comment");
    const comment = await this.guard("getById", { commentId: id }, () =>
      this.repo.getById(id)
    );
    if (!comment) {
      this.log.warn({ commentId: id }, "[CommentService.getById] not found");
      return null;
    }
    return toCommentResponse(comment);
  }

  /** Author comes from the caller; anything identity-like in the body is ignored. */
  async add(
    request: CommentRequestDto,
    author: string
  ): Promise<CommentResponseDto> {
    const comment = commentFromRequest(request, author);
    this.log.info(
      { commentId: comment.id, postId: comment.postId },
      "[CommentService.add] adding comment"
    );
    await this.guard("add", { commentId: comment.id }, () =>
      this.repo.add(comment)
    );
    return toCommentResponse(comment);
  }

  /** Overlays content only; postId is fixed at creation. */
  async update(id: string, request: CommentRequestDto): Promise<boolean> {
    this.log.info({ commentId: id }, "[CommentService.update] updating comment");
    return this.guard("update", { commentId: id }, async () => {
      const existing = await this.repo.getById(id);
      if (!existing) {
        this.log.warn({ commentId: id }, "[CommentService.update] not found");
        return false;
      }
      existing.content = request.content;
      existing.touch();
      await this.repo.update(existing);
      return true;
    });
  }

  async delete(id: string): Promise<boolean> {
    this.log.info({ commentId: id }, "[CommentService.delete] deleting comment");
    return this.guard("delete", { commentId: id }, async () => {
      const existing = await this.repo.getById(id);
      if (!existing) {
        this.log.warn({ commentId: id }, "[CommentService.delete] not found");
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
      this.log.error({ err, ...ctx }, `[CommentService.${op}] failed`);
      throw err;
    }
  }
}
