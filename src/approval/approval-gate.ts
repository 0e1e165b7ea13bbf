/**
 * Approval Gate
 *
 * Tracks threads suspended for a human decision. A handle resumes at most
 * once: `resume` checks and removes it in the same synchronous step, so a
 * duplicate or late answer finds nothing and changes nothing.
 */

import type { ApprovalDecision } from '../types/index.js';
import { HandleNotFoundError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { ApprovalChannel } from './channel.js';

const log = createLogger('approval-gate');

export interface PendingApproval {
  handle: string;
  threadId: string;
  question: string;
  details: Record<string, unknown>;
  createdAt: Date;
}

export interface ResolvedApproval extends PendingApproval {
  decision: ApprovalDecision;
  resolvedAt: Date;
}

export type ResumeResult =
  | { ok: true; approval: ResolvedApproval }
  | { ok: false; error: HandleNotFoundError };

export class ApprovalGate {
  private readonly pendingByHandle = new Map<string, PendingApproval>();
  /** Consumed handles by thread, forgotten when the thread is discarded */
  private readonly consumed = new Map<string, string>();

  constructor(private readonly channel: ApprovalChannel) {}

  /**
   * Publish a request and record it as pending. Returns the handle.
   */
  async suspend(
    threadId: string,
    question: string,
    details: Record<string, unknown> = {}
  ): Promise<string> {
    const { handle } = await this.channel.publish({ threadId, question, details });
    this.pendingByHandle.set(handle, {
      handle,
      threadId,
      question,
      details,
      createdAt: new Date(),
    });
    log.info({ threadId, handle }, 'Approval requested');
    return handle;
  }

  resume(handle: string, decision: ApprovalDecision): ResumeResult {
    const pending = this.pendingByHandle.get(handle);
    if (!pending) {
      log.warn({ handle }, 'Resume for unknown or consumed handle');
      return { ok: false, error: new HandleNotFoundError(handle) };
    }
    this.pendingByHandle.delete(handle);
    this.consumed.set(handle, pending.threadId);

    log.info(
      { threadId: pending.threadId, handle, approved: decision.approved, decidedBy: decision.decidedBy },
      'Approval resolved'
    );
    return { ok: true, approval: { ...pending, decision, resolvedAt: new Date() } };
  }

  pending(threadId?: string): PendingApproval[] {
    const all = [...this.pendingByHandle.values()];
    return threadId === undefined ? all : all.filter((p) => p.threadId === threadId);
  }

  get(handle: string): PendingApproval | undefined {
    return this.pendingByHandle.get(handle);
  }

  /**
   * Re-register an approval known from a checkpoint, e.g. after a restart.
   * Pending and already consumed handles are left as they are.
   */
  restore(approval: PendingApproval): boolean {
    if (this.pendingByHandle.has(approval.handle) || this.consumed.has(approval.handle)) {
      return false;
    }
    this.pendingByHandle.set(approval.handle, approval);
    log.debug({ threadId: approval.threadId, handle: approval.handle }, 'Approval restored');
    return true;
  }

  /**
   * Drop every pending approval of a thread and forget its consumed
   * handles. Returns how many pending approvals were dropped.
   */
  discard(threadId: string): number {
    let dropped = 0;
    for (const [handle, pending] of this.pendingByHandle) {
      if (pending.threadId === threadId) {
        this.pendingByHandle.delete(handle);
        dropped++;
      }
    }
    for (const [handle, owner] of this.consumed) {
      if (owner === threadId) {
        this.consumed.delete(handle);
      }
    }
    return dropped;
  }

  /**
   * Number of consumed handles still remembered.
   */
  consumedCount(): number {
    return this.consumed.size;
  }
}
