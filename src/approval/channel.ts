import { nanoid } from 'nanoid';

/**
 * What a suspended thread asks a human.
 */
export interface ApprovalRequest {
  threadId: string;
  question: string;
  details: Record<string, unknown>;
}

/**
 * Where approval requests are published. The returned handle is what the
 * human's answer must quote to resume the thread.
 */
export interface ApprovalChannel {
  publish(request: ApprovalRequest): Promise<{ handle: string }>;
}

export interface PublishedRequest extends ApprovalRequest {
  handle: string;
  publishedAt: Date;
}

/**
 * Channel that mints handles locally and keeps every request it was given.
 * Answers arrive through the HTTP approval routes or direct `resume` calls.
 */
export class InMemoryApprovalChannel implements ApprovalChannel {
  readonly published: PublishedRequest[] = [];

  publish(request: ApprovalRequest): Promise<{ handle: string }> {
    const handle = nanoid(16);
    this.published.push({ ...request, handle, publishedAt: new Date() });
    return Promise.resolve({ handle });
  }
}
