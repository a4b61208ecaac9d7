/**
 * Forum boundary: the read/write contract the workbench needs from the forum,
 * independent of the concrete API client.
 *
 * @module cmv/forum
 */

import type { FetchOptions, Thread } from "./types";

export interface ForumClient {
  /** Ranked threads for the given sort order; time window only applies to "top". */
  fetchThreads(options: FetchOptions): Promise<Thread[]>;
  /** Post a top-level reply. Resolves to the new comment id. */
  reply(threadId: string, text: string): Promise<string>;
}

/**
 * Thrown for network, auth and upstream failures of the forum API.
 * `status` is the HTTP status when the forum answered, null otherwise.
 */
export class ForumUnavailableError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ForumUnavailableError";
    this.status = status;
  }
}
