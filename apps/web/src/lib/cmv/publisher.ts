/**
 * Publisher: posts a rebuttal as a reply to its thread.
 * Never throws; a failed post is reported as `{ ok: false, message }`.
 *
 * @module cmv/publisher
 */

import type { ForumClient } from "./forum";
import type { Thread } from "./types";

export type PublishResult =
  | { ok: true; commentId: string }
  | { ok: false; message: string };

export async function publishRebuttal(
  forum: ForumClient,
  thread: Thread,
  rebuttal: string,
): Promise<PublishResult> {
  try {
    const commentId = await forum.reply(thread.id, rebuttal);
    console.log(`[Publisher] Posted reply ${commentId || "(no id)"} to ${thread.id}`);
    return { ok: true, commentId };
  } catch (error) {
    const message = `Failed to post comment: ${error instanceof Error ? error.message : String(error)}`;
    console.error(`[Publisher] ${message}`);
    return { ok: false, message };
  }
}
