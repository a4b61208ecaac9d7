/**
 * Publisher tests: success path and the catch-and-report policy.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { publishRebuttal } from "@/lib/cmv/publisher";
import { ForumUnavailableError } from "@/lib/cmv/forum";
import { FakeForumClient } from "@test/helpers/fakes";

const thread = { id: "q9", title: "CMV: x", selftext: "" };

describe("publishRebuttal", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("posts the text as a reply and returns the comment id", async () => {
    const forum = new FakeForumClient();
    const result = await publishRebuttal(forum, thread, "Here is why you're wrong, politely.");
    expect(result).toEqual({ ok: true, commentId: "t1_reply1" });
    expect(forum.replies).toEqual([{ threadId: "q9", text: "Here is why you're wrong, politely." }]);
  });

  it("returns ok:false instead of throwing when the forum rejects the reply", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const forum = new FakeForumClient();
    forum.replyError = new ForumUnavailableError("Reddit API HTTP 403: Forbidden", 403);

    const result = await publishRebuttal(forum, thread, "text");
    expect(result).toEqual({ ok: false, message: "Failed to post comment: Reddit API HTTP 403: Forbidden" });
  });

  it("converts non-Error throws to a message", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const forum = new FakeForumClient();
    forum.reply = async () => {
      throw "socket hang up";
    };
    const result = await publishRebuttal(forum, thread, "text");
    expect(result).toEqual({ ok: false, message: "Failed to post comment: socket hang up" });
  });
});
