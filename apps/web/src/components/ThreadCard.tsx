/**
 * One fetched thread: the Analyze/Hide toggle and, while visible, the
 * original post, the extracted analysis and the counter argument.
 */

"use client";

import ReactMarkdown from "react-markdown";
import remarkGfm from "remark-gfm";
import type { Thread, ThreadSessionEntry } from "@/lib/cmv/types";

type Props = {
  thread: Thread;
  entry: ThreadSessionEntry;
  isBusy: boolean;
  onToggle: (threadId: string) => void;
  onPublish: (threadId: string) => void;
};

const headingStyle = { fontSize: 16, margin: "16px 0 8px" };

export function ThreadCard({ thread, entry, isBusy, onToggle, onPublish }: Props) {
  const buttonText = entry.visible ? "Hide" : "Analyze";

  return (
    <article style={{ border: "1px solid #e5e5e5", borderRadius: 10, padding: 12, marginBottom: 12 }}>
      <button
        type="button"
        onClick={() => onToggle(thread.id)}
        disabled={isBusy}
        style={{
          width: "100%",
          textAlign: "left",
          padding: "10px 12px",
          fontSize: 15,
          background: entry.visible ? "#f1f3f5" : "#fff",
          border: "1px solid #ccc",
          borderRadius: 8,
          cursor: isBusy ? "wait" : "pointer",
        }}
      >
        {isBusy && !entry.analyzed ? "Analyzing submission..." : `${buttonText}: ${thread.title}`}
      </button>

      {entry.visible && (
        <div style={{ padding: "4px 8px" }}>
          <h3 style={headingStyle}>Original Submission</h3>
          <p><strong>Title:</strong> {thread.title}</p>
          <p style={{ whiteSpace: "pre-wrap" }}><strong>Text:</strong> {thread.selftext}</p>

          {entry.analyzed && (
            <>
              <h3 style={headingStyle}>Analysis</h3>
              <p><strong>Main Position:</strong> {entry.analysis.main_position}</p>
              <p><strong>Rationale:</strong></p>
              <ol>
                {entry.analysis.rationale.map((point, i) => (
                  <li key={i}>{point}</li>
                ))}
              </ol>

              <h3 style={headingStyle}>Counter Argument</h3>
              {/* Rendered as the forum would show it once posted */}
              <div style={{ lineHeight: 1.6 }} className="markdown-body">
                <ReactMarkdown remarkPlugins={[remarkGfm]}>{entry.rebuttal}</ReactMarkdown>
              </div>

              <button
                type="button"
                onClick={() => onPublish(thread.id)}
                disabled={isBusy}
                style={{
                  marginTop: 12,
                  padding: "8px 16px",
                  backgroundColor: "#ff4500",
                  color: "#fff",
                  border: "none",
                  borderRadius: 8,
                  cursor: isBusy ? "wait" : "pointer",
                }}
              >
                Post reply to Reddit
              </button>
            </>
          )}
        </div>
      )}
    </article>
  );
}
