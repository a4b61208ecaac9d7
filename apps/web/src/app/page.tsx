/**
 * Workbench page
 *
 * Operator flow: enter the OpenAI key, fetch CMV submissions, toggle a thread
 * to analyze it (first time) or show/hide the cached result, optionally post
 * the counter argument back to Reddit.
 */

"use client";

import { useEffect, useState, type FormEvent } from "react";
import toast from "react-hot-toast";
import { FetchControls, type FetchSelection } from "@/components/FetchControls";
import { ThreadCard } from "@/components/ThreadCard";
import { notifyWarning } from "@/components/ToastProvider";
import type { SessionSnapshot } from "@/lib/cmv/session-store";
import { loadSession, requestPublish, requestThreads, requestToggle, saveApiKey } from "@/lib/workbench-api";

export default function WorkbenchPage() {
  const [snapshot, setSnapshot] = useState<SessionSnapshot | null>(null);
  const [apiKey, setApiKey] = useState("");
  const [selection, setSelection] = useState<FetchSelection>({ limit: 3, sortOrder: "top", timeWindow: "day" });
  const [isFetching, setIsFetching] = useState(false);
  const [busyThreads, setBusyThreads] = useState<ReadonlySet<string>>(new Set());
  const [cooldownMessage, setCooldownMessage] = useState<string | null>(null);

  useEffect(() => {
    let mounted = true;
    loadSession()
      .then((result) => {
        if (!mounted) return;
        if (result.ok) setSnapshot(result.data);
        else toast.error(result.error);
      })
      .catch((err: unknown) => {
        console.error("[Workbench] Failed to load session", err);
      });
    return () => {
      mounted = false;
    };
  }, []);

  const handleSaveKey = async (e: FormEvent) => {
    e.preventDefault();
    const result = await saveApiKey(apiKey);
    if (!result.ok) {
      toast.error(result.error);
      return;
    }
    setSnapshot(result.data);
    setApiKey("");
    if (result.data.hasApiKey) toast.success("OpenAI client initialized successfully!");
  };

  const handleFetch = async () => {
    setIsFetching(true);
    setCooldownMessage(null);
    const result = await requestThreads(selection);
    setIsFetching(false);
    if (result.ok) {
      setSnapshot(result.data);
    } else if (result.remainingSeconds !== undefined) {
      setCooldownMessage(result.error);
    } else {
      toast.error(result.error);
    }
  };

  const markBusy = (threadId: string, busy: boolean) => {
    setBusyThreads((prev) => {
      const next = new Set(prev);
      if (busy) next.add(threadId);
      else next.delete(threadId);
      return next;
    });
  };

  const handleToggle = async (threadId: string) => {
    markBusy(threadId, true);
    const result = await requestToggle(threadId);
    markBusy(threadId, false);
    if (!result.ok) {
      toast.error(result.error);
      return;
    }
    for (const warning of result.warnings) notifyWarning(warning);
    setSnapshot((prev) =>
      prev && {
        ...prev,
        threads: prev.threads.map((view) =>
          view.thread.id === threadId ? { ...view, entry: result.data.entry } : view,
        ),
      },
    );
  };

  const handlePublish = async (threadId: string) => {
    markBusy(threadId, true);
    const result = await requestPublish(threadId);
    markBusy(threadId, false);
    if (result.ok) toast.success("Counter argument posted to Reddit");
    else toast.error(result.error);
  };

  const hasApiKey = snapshot?.hasApiKey ?? false;

  return (
    <div style={{ maxWidth: 800, margin: "0 auto", padding: 20 }}>
      <h1 style={{ marginBottom: 8 }}>AI Persuasion Companion for CMV</h1>
      <p style={{ color: "#666", marginBottom: 24 }}>
        Fetch submissions from{" "}
        <a href="https://www.reddit.com/r/changemyview/" target="_blank" rel="noreferrer">r/changemyview</a>,
        extract each post&apos;s main argument and rationale, and draft a counter argument.
      </p>

      <form onSubmit={handleSaveKey} style={{ display: "flex", gap: 8, marginBottom: 16 }}>
        <input
          type="password"
          value={apiKey}
          onChange={(e) => setApiKey(e.target.value)}
          placeholder={hasApiKey ? "OpenAI API key saved for this session" : "OpenAI API Key"}
          autoComplete="off"
          style={{ flex: 1, padding: "8px 12px", fontSize: 14, border: "1px solid #ddd", borderRadius: 8 }}
        />
        <button type="submit" style={{ padding: "8px 16px", borderRadius: 8, border: "1px solid #ccc" }}>
          {apiKey.trim() || !hasApiKey ? "Save key" : "Clear key"}
        </button>
      </form>

      {!hasApiKey ? (
        <div style={{ padding: 12, backgroundColor: "#fff3cd", color: "#856404", borderRadius: 8 }}>
          Please provide the OpenAI API key to proceed.
        </div>
      ) : (
        <>
          <FetchControls
            value={selection}
            onChange={setSelection}
            onFetch={handleFetch}
            isFetching={isFetching}
            cooldownMessage={cooldownMessage}
          />

          {snapshot?.threads.map(({ thread, entry }) => (
            <ThreadCard
              key={thread.id}
              thread={thread}
              entry={entry}
              isBusy={busyThreads.has(thread.id)}
              onToggle={handleToggle}
              onPublish={handlePublish}
            />
          ))}
        </>
      )}
    </div>
  );
}
