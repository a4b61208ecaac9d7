/**
 * Fetch controls: count, sort order, time window (only for "top") and the
 * fetch button with its cooldown hint.
 */

"use client";

import { FETCH_LIMITS, SORT_ORDERS, TIME_WINDOWS, normalizeSortOrder, normalizeTimeWindow } from "@/lib/cmv/types";
import type { SortOrder, TimeWindow } from "@/lib/cmv/types";

export interface FetchSelection {
  limit: number;
  sortOrder: SortOrder;
  timeWindow: TimeWindow;
}

type Props = {
  value: FetchSelection;
  onChange: (next: FetchSelection) => void;
  onFetch: () => void;
  isFetching: boolean;
  cooldownMessage: string | null;
};

const selectStyle = {
  width: "100%",
  padding: "8px 10px",
  fontSize: 14,
  border: "1px solid #ddd",
  borderRadius: 8,
  background: "#fff",
};

const labelStyle = { display: "block", fontSize: 13, color: "#555", marginBottom: 4 };

export function FetchControls({ value, onChange, onFetch, isFetching, cooldownMessage }: Props) {
  return (
    <section style={{ marginBottom: 24 }}>
      <div style={{ display: "grid", gridTemplateColumns: "repeat(3, 1fr)", gap: 12 }}>
        <label>
          <span style={labelStyle}>Number of posts to fetch</span>
          <select
            style={selectStyle}
            value={value.limit}
            onChange={(e) => onChange({ ...value, limit: Number(e.target.value) })}
          >
            {FETCH_LIMITS.map((n) => (
              <option key={n} value={n}>{n}</option>
            ))}
          </select>
        </label>

        <label>
          <span style={labelStyle}>Sort submissions by:</span>
          <select
            style={selectStyle}
            value={value.sortOrder}
            onChange={(e) => onChange({ ...value, sortOrder: normalizeSortOrder(e.target.value) })}
          >
            {SORT_ORDERS.map((s) => (
              <option key={s} value={s}>{s}</option>
            ))}
          </select>
        </label>

        <div>
          {value.sortOrder === "top" && (
            <label>
              <span style={labelStyle}>Time period:</span>
              <select
                style={selectStyle}
                value={value.timeWindow}
                onChange={(e) => onChange({ ...value, timeWindow: normalizeTimeWindow(e.target.value) })}
              >
                {TIME_WINDOWS.map((t) => (
                  <option key={t} value={t}>{t}</option>
                ))}
              </select>
            </label>
          )}
        </div>
      </div>

      <button
        type="button"
        onClick={onFetch}
        disabled={isFetching}
        title="Please wait 60 seconds between fetching posts."
        style={{
          marginTop: 16,
          padding: "10px 20px",
          fontSize: 15,
          fontWeight: 600,
          backgroundColor: isFetching ? "#ccc" : "#007bff",
          color: "#fff",
          border: "none",
          borderRadius: 8,
          cursor: isFetching ? "not-allowed" : "pointer",
        }}
      >
        {isFetching ? "Fetching submissions..." : "Fetch New Submissions"}
      </button>

      {cooldownMessage && (
        <div style={{
          marginTop: 12,
          padding: 10,
          backgroundColor: "#fff3cd",
          color: "#856404",
          border: "1px solid #ffeeba",
          borderRadius: 8,
          fontSize: 14,
        }}>
          {cooldownMessage}
        </div>
      )}
    </section>
  );
}
