"use client";

import toast, { Toaster } from "react-hot-toast";

const WARNING_STYLE = { background: "#f59e0b", color: "#1f2937" };

/**
 * Non-fatal notices, e.g. an analysis that fell back to the default structure.
 */
export function notifyWarning(message: string) {
  toast(message, { icon: "⚠️", duration: 8000, style: WARNING_STYLE });
}

export function ToastProvider() {
  return (
    <Toaster
      position="bottom-center"
      toastOptions={{
        duration: 4000,
        success: {
          duration: 3000,
          style: { background: "#10b981", color: "#fff" },
        },
        error: {
          // Reddit and OpenAI errors are long; leave time to read them
          duration: 8000,
          style: { background: "#ef4444", color: "#fff", maxWidth: 520 },
        },
      }}
    />
  );
}
