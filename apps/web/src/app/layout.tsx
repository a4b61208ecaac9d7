import type { ReactNode } from "react";
import { ToastProvider } from "@/components/ToastProvider";

export const metadata = {
  title: "CMV Rebuttal Workbench",
};

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en">
      <body style={{ margin: 0, fontFamily: "system-ui, sans-serif", color: "#222" }}>
        <div style={{ padding: 16, maxWidth: 980, margin: "0 auto" }}>
          <main>{children}</main>
        </div>
        <ToastProvider />
      </body>
    </html>
  );
}
