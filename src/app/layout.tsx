// src/app/layout.tsx
import type { Metadata } from "next";
import type { ReactNode } from "react";
import "./globals.css";

export const metadata: Metadata = {
  title: "Taxi Trip Explorer",
  description: "Upload taxi trip records, filter them, and explore metrics, charts and maps.",
};

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en" suppressHydrationWarning>
      <body className="antialiased">
        <div className="min-h-dvh bg-grid-surface text-[15px]">
          {/* Top gradient header */}
          <header className="bg-gradient-to-r from-amber-500 via-yellow-500 to-cyan-500 text-white shadow-sm">
            <div className="mx-auto max-w-6xl px-6 py-6 flex items-center justify-between">
              <div className="flex items-center gap-3">
                <div className="h-9 w-9 rounded-xl bg-white/15 backdrop-blur-sm flex items-center justify-center shadow-inner">
                  <span className="text-lg">🚕</span>
                </div>
                <div>
                  <h1 className="text-xl font-semibold tracking-tight">Taxi Trip Explorer</h1>
                  <p className="text-xs/5 opacity-90">Trips, fares, speeds and hotspots from a single CSV</p>
                </div>
              </div>
            </div>
          </header>

          <main className="mx-auto max-w-6xl p-6 text-foreground">{children}</main>
        </div>
      </body>
    </html>
  );
}
