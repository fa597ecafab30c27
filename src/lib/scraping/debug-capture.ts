import { createHash } from "crypto";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { join, resolve } from "path";
import { config } from "../config";
import { Transport } from "../types";

function getCapturePath(dir: string, url: string, transport: Transport, at: Date): string {
  const hash = createHash("md5").update(url).digest("hex");
  const stamp = at.toISOString().replace(/[:.]/g, "-");
  return join(dir, `${hash}-${stamp}-${transport}.html`);
}

/**
 * Write fetched HTML to the debug directory. Never throws: a failed write is
 * logged and reported as null.
 */
export function captureDebugHtml(
  url: string,
  html: string,
  transport: Transport,
  options: { dir?: string; at?: Date } = {}
): string | null {
  const dir = resolve(process.cwd(), options.dir ?? config.debugHtmlDir);
  try {
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    const path = getCapturePath(dir, url, transport, options.at ?? new Date());
    writeFileSync(path, html, "utf-8");
    console.log(`[fetcher] Saved ${transport} HTML for ${url} to ${path}`);
    return path;
  } catch (error) {
    console.warn(
      `[fetcher] Could not save debug HTML for ${url}:`,
      error instanceof Error ? error.message : error
    );
    return null;
  }
}
