import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createHash } from "crypto";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { captureDebugHtml } from "../lib/scraping/debug-capture";
import { Transport } from "../lib/types";

const URL_UNDER_TEST = "https://www.smithauto.example/locations";

describe("captureDebugHtml", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "dealer-capture-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("names the file by URL hash, timestamp and transport", () => {
    const at = new Date("2026-01-15T10:30:00.000Z");
    const hash = createHash("md5").update(URL_UNDER_TEST).digest("hex");

    const path = captureDebugHtml(URL_UNDER_TEST, "<html>rendered</html>", Transport.BROWSER, { dir, at });

    expect(path).toBe(join(dir, `${hash}-2026-01-15T10-30-00-000Z-browser.html`));
    expect(readFileSync(join(dir, `${hash}-2026-01-15T10-30-00-000Z-browser.html`), "utf-8")).toBe(
      "<html>rendered</html>"
    );
  });

  it("creates the directory when missing", () => {
    const nested = join(dir, "a", "b");
    const path = captureDebugHtml(URL_UNDER_TEST, "<html></html>", Transport.LIGHT, { dir: nested });
    expect(path?.startsWith(nested)).toBe(true);
  });

  it("returns null instead of throwing when the write fails", () => {
    const file = join(dir, "not-a-directory");
    writeFileSync(file, "x");

    expect(captureDebugHtml(URL_UNDER_TEST, "<html></html>", Transport.LIGHT, { dir: file })).toBeNull();
    expect(console.warn).toHaveBeenCalled();
  });
});
