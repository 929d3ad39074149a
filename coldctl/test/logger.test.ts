import { describe, expect, it } from "vitest";
import { createLogger } from "../src/log/logger.js";

function sink(): { write(chunk: string): boolean; text: () => string } {
  const chunks: string[] = [];
  return {
    write: (chunk) => chunks.push(chunk) > 0,
    text: () => chunks.join(""),
  };
}

describe("logger", () => {
  it("prints human messages, warnings and errors to stderr", () => {
    const out = sink();
    const err = sink();
    const log = createLogger("human", out, err);

    log.info("UPLOADED", "Uploaded b.zip", { id: "x" });
    log.warn("STALE", "Stale lock removed");
    log.error("FAILED", "Upload failed");

    expect(out.text()).toBe("Uploaded b.zip\n");
    expect(err.text()).toBe("Stale lock removed\nUpload failed\n");
  });

  it("writes one JSON object per line in jsonl mode", () => {
    const out = sink();
    const err = sink();
    const log = createLogger("jsonl", out, err);

    log.info("UPLOADED", "Uploaded b.zip", { id: "x", bytes: 3 });
    log.error("FAILED", "Upload failed");

    expect(out.text().split("\n").filter(Boolean).map((l) => JSON.parse(l))).toEqual([
      { level: "info", code: "UPLOADED", message: "Uploaded b.zip", id: "x", bytes: 3 },
      { level: "error", code: "FAILED", message: "Upload failed" },
    ]);
    expect(err.text()).toBe("");
  });

  it("reports progress once per whole percent", () => {
    const out = sink();
    const err = sink();
    const log = createLogger("human", out, err);

    log.progress("b.zip", 0, 200);
    log.progress("b.zip", 1, 200);
    log.progress("b.zip", 100, 200);
    log.progress("b.zip", 200, 200);

    expect(err.text()).toBe("\rb.zip: 0%\rb.zip: 50%\rb.zip: 100%\n");
    expect(out.text()).toBe("");
  });

  it("reports progress as records in jsonl mode", () => {
    const out = sink();
    createLogger("jsonl", out, sink()).progress("b.zip", 5, 10);
    expect(JSON.parse(out.text())).toEqual({
      level: "info",
      code: "PROGRESS",
      label: "b.zip",
      transferred: 5,
      total: 10,
      percent: 50,
    });
  });
});
