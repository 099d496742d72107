import { afterEach, expect, test, vi } from "vitest";
import { log } from "../../utils/logger.js";

afterEach(() => {
  log.configure({ level: "error", format: "pretty" });
  vi.restoreAllMocks();
});

test("configured level, scopes and format take effect", () => {
  const out = vi.spyOn(console, "log").mockImplementation(() => undefined);
  log.configure({ level: "info", scopes: ["cli"], format: "json" });

  log.withScope("cli").info("wrote", { blocks: 3 });
  log.withScope("build").info("hidden");
  log.withScope("cli").debug("too quiet");

  expect(out).toHaveBeenCalledTimes(1);
  const entry: unknown = JSON.parse(String(out.mock.calls[0]?.[0]));
  expect(entry).toMatchObject({ level: "info", scope: "cli", message: "wrote", data: { blocks: 3 } });
});

test("pretty lines carry the level and scope", () => {
  const out = vi.spyOn(console, "warn").mockImplementation(() => undefined);
  log.configure({ level: "warn", format: "pretty" });

  log.withScope("cli").warn("unreached event:X");

  expect(String(out.mock.calls[0]?.[0])).toMatch(/^\d\d:\d\d:\d\d \[WRN\] │ cli unreached event:X$/);
});
