import { describe, expect, it } from "vitest";
import { AppError, ValidationError, asAppError, conciseErrorText } from "../../src/utils/errors.js";
import { StderrLogger } from "../../src/utils/logger.js";

function capture(level: ConstructorParameters<typeof StderrLogger>[1]) {
  const lines: string[] = [];
  const logger = new StderrLogger("bridge", level, (line) => {
    lines.push(line);
  });
  return { lines, logger };
}

describe("StderrLogger", () => {
  it("drops records below its level", () => {
    const { lines, logger } = capture("warn");
    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");
    logger.error("also shown");

    expect(lines).toEqual(["[bridge] WARN shown\n", "[bridge] ERROR also shown\n"]);
  });

  it("appends extra arguments", () => {
    const { lines, logger } = capture("debug");
    logger.info("count", 3, { a: 1 }, "done");

    expect(lines).toEqual(['[bridge] INFO count 3 {"a":1} done\n']);
  });

  it("nests scopes in children", () => {
    const { lines, logger } = capture("info");
    logger.child("plugin:Hello").child("loader").info("ready");

    expect(lines).toEqual(["[bridge:plugin:Hello:loader] INFO ready\n"]);
  });

  it("writes nothing when silent", () => {
    const { lines, logger } = capture("silent");
    logger.error("ignored");

    expect(lines).toEqual([]);
  });
});

describe("error helpers", () => {
  it("keeps application errors and wraps everything else", () => {
    const validation = new ValidationError("bad");

    expect(asAppError(validation)).toBe(validation);
    expect(asAppError(new RangeError("too far"))).toMatchObject({ code: "INTERNAL", message: "too far" });
    expect(asAppError({ message: "foreign" })).toMatchObject({ code: "INTERNAL", message: "foreign" });
    expect(asAppError(42)).toMatchObject({ code: "INTERNAL", message: "Unknown error" });
  });

  it("formats errors as code and message", () => {
    expect(conciseErrorText(new AppError("NOT_FOUND", "gone"))).toBe("NOT_FOUND: gone");
    expect(conciseErrorText("oops")).toBe("INTERNAL: Unknown error");
  });
});
