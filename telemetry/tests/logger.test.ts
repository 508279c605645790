import { describe, expect, test } from "vitest";
import { createComponentLogger, logger } from "../src/utils/logger.js";

describe("logger", () => {
  test("should create component loggers carrying the component name", () => {
    const child = createComponentLogger("sampler");

    expect(child).not.toBe(logger);
    expect(child.bindings()).toEqual({ component: "sampler" });
  });

  test("should take its level from LOG_LEVEL", () => {
    expect(logger.level).toBe(process.env.LOG_LEVEL || "info");
  });

  test("should log structured messages without throwing", () => {
    expect(() => {
      logger.info({ cycleId: 1 }, "Cycle published");
      logger.error({ error: { message: "boom" } }, "Sampler cycle failed");
    }).not.toThrow();
  });
});
