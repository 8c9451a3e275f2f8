import { describe, it, expect } from "vitest";
import { createLogger } from "./logger.js";
import { LogBuffer } from "./log-buffer.js";

function capture() {
  const lines: string[] = [];
  return {
    lines,
    stream: {
      write(line: string) {
        lines.push(line);
      },
    },
  };
}

describe("createLogger", () => {
  it("redacts credentials and masks recipients", () => {
    const out = capture();
    const logger = createLogger({ level: "info", service: "relaymail-api", destination: out.stream });

    logger.info({ to: ["alice@example.com"], apiKey: "re_test" }, "Email sent");

    expect(out.lines).toHaveLength(1);
    expect(JSON.parse(out.lines[0] ?? "")).toMatchObject({
      level: 30,
      name: "relaymail-api",
      msg: "Email sent",
      to: ["a***@example.com"],
      apiKey: "[REDACTED]",
    });
  });

  it("feeds the buffer from info up while the main output gets everything", () => {
    const out = capture();
    const buffer = new LogBuffer();
    const logger = createLogger({ level: "debug", destination: out.stream, buffer });

    logger.child({ component: "verification" }).info("Domain verified");
    logger.debug("Poll tick");
    logger.warn({ error: "ThrottlingException" }, "Provider check failed");

    expect(out.lines).toHaveLength(3);
    expect(buffer.query()).toEqual([
      {
        timestamp: expect.any(String),
        level: "info",
        category: "verification",
        message: "Domain verified",
        error: null,
      },
      {
        timestamp: expect.any(String),
        level: "warn",
        category: "relaymail",
        message: "Provider check failed",
        error: "ThrottlingException",
      },
    ]);
  });

  it("writes nothing when silent", () => {
    const buffer = new LogBuffer();
    const logger = createLogger({ level: "silent", buffer });

    logger.error("boom");

    expect(buffer.size).toBe(0);
  });
});
