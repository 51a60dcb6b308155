import { describe, it, expect, beforeEach } from "vitest";

import { createLogger, Logger, type LogEntry } from "../logger.js";
import { UpstreamError } from "../../errors/ServiceError.js";

describe("Logger", () => {
  let entries: LogEntry[];
  let logger: Logger;

  beforeEach(() => {
    entries = [];
    logger = createLogger({
      service: "lingua-relay",
      minLevel: "debug",
      sink: (entry) => entries.push({ ...entry }),
    });
  });

  it("writes level, message and service", () => {
    logger.info("Server listening", { port: 8000 });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: "info",
      message: "Server listening",
      service: "lingua-relay",
      port: 8000,
    });
    expect(typeof entries[0]?.timestamp).toBe("string");
  });

  it("drops entries below the minimum level", () => {
    const quiet = createLogger({ minLevel: "warn", sink: (entry) => entries.push({ ...entry }) });

    quiet.debug("noise");
    quiet.info("still noise");
    quiet.warn("kept");

    expect(entries.map((entry) => entry.message)).toEqual(["kept"]);
    expect(quiet.isLevelEnabled("info")).toBe(false);
    expect(quiet.isLevelEnabled("error")).toBe(true);
  });

  describe("redaction", () => {
    it("redacts credential-like fields", () => {
      logger.info("config", {
        speechKey: "test-secret",
        headers: { "Ocp-Apim-Subscription-Key": "test-secret", Accept: "application/json" },
        authorization: "Bearer test-secret",
      });

      expect(entries[0]).toMatchObject({
        speechKey: "[REDACTED]",
        headers: { "Ocp-Apim-Subscription-Key": "[REDACTED]", Accept: "application/json" },
        authorization: "[REDACTED]",
      });
    });

    it("keeps fields that only mention keys", () => {
      logger.warn("missing", { missingKeys: ["SPEECH_KEY"] });
      expect(entries[0]?.["missingKeys"]).toEqual(["SPEECH_KEY"]);
    });

    it("redacts inside arrays", () => {
      logger.info("list", { items: [{ accessToken: "test-secret" }] });
      expect(entries[0]?.["items"]).toEqual([{ accessToken: "[REDACTED]" }]);
    });
  });

  describe("error()", () => {
    it("formats an Error with its code", () => {
      const error = new UpstreamError("translator", {
        httpStatus: 503,
        providerCode: null,
        message: "busy",
      });

      logger.error("Upstream call failed", error, { path: "/api/translate" });

      expect(entries[0]?.error).toMatchObject({
        name: "UpstreamError",
        message: "translator returned 503: busy",
        code: "SERVICE_002",
      });
      expect(entries[0]?.["path"]).toBe("/api/translate");
    });

    it("omits stack traces when disabled", () => {
      const noStack = createLogger({
        includeStackTrace: false,
        sink: (entry) => entries.push({ ...entry }),
      });
      noStack.error("failed", new Error("boom"));
      expect(entries[0]?.error).toEqual({ name: "Error", message: "boom" });
    });

    it("wraps non-Error values", () => {
      logger.error("failed", "plain string");
      expect(entries[0]?.error).toEqual({ name: "UnknownError", message: "plain string" });
    });

    it("accepts a data object in place of an error", () => {
      logger.error("failed", { status: 500 });
      expect(entries[0]?.["status"]).toBe(500);
      expect(entries[0]?.error).toBeUndefined();
    });
  });

  describe("child()", () => {
    it("adds context to every entry", () => {
      const child = logger.child({ component: "router" });
      child.info("Request completed", { status: 200 });

      expect(entries[0]).toMatchObject({
        component: "router",
        status: 200,
        service: "lingua-relay",
      });
    });

    it("lets call data override context", () => {
      logger.child({ component: "router" }).info("x", { component: "lifecycle" });
      expect(entries[0]?.["component"]).toBe("lifecycle");
    });
  });
});
