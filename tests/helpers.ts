import { createLogger } from "../src/logger.js";

// 36 bytes once decoded
export const TEST_KEY = Buffer.from("test-secret-".repeat(3)).toString("base64");
export const OTHER_KEY = Buffer.from("other-secret".repeat(3)).toString("base64");

export const NOW = new Date("2024-01-01T00:00:00.000Z");
export const NOW_SECONDS = 1704067200;

export const silentLogger = createLogger("silent");

export function decodeSegment(segment: string): unknown {
  return JSON.parse(Buffer.from(segment, "base64url").toString("utf8"));
}
