import { beforeAll, vi } from "vitest";

process.env.NODE_ENV = "test";

// Global mocks
beforeAll(() => {
  // Mock console methods to reduce noise in tests
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  // Keep error logging for debugging
  // vi.spyOn(console, "error").mockImplementation(() => {});
});
