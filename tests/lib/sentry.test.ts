/**
 * Threadkeeper — tests/lib/sentry.test.ts
 * WHAT: Unit tests for the Sentry wrapper while tracking is off.
 * WHY: Tests and DSN-less deployments must never reach the SDK.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

const { mockInit, mockCaptureException, mockAddBreadcrumb, mockSetTag, mockClose } = vi.hoisted(() => ({
  mockInit: vi.fn(),
  mockCaptureException: vi.fn().mockReturnValue("event-id-123"),
  mockAddBreadcrumb: vi.fn(),
  mockSetTag: vi.fn(),
  mockClose: vi.fn().mockResolvedValue(true),
}));

vi.mock("@sentry/node", () => ({
  init: mockInit,
  captureException: mockCaptureException,
  addBreadcrumb: mockAddBreadcrumb,
  setTag: mockSetTag,
  close: mockClose,
}));

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

vi.mock("../../src/lib/env.js", () => ({
  env: {
    SENTRY_DSN: "https://key@sentry.example.com/1",
    SENTRY_ENVIRONMENT: "test",
    NODE_ENV: "test",
    SENTRY_TRACES_SAMPLE_RATE: 0.1,
  },
}));

import {
  addBreadcrumb,
  captureException,
  flushSentry,
  initializeSentry,
  isSentryEnabled,
  setTag,
} from "../../src/lib/sentry.js";

describe("lib/sentry", () => {
  it("stays off under Vitest even with a valid DSN", () => {
    initializeSentry();
    expect(mockInit).not.toHaveBeenCalled();
    expect(isSentryEnabled()).toBe(false);
  });

  it("captureException returns null when disabled", () => {
    expect(captureException(new Error("test"), { guildId: "1" })).toBeNull();
    expect(mockCaptureException).not.toHaveBeenCalled();
  });

  it("breadcrumbs and tags are no-ops when disabled", () => {
    addBreadcrumb({ message: "sweep started", category: "escalation" });
    setTag("guildId", "1");
    expect(mockAddBreadcrumb).not.toHaveBeenCalled();
    expect(mockSetTag).not.toHaveBeenCalled();
  });

  it("flushSentry resolves true without closing the client", async () => {
    await expect(flushSentry()).resolves.toBe(true);
    expect(mockClose).not.toHaveBeenCalled();
  });
});
