import { describe, it, expect, beforeEach, vi } from "vitest";
import type { ScheduledTask } from "node-cron";
import pino from "pino";
import { createTestConfig } from "./test-utils/fixtures";
import type { RunSummary } from "./digest/dispatcher";
import type { SendDigestFn } from "./digest/sender";

vi.mock("node-cron");
vi.mock("./digest/orchestrator");

describe("createDigestScheduler", () => {
  let capturedCallback: (() => Promise<void>) | null = null;
  const mockTaskStop = vi.fn();
  const logger = pino({ level: "silent" });
  const sendDigest = vi.fn<SendDigestFn>();

  beforeEach(async () => {
    vi.clearAllMocks();
    capturedCallback = null;

    const cronModule = await import("node-cron");
    vi.mocked(cronModule.default.schedule).mockImplementation(
      (_expression, callback) => {
        capturedCallback = async () => {
          if (typeof callback === "function") {
            await callback(new Date());
          }
        };
        const task: Pick<ScheduledTask, "stop"> = { stop: mockTaskStop };
        return task as ScheduledTask;
      },
    );
  });

  it("should register a cron task in the location's timezone", async () => {
    const { createDigestScheduler } = await import("./scheduler");
    const cronModule = await import("node-cron");

    createDigestScheduler("0 7 * * *", createTestConfig(), sendDigest, logger);

    expect(vi.mocked(cronModule.default.schedule)).toHaveBeenCalledWith(
      "0 7 * * *",
      expect.any(Function),
      { timezone: "Europe/Berlin" },
    );
  });

  it("should run the digest cycle when the task fires", async () => {
    const { createDigestScheduler } = await import("./scheduler");
    const { runDigestCycle } = await import("./digest/orchestrator");
    vi.mocked(runDigestCycle).mockResolvedValue({
      sent: 2,
      failed: 0,
      failedRecipients: [],
    });
    const config = createTestConfig();

    createDigestScheduler("0 7 * * *", config, sendDigest, logger);
    await capturedCallback?.();

    expect(runDigestCycle).toHaveBeenCalledWith(config, sendDigest, logger);
  });

  it("should log and swallow an unexpected cycle error", async () => {
    const { createDigestScheduler } = await import("./scheduler");
    const { runDigestCycle } = await import("./digest/orchestrator");
    vi.mocked(runDigestCycle).mockRejectedValue(new Error("boom"));
    const errorSpy = vi.spyOn(logger, "error");

    createDigestScheduler("0 7 * * *", createTestConfig(), sendDigest, logger);

    await expect(capturedCallback?.()).resolves.toBeUndefined();
    expect(errorSpy).toHaveBeenCalledWith(
      { error: "boom" },
      "digest cycle failed unexpectedly",
    );
  });

  it("should stop the cron task", async () => {
    const { createDigestScheduler } = await import("./scheduler");

    const scheduler = createDigestScheduler(
      "0 7 * * *",
      createTestConfig(),
      sendDigest,
      logger,
    );
    await scheduler.stop();

    expect(mockTaskStop).toHaveBeenCalledTimes(1);
  });

  it("should skip a tick while the previous cycle is still running", async () => {
    const { createDigestScheduler } = await import("./scheduler");
    const { runDigestCycle } = await import("./digest/orchestrator");
    let finishCycle: () => void = () => undefined;
    vi.mocked(runDigestCycle).mockReturnValue(
      new Promise<RunSummary>((resolve) => {
        finishCycle = () => resolve({ sent: 1, failed: 0, failedRecipients: [] });
      }),
    );
    const warnSpy = vi.spyOn(logger, "warn");

    createDigestScheduler("0 7 * * *", createTestConfig(), sendDigest, logger);
    const first = capturedCallback?.();
    const second = capturedCallback?.();
    finishCycle();
    await Promise.all([first, second]);

    expect(runDigestCycle).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith(
      "previous digest cycle still running, skipping this tick",
    );
  });

  it("should wait for a running cycle before stop() resolves", async () => {
    const { createDigestScheduler } = await import("./scheduler");
    const { runDigestCycle } = await import("./digest/orchestrator");
    let finishCycle: () => void = () => undefined;
    vi.mocked(runDigestCycle).mockReturnValue(
      new Promise<RunSummary>((resolve) => {
        finishCycle = () => resolve({ sent: 1, failed: 0, failedRecipients: [] });
      }),
    );

    const scheduler = createDigestScheduler(
      "0 7 * * *",
      createTestConfig(),
      sendDigest,
      logger,
    );
    const tick = capturedCallback?.();
    let stopped = false;
    const stopping = scheduler.stop().then(() => {
      stopped = true;
    });

    await Promise.resolve();
    expect(mockTaskStop).toHaveBeenCalledTimes(1);
    expect(stopped).toBe(false);

    finishCycle();
    await stopping;
    await tick;
    expect(stopped).toBe(true);
  });
});
