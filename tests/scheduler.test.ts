/**
 * PipelineScheduler 테스트
 */

import { describe, it, expect, jest } from "@jest/globals";
import { loadPipelineConfig } from "@/config/PipelineConfig";
import type { GoldImagePipeline, PipelineRunResult } from "@/services/GoldImagePipeline";
import { PipelineScheduler } from "@/scheduler";

const emptyResult: PipelineRunResult = {
  runId: "run-1",
  definitions: [],
  submitted: [],
  skipped: [],
};

describe("PipelineScheduler", () => {
  it("실행 중에는 다음 tick 스킵", async () => {
    let finish: (result: PipelineRunResult) => void = () => undefined;
    const run = jest.fn<GoldImagePipeline["run"]>().mockImplementation(
      () =>
        new Promise<PipelineRunResult>((resolve) => {
          finish = resolve;
        }),
    );
    const scheduler = new PipelineScheduler({ run }, loadPipelineConfig({}));

    const first = scheduler.tick();
    const second = await scheduler.tick();
    finish(emptyResult);

    expect(second).toBe(false);
    await expect(first).resolves.toBe(true);
    expect(run).toHaveBeenCalledTimes(1);
  });

  it("실행 실패는 전파하지 않고 다음 tick 허용", async () => {
    const run = jest
      .fn<GoldImagePipeline["run"]>()
      .mockRejectedValueOnce(new Error("boom"))
      .mockResolvedValue(emptyResult);
    const scheduler = new PipelineScheduler({ run }, loadPipelineConfig({}));

    await expect(scheduler.tick()).resolves.toBe(true);
    await expect(scheduler.tick()).resolves.toBe(true);
    expect(run).toHaveBeenCalledTimes(2);
  });

  it("잘못된 cron 표현식은 시작 시 에러", () => {
    const scheduler = new PipelineScheduler(
      { run: jest.fn<GoldImagePipeline["run"]>() },
      loadPipelineConfig({ SCHEDULE_CRON: "not a cron" }),
    );

    expect(() => scheduler.start()).toThrow("Invalid cron expression: not a cron");
  });
});
