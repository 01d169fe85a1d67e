/**
 * Gold Image Pipeline Scheduler
 *
 * node-cron 기반 주기 실행
 *
 * 목적:
 * - SCHEDULE_CRON(기본: 매일 03:00)마다 파이프라인 1회 실행
 * - 같은 프로세스 안에서는 이전 실행이 끝나기 전 다음 실행을 시작하지 않음
 *   (프로세스 간 중복 실행은 막지 않음)
 *
 * 사용:
 * - npm run scheduler
 */

import "dotenv/config";
import cron, { type ScheduledTask } from "node-cron";
import { logger } from "@/config/logger";
import { loadPipelineConfig, type PipelineConfig } from "@/config/PipelineConfig";
import { toErrorLog } from "@/core/domain/errors";
import type { GoldImagePipeline } from "@/services/GoldImagePipeline";
import { createPipeline } from "@/services/createPipeline";

/**
 * 주기 실행기
 */
export class PipelineScheduler {
  private task: ScheduledTask | null = null;
  private running = false;

  constructor(
    private readonly pipeline: Pick<GoldImagePipeline, "run">,
    private readonly config: PipelineConfig,
  ) {}

  /**
   * 1회 실행 (이미 실행 중이면 스킵)
   * @returns 실행 여부
   */
  async tick(): Promise<boolean> {
    if (this.running) {
      logger.warn("[Scheduler] 이전 실행 진행 중 - 스킵");
      return false;
    }

    this.running = true;
    try {
      const result = await this.pipeline.run();
      logger.info(
        {
          run_id: result.runId,
          candidates: result.definitions.length,
          submitted: result.submitted.map((build) => build.platform),
          skipped: result.skipped,
        },
        "[Scheduler] 파이프라인 실행 완료",
      );
    } catch (error) {
      // 실패해도 다음 주기는 유지
      logger.error(toErrorLog(error), "[Scheduler] 파이프라인 실행 실패");
    } finally {
      this.running = false;
    }
    return true;
  }

  start(): void {
    const { cron: expression, timezone } = this.config.schedule;
    if (!cron.validate(expression)) {
      throw new Error(`Invalid cron expression: ${expression}`);
    }

    this.task = cron.schedule(
      expression,
      () => {
        void this.tick();
      },
      { timezone },
    );

    logger.info({ cron: expression, timezone }, "[Scheduler] Cron task 스케줄됨");
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info("[Scheduler] Cron task 중지됨");
    }
  }
}

/**
 * Graceful shutdown 핸들러
 */
function setupShutdownHandlers(scheduler: PipelineScheduler): void {
  const shutdown = (signal: string) => {
    logger.info({ signal }, "[Scheduler] 종료 신호 수신");
    scheduler.stop();
    logger.info("[Scheduler] 정상 종료 완료");
    process.exit(0);
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

function main(): void {
  const config = loadPipelineConfig();
  const scheduler = new PipelineScheduler(createPipeline(config), config);

  setupShutdownHandlers(scheduler);
  scheduler.start();
}

if (require.main === module) {
  try {
    main();
  } catch (error) {
    logger.fatal(toErrorLog(error), "[Scheduler] 시작 실패");
    process.exitCode = 1;
  }
}
