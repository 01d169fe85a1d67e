/**
 * Concurrency Guard
 *
 * 목적:
 * - 같은 플랫폼의 빌드가 이미 진행 중이면 새 빌드 차단
 * - Waiting 상태로 멈춘 실행은 현재 단계 Resume (차단 사유 아님)
 * - 진행 중인 실행이 없으면 이전 실행이 남긴 Worker 인스턴스 종료
 *
 * 주의:
 * - 조회 후 제출(check-then-act) 구조라 분산 Lock이 아니다
 * - 동시에 실행된 두 파이프라인이 모두 통과할 수 있음 (저빈도 주기 실행 전제)
 */

import {
  BUILD_PARAMETERS,
  EXECUTION_ID_TAG_SUFFIX,
  EXECUTION_STATUS,
  LIVE_EXECUTION_STATUSES,
  RECLAIMABLE_INSTANCE_STATES,
  ARTIFACT_TAGS,
} from "@/config/constants";
import { createComponentLogger, type Logger } from "@/config/logger";
import type { IAutomationRepository } from "@/core/interfaces/IAutomationRepository";
import type { IInstanceRepository } from "@/core/interfaces/IInstanceRepository";

/**
 * 문서명 검색 prefix 목록
 * 마지막 "-" 뒤 식별자를 뗀 prefix를 함께 조회 (버전이 바뀐 문서의 실행 포함)
 *
 * @example documentNamePrefixes("GoldImage-Build-v2") // ["GoldImage-Build-v2", "GoldImage-Build-"]
 */
export function documentNamePrefixes(documentName: string): string[] {
  const separator = documentName.lastIndexOf("-");
  if (separator <= 0) {
    return [documentName];
  }
  const prefix = documentName.slice(0, separator + 1);
  return prefix === documentName ? [documentName] : [documentName, prefix];
}

export class ConcurrencyGuard {
  constructor(
    private readonly automation: IAutomationRepository,
    private readonly instances: IInstanceRepository,
    private readonly logger: Logger = createComponentLogger("ConcurrencyGuard"),
  ) {}

  /**
   * 새 빌드 제출 가능 여부
   * @param platform 플랫폼 표시명
   * @param documentName 빌드 문서명
   * @param instanceTagPrefix Worker 인스턴스 실행 ID 태그 prefix
   */
  async isReady(
    platform: string,
    documentName: string,
    instanceTagPrefix: string,
  ): Promise<boolean> {
    const executions = await this.automation.describeExecutions(
      documentNamePrefixes(documentName),
      LIVE_EXECUTION_STATUSES,
    );

    for (const summary of executions) {
      const execution = await this.automation.getExecution(summary.executionId);
      const platforms = execution.parameters[BUILD_PARAMETERS.PLATFORM] ?? [];
      if (!platforms.includes(platform)) {
        continue;
      }

      if (execution.status === EXECUTION_STATUS.WAITING) {
        if (!execution.currentStepName) {
          this.logger.warn(
            { platform, execution_id: execution.executionId },
            "Waiting 실행에 현재 단계 정보 없음 - Resume 생략",
          );
          continue;
        }
        await this.automation.sendSignal(execution.executionId, "Resume", {
          StepName: [execution.currentStepName],
        });
        this.logger.info(
          {
            platform,
            execution_id: execution.executionId,
            step_name: execution.currentStepName,
          },
          "Waiting 실행 Resume 신호 전송",
        );
        continue;
      }

      if (
        execution.status === EXECUTION_STATUS.PENDING ||
        execution.status === EXECUTION_STATUS.IN_PROGRESS
      ) {
        this.logger.info(
          { platform, execution_id: execution.executionId, status: execution.status },
          "진행 중인 빌드 존재 - 차단",
        );
        return false;
      }
    }

    await this.reclaimWorkers(platform, instanceTagPrefix);
    return true;
  }

  /**
   * 이전 미완료 실행이 남긴 Worker 인스턴스 종료
   */
  private async reclaimWorkers(platform: string, instanceTagPrefix: string): Promise<void> {
    const orphans = await this.instances.describeInstances({
      [`tag:${ARTIFACT_TAGS.PLATFORM}`]: [platform],
      "instance-state-name": RECLAIMABLE_INSTANCE_STATES,
      "tag-key": [`${instanceTagPrefix}${EXECUTION_ID_TAG_SUFFIX}`],
    });

    if (orphans.length === 0) {
      return;
    }

    const instanceIds = orphans.map((instance) => instance.instanceId);
    await this.instances.terminateInstances(instanceIds);
    this.logger.warn(
      { platform, instance_ids: instanceIds },
      "잔여 Worker 인스턴스 종료",
    );
  }
}
