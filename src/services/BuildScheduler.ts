/**
 * Build Scheduler
 * Gold 이미지 빌드 Automation 실행 요청 생성 + 제출
 *
 * - 제출만 하고 빌드 완료는 기다리지 않음
 * - 실패 시 재시도하지 않음 (TransportError 전파)
 */

import { ARTIFACT_TAGS, BUILD_PARAMETERS } from "@/config/constants";
import { createComponentLogger, type Logger } from "@/config/logger";
import type { StartExecutionRequest } from "@/core/domain/AutomationExecution";
import type { ResolvedDefinition } from "@/core/domain/BuildDefinition";
import type { IAutomationRepository } from "@/core/interfaces/IAutomationRepository";
import { toIsoDuration } from "@/utils/timestamp";

/**
 * 태그 값에 허용되지 않는 와일드카드 문자 치환
 */
export function sanitizeTagValue(value: string): string {
  return value.replace(/[*?]/g, "_");
}

/**
 * 설정 트리 경로의 마지막 세그먼트
 * @example platformKeyOf("/gold-image/platforms/linux/ubuntu-22", "Ubuntu") // "ubuntu-22"
 */
export function platformKeyOf(path: string, fallback: string): string {
  const segments = path.split("/").filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? fallback;
}

/**
 * 자유 형식 파라미터 값 → 문서 파라미터 값
 * 문자열은 그대로, 그 외는 JSON 직렬화
 */
export function toParameterValue(value: unknown): string[] {
  return [typeof value === "string" ? value : JSON.stringify(value)];
}

export class BuildScheduler {
  constructor(
    private readonly automation: IAutomationRepository,
    private readonly logger: Logger = createComponentLogger("BuildScheduler"),
  ) {}

  /**
   * 실행 요청 구성
   * @throws RangeError delaySeconds가 0 이상의 정수가 아닌 경우
   */
  composeRequest(
    definition: ResolvedDefinition,
    delaySeconds: number,
  ): StartExecutionRequest {
    if (!Number.isInteger(delaySeconds) || delaySeconds < 0) {
      throw new RangeError(`delaySeconds must be a non-negative integer: ${delaySeconds}`);
    }

    const { image } = definition;
    const parameters: Record<string, string[]> = {
      [BUILD_PARAMETERS.SOURCE_IMAGE_ID]: [image.imageId],
      [BUILD_PARAMETERS.IMAGE_NAME]: [definition.platform],
      [BUILD_PARAMETERS.PLATFORM]: [definition.platform],
      [BUILD_PARAMETERS.PLATFORM_KEY]: [platformKeyOf(definition.path, definition.platform)],
      [BUILD_PARAMETERS.DELAY_TIME]: [toIsoDuration(delaySeconds)],
      [BUILD_PARAMETERS.BLOCK_DEVICES]: [...definition.finalBlockDevices],
      [BUILD_PARAMETERS.IMAGE_DESCRIPTION]: [definition.description ?? definition.platform],
    };

    const tags: Record<string, string> = {
      [ARTIFACT_TAGS.PLATFORM]: definition.platform,
      [ARTIFACT_TAGS.SOURCE_IMAGE_ID]: image.imageId,
      [ARTIFACT_TAGS.SOURCE]: sanitizeTagValue(definition.source),
    };

    if (definition.userData !== undefined) {
      parameters[BUILD_PARAMETERS.USER_DATA] = [definition.userData];
    }

    if (image.solutionStackName) {
      parameters[BUILD_PARAMETERS.SOLUTION_STACK] = [image.solutionStackName];
      tags[ARTIFACT_TAGS.SOLUTION_STACK] = image.solutionStackName;
    }

    // 자유 형식 파라미터는 마지막에 병합 (같은 키는 덮어씀)
    for (const [key, value] of Object.entries(definition.parameters ?? {})) {
      parameters[key] = toParameterValue(value);
    }

    return { documentName: definition.documentName, parameters, tags };
  }

  /**
   * 빌드 실행 제출
   * @returns Automation 실행 ID
   */
  async submit(definition: ResolvedDefinition, delaySeconds: number): Promise<string> {
    const request = this.composeRequest(definition, delaySeconds);
    const executionId = await this.automation.startExecution(request);

    this.logger.info(
      {
        platform: definition.platform,
        source_image_id: definition.image.imageId,
        document_name: request.documentName,
        delay_seconds: delaySeconds,
        execution_id: executionId,
      },
      "빌드 실행 제출 완료",
    );
    return executionId;
  }
}
