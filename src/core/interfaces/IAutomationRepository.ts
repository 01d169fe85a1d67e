/**
 * Automation Repository 인터페이스
 *
 * SOLID 원칙:
 * - ISP: 빌드 워크플로우 실행 조회/신호/시작만 노출
 */

import type {
  AutomationExecution,
  AutomationExecutionSummary,
  AutomationSignalType,
  StartExecutionRequest,
} from "@/core/domain/AutomationExecution";

export interface IAutomationRepository {
  /**
   * 문서명 prefix + 상태로 실행 목록 조회 (페이지 전체 수집)
   */
  describeExecutions(
    documentNamePrefixes: readonly string[],
    statuses: readonly string[],
  ): Promise<AutomationExecutionSummary[]>;

  /**
   * 실행 상세 조회
   */
  getExecution(executionId: string): Promise<AutomationExecution>;

  /**
   * 실행에 신호 전송 (예: Waiting 단계 Resume)
   */
  sendSignal(
    executionId: string,
    signalType: AutomationSignalType,
    payload: Record<string, string[]>,
  ): Promise<void>;

  /**
   * 빌드 실행 시작 (완료를 기다리지 않음)
   * @returns 실행 ID
   */
  startExecution(request: StartExecutionRequest): Promise<string>;
}
