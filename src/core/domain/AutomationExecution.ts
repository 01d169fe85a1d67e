/**
 * Automation 실행 / Worker 인스턴스 도메인
 *
 * 두 리소스 모두 외부 시스템 소유 (이 파이프라인은 조회/신호/종료만 수행)
 */

import { EXECUTION_STATUS } from "@/config/constants";

export type ExecutionStatus =
  | (typeof EXECUTION_STATUS)[keyof typeof EXECUTION_STATUS]
  | "Other";

/**
 * Automation 신호 종류
 */
export type AutomationSignalType =
  | "Approve"
  | "Reject"
  | "Resume"
  | "StartStep"
  | "StopStep";

/**
 * 목록 조회 결과 (상세 조회 전)
 */
export interface AutomationExecutionSummary {
  executionId: string;
  documentName: string;
  status: ExecutionStatus;
}

/**
 * 실행 상세
 */
export interface AutomationExecution {
  executionId: string;
  status: ExecutionStatus;
  parameters: Record<string, string[]>;
  /** status가 Waiting일 때만 의미 있음 */
  currentStepName?: string;
}

/**
 * 빌드 실행 시작 요청
 */
export interface StartExecutionRequest {
  documentName: string;
  parameters: Record<string, string[]>;
  tags: Record<string, string>;
}

/**
 * 빌드 Worker 인스턴스
 */
export interface WorkerInstance {
  instanceId: string;
  state: string;
  tags: Record<string, string>;
}

/**
 * SDK 상태 문자열 → ExecutionStatus
 */
export function toExecutionStatus(value: string | undefined): ExecutionStatus {
  switch (value) {
    case EXECUTION_STATUS.PENDING:
    case EXECUTION_STATUS.IN_PROGRESS:
    case EXECUTION_STATUS.WAITING:
      return value;
    default:
      return "Other";
  }
}
