/**
 * Instance Repository 인터페이스
 */

import type { WorkerInstance } from "@/core/domain/AutomationExecution";

/**
 * 인스턴스 필터 (필터명 → 값 목록)
 * 예: { "tag:Platform": ["ubuntu-22"], "instance-state-name": ["running"] }
 */
export type InstanceFilters = Record<string, readonly string[]>;

export interface IInstanceRepository {
  /**
   * 인스턴스 조회 (페이지 전체 수집)
   */
  describeInstances(filters: InstanceFilters): Promise<WorkerInstance[]>;

  /**
   * 인스턴스 종료
   */
  terminateInstances(instanceIds: readonly string[]): Promise<void>;
}
