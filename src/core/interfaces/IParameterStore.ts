/**
 * Parameter Store 인터페이스
 */

import type { RawDefinition } from "@/core/domain/BuildDefinition";

export interface IParameterStore {
  /**
   * 파라미터 값 조회
   * @returns 값 또는 null (파라미터 없음)
   */
  getParameter(name: string): Promise<string | null>;
}

/**
 * 설정 트리 Reader 인터페이스
 */
export interface IDefinitionRepository {
  /**
   * prefix 하위 모든 정의 조회
   * 필수 필드 검증은 하지 않음 (Pipeline 책임)
   */
  getDefinitions(pathPrefix: string): Promise<RawDefinition[]>;
}
