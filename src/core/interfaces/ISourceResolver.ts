/**
 * Source Resolver 인터페이스
 * Strategy Pattern: scheme별 해석 전략
 */

import type { ResolutionResult } from "@/core/domain/ImageDescriptor";

export interface ISourceResolver {
  /** scheme 토큰 (예: "ami", "name") */
  readonly scheme: string;

  /**
   * payload → 이미지 해석
   * @param payload "scheme:" 이후 문자열
   */
  resolve(payload: string): Promise<ResolutionResult>;
}
