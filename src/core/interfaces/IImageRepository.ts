/**
 * Image Repository 인터페이스
 *
 * SOLID 원칙:
 * - ISP: 이미지 조회 전용 인터페이스
 * - DIP: 서비스는 EC2 SDK가 아닌 이 추상화에 의존
 */

import type { ImageDescriptor } from "@/core/domain/ImageDescriptor";

/**
 * 이미지 조회 필터 (필터명 → 허용 값 목록, 값끼리는 OR)
 * 예: { "tag:Platform": ["ubuntu-22"], "name": ["gold-*"] }
 */
export type ImageFilters = Record<string, readonly string[]>;

export interface DescribeImagesQuery {
  imageIds?: readonly string[];
  filters?: ImageFilters;
  /** 소유자 allowlist (예: ["amazon", "self"]) */
  owners?: readonly string[];
}

export interface IImageRepository {
  /**
   * 이미지 조회 (페이지 전체 수집)
   * @returns 생성 시각 내림차순 정렬된 이미지 목록
   */
  describeImages(query: DescribeImagesQuery): Promise<ImageDescriptor[]>;
}
