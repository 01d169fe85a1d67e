/**
 * BuildDefinition - 플랫폼별 Gold 이미지 빌드 정의
 */

import type { ImageDescriptor } from "./ImageDescriptor";

/**
 * 설정 트리에서 읽은 가공 전 정의
 */
export interface RawDefinition {
  /** prefix 기준 상대 경로 (예: "linux/ubuntu-22") */
  shortName: string;
  /** 설정 트리 내 전체 경로 (예: "/gold-image/platforms/linux/ubuntu-22") */
  path: string;
  /** 필드명 → 값 (Platform, Source, BlockDevices, UserData, Parameters, ...) */
  fields: Record<string, string>;
}

/**
 * 설정 트리 필드명
 */
export const DEFINITION_FIELDS = {
  PLATFORM: "Platform",
  SOURCE: "Source",
  BLOCK_DEVICES: "BlockDevices",
  USER_DATA: "UserData",
  PARAMETERS: "Parameters",
  DESCRIPTION: "Description",
  DOCUMENT_NAME: "DocumentName",
} as const;

/**
 * 빌드 정의
 */
export interface BuildDefinition {
  shortName: string;
  path: string;
  platform: string;
  source: string;
  documentName: string;
  blockDevices?: string;
  userData?: string;
  /** 자유 형식 파라미터 (값은 스칼라 또는 구조체) */
  parameters?: Record<string, unknown>;
  description?: string;
}

/**
 * 소스 해석 + block device 확정이 끝난 정의
 * 한 번의 실행 동안만 유지 (저장하지 않음)
 */
export interface ResolvedDefinition extends BuildDefinition {
  image: ImageDescriptor;
  /** JSON 직렬화된 block device mapping 목록 */
  finalBlockDevices: string[];
}
