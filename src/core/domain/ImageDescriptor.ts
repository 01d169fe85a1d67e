/**
 * ImageDescriptor - 해석된 소스 이미지
 *
 * Source Resolver만 생성하며 생성 이후 변경하지 않는다
 */

import { z } from "zod";

/**
 * EBS 설정 스키마 (EC2 BlockDeviceMapping.Ebs 형태)
 *
 * 알 수 없는 키는 그대로 통과 (템플릿에 새 EBS 옵션이 추가돼도 손실 없음)
 */
export const EbsBlockDeviceSchema = z
  .object({
    DeleteOnTermination: z.boolean().optional(),
    Encrypted: z.boolean().optional(),
    Iops: z.number().optional(),
    KmsKeyId: z.string().optional(),
    SnapshotId: z.string().optional(),
    Throughput: z.number().optional(),
    VolumeSize: z.number().optional(),
    VolumeType: z.string().optional(),
  })
  .passthrough();

/**
 * Block device mapping 스키마
 */
export const BlockDeviceMappingSchema = z
  .object({
    DeviceName: z.string().min(1),
    Ebs: EbsBlockDeviceSchema.optional(),
    NoDevice: z.string().optional(),
    VirtualName: z.string().optional(),
  })
  .passthrough();

export type EbsBlockDevice = z.infer<typeof EbsBlockDeviceSchema>;
export type BlockDeviceMapping = z.infer<typeof BlockDeviceMappingSchema>;

/**
 * 소스 이미지 정보
 */
export interface ImageDescriptor {
  readonly imageId: string;
  /** ISO 8601 생성 시각 */
  readonly creationDate: string;
  readonly name?: string;
  readonly rootDeviceName?: string;
  readonly blockDeviceMappings: readonly BlockDeviceMapping[];
  /** beanstalk 전략에서만 채워짐 */
  readonly solutionStackName?: string;
  readonly tags: Readonly<Record<string, string>>;
  /** 레지스트리 원본 메타데이터 */
  readonly metadata: Readonly<Record<string, unknown>>;
}

/**
 * Source 해석 결과
 *
 * - resolved: 이미지 확보
 * - not_found: 조건에 맞는 이미지 없음 (에러 아님, 해당 정의만 제외)
 *
 * 전송 실패는 결과가 아니라 TransportError로 던진다
 */
export type ResolutionResult =
  | { readonly status: "resolved"; readonly image: ImageDescriptor }
  | { readonly status: "not_found"; readonly reason: string };

export function resolved(image: ImageDescriptor): ResolutionResult {
  return { status: "resolved", image };
}

export function notFound(reason: string): ResolutionResult {
  return { status: "not_found", reason };
}

/**
 * 생성 시각 내림차순 비교 (파싱 불가 시각은 가장 뒤)
 */
export function compareByCreationDateDesc(
  a: ImageDescriptor,
  b: ImageDescriptor,
): number {
  const left = Date.parse(a.creationDate);
  const right = Date.parse(b.creationDate);
  if (Number.isNaN(left)) {
    return Number.isNaN(right) ? 0 : 1;
  }
  if (Number.isNaN(right)) {
    return -1;
  }
  return right - left;
}

/**
 * 생성 시각 기준 최신 이미지 선택
 * @returns 최신 이미지 또는 undefined (빈 배열)
 */
export function pickNewest(
  images: readonly ImageDescriptor[],
): ImageDescriptor | undefined {
  let newest: ImageDescriptor | undefined;
  for (const image of images) {
    if (!newest || compareByCreationDateDesc(image, newest) < 0) {
      newest = image;
    }
  }
  return newest;
}
