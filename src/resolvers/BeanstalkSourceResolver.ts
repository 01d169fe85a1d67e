/**
 * Beanstalk Source Resolver ("beanstalk:Node.js 20 running on 64bit Amazon Linux 2023")
 *
 * 처리 순서:
 * 1. 플랫폼 branch의 Ready 버전 ARN 전체 수집 (페이지 끝까지)
 * 2. 버전별 상세 조회 → HVM custom AMI 중 첫 번째 후보를 레지스트리에서 조회
 * 3. 버전당 후보 1개, 전체 중 가장 최근 생성된 이미지 선택
 *
 * 선택된 이미지에는 해당 버전의 solution stack 이름을 붙인다
 */

import {
  HVM_VIRTUALIZATION,
  PLATFORM_VERSION_READY_STATUS,
} from "@/config/constants";
import { createComponentLogger, type Logger } from "@/config/logger";
import {
  notFound,
  pickNewest,
  resolved,
  type ImageDescriptor,
  type ResolutionResult,
} from "@/core/domain/ImageDescriptor";
import type { IImageRepository } from "@/core/interfaces/IImageRepository";
import type { IPlatformVersionRepository } from "@/core/interfaces/IPlatformVersionRepository";
import type { ISourceResolver } from "@/core/interfaces/ISourceResolver";

export class BeanstalkSourceResolver implements ISourceResolver {
  readonly scheme = "beanstalk";

  constructor(
    private readonly platforms: IPlatformVersionRepository,
    private readonly images: IImageRepository,
    private readonly logger: Logger = createComponentLogger("BeanstalkSourceResolver"),
  ) {}

  async resolve(payload: string): Promise<ResolutionResult> {
    const arns = await this.platforms.listVersions(payload, PLATFORM_VERSION_READY_STATUS);
    const candidates: ImageDescriptor[] = [];

    for (const arn of arns) {
      const version = await this.platforms.describeVersion(arn);
      const [candidate] = version.customImages.filter(
        (image) => image.virtualizationType === HVM_VIRTUALIZATION,
      );
      if (!candidate) {
        this.logger.debug({ arn }, "HVM custom AMI 없음 - 스킵");
        continue;
      }

      const [image] = await this.images.describeImages({
        imageIds: [candidate.imageId],
      });
      if (!image) {
        this.logger.warn(
          { arn, image_id: candidate.imageId },
          "플랫폼 버전의 custom AMI를 찾을 수 없음",
        );
        continue;
      }

      candidates.push({ ...image, solutionStackName: version.solutionStackName });
    }

    const newest = pickNewest(candidates);
    return newest
      ? resolved(newest)
      : notFound(`No ready HVM image for platform branch "${payload}"`);
  }
}
