/**
 * Staleness Filter
 *
 * 목적:
 * - 이미 (SourceImageId, Platform, 스키마 버전) 조합으로 빌드된 Gold 이미지가 있는 정의 제외
 * - 막 배포된 소스 이미지는 minAgeDays 동안 안정화 후 빌드
 *
 * 처리 순서:
 * 1. 후보들의 SourceImageId로 기존 Gold 이미지 인덱스 구성
 * 2. 인덱스에 (id, platform)이 없는 후보만 유지
 * 3. 소스 이미지 생성 시각이 now - minAgeDays 이전인 후보만 유지
 */

import {
  ARTIFACT_TAGS,
  MAX_FILTER_VALUES,
  SCHEMA_VERSION,
} from "@/config/constants";
import { createComponentLogger, type Logger } from "@/config/logger";
import type { PipelineConfig } from "@/config/PipelineConfig";
import type { ResolvedDefinition } from "@/core/domain/BuildDefinition";
import type { IImageRepository } from "@/core/interfaces/IImageRepository";
import { chunk } from "@/utils/pagination";
import { subtractDays, systemClock, type Clock } from "@/utils/timestamp";

/**
 * SourceImageId → 이미 빌드된 Platform 집합
 */
export type ExistingArtifactIndex = ReadonlyMap<string, ReadonlySet<string>>;

/**
 * 기존 아티팩트 판정
 */
export function isSatisfied(
  index: ExistingArtifactIndex,
  sourceImageId: string,
  platform: string,
): boolean {
  return index.get(sourceImageId)?.has(platform) ?? false;
}

export class StalenessFilter {
  constructor(
    private readonly images: IImageRepository,
    private readonly config: Pick<PipelineConfig, "artifactNamePrefix">,
    private readonly logger: Logger = createComponentLogger("StalenessFilter"),
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * 인덱스 구성 + 필터 적용
   */
  async apply(
    candidates: readonly ResolvedDefinition[],
    minAgeDays: number,
  ): Promise<ResolvedDefinition[]> {
    const sourceImageIds = [...new Set(candidates.map((c) => c.image.imageId))];
    const index = await this.buildIndex(sourceImageIds);
    return this.filter(candidates, index, minAgeDays);
  }

  /**
   * 기존 Gold 이미지 인덱스 구성
   * 조건: 자기 소유 + 이름 prefix + 현재 스키마 버전 + GoldImage=true
   */
  async buildIndex(sourceImageIds: readonly string[]): Promise<ExistingArtifactIndex> {
    const index = new Map<string, Set<string>>();

    for (const ids of chunk(sourceImageIds, MAX_FILTER_VALUES)) {
      const artifacts = await this.images.describeImages({
        owners: ["self"],
        filters: {
          [`tag:${ARTIFACT_TAGS.SOURCE_IMAGE_ID}`]: ids,
          name: [`${this.config.artifactNamePrefix}*`],
          [`tag:${ARTIFACT_TAGS.VERSION}`]: [SCHEMA_VERSION],
          [`tag:${ARTIFACT_TAGS.GOLD_IMAGE}`]: ["true"],
        },
      });

      for (const artifact of artifacts) {
        const sourceImageId = artifact.tags[ARTIFACT_TAGS.SOURCE_IMAGE_ID];
        const platform = artifact.tags[ARTIFACT_TAGS.PLATFORM];
        if (!sourceImageId || !platform) {
          continue;
        }

        let platforms = index.get(sourceImageId);
        if (!platforms) {
          platforms = new Set<string>();
          index.set(sourceImageId, platforms);
        }
        platforms.add(platform);
      }
    }

    this.logger.debug(
      { source_images: sourceImageIds.length, indexed: index.size },
      "기존 Gold 이미지 인덱스 구성 완료",
    );
    return index;
  }

  /**
   * 인덱스 + 최소 경과일 기준 필터
   */
  filter(
    candidates: readonly ResolvedDefinition[],
    index: ExistingArtifactIndex,
    minAgeDays: number,
    now: Date = this.clock(),
  ): ResolvedDefinition[] {
    const cutoff = subtractDays(now, minAgeDays).getTime();

    return candidates.filter((candidate) => {
      const { imageId, creationDate } = candidate.image;

      if (isSatisfied(index, imageId, candidate.platform)) {
        this.logger.debug(
          { platform: candidate.platform, source_image_id: imageId },
          "최신 Gold 이미지 존재 - 제외",
        );
        return false;
      }

      const createdAt = Date.parse(creationDate);
      if (Number.isNaN(createdAt)) {
        this.logger.warn(
          { platform: candidate.platform, source_image_id: imageId, creation_date: creationDate },
          "소스 이미지 생성 시각 파싱 실패 - 제외",
        );
        return false;
      }

      if (createdAt >= cutoff) {
        this.logger.info(
          {
            platform: candidate.platform,
            source_image_id: imageId,
            creation_date: creationDate,
            min_age_days: minAgeDays,
          },
          "소스 이미지 안정화 대기 중 - 제외",
        );
        return false;
      }

      return true;
    });
  }
}
