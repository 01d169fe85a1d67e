/**
 * Name Source Resolver ("name:ubuntu/images/hvm-ssd/ubuntu-jammy-22.04-amd64-server-*")
 *
 * 이름 필터(와일드카드 허용) + 신뢰 소유자 + 고정 플랫폼 조건으로 조회 후
 * 가장 최근 생성된 이미지 선택
 */

import { SOURCE_IMAGE_CONSTRAINTS } from "@/config/constants";
import {
  notFound,
  pickNewest,
  resolved,
  type ResolutionResult,
} from "@/core/domain/ImageDescriptor";
import type { IImageRepository, ImageFilters } from "@/core/interfaces/IImageRepository";
import type { ISourceResolver } from "@/core/interfaces/ISourceResolver";

export class NameSourceResolver implements ISourceResolver {
  readonly scheme = "name";

  constructor(
    private readonly images: IImageRepository,
    private readonly trustedOwners: readonly string[],
  ) {}

  async resolve(payload: string): Promise<ResolutionResult> {
    const filters: ImageFilters = { name: [payload] };
    for (const [name, value] of Object.entries(SOURCE_IMAGE_CONSTRAINTS)) {
      filters[name] = [value];
    }

    const candidates = await this.images.describeImages({
      filters,
      owners: this.trustedOwners,
    });
    const newest = pickNewest(candidates);

    return newest
      ? resolved(newest)
      : notFound(
          `No image named "${payload}" owned by [${this.trustedOwners.join(", ")}]`,
        );
  }
}
