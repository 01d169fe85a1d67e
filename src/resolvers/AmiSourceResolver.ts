/**
 * AMI Source Resolver ("ami:ami-0123456789abcdef0")
 * payload가 이미 이미지 ID인 경우
 */

import { notFound, resolved, type ResolutionResult } from "@/core/domain/ImageDescriptor";
import type { IImageRepository } from "@/core/interfaces/IImageRepository";
import type { ISourceResolver } from "@/core/interfaces/ISourceResolver";

export class AmiSourceResolver implements ISourceResolver {
  readonly scheme = "ami";

  constructor(private readonly images: IImageRepository) {}

  async resolve(payload: string): Promise<ResolutionResult> {
    const imageId = payload.trim();
    const [image] = await this.images.describeImages({ imageIds: [imageId] });
    return image ? resolved(image) : notFound(`Image ${imageId} not found`);
  }
}
