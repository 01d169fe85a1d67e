/**
 * EC2 Image Repository
 * DescribeImages 기반 이미지 조회
 *
 * SOLID 원칙:
 * - SRP: EC2 이미지 조회 + 도메인 변환만 담당
 * - DIP: IImageRepository 구현
 */

import {
  DescribeImagesCommand,
  EC2Client,
  type BlockDeviceMapping as Ec2BlockDeviceMapping,
  type Image,
} from "@aws-sdk/client-ec2";
import {
  compareByCreationDateDesc,
  type BlockDeviceMapping,
  type ImageDescriptor,
} from "@/core/domain/ImageDescriptor";
import type {
  DescribeImagesQuery,
  IImageRepository,
} from "@/core/interfaces/IImageRepository";
import { drainPages } from "@/utils/pagination";
import {
  isAwsErrorNamed,
  tagsToRecord,
  toNameValuesFilters,
  withTransportError,
} from "@/utils/aws";

/**
 * ImageIds 지정 조회 시 "없음"으로 취급하는 EC2 에러
 */
const IMAGE_NOT_FOUND_ERRORS = [
  "InvalidAMIID.NotFound",
  "InvalidAMIID.Unavailable",
  "InvalidAMIID.Malformed",
];

export class Ec2ImageRepository implements IImageRepository {
  constructor(private readonly client: EC2Client) {}

  async describeImages(query: DescribeImagesQuery): Promise<ImageDescriptor[]> {
    const images = await withTransportError("ec2:DescribeImages", async () => {
      try {
        return await drainPages<Image>(async (nextToken) => {
          const response = await this.client.send(
            new DescribeImagesCommand({
              ImageIds: query.imageIds ? [...query.imageIds] : undefined,
              Owners: query.owners ? [...query.owners] : undefined,
              Filters: query.filters ? toNameValuesFilters(query.filters) : undefined,
              NextToken: nextToken,
            }),
          );
          return { items: response.Images ?? [], nextToken: response.NextToken };
        });
      } catch (error) {
        if (IMAGE_NOT_FOUND_ERRORS.some((name) => isAwsErrorNamed(error, name))) {
          return [];
        }
        throw error;
      }
    });

    return images
      .map(toImageDescriptor)
      .filter((image): image is ImageDescriptor => image !== null)
      .sort(compareByCreationDateDesc);
  }
}

/**
 * SDK Image → ImageDescriptor
 * ImageId 또는 CreationDate가 없는 항목은 제외
 */
export function toImageDescriptor(image: Image): ImageDescriptor | null {
  if (!image.ImageId || !image.CreationDate) {
    return null;
  }

  return {
    imageId: image.ImageId,
    creationDate: image.CreationDate,
    name: image.Name,
    rootDeviceName: image.RootDeviceName,
    blockDeviceMappings: (image.BlockDeviceMappings ?? [])
      .map(toBlockDeviceMapping)
      .filter((mapping): mapping is BlockDeviceMapping => mapping !== null),
    tags: tagsToRecord(image.Tags),
    metadata: {
      architecture: image.Architecture,
      description: image.Description,
      ownerId: image.OwnerId,
      platformDetails: image.PlatformDetails,
      virtualizationType: image.VirtualizationType,
      rootDeviceType: image.RootDeviceType,
      state: image.State,
    },
  };
}

function toBlockDeviceMapping(mapping: Ec2BlockDeviceMapping): BlockDeviceMapping | null {
  if (!mapping.DeviceName) {
    return null;
  }

  const result: BlockDeviceMapping = { DeviceName: mapping.DeviceName };
  if (mapping.VirtualName !== undefined) result.VirtualName = mapping.VirtualName;
  if (mapping.NoDevice !== undefined) result.NoDevice = mapping.NoDevice;
  if (mapping.Ebs) {
    const ebs = mapping.Ebs;
    result.Ebs = {
      DeleteOnTermination: ebs.DeleteOnTermination,
      Encrypted: ebs.Encrypted,
      Iops: ebs.Iops,
      KmsKeyId: ebs.KmsKeyId,
      SnapshotId: ebs.SnapshotId,
      Throughput: ebs.Throughput,
      VolumeSize: ebs.VolumeSize,
      VolumeType: ebs.VolumeType,
    };
  }
  return result;
}
