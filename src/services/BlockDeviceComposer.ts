/**
 * Block Device Composer
 *
 * 목적:
 * - 정의의 block device 템플릿(override) 또는 소스 이미지 기본 매핑을
 *   빌드 문서에 넘길 직렬화 목록으로 확정
 *
 * 규칙:
 * - 템플릿 있음: {RootDeviceName} → 이미지 루트 디바이스명 치환 후 파싱
 * - 템플릿 없음: 이미지 매핑 복사 + EBS 항목 암호화 강제
 * - 각 항목은 독립적으로 JSON 직렬화
 */

import * as yaml from "js-yaml";
import { z } from "zod";
import { ROOT_DEVICE_PLACEHOLDER } from "@/config/constants";
import type { BuildDefinition } from "@/core/domain/BuildDefinition";
import {
  InvalidBlockDeviceTemplateError,
  MissingRootDeviceError,
} from "@/core/domain/errors";
import {
  BlockDeviceMappingSchema,
  type BlockDeviceMapping,
  type ImageDescriptor,
} from "@/core/domain/ImageDescriptor";

const BlockDeviceTemplateSchema = z.array(BlockDeviceMappingSchema);

export class BlockDeviceComposer {
  /**
   * @throws MissingRootDeviceError 템플릿에 placeholder가 있는데 루트 디바이스가 없음
   * @throws InvalidBlockDeviceTemplateError 템플릿이 매핑 목록이 아님
   */
  compose(definition: BuildDefinition, image: ImageDescriptor): string[] {
    if (definition.blockDevices !== undefined) {
      return this.composeFromTemplate(definition, image);
    }
    return image.blockDeviceMappings.map((mapping) =>
      JSON.stringify(encryptEbs(mapping)),
    );
  }

  private composeFromTemplate(
    definition: BuildDefinition,
    image: ImageDescriptor,
  ): string[] {
    let template = definition.blockDevices ?? "";

    if (template.includes(ROOT_DEVICE_PLACEHOLDER)) {
      if (!image.rootDeviceName) {
        throw new MissingRootDeviceError(definition.platform, image.imageId);
      }
      template = template.split(ROOT_DEVICE_PLACEHOLDER).join(image.rootDeviceName);
    }

    let parsed: unknown;
    try {
      parsed = parseTemplate(template);
    } catch (error) {
      throw new InvalidBlockDeviceTemplateError(
        definition.platform,
        error instanceof Error ? error.message : String(error),
        { cause: error },
      );
    }

    const validation = BlockDeviceTemplateSchema.safeParse(parsed);
    if (!validation.success || !Array.isArray(parsed)) {
      throw new InvalidBlockDeviceTemplateError(
        definition.platform,
        validation.success
          ? "expected a list of block device mappings"
          : validation.error.issues.map((issue) => issue.message).join("; "),
      );
    }

    // 템플릿의 키 순서를 유지하기 위해 검증 결과가 아닌 원본 직렬화
    return parsed.map((entry: unknown) => JSON.stringify(entry));
  }
}

/**
 * 템플릿 파싱: JSON 우선, 실패 시 YAML
 * (YAML은 JSON이 허용하는 중복 키를 거부함)
 */
function parseTemplate(template: string): unknown {
  try {
    return JSON.parse(template);
  } catch (jsonError) {
    if (!(jsonError instanceof SyntaxError)) {
      throw jsonError;
    }
    return yaml.load(template);
  }
}

/**
 * EBS 항목 암호화 강제 (원본 불변)
 */
export function encryptEbs(mapping: BlockDeviceMapping): BlockDeviceMapping {
  if (!mapping.Ebs) {
    return { ...mapping };
  }
  return { ...mapping, Ebs: { ...mapping.Ebs, Encrypted: true } };
}
