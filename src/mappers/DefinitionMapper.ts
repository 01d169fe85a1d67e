/**
 * Definition Mapper
 * 설정 트리 원본(RawDefinition) → BuildDefinition
 *
 * 필수 필드(Platform, Source)가 없으면 null (에러 아님)
 */

import { z } from "zod";
import type { Logger } from "@/config/logger";
import {
  DEFINITION_FIELDS,
  type BuildDefinition,
  type RawDefinition,
} from "@/core/domain/BuildDefinition";

const ParametersSchema = z.record(z.unknown());

/**
 * 빈 문자열/공백은 미설정으로 취급
 */
function optionalField(fields: Record<string, string>, key: string): string | undefined {
  const value = fields[key];
  return value !== undefined && value.trim() !== "" ? value : undefined;
}

/**
 * Parameters 필드 (JSON 객체 문자열) 파싱
 * @returns 파싱 결과, 필드 없음이면 undefined, 형식 오류면 null
 */
export function parseDefinitionParameters(
  text: string | undefined,
): Record<string, unknown> | undefined | null {
  if (text === undefined) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }

  const result = ParametersSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

export function toBuildDefinition(
  raw: RawDefinition,
  defaultDocumentName: string,
  logger?: Logger,
): BuildDefinition | null {
  const platform = optionalField(raw.fields, DEFINITION_FIELDS.PLATFORM)?.trim();
  const source = optionalField(raw.fields, DEFINITION_FIELDS.SOURCE)?.trim();
  if (!platform || !source) {
    logger?.debug({ short_name: raw.shortName }, "필수 필드 누락 - 정의 제외");
    return null;
  }

  const parameters = parseDefinitionParameters(
    optionalField(raw.fields, DEFINITION_FIELDS.PARAMETERS),
  );
  if (parameters === null) {
    logger?.warn(
      { short_name: raw.shortName, platform },
      "Parameters가 JSON 객체가 아님 - 정의 제외",
    );
    return null;
  }

  return {
    shortName: raw.shortName,
    path: raw.path,
    platform,
    source,
    documentName:
      optionalField(raw.fields, DEFINITION_FIELDS.DOCUMENT_NAME)?.trim() ??
      defaultDocumentName,
    blockDevices: optionalField(raw.fields, DEFINITION_FIELDS.BLOCK_DEVICES),
    userData: optionalField(raw.fields, DEFINITION_FIELDS.USER_DATA),
    parameters,
    description: optionalField(raw.fields, DEFINITION_FIELDS.DESCRIPTION),
  };
}
