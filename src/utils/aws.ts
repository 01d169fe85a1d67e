/**
 * AWS SDK 호출 헬퍼
 */

import { TransportError } from "@/core/domain/errors";

/**
 * SDK 호출 실패를 TransportError로 변환
 * 재시도는 하지 않는다
 */
export async function withTransportError<T>(
  operation: string,
  call: () => Promise<T>,
): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof TransportError) {
      throw error;
    }
    throw new TransportError(operation, error);
  }
}

/**
 * SDK 에러 이름 확인 (예: "ParameterNotFound")
 */
export function isAwsErrorNamed(error: unknown, name: string): boolean {
  return error instanceof Error && error.name === name;
}

/**
 * { 필터명: 값[] } → [{ Name, Values }]
 * 값이 비어 있는 필터는 제외
 */
export function toNameValuesFilters(
  filters: Record<string, readonly string[]>,
): { Name: string; Values: string[] }[] {
  return Object.entries(filters)
    .filter(([, values]) => values.length > 0)
    .map(([name, values]) => ({ Name: name, Values: [...values] }));
}

/**
 * [{ Key, Value }] → { Key: Value }
 */
export function tagsToRecord(
  tags: readonly { Key?: string; Value?: string }[] | undefined,
): Record<string, string> {
  const record: Record<string, string> = {};
  for (const tag of tags ?? []) {
    if (tag.Key !== undefined) {
      record[tag.Key] = tag.Value ?? "";
    }
  }
  return record;
}

/**
 * { Key: Value } → [{ Key, Value }]
 */
export function recordToTags(tags: Record<string, string>): { Key: string; Value: string }[] {
  return Object.entries(tags).map(([Key, Value]) => ({ Key, Value }));
}
