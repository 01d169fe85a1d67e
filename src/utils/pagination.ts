/**
 * 페이지네이션 유틸리티
 *
 * NextToken 기반 API를 마지막 페이지까지 모두 수집
 * 부분 결과로 판단하지 않도록 호출자는 항상 전체 목록만 받는다
 */

export interface Page<T> {
  items: readonly T[];
  nextToken?: string;
}

/**
 * 모든 페이지 수집
 * @param fetchPage 토큰 → 페이지 (첫 호출은 undefined)
 * @param maxPages 무한 루프 방지 상한
 */
export async function drainPages<T>(
  fetchPage: (nextToken: string | undefined) => Promise<Page<T>>,
  maxPages = 1000,
): Promise<T[]> {
  const collected: T[] = [];
  let nextToken: string | undefined;
  let pages = 0;

  do {
    const page = await fetchPage(nextToken);
    collected.push(...page.items);
    nextToken = page.nextToken || undefined;
    pages++;

    if (pages >= maxPages && nextToken) {
      throw new Error(`Pagination exceeded ${maxPages} pages`);
    }
  } while (nextToken);

  return collected;
}

/**
 * 배열을 size 단위로 분할
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size <= 0) {
    throw new RangeError(`chunk size must be positive: ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
