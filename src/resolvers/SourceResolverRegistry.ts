/**
 * Source Resolver Registry
 * Registry Pattern + Strategy Pattern
 *
 * SOLID 원칙:
 * - OCP: scheme 추가 = resolver 등록 한 줄
 * - DIP: ISourceResolver 인터페이스에 의존
 *
 * source spec 형식: "scheme:payload" (첫 번째 ":" 기준 분리)
 */

import { createComponentLogger, type Logger } from "@/config/logger";
import {
  MalformedSpecError,
  UnsupportedSchemeError,
} from "@/core/domain/errors";
import type { ResolutionResult } from "@/core/domain/ImageDescriptor";
import type { ISourceResolver } from "@/core/interfaces/ISourceResolver";

export interface ParsedSourceSpec {
  scheme: string;
  payload: string;
}

/**
 * "scheme:payload" 분리
 * @throws MalformedSpecError 구분자가 없거나 scheme이 비어 있는 경우
 */
export function parseSourceSpec(spec: string): ParsedSourceSpec {
  const separator = spec.indexOf(":");
  const scheme = separator > 0 ? spec.slice(0, separator).trim() : "";
  if (scheme === "") {
    throw new MalformedSpecError(spec);
  }
  return { scheme, payload: spec.slice(separator + 1) };
}

/**
 * 실행 단위 해석 캐시
 * 파이프라인 실행마다 새로 만들고 실행 종료 시 버린다
 */
export class ResolutionCache {
  private readonly entries = new Map<string, ResolutionResult>();

  get(spec: string): ResolutionResult | undefined {
    return this.entries.get(spec);
  }

  set(spec: string, result: ResolutionResult): void {
    this.entries.set(spec, result);
  }

  get size(): number {
    return this.entries.size;
  }
}

export class SourceResolverRegistry {
  private readonly resolvers = new Map<string, ISourceResolver>();

  constructor(
    resolvers: readonly ISourceResolver[],
    private readonly logger: Logger = createComponentLogger("SourceResolverRegistry"),
  ) {
    for (const resolver of resolvers) {
      this.register(resolver);
    }
  }

  private register(resolver: ISourceResolver): void {
    if (this.resolvers.has(resolver.scheme)) {
      throw new Error(`Duplicate source resolver scheme: ${resolver.scheme}`);
    }
    this.resolvers.set(resolver.scheme, resolver);
    this.logger.debug({ scheme: resolver.scheme }, "Resolver 등록 완료");
  }

  /**
   * source spec 해석
   * @param cache 지정 시 동일 spec은 한 번만 해석 (실패는 캐시하지 않음)
   * @throws MalformedSpecError / UnsupportedSchemeError
   */
  async resolve(spec: string, cache?: ResolutionCache): Promise<ResolutionResult> {
    const cached = cache?.get(spec);
    if (cached) {
      this.logger.debug({ spec }, "해석 캐시 적중");
      return cached;
    }

    const { scheme, payload } = parseSourceSpec(spec);
    const resolver = this.resolvers.get(scheme);
    if (!resolver) {
      throw new UnsupportedSchemeError(scheme, this.getAvailableSchemes());
    }

    const result = await resolver.resolve(payload);
    cache?.set(spec, result);
    return result;
  }

  /**
   * 등록된 scheme 목록
   */
  getAvailableSchemes(): string[] {
    return Array.from(this.resolvers.keys());
  }
}
