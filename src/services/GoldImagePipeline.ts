/**
 * Gold Image Pipeline
 * 정의 로드 → 소스 해석 → stale 판정 → 동시성 확인 → 빌드 제출
 *
 * 특징:
 * - 모든 외부 호출은 순차 실행 (정의 간 병렬 처리 없음)
 * - 해석 캐시는 실행마다 새로 만들고 실행 종료 시 폐기
 * - 제출 지연은 목록 순서 × staggerIntervalSeconds (부하 분산용, 정합성 보장 아님)
 */

import { v7 as uuidv7 } from "uuid";
import { createComponentLogger, type Logger } from "@/config/logger";
import type { PipelineConfig } from "@/config/PipelineConfig";
import type {
  BuildDefinition,
  ResolvedDefinition,
} from "@/core/domain/BuildDefinition";
import {
  InvalidBlockDeviceTemplateError,
  MalformedSpecError,
  UnsupportedSchemeError,
  toErrorLog,
} from "@/core/domain/errors";
import type { IDefinitionRepository } from "@/core/interfaces/IParameterStore";
import { toBuildDefinition } from "@/mappers/DefinitionMapper";
import {
  ResolutionCache,
  type SourceResolverRegistry,
} from "@/resolvers/SourceResolverRegistry";
import type { BlockDeviceComposer } from "./BlockDeviceComposer";
import type { BuildScheduler } from "./BuildScheduler";
import type { ConcurrencyGuard } from "./ConcurrencyGuard";
import type { StalenessFilter } from "./StalenessFilter";

/**
 * 실행 옵션 (미지정 항목은 PipelineConfig 값 사용)
 */
export interface PipelineRunOptions {
  /** 플랫폼 정의 경로 prefix */
  pathPrefix?: string;
  /** 소스 이미지 최소 경과일 */
  minAgeDays?: number;
  /** Worker 인스턴스 실행 ID 태그 prefix */
  instanceTagPrefix?: string;
  /** 빌드 문서명 (정의에 DocumentName이 없을 때) */
  documentName?: string;
  /** 빌드 대상 플랫폼 allowlist (비어 있으면 전체) */
  platforms?: readonly string[];
  /** stale 판정 생략 (모든 정의 재빌드) */
  force?: boolean;
  /** 동시성 확인/제출 생략 */
  dryRun?: boolean;
}

export interface SubmittedBuild {
  platform: string;
  executionId: string;
  delaySeconds: number;
}

export interface PipelineRunResult {
  runId: string;
  /** 최종 빌드 검토 대상 정의 */
  definitions: ResolvedDefinition[];
  submitted: SubmittedBuild[];
  /** 진행 중 빌드로 건너뛴 플랫폼 */
  skipped: string[];
}

export interface PipelineDependencies {
  definitions: IDefinitionRepository;
  resolvers: SourceResolverRegistry;
  composer: BlockDeviceComposer;
  stalenessFilter: StalenessFilter;
  guard: ConcurrencyGuard;
  scheduler: BuildScheduler;
}

export class GoldImagePipeline {
  constructor(
    private readonly deps: PipelineDependencies,
    private readonly config: PipelineConfig,
    private readonly logger: Logger = createComponentLogger("GoldImagePipeline"),
  ) {}

  async run(options: PipelineRunOptions = {}): Promise<PipelineRunResult> {
    const runId = uuidv7();
    const runLogger = this.logger.child({ run_id: runId });
    const pathPrefix = options.pathPrefix ?? this.config.platformPathPrefix;
    const minAgeDays = options.minAgeDays ?? this.config.minAgeDays;
    const instanceTagPrefix = options.instanceTagPrefix ?? this.config.instanceTagPrefix;
    const documentName = options.documentName ?? this.config.documentName;

    runLogger.info(
      {
        path_prefix: pathPrefix,
        min_age_days: minAgeDays,
        force: options.force ?? false,
        dry_run: options.dryRun ?? false,
        platforms: options.platforms,
      },
      "[Pipeline] 실행 시작",
    );

    // 1. 정의 로드 (필수 필드 누락은 조용히 제외)
    const raws = await this.deps.definitions.getDefinitions(pathPrefix);
    const definitions = raws
      .map((raw) => toBuildDefinition(raw, documentName, runLogger))
      .filter((definition): definition is BuildDefinition => definition !== null);

    // 2. 소스 해석 + block device 확정
    const resolvedDefinitions = await this.resolveAll(definitions, runLogger);

    // 3. stale 판정
    let candidates = options.force
      ? resolvedDefinitions
      : await this.deps.stalenessFilter.apply(resolvedDefinitions, minAgeDays);

    // 4. 플랫폼 allowlist
    if (options.platforms && options.platforms.length > 0) {
      const allowed = new Set(options.platforms);
      candidates = candidates.filter((candidate) => allowed.has(candidate.platform));
    }

    runLogger.info(
      {
        loaded: raws.length,
        valid: definitions.length,
        resolved: resolvedDefinitions.length,
        candidates: candidates.map((candidate) => candidate.platform),
      },
      "[Pipeline] 빌드 대상 확정",
    );

    // 5. 동시성 확인 + 제출
    const submitted: SubmittedBuild[] = [];
    const skipped: string[] = [];

    for (const [index, candidate] of candidates.entries()) {
      const delaySeconds = index * this.config.staggerIntervalSeconds;

      if (options.dryRun) {
        runLogger.info(
          { platform: candidate.platform, delay_seconds: delaySeconds },
          "[Pipeline] dry-run - 제출 생략",
        );
        continue;
      }

      const ready = await this.deps.guard.isReady(
        candidate.platform,
        candidate.documentName,
        instanceTagPrefix,
      );
      if (!ready) {
        runLogger.warn(
          { platform: candidate.platform },
          "[Pipeline] 진행 중인 빌드 존재 - 스킵",
        );
        skipped.push(candidate.platform);
        continue;
      }

      const executionId = await this.deps.scheduler.submit(candidate, delaySeconds);
      submitted.push({ platform: candidate.platform, executionId, delaySeconds });
    }

    runLogger.info(
      { submitted: submitted.length, skipped: skipped.length },
      "[Pipeline] 실행 완료",
    );

    return { runId, definitions: candidates, submitted, skipped };
  }

  /**
   * 정의별 소스 해석
   *
   * - not_found: 해당 정의 제외
   * - 잘못된 spec/scheme, 템플릿 형식 오류: 해당 정의만 제외
   * - MissingRootDeviceError, TransportError: 실행 전체 중단
   */
  private async resolveAll(
    definitions: readonly BuildDefinition[],
    runLogger: Logger,
  ): Promise<ResolvedDefinition[]> {
    const cache = new ResolutionCache();
    const resolvedDefinitions: ResolvedDefinition[] = [];

    for (const definition of definitions) {
      try {
        const result = await this.deps.resolvers.resolve(definition.source, cache);
        if (result.status === "not_found") {
          runLogger.warn(
            { platform: definition.platform, source: definition.source, reason: result.reason },
            "[Pipeline] 소스 이미지 없음 - 제외",
          );
          continue;
        }

        resolvedDefinitions.push({
          ...definition,
          image: result.image,
          finalBlockDevices: this.deps.composer.compose(definition, result.image),
        });
      } catch (error) {
        if (
          error instanceof MalformedSpecError ||
          error instanceof UnsupportedSchemeError ||
          error instanceof InvalidBlockDeviceTemplateError
        ) {
          runLogger.error(
            { platform: definition.platform, ...toErrorLog(error) },
            "[Pipeline] 정의 해석 실패 - 제외",
          );
          continue;
        }
        throw error;
      }
    }

    return resolvedDefinitions;
  }
}
