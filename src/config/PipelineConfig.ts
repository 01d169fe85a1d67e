/**
 * Pipeline 설정
 *
 * 환경변수를 한 번만 파싱해서 불변 설정 객체로 만든 뒤
 * 각 컴포넌트 생성자에 명시적으로 전달한다 (전역 세션/상태 없음)
 *
 * 환경변수:
 * - AWS_REGION: AWS 리전 (SDK 기본 체인 사용 시 생략)
 * - PLATFORM_PATH_PREFIX: 플랫폼 정의 파라미터 경로
 * - BUILD_DOCUMENT_NAME: 빌드 Automation 문서명
 * - MIN_AGE_DAYS: 소스 이미지 최소 경과일
 * - INSTANCE_TAG_PREFIX: Worker 인스턴스 실행 ID 태그 prefix
 * - ARTIFACT_NAME_PREFIX: Gold 이미지 이름 prefix
 * - TRUSTED_IMAGE_OWNERS: name 전략에서 허용하는 소유자 (콤마 구분)
 * - STAGGER_INTERVAL_SECONDS: 빌드 간 지연 간격
 * - SCHEDULE_CRON / SCHEDULE_TIMEZONE: 주기 실행 설정
 */

import { z } from "zod";
import { ConfigurationError } from "@/core/domain/errors";

const commaList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  )
  .pipe(z.array(z.string()).min(1));

/**
 * 환경변수 스키마
 */
export const PipelineConfigSchema = z.object({
  AWS_REGION: z.string().min(1).optional(),
  PLATFORM_PATH_PREFIX: z
    .string()
    .startsWith("/")
    .default("/gold-image/platforms"),
  BUILD_DOCUMENT_NAME: z.string().min(1).default("GoldImage-Build"),
  MIN_AGE_DAYS: z.coerce.number().int().min(0).default(3),
  INSTANCE_TAG_PREFIX: z.string().default("aws:ssm:"),
  ARTIFACT_NAME_PREFIX: z.string().min(1).default("gold-"),
  TRUSTED_IMAGE_OWNERS: commaList.default("amazon"),
  STAGGER_INTERVAL_SECONDS: z.coerce.number().int().min(0).default(300),
  SCHEDULE_CRON: z.string().min(1).default("0 3 * * *"),
  SCHEDULE_TIMEZONE: z.string().min(1).default("UTC"),
});

/**
 * 파이프라인 설정
 */
export interface PipelineConfig {
  readonly region?: string;
  readonly platformPathPrefix: string;
  readonly documentName: string;
  readonly minAgeDays: number;
  readonly instanceTagPrefix: string;
  readonly artifactNamePrefix: string;
  readonly trustedImageOwners: readonly string[];
  readonly staggerIntervalSeconds: number;
  readonly schedule: {
    readonly cron: string;
    readonly timezone: string;
  };
}

/**
 * 환경변수 → PipelineConfig
 * @throws ConfigurationError 값이 유효하지 않은 경우
 */
export function loadPipelineConfig(
  env: NodeJS.ProcessEnv = process.env,
): PipelineConfig {
  // 빈 문자열은 미설정으로 취급 (기본값 적용)
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );

  const parsed = PipelineConfigSchema.safeParse(defined);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid pipeline configuration: ${issues}`);
  }

  const values = parsed.data;
  return Object.freeze({
    region: values.AWS_REGION,
    platformPathPrefix: values.PLATFORM_PATH_PREFIX.replace(/\/+$/, ""),
    documentName: values.BUILD_DOCUMENT_NAME,
    minAgeDays: values.MIN_AGE_DAYS,
    instanceTagPrefix: values.INSTANCE_TAG_PREFIX,
    artifactNamePrefix: values.ARTIFACT_NAME_PREFIX,
    trustedImageOwners: Object.freeze([...values.TRUSTED_IMAGE_OWNERS]),
    staggerIntervalSeconds: values.STAGGER_INTERVAL_SECONDS,
    schedule: Object.freeze({
      cron: values.SCHEDULE_CRON,
      timezone: values.SCHEDULE_TIMEZONE,
    }),
  });
}
