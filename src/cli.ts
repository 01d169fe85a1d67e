#!/usr/bin/env node
/**
 * Gold Image Pipeline CLI
 * 1회 실행 후 결과(JSON)를 stdout으로 출력
 *
 * 사용법:
 *   npm start -- [options]
 *
 * 옵션:
 *   --path-prefix <path>      플랫폼 정의 경로 (기본: PLATFORM_PATH_PREFIX)
 *   --min-age-days <n>        소스 이미지 최소 경과일 (기본: MIN_AGE_DAYS)
 *   --tag-prefix <prefix>     Worker 인스턴스 태그 prefix (기본: INSTANCE_TAG_PREFIX)
 *   --document-name <name>    빌드 문서명 (기본: BUILD_DOCUMENT_NAME)
 *   --platforms <a,b,...>     빌드 대상 플랫폼 제한
 *   --force                   stale 판정 생략
 *   --dry-run                 제출하지 않고 대상만 출력
 *
 * 예시:
 *   npm start -- --platforms "Ubuntu 22.04,Amazon Linux 2023" --dry-run
 */

import "dotenv/config";
import { logger } from "@/config/logger";
import { loadPipelineConfig } from "@/config/PipelineConfig";
import { toErrorLog } from "@/core/domain/errors";
import type { PipelineRunOptions } from "@/services/GoldImagePipeline";
import { createPipeline } from "@/services/createPipeline";

const VALUE_OPTIONS = [
  "--path-prefix",
  "--min-age-days",
  "--tag-prefix",
  "--document-name",
  "--platforms",
] as const;

/**
 * argv → 실행 옵션
 * @throws Error 알 수 없는 옵션 / 값 누락
 */
export function parseCliArgs(argv: readonly string[]): PipelineRunOptions {
  const options: PipelineRunOptions = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--force") {
      options.force = true;
      continue;
    }
    if (arg === "--dry-run") {
      options.dryRun = true;
      continue;
    }

    if (!VALUE_OPTIONS.some((option) => option === arg)) {
      throw new Error(`Unknown option: ${arg}`);
    }
    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new Error(`Missing value for ${arg}`);
    }
    i++;

    switch (arg) {
      case "--path-prefix":
        options.pathPrefix = value;
        break;
      case "--min-age-days": {
        const days = Number(value);
        if (!Number.isInteger(days) || days < 0) {
          throw new Error(`--min-age-days must be a non-negative integer: ${value}`);
        }
        options.minAgeDays = days;
        break;
      }
      case "--tag-prefix":
        options.instanceTagPrefix = value;
        break;
      case "--document-name":
        options.documentName = value;
        break;
      case "--platforms":
        options.platforms = value
          .split(",")
          .map((platform) => platform.trim())
          .filter((platform) => platform.length > 0);
        break;
    }
  }

  return options;
}

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));
  const config = loadPipelineConfig();
  const pipeline = createPipeline(config);

  const result = await pipeline.run(options);
  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.fatal(toErrorLog(error), "[CLI] 실행 실패");
    process.exitCode = 1;
  });
}
