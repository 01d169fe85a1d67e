/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 콘솔 출력:
 * - LOG_PRETTY=true: 색상 포맷 (개발용)
 * - 기본: JSON 한 줄 (CloudWatch 등 수집용)
 *
 * 파일 출력 (LOG_DIR 설정 시에만):
 * - LOG_DIR/YYYY-MM-DD/pipeline.log
 * - LOG_DIR/YYYY-MM-DD/error.log (에러 통합)
 * - 일일 로테이션, 30일 보관
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream, type RotatingFileStream } from "rotating-file-stream";
import path from "path";
import { getDateStringWithDash, getTimestampWithTimezone } from "@/utils/timestamp";

// 환경 변수
const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (NODE_ENV === "test" ? "silent" : NODE_ENV === "production" ? "info" : "debug");
const LOG_DIR = process.env.LOG_DIR;
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const SERVICE_NAME = process.env.SERVICE_NAME || "pipeline";

/**
 * Pino 로그 레벨 상수
 */
const LOG_LEVELS = {
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
} as const;

/**
 * 날짜별 디렉터리에 로그 파일 생성
 * 구조: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(logDir: string, prefix: string): RotatingFileStream {
  return createStream(
    (time) => {
      const date = time instanceof Date ? time : new Date();
      return path.join(getDateStringWithDash(date), `${prefix}.log`);
    },
    {
      interval: "1d", // 일일 로테이션
      intervalBoundary: true, // 자정 기준 정렬
      path: logDir,
      maxFiles: 30,
      maxSize: "100M",
    },
  );
}

/**
 * 파일 라우팅 스트림
 * 에러는 error.log에도 기록
 */
class FileRoutingStream implements DestinationStream {
  constructor(
    private readonly mainStream: RotatingFileStream,
    private readonly errorStream: RotatingFileStream,
  ) {}

  write(chunk: string): void {
    this.mainStream.write(chunk);
    if (chunk.includes('"level":"error"') || chunk.includes('"level":"fatal"')) {
      this.errorStream.write(chunk);
    }
  }
}

/**
 * 콘솔 출력을 hook이 담당할 때 사용하는 빈 스트림
 */
class DiscardStream implements DestinationStream {
  write(): void {}
}

type ConsoleFormatter = (logObj: Record<string, unknown>, level: number) => void;

/**
 * 개발 환경용 콘솔 포맷터 (색상 + 구조화)
 */
const formatConsolePretty: ConsoleFormatter = (logObj, level) => {
  const msg = typeof logObj.msg === "string" ? logObj.msg : "";
  const time = new Date().toLocaleTimeString("en-US", { hour12: false });
  const levelColor =
    level >= LOG_LEVELS.ERROR
      ? "\x1b[31m"
      : level >= LOG_LEVELS.WARN
        ? "\x1b[33m"
        : "\x1b[32m";
  const levelText =
    level >= LOG_LEVELS.ERROR
      ? "ERROR"
      : level >= LOG_LEVELS.WARN
        ? "WARN"
        : level >= LOG_LEVELS.INFO
          ? "INFO"
          : "DEBUG";

  console.error(`[${time}] ${levelColor}${levelText}\x1b[0m \x1b[36m${msg}\x1b[0m`);

  for (const [field, value] of Object.entries(logObj)) {
    if (field === "msg") continue;
    const rendered =
      typeof value === "object"
        ? JSON.stringify(value, null, 2)
            .split("\n")
            .map((line) => "  " + line)
            .join("\n")
        : String(value);
    console.error(`  ${field}: ${rendered}`);
  }
};

/**
 * 콘솔 출력 Hook 생성
 * Pino 형식: logger.info(obj, msg) 또는 logger.info(msg)
 */
function createConsoleHook(formatter: ConsoleFormatter): pino.LoggerOptions["hooks"] {
  return {
    logMethod(inputArgs, method, level) {
      method.apply(this, inputArgs);

      const [first, second] = inputArgs;
      const logObj: Record<string, unknown> = {};
      if (typeof first === "string") {
        logObj.msg = first;
      } else if (typeof first === "object" && first !== null) {
        Object.assign(logObj, first);
        if (typeof second === "string") {
          logObj.msg = second;
        }
      }

      formatter(logObj, level);
    },
  };
}

/**
 * 기본 로거 설정
 */
const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: "gold_image_pipeline",
    env: NODE_ENV,
    service_name: SERVICE_NAME,
  },
};

const streams: pino.StreamEntry[] = [];

if (LOG_DIR) {
  streams.push({
    level: "debug",
    stream: new FileRoutingStream(
      createRotatingStream(LOG_DIR, SERVICE_NAME),
      createRotatingStream(LOG_DIR, "error"),
    ),
  });
}

/**
 * 메인 로거 인스턴스
 */
let logger: pino.Logger;

if (LOG_PRETTY) {
  // 개발 환경: 색상 포맷 (콘솔은 hook, 파일은 JSON)
  if (streams.length === 0) {
    streams.push({ level: "debug", stream: new DiscardStream() });
  }
  logger = pino(
    { ...baseConfig, hooks: createConsoleHook(formatConsolePretty) },
    pino.multistream(streams),
  );
} else {
  // 프로덕션: stdout JSON
  streams.push({ level: "debug", stream: pino.destination({ dest: 1, sync: true }) });
  logger = pino(baseConfig, pino.multistream(streams));
}

/**
 * 컴포넌트 전용 로거 생성
 * @param component 컴포넌트명 (예: "ConcurrencyGuard")
 */
export function createComponentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}

export { logger };

export type Logger = pino.Logger;
