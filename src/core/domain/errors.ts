/**
 * Pipeline Error Types
 *
 * 목적:
 * - 실패 원인 세분화 (정의 단위 실패 vs 실행 전체 중단)
 * - 에러별 로깅 필드 통일
 *
 * SOLID 원칙:
 * - SRP: 에러 타입 정의만 담당
 * - OCP: 새로운 에러 타입 추가 가능
 */

/**
 * Pipeline 에러 타입
 */
export enum PipelineErrorType {
  /** source spec에 "scheme:payload" 구분자가 없음 */
  MALFORMED_SPEC = "MALFORMED_SPEC",

  /** 등록되지 않은 scheme */
  UNSUPPORTED_SCHEME = "UNSUPPORTED_SCHEME",

  /** block device 템플릿 치환에 필요한 루트 디바이스 없음 */
  MISSING_ROOT_DEVICE = "MISSING_ROOT_DEVICE",

  /** block device 템플릿 파싱/검증 실패 */
  INVALID_BLOCK_DEVICE_TEMPLATE = "INVALID_BLOCK_DEVICE_TEMPLATE",

  /** AWS API 호출 실패 (네트워크, throttling, 권한) */
  TRANSPORT = "TRANSPORT",

  /** 환경 설정 오류 */
  CONFIGURATION = "CONFIGURATION",
}

/**
 * Pipeline Error 기본 클래스
 */
export class PipelineError extends Error {
  public readonly type: PipelineErrorType;

  constructor(type: PipelineErrorType, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PipelineError";
    this.type = type;
  }

  /**
   * 로그용 객체 변환
   */
  toLogObject(): Record<string, unknown> {
    return {
      error_type: this.type,
      name: this.name,
      message: this.message,
      stack: this.stack,
    };
  }
}

export class MalformedSpecError extends PipelineError {
  constructor(public readonly spec: string) {
    super(
      PipelineErrorType.MALFORMED_SPEC,
      `Malformed source spec: "${spec}" (expected "scheme:payload")`,
    );
    this.name = "MalformedSpecError";
  }
}

export class UnsupportedSchemeError extends PipelineError {
  constructor(
    public readonly scheme: string,
    public readonly available: readonly string[],
  ) {
    super(
      PipelineErrorType.UNSUPPORTED_SCHEME,
      `Unsupported source scheme: ${scheme}. Available: [${available.join(", ")}]`,
    );
    this.name = "UnsupportedSchemeError";
  }
}

export class MissingRootDeviceError extends PipelineError {
  constructor(
    public readonly platform: string,
    public readonly imageId: string,
  ) {
    super(
      PipelineErrorType.MISSING_ROOT_DEVICE,
      `Image ${imageId} has no root device name but the block device template for ${platform} requires one`,
    );
    this.name = "MissingRootDeviceError";
  }
}

export class InvalidBlockDeviceTemplateError extends PipelineError {
  constructor(
    public readonly platform: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(
      PipelineErrorType.INVALID_BLOCK_DEVICE_TEMPLATE,
      `Invalid block device template for ${platform}: ${reason}`,
      options,
    );
    this.name = "InvalidBlockDeviceTemplateError";
  }
}

/**
 * AWS SDK 호출 실패 래퍼
 * 재시도하지 않고 실행 전체를 중단시킨다
 */
export class TransportError extends PipelineError {
  public readonly operation: string;
  public readonly statusCode?: number;

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(PipelineErrorType.TRANSPORT, `${operation} failed: ${reason}`, {
      cause,
    });
    this.name = "TransportError";
    this.operation = operation;
    this.statusCode = extractStatusCode(cause);
  }

  override toLogObject(): Record<string, unknown> {
    return {
      ...super.toLogObject(),
      operation: this.operation,
      status_code: this.statusCode,
    };
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string) {
    super(PipelineErrorType.CONFIGURATION, message);
    this.name = "ConfigurationError";
  }
}

/**
 * SDK 에러의 $metadata.httpStatusCode 추출
 */
function extractStatusCode(error: unknown): number | undefined {
  if (!error || typeof error !== "object" || !("$metadata" in error)) {
    return undefined;
  }
  const metadata = error.$metadata;
  if (!metadata || typeof metadata !== "object" || !("httpStatusCode" in metadata)) {
    return undefined;
  }
  const status = metadata.httpStatusCode;
  return typeof status === "number" ? status : undefined;
}

/**
 * 임의의 에러를 로그 필드로 변환
 */
export function toErrorLog(error: unknown): Record<string, unknown> {
  if (error instanceof PipelineError) {
    return error.toLogObject();
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}
