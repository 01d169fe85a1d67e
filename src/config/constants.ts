/**
 * 파이프라인 고정 상수
 *
 * 환경변수로 바뀌지 않는 값만 정의
 * - 환경별 설정은 PipelineConfig.ts 참고
 */

/**
 * Gold 이미지 태그 스키마 버전
 *
 * 태그 구조가 바뀌면 버전을 올려 기존 아티팩트를 모두 stale 처리
 */
export const SCHEMA_VERSION = "v3";

/**
 * Gold 이미지 / 빌드 실행에 붙는 태그 키
 */
export const ARTIFACT_TAGS = {
  SOURCE_IMAGE_ID: "SourceImageId",
  PLATFORM: "Platform",
  VERSION: "Version",
  GOLD_IMAGE: "GoldImage",
  SOURCE: "Source",
  SOLUTION_STACK: "SolutionStack",
} as const;

/**
 * name-pattern 해석 시 고정 필터
 * (64-bit, machine image, EBS root, HVM, available)
 */
export const SOURCE_IMAGE_CONSTRAINTS = {
  architecture: "x86_64",
  "image-type": "machine",
  "root-device-type": "ebs",
  "virtualization-type": "hvm",
  state: "available",
} as const;

/**
 * EC2 Filter 하나에 넣을 수 있는 최대 값 개수
 */
export const MAX_FILTER_VALUES = 200;

/**
 * Block device 템플릿의 루트 디바이스 placeholder
 */
export const ROOT_DEVICE_PLACEHOLDER = "{RootDeviceName}";

/**
 * Automation 실행 상태
 */
export const EXECUTION_STATUS = {
  PENDING: "Pending",
  IN_PROGRESS: "InProgress",
  WAITING: "Waiting",
} as const;

/**
 * Concurrency Guard가 조회하는 "살아있는" 실행 상태
 */
export const LIVE_EXECUTION_STATUSES = [
  EXECUTION_STATUS.PENDING,
  EXECUTION_STATUS.IN_PROGRESS,
  EXECUTION_STATUS.WAITING,
] as const;

/**
 * 정리 대상 Worker 인스턴스 상태 (terminated/shutting-down 제외)
 */
export const RECLAIMABLE_INSTANCE_STATES = [
  "pending",
  "running",
  "stopping",
  "stopped",
] as const;

/**
 * Automation이 Worker 인스턴스에 남기는 실행 ID 태그 (prefix 뒤에 붙음)
 */
export const EXECUTION_ID_TAG_SUFFIX = "automation-execution-id";

/**
 * 빌드 문서에 전달하는 파라미터 키
 */
export const BUILD_PARAMETERS = {
  SOURCE_IMAGE_ID: "sourceImageId",
  IMAGE_NAME: "imageName",
  PLATFORM: "platform",
  PLATFORM_KEY: "platformKey",
  DELAY_TIME: "delayTime",
  BLOCK_DEVICES: "blockDevices",
  USER_DATA: "userData",
  IMAGE_DESCRIPTION: "imageDescription",
  SOLUTION_STACK: "solutionStack",
} as const;

/**
 * Beanstalk 플랫폼 버전 중 해석 대상 상태
 */
export const PLATFORM_VERSION_READY_STATUS = "Ready";

/**
 * Beanstalk custom AMI 중 사용 가능한 가상화 타입
 */
export const HVM_VIRTUALIZATION = "hvm";
