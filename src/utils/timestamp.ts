/**
 * 타임스탬프 유틸리티
 *
 * SOLID 원칙:
 * - SRP: 시간 계산/포맷만 담당
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * 현재 시각 제공자 (테스트에서 고정 시각 주입용)
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * 타임존 정보가 포함된 타임스탬프 생성
 * ISO 8601 형식 (예: 2025-10-30T12:34:56.789+09:00)
 *
 * - TZ 환경 변수 기준 로컬 타임존
 * - 밀리초 단위까지 기록
 */
export function getTimestampWithTimezone(now: Date = new Date()): string {
  const offset = -now.getTimezoneOffset();
  const offsetHours = Math.floor(Math.abs(offset) / 60);
  const offsetMinutes = Math.abs(offset) % 60;
  const offsetSign = offset >= 0 ? "+" : "-";

  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, "0");
  const day = String(now.getDate()).padStart(2, "0");
  const hours = String(now.getHours()).padStart(2, "0");
  const minutes = String(now.getMinutes()).padStart(2, "0");
  const seconds = String(now.getSeconds()).padStart(2, "0");
  const milliseconds = String(now.getMilliseconds()).padStart(3, "0");

  return `${year}-${month}-${day}T${hours}:${minutes}:${seconds}.${milliseconds}${offsetSign}${String(offsetHours).padStart(2, "0")}:${String(offsetMinutes).padStart(2, "0")}`;
}

/**
 * YYYY-MM-DD 형식의 날짜 문자열 반환 (로컬 타임존 기준)
 */
export function getDateStringWithDash(now: Date = new Date()): string {
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, "0");
  const day = String(now.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * 초 단위 지연 → ISO 8601 duration
 * @example toIsoDuration(600) // "PT600S"
 */
export function toIsoDuration(seconds: number): string {
  return `PT${seconds}S`;
}

/**
 * now 기준 days일 이전 시각
 */
export function subtractDays(now: Date, days: number): Date {
  return new Date(now.getTime() - days * MS_PER_DAY);
}
