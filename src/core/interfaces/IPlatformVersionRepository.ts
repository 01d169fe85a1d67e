/**
 * Platform Version Repository 인터페이스
 * beanstalk 해석 전략 전용
 */

export interface CustomImage {
  imageId: string;
  virtualizationType: string;
}

export interface PlatformVersionDetail {
  arn: string;
  name?: string;
  version?: string;
  solutionStackName?: string;
  customImages: CustomImage[];
  createdAt?: Date;
  updatedAt?: Date;
}

export interface IPlatformVersionRepository {
  /**
   * 플랫폼 branch의 버전 ARN 목록 (페이지 전체 수집)
   * @param platformBranch 플랫폼 branch명
   * @param status 플랫폼 상태 (예: "Ready")
   */
  listVersions(platformBranch: string, status: string): Promise<string[]>;

  /**
   * 플랫폼 버전 상세
   */
  describeVersion(arn: string): Promise<PlatformVersionDetail>;
}
