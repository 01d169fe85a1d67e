/**
 * Elastic Beanstalk Platform Repository
 * 관리형 플랫폼 버전 조회 (beanstalk 해석 전략 전용)
 */

import {
  DescribePlatformVersionCommand,
  ElasticBeanstalkClient,
  ListPlatformVersionsCommand,
} from "@aws-sdk/client-elastic-beanstalk";
import type {
  IPlatformVersionRepository,
  PlatformVersionDetail,
} from "@/core/interfaces/IPlatformVersionRepository";
import { drainPages } from "@/utils/pagination";
import { withTransportError } from "@/utils/aws";

export class BeanstalkPlatformRepository implements IPlatformVersionRepository {
  constructor(private readonly client: ElasticBeanstalkClient) {}

  async listVersions(platformBranch: string, status: string): Promise<string[]> {
    const summaries = await withTransportError(
      "elasticbeanstalk:ListPlatformVersions",
      () =>
        drainPages(async (nextToken) => {
          const response = await this.client.send(
            new ListPlatformVersionsCommand({
              Filters: [
                { Type: "PlatformBranchName", Operator: "=", Values: [platformBranch] },
                { Type: "PlatformStatus", Operator: "=", Values: [status] },
              ],
              NextToken: nextToken,
            }),
          );
          return {
            items: response.PlatformSummaryList ?? [],
            nextToken: response.NextToken,
          };
        }),
    );

    return summaries.flatMap((summary) =>
      summary.PlatformArn ? [summary.PlatformArn] : [],
    );
  }

  async describeVersion(arn: string): Promise<PlatformVersionDetail> {
    const response = await withTransportError(
      "elasticbeanstalk:DescribePlatformVersion",
      () => this.client.send(new DescribePlatformVersionCommand({ PlatformArn: arn })),
    );
    const description = response.PlatformDescription;

    return {
      arn,
      name: description?.PlatformName,
      version: description?.PlatformVersion,
      solutionStackName: description?.SolutionStackName,
      customImages: (description?.CustomAmiList ?? []).flatMap((ami) =>
        ami.ImageId
          ? [{ imageId: ami.ImageId, virtualizationType: ami.VirtualizationType ?? "" }]
          : [],
      ),
      createdAt: description?.DateCreated,
      updatedAt: description?.DateUpdated,
    };
  }
}
