/**
 * EC2 Instance Repository
 * 빌드 Worker 인스턴스 조회/종료
 */

import {
  DescribeInstancesCommand,
  EC2Client,
  TerminateInstancesCommand,
  type Instance,
} from "@aws-sdk/client-ec2";
import type { WorkerInstance } from "@/core/domain/AutomationExecution";
import type {
  IInstanceRepository,
  InstanceFilters,
} from "@/core/interfaces/IInstanceRepository";
import { drainPages } from "@/utils/pagination";
import { tagsToRecord, toNameValuesFilters, withTransportError } from "@/utils/aws";

export class Ec2InstanceRepository implements IInstanceRepository {
  constructor(private readonly client: EC2Client) {}

  async describeInstances(filters: InstanceFilters): Promise<WorkerInstance[]> {
    const instances = await withTransportError("ec2:DescribeInstances", () =>
      drainPages<Instance>(async (nextToken) => {
        const response = await this.client.send(
          new DescribeInstancesCommand({
            Filters: toNameValuesFilters(filters),
            NextToken: nextToken,
          }),
        );
        const items = (response.Reservations ?? []).flatMap(
          (reservation) => reservation.Instances ?? [],
        );
        return { items, nextToken: response.NextToken };
      }),
    );

    return instances.flatMap((instance) =>
      instance.InstanceId
        ? [
            {
              instanceId: instance.InstanceId,
              state: instance.State?.Name ?? "unknown",
              tags: tagsToRecord(instance.Tags),
            },
          ]
        : [],
    );
  }

  async terminateInstances(instanceIds: readonly string[]): Promise<void> {
    if (instanceIds.length === 0) {
      return;
    }
    await withTransportError("ec2:TerminateInstances", () =>
      this.client.send(new TerminateInstancesCommand({ InstanceIds: [...instanceIds] })),
    );
  }
}
