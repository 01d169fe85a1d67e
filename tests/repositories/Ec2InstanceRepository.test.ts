/**
 * Ec2InstanceRepository 테스트
 */

import { afterEach, describe, it, expect, jest } from "@jest/globals";
import { EC2Client } from "@aws-sdk/client-ec2";
import { Ec2InstanceRepository } from "@/repositories/Ec2InstanceRepository";

describe("Ec2InstanceRepository", () => {
  const client = new EC2Client({ region: "us-east-1" });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("describeInstances: 예약 단위 응답을 인스턴스 목록으로 펼침", async () => {
    const send = jest.spyOn(client, "send").mockImplementation(async () => ({
      $metadata: {},
      Reservations: [
        {
          Instances: [
            {
              InstanceId: "i-1",
              State: { Name: "running" },
              Tags: [{ Key: "Platform", Value: "Ubuntu" }],
            },
            { InstanceId: "i-2" },
          ],
        },
        { Instances: [{ InstanceId: "i-3", State: { Name: "stopped" } }] },
        {},
      ],
    }));
    const repository = new Ec2InstanceRepository(client);

    const instances = await repository.describeInstances({
      "tag:Platform": ["Ubuntu"],
      "instance-state-name": ["running", "stopped"],
    });

    expect(instances).toEqual([
      { instanceId: "i-1", state: "running", tags: { Platform: "Ubuntu" } },
      { instanceId: "i-2", state: "unknown", tags: {} },
      { instanceId: "i-3", state: "stopped", tags: {} },
    ]);
    expect(send.mock.calls[0]?.[0].input).toEqual({
      Filters: [
        { Name: "tag:Platform", Values: ["Ubuntu"] },
        { Name: "instance-state-name", Values: ["running", "stopped"] },
      ],
    });
  });

  it("terminateInstances: ID가 없으면 호출하지 않음", async () => {
    const send = jest.spyOn(client, "send").mockImplementation(async () => ({ $metadata: {} }));
    const repository = new Ec2InstanceRepository(client);

    await repository.terminateInstances([]);
    await repository.terminateInstances(["i-1", "i-2"]);

    expect(send).toHaveBeenCalledTimes(1);
    expect(send.mock.calls[0]?.[0].input).toEqual({ InstanceIds: ["i-1", "i-2"] });
  });
});
