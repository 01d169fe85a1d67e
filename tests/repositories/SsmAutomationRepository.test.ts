/**
 * SsmAutomationRepository 테스트
 */

import { afterEach, describe, it, expect, jest } from "@jest/globals";
import {
  DescribeAutomationExecutionsCommand,
  SSMClient,
  StartAutomationExecutionCommand,
} from "@aws-sdk/client-ssm";
import { SsmAutomationRepository } from "@/repositories/SsmAutomationRepository";

describe("SsmAutomationRepository", () => {
  const client = new SSMClient({ region: "us-east-1" });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("describeExecutions: 문서명 prefix + 상태 필터, 페이지 전체 수집", async () => {
    const send = jest
      .spyOn(client, "send")
      .mockImplementationOnce(async () => ({
        $metadata: {},
        AutomationExecutionMetadataList: [
          {
            AutomationExecutionId: "exec-1",
            DocumentName: "GoldImage-Build",
            AutomationExecutionStatus: "InProgress",
          },
          { DocumentName: "GoldImage-Build" },
        ],
        NextToken: "next",
      }))
      .mockImplementationOnce(async () => ({
        $metadata: {},
        AutomationExecutionMetadataList: [
          {
            AutomationExecutionId: "exec-2",
            DocumentName: "GoldImage-Build-v1",
            AutomationExecutionStatus: "Success",
          },
        ],
      }));
    const repository = new SsmAutomationRepository(client);

    const executions = await repository.describeExecutions(
      ["GoldImage-Build", "GoldImage-"],
      ["Pending", "InProgress", "Waiting"],
    );

    expect(executions).toEqual([
      { executionId: "exec-1", documentName: "GoldImage-Build", status: "InProgress" },
      { executionId: "exec-2", documentName: "GoldImage-Build-v1", status: "Other" },
    ]);
    expect(send.mock.calls.map(([command]) => command.input)).toEqual([
      {
        Filters: [
          { Key: "DocumentNamePrefix", Values: ["GoldImage-Build", "GoldImage-"] },
          { Key: "ExecutionStatus", Values: ["Pending", "InProgress", "Waiting"] },
        ],
      },
      {
        Filters: [
          { Key: "DocumentNamePrefix", Values: ["GoldImage-Build", "GoldImage-"] },
          { Key: "ExecutionStatus", Values: ["Pending", "InProgress", "Waiting"] },
        ],
        NextToken: "next",
      },
    ]);
    expect(send.mock.calls[0]?.[0]).toBeInstanceOf(DescribeAutomationExecutionsCommand);
  });

  it("getExecution: 상태/파라미터/현재 단계 변환", async () => {
    jest.spyOn(client, "send").mockImplementation(async () => ({
      $metadata: {},
      AutomationExecution: {
        AutomationExecutionStatus: "Waiting",
        Parameters: { platform: ["Ubuntu"] },
        CurrentStepName: "Gate",
      },
    }));
    const repository = new SsmAutomationRepository(client);

    await expect(repository.getExecution("exec-1")).resolves.toEqual({
      executionId: "exec-1",
      status: "Waiting",
      parameters: { platform: ["Ubuntu"] },
      currentStepName: "Gate",
    });
  });

  it("startExecution: 태그 목록 변환 후 실행 ID 반환", async () => {
    const send = jest.spyOn(client, "send").mockImplementation(async () => ({
      $metadata: {},
      AutomationExecutionId: "exec-new",
    }));
    const repository = new SsmAutomationRepository(client);

    const executionId = await repository.startExecution({
      documentName: "GoldImage-Build",
      parameters: { platform: ["Ubuntu"] },
      tags: { Platform: "Ubuntu" },
    });

    expect(executionId).toBe("exec-new");
    expect(send.mock.calls[0]?.[0]).toBeInstanceOf(StartAutomationExecutionCommand);
    expect(send.mock.calls.map(([command]) => command.input)).toEqual([
      {
        DocumentName: "GoldImage-Build",
        Parameters: { platform: ["Ubuntu"] },
        Tags: [{ Key: "Platform", Value: "Ubuntu" }],
      },
    ]);
  });

  it("startExecution: 실행 ID가 없으면 에러", async () => {
    jest.spyOn(client, "send").mockImplementation(async () => ({ $metadata: {} }));
    const repository = new SsmAutomationRepository(client);

    await expect(
      repository.startExecution({ documentName: "GoldImage-Build", parameters: {}, tags: {} }),
    ).rejects.toThrow("StartAutomationExecution returned no execution id for GoldImage-Build");
  });
});
