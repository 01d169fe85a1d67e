/**
 * SSM Automation Repository
 * 빌드 워크플로우 실행 조회/신호/시작
 *
 * SOLID 원칙:
 * - SRP: SSM Automation API 호출 + 도메인 변환만 담당
 * - DIP: IAutomationRepository 구현
 */

import {
  DescribeAutomationExecutionsCommand,
  GetAutomationExecutionCommand,
  SendAutomationSignalCommand,
  SSMClient,
  StartAutomationExecutionCommand,
  type AutomationExecutionMetadata,
} from "@aws-sdk/client-ssm";
import {
  toExecutionStatus,
  type AutomationExecution,
  type AutomationExecutionSummary,
  type AutomationSignalType,
  type StartExecutionRequest,
} from "@/core/domain/AutomationExecution";
import type { IAutomationRepository } from "@/core/interfaces/IAutomationRepository";
import { drainPages } from "@/utils/pagination";
import { recordToTags, withTransportError } from "@/utils/aws";

export class SsmAutomationRepository implements IAutomationRepository {
  constructor(private readonly client: SSMClient) {}

  async describeExecutions(
    documentNamePrefixes: readonly string[],
    statuses: readonly string[],
  ): Promise<AutomationExecutionSummary[]> {
    const executions = await withTransportError(
      "ssm:DescribeAutomationExecutions",
      () =>
        drainPages<AutomationExecutionMetadata>(async (nextToken) => {
          const response = await this.client.send(
            new DescribeAutomationExecutionsCommand({
              Filters: [
                { Key: "DocumentNamePrefix", Values: [...documentNamePrefixes] },
                { Key: "ExecutionStatus", Values: [...statuses] },
              ],
              NextToken: nextToken,
            }),
          );
          return {
            items: response.AutomationExecutionMetadataList ?? [],
            nextToken: response.NextToken,
          };
        }),
    );

    return executions.flatMap((execution) =>
      execution.AutomationExecutionId
        ? [
            {
              executionId: execution.AutomationExecutionId,
              documentName: execution.DocumentName ?? "",
              status: toExecutionStatus(execution.AutomationExecutionStatus),
            },
          ]
        : [],
    );
  }

  async getExecution(executionId: string): Promise<AutomationExecution> {
    const response = await withTransportError("ssm:GetAutomationExecution", () =>
      this.client.send(
        new GetAutomationExecutionCommand({ AutomationExecutionId: executionId }),
      ),
    );
    const execution = response.AutomationExecution;

    return {
      executionId,
      status: toExecutionStatus(execution?.AutomationExecutionStatus),
      parameters: execution?.Parameters ?? {},
      currentStepName: execution?.CurrentStepName,
    };
  }

  async sendSignal(
    executionId: string,
    signalType: AutomationSignalType,
    payload: Record<string, string[]>,
  ): Promise<void> {
    await withTransportError("ssm:SendAutomationSignal", () =>
      this.client.send(
        new SendAutomationSignalCommand({
          AutomationExecutionId: executionId,
          SignalType: signalType,
          Payload: payload,
        }),
      ),
    );
  }

  async startExecution(request: StartExecutionRequest): Promise<string> {
    const response = await withTransportError("ssm:StartAutomationExecution", () =>
      this.client.send(
        new StartAutomationExecutionCommand({
          DocumentName: request.documentName,
          Parameters: request.parameters,
          Tags: recordToTags(request.tags),
        }),
      ),
    );

    if (!response.AutomationExecutionId) {
      throw new Error(
        `StartAutomationExecution returned no execution id for ${request.documentName}`,
      );
    }
    return response.AutomationExecutionId;
  }
}
