/**
 * SSM Parameter Repository
 * 단일 파라미터 조회 (ssm 해석 전략)
 */

import { GetParameterCommand, SSMClient } from "@aws-sdk/client-ssm";
import type { IParameterStore } from "@/core/interfaces/IParameterStore";
import { isAwsErrorNamed, withTransportError } from "@/utils/aws";

export class SsmParameterRepository implements IParameterStore {
  constructor(private readonly client: SSMClient) {}

  async getParameter(name: string): Promise<string | null> {
    return withTransportError("ssm:GetParameter", async () => {
      try {
        const response = await this.client.send(
          new GetParameterCommand({ Name: name, WithDecryption: true }),
        );
        return response.Parameter?.Value ?? null;
      } catch (error) {
        if (isAwsErrorNamed(error, "ParameterNotFound")) {
          return null;
        }
        throw error;
      }
    });
  }
}
