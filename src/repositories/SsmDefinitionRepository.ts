/**
 * SSM Definition Repository
 * Parameter Store 경로 트리 → 플랫폼 정의
 *
 * 트리 구조:
 *   {prefix}/{shortName...}/{Field}
 * 예:
 *   /gold-image/platforms/linux/ubuntu-22/Platform = "Ubuntu 22.04"
 *   /gold-image/platforms/linux/ubuntu-22/Source   = "name:ubuntu/images/*22.04*"
 *
 * 필드명 앞까지의 경로가 같은 파라미터들이 하나의 정의가 된다
 */

import { GetParametersByPathCommand, SSMClient } from "@aws-sdk/client-ssm";
import type { RawDefinition } from "@/core/domain/BuildDefinition";
import type { IDefinitionRepository } from "@/core/interfaces/IParameterStore";
import { drainPages } from "@/utils/pagination";
import { withTransportError } from "@/utils/aws";

export interface ParameterEntry {
  name: string;
  value: string;
}

export class SsmDefinitionRepository implements IDefinitionRepository {
  constructor(private readonly client: SSMClient) {}

  async getDefinitions(pathPrefix: string): Promise<RawDefinition[]> {
    const parameters = await withTransportError("ssm:GetParametersByPath", () =>
      drainPages<ParameterEntry>(async (nextToken) => {
        const response = await this.client.send(
          new GetParametersByPathCommand({
            Path: pathPrefix,
            Recursive: true,
            WithDecryption: true,
            NextToken: nextToken,
          }),
        );
        const items = (response.Parameters ?? []).flatMap((parameter) =>
          parameter.Name !== undefined
            ? [{ name: parameter.Name, value: parameter.Value ?? "" }]
            : [],
        );
        return { items, nextToken: response.NextToken };
      }),
    );

    return groupDefinitions(pathPrefix, parameters);
  }
}

/**
 * 파라미터 목록 → 정의 목록 (첫 등장 순서 유지)
 *
 * prefix 바로 아래 파라미터(정의 경로 없음)는 무시
 */
export function groupDefinitions(
  pathPrefix: string,
  parameters: readonly ParameterEntry[],
): RawDefinition[] {
  const prefix = pathPrefix.replace(/\/+$/, "");
  const definitions = new Map<string, RawDefinition>();

  for (const parameter of parameters) {
    if (!parameter.name.startsWith(`${prefix}/`)) {
      continue;
    }

    const relative = parameter.name.slice(prefix.length + 1);
    const separator = relative.lastIndexOf("/");
    if (separator <= 0) {
      continue;
    }

    const shortName = relative.slice(0, separator);
    const field = relative.slice(separator + 1);

    let definition = definitions.get(shortName);
    if (!definition) {
      definition = { shortName, path: `${prefix}/${shortName}`, fields: {} };
      definitions.set(shortName, definition);
    }
    definition.fields[field] = parameter.value;
  }

  return Array.from(definitions.values());
}
