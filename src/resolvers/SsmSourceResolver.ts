/**
 * SSM Source Resolver ("ssm:/aws/service/ami-amazon-linux-latest/al2023-ami-kernel-default-x86_64")
 * 파라미터 값(이미지 ID)을 ami 전략으로 해석
 */

import { notFound, type ResolutionResult } from "@/core/domain/ImageDescriptor";
import type { IParameterStore } from "@/core/interfaces/IParameterStore";
import type { ISourceResolver } from "@/core/interfaces/ISourceResolver";

export class SsmSourceResolver implements ISourceResolver {
  readonly scheme = "ssm";

  constructor(
    private readonly parameters: IParameterStore,
    private readonly direct: ISourceResolver,
  ) {}

  async resolve(payload: string): Promise<ResolutionResult> {
    const value = await this.parameters.getParameter(payload);
    if (value === null || value.trim() === "") {
      return notFound(`Parameter ${payload} not found`);
    }
    return this.direct.resolve(value.trim());
  }
}
