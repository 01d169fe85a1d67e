/**
 * Source Resolver 조립
 */

import type { PipelineConfig } from "@/config/PipelineConfig";
import type { Logger } from "@/config/logger";
import type { IImageRepository } from "@/core/interfaces/IImageRepository";
import type { IParameterStore } from "@/core/interfaces/IParameterStore";
import type { IPlatformVersionRepository } from "@/core/interfaces/IPlatformVersionRepository";
import { AmiSourceResolver } from "./AmiSourceResolver";
import { BeanstalkSourceResolver } from "./BeanstalkSourceResolver";
import { NameSourceResolver } from "./NameSourceResolver";
import { SourceResolverRegistry } from "./SourceResolverRegistry";
import { SsmSourceResolver } from "./SsmSourceResolver";

export interface SourceResolverDependencies {
  images: IImageRepository;
  platforms: IPlatformVersionRepository;
  parameters: IParameterStore;
}

/**
 * 기본 scheme(ami, name, beanstalk, ssm)이 등록된 Registry 생성
 */
export function createSourceResolverRegistry(
  deps: SourceResolverDependencies,
  config: Pick<PipelineConfig, "trustedImageOwners">,
  logger?: Logger,
): SourceResolverRegistry {
  const ami = new AmiSourceResolver(deps.images);

  return new SourceResolverRegistry(
    [
      ami,
      new NameSourceResolver(deps.images, config.trustedImageOwners),
      new BeanstalkSourceResolver(
        deps.platforms,
        deps.images,
        logger?.child({ component: "BeanstalkSourceResolver" }),
      ),
      new SsmSourceResolver(deps.parameters, ami),
    ],
    logger?.child({ component: "SourceResolverRegistry" }),
  );
}

export { AmiSourceResolver } from "./AmiSourceResolver";
export { BeanstalkSourceResolver } from "./BeanstalkSourceResolver";
export { NameSourceResolver } from "./NameSourceResolver";
export { SsmSourceResolver } from "./SsmSourceResolver";
export {
  ResolutionCache,
  SourceResolverRegistry,
  parseSourceSpec,
  type ParsedSourceSpec,
} from "./SourceResolverRegistry";
