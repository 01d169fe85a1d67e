/**
 * Pipeline 조립
 * AWS SDK 클라이언트 → Repository → Service 순서로 생성
 */

import { EC2Client } from "@aws-sdk/client-ec2";
import { ElasticBeanstalkClient } from "@aws-sdk/client-elastic-beanstalk";
import { SSMClient } from "@aws-sdk/client-ssm";
import { logger as rootLogger, type Logger } from "@/config/logger";
import type { PipelineConfig } from "@/config/PipelineConfig";
import { BeanstalkPlatformRepository } from "@/repositories/BeanstalkPlatformRepository";
import { Ec2ImageRepository } from "@/repositories/Ec2ImageRepository";
import { Ec2InstanceRepository } from "@/repositories/Ec2InstanceRepository";
import { SsmAutomationRepository } from "@/repositories/SsmAutomationRepository";
import { SsmDefinitionRepository } from "@/repositories/SsmDefinitionRepository";
import { SsmParameterRepository } from "@/repositories/SsmParameterRepository";
import { createSourceResolverRegistry } from "@/resolvers";
import { BlockDeviceComposer } from "./BlockDeviceComposer";
import { BuildScheduler } from "./BuildScheduler";
import { ConcurrencyGuard } from "./ConcurrencyGuard";
import { GoldImagePipeline } from "./GoldImagePipeline";
import { StalenessFilter } from "./StalenessFilter";

export function createPipeline(
  config: PipelineConfig,
  logger: Logger = rootLogger,
): GoldImagePipeline {
  const clientConfig = config.region ? { region: config.region } : {};
  const ec2 = new EC2Client(clientConfig);
  const ssm = new SSMClient(clientConfig);
  const beanstalk = new ElasticBeanstalkClient(clientConfig);

  const images = new Ec2ImageRepository(ec2);
  const automation = new SsmAutomationRepository(ssm);

  return new GoldImagePipeline(
    {
      definitions: new SsmDefinitionRepository(ssm),
      resolvers: createSourceResolverRegistry(
        {
          images,
          platforms: new BeanstalkPlatformRepository(beanstalk),
          parameters: new SsmParameterRepository(ssm),
        },
        config,
        logger,
      ),
      composer: new BlockDeviceComposer(),
      stalenessFilter: new StalenessFilter(
        images,
        config,
        logger.child({ component: "StalenessFilter" }),
      ),
      guard: new ConcurrencyGuard(
        automation,
        new Ec2InstanceRepository(ec2),
        logger.child({ component: "ConcurrencyGuard" }),
      ),
      scheduler: new BuildScheduler(
        automation,
        logger.child({ component: "BuildScheduler" }),
      ),
    },
    config,
    logger.child({ component: "GoldImagePipeline" }),
  );
}
