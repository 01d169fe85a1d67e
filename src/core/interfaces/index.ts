/**
 * Core Interfaces Barrel Export
 */

export type {
  IImageRepository,
  ImageFilters,
  DescribeImagesQuery,
} from "./IImageRepository";
export type {
  IPlatformVersionRepository,
  PlatformVersionDetail,
  CustomImage,
} from "./IPlatformVersionRepository";
export type { IParameterStore, IDefinitionRepository } from "./IParameterStore";
export type { IAutomationRepository } from "./IAutomationRepository";
export type { IInstanceRepository, InstanceFilters } from "./IInstanceRepository";
export type { ISourceResolver } from "./ISourceResolver";
