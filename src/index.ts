/**
 * Gold Image Pipeline - 라이브러리 진입점
 */

export { loadPipelineConfig, type PipelineConfig } from "./config/PipelineConfig";
export * from "./core/domain/errors";
export type {
  BuildDefinition,
  RawDefinition,
  ResolvedDefinition,
} from "./core/domain/BuildDefinition";
export type {
  BlockDeviceMapping,
  ImageDescriptor,
  ResolutionResult,
} from "./core/domain/ImageDescriptor";
export type * from "./core/interfaces";
export * from "./resolvers";
export { BlockDeviceComposer } from "./services/BlockDeviceComposer";
export { BuildScheduler } from "./services/BuildScheduler";
export { ConcurrencyGuard } from "./services/ConcurrencyGuard";
export {
  GoldImagePipeline,
  type PipelineRunOptions,
  type PipelineRunResult,
} from "./services/GoldImagePipeline";
export { StalenessFilter, type ExistingArtifactIndex } from "./services/StalenessFilter";
export { createPipeline } from "./services/createPipeline";
