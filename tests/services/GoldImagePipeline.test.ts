/**
 * GoldImagePipeline 통합 테스트
 *
 * 실제 서비스 조합 + in-memory Repository
 */

import { describe, it, expect, beforeEach, jest } from "@jest/globals";
import { loadPipelineConfig } from "@/config/PipelineConfig";
import type { RawDefinition } from "@/core/domain/BuildDefinition";
import { MissingRootDeviceError, TransportError } from "@/core/domain/errors";
import type { ImageDescriptor } from "@/core/domain/ImageDescriptor";
import type { IDefinitionRepository } from "@/core/interfaces/IParameterStore";
import { createSourceResolverRegistry } from "@/resolvers";
import { BlockDeviceComposer } from "@/services/BlockDeviceComposer";
import { BuildScheduler } from "@/services/BuildScheduler";
import { ConcurrencyGuard } from "@/services/ConcurrencyGuard";
import { GoldImagePipeline } from "@/services/GoldImagePipeline";
import { StalenessFilter } from "@/services/StalenessFilter";
import {
  createImage,
  createMockAutomationRepository,
  createMockImageRepository,
  createMockInstanceRepository,
  createMockParameterStore,
  createMockPlatformRepository,
  silentLogger,
} from "../helpers/fixtures";

const config = loadPipelineConfig({});

const rawDefinition = (
  shortName: string,
  fields: Record<string, string>,
): RawDefinition => ({
  shortName,
  path: `/gold-image/platforms/${shortName}`,
  fields,
});

describe("GoldImagePipeline", () => {
  let sourceImages: ImageDescriptor[];
  let artifacts: ImageDescriptor[];
  let raws: RawDefinition[];
  let images: ReturnType<typeof createMockImageRepository>;
  let automation: ReturnType<typeof createMockAutomationRepository>;
  let pipeline: GoldImagePipeline;

  beforeEach(() => {
    sourceImages = [
      createImage("ami-a", { creationDate: "2024-01-01T00:00:00.000Z" }),
      createImage("ami-b", { creationDate: "2024-01-01T00:00:00.000Z" }),
    ];
    artifacts = [
      createImage("ami-gold-a", {
        tags: { SourceImageId: "ami-a", Platform: "A", Version: "v3", GoldImage: "true" },
      }),
    ];
    raws = [
      rawDefinition("a", { Platform: "A", Source: "ami:ami-a" }),
      rawDefinition("b", { Platform: "B", Source: "ami:ami-b" }),
    ];

    images = createMockImageRepository();
    images.describeImages.mockImplementation(async (query) => {
      if (query.owners?.includes("self")) {
        return artifacts;
      }
      const ids = query.imageIds ?? [];
      return sourceImages.filter((image) => ids.includes(image.imageId));
    });

    const definitions: IDefinitionRepository = {
      getDefinitions: jest
        .fn<IDefinitionRepository["getDefinitions"]>()
        .mockImplementation(async () => raws),
    };
    automation = createMockAutomationRepository();

    pipeline = new GoldImagePipeline(
      {
        definitions,
        resolvers: createSourceResolverRegistry(
          {
            images,
            platforms: createMockPlatformRepository(),
            parameters: createMockParameterStore(),
          },
          config,
          silentLogger,
        ),
        composer: new BlockDeviceComposer(),
        stalenessFilter: new StalenessFilter(images, config, silentLogger),
        guard: new ConcurrencyGuard(automation, createMockInstanceRepository(), silentLogger),
        scheduler: new BuildScheduler(automation, silentLogger),
      },
      config,
      silentLogger,
    );
  });

  it("기존 Gold 이미지가 있는 플랫폼은 제외하고 나머지만 제출", async () => {
    const result = await pipeline.run();

    expect(result.submitted).toEqual([
      { platform: "B", executionId: "exec-new", delaySeconds: 0 },
    ]);
    expect(result.skipped).toEqual([]);
    expect(automation.startExecution).toHaveBeenCalledTimes(1);
  });

  it("force: stale 판정 없이 전체 제출 + 순서대로 지연 증가", async () => {
    const result = await pipeline.run({ force: true });

    expect(result.submitted).toEqual([
      { platform: "A", executionId: "exec-new", delaySeconds: 0 },
      { platform: "B", executionId: "exec-new", delaySeconds: 300 },
    ]);
    const [, second] = automation.startExecution.mock.calls;
    expect(second?.[0].parameters.delayTime).toEqual(["PT300S"]);
  });

  it("platforms allowlist에 있는 플랫폼만 제출", async () => {
    const result = await pipeline.run({ force: true, platforms: ["B"] });

    expect(result.submitted.map((build) => build.platform)).toEqual(["B"]);
  });

  it("dryRun: 제출 없이 대상만 반환", async () => {
    const result = await pipeline.run({ dryRun: true });

    expect(result.definitions.map((definition) => definition.platform)).toEqual(["B"]);
    expect(result.submitted).toEqual([]);
    expect(automation.describeExecutions).not.toHaveBeenCalled();
    expect(automation.startExecution).not.toHaveBeenCalled();
  });

  it("진행 중인 빌드가 있는 플랫폼은 skipped", async () => {
    automation.describeExecutions.mockResolvedValue([
      { executionId: "exec-1", documentName: "GoldImage-Build", status: "InProgress" },
    ]);
    automation.getExecution.mockResolvedValue({
      executionId: "exec-1",
      status: "InProgress",
      parameters: { platform: ["B"] },
    });

    const result = await pipeline.run();

    expect(result.submitted).toEqual([]);
    expect(result.skipped).toEqual(["B"]);
  });

  it("필수 필드 누락/소스 없음/잘못된 spec 정의는 해당 정의만 제외", async () => {
    raws = [
      rawDefinition("no-source", { Platform: "NoSource" }),
      rawDefinition("missing", { Platform: "Missing", Source: "ami:ami-404" }),
      rawDefinition("malformed", { Platform: "Malformed", Source: "noscheme" }),
      rawDefinition("unknown", { Platform: "Unknown", Source: "unknown:x" }),
      rawDefinition("b", { Platform: "B", Source: "ami:ami-b" }),
    ];

    const result = await pipeline.run();

    expect(result.definitions.map((definition) => definition.platform)).toEqual(["B"]);
    expect(result.submitted).toEqual([
      { platform: "B", executionId: "exec-new", delaySeconds: 0 },
    ]);
  });

  it("같은 source spec은 실행당 한 번만 조회", async () => {
    raws = [
      rawDefinition("b1", { Platform: "B1", Source: "ami:ami-b" }),
      rawDefinition("b2", { Platform: "B2", Source: "ami:ami-b" }),
    ];

    await pipeline.run({ dryRun: true });

    const sourceLookups = images.describeImages.mock.calls.filter(
      ([query]) => query.imageIds !== undefined,
    );
    expect(sourceLookups).toHaveLength(1);
  });

  it("템플릿 치환에 루트 디바이스가 없으면 실행 중단", async () => {
    sourceImages = [createImage("ami-b", { rootDeviceName: undefined })];
    raws = [
      rawDefinition("b", {
        Platform: "B",
        Source: "ami:ami-b",
        BlockDevices: '[{"DeviceName":"{RootDeviceName}"}]',
      }),
    ];

    await expect(pipeline.run()).rejects.toBeInstanceOf(MissingRootDeviceError);
    expect(automation.startExecution).not.toHaveBeenCalled();
  });

  it("전송 실패는 실행 중단", async () => {
    images.describeImages.mockRejectedValue(
      new TransportError("DescribeImages", new Error("throttled")),
    );

    await expect(pipeline.run()).rejects.toBeInstanceOf(TransportError);
  });
});
