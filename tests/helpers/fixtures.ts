/**
 * 테스트 공용 fixture / mock 팩토리
 */

import { jest } from "@jest/globals";
import pino from "pino";
import type { ResolvedDefinition } from "@/core/domain/BuildDefinition";
import type { ImageDescriptor } from "@/core/domain/ImageDescriptor";
import type { IAutomationRepository } from "@/core/interfaces/IAutomationRepository";
import type { IImageRepository } from "@/core/interfaces/IImageRepository";
import type { IInstanceRepository } from "@/core/interfaces/IInstanceRepository";
import type { IParameterStore } from "@/core/interfaces/IParameterStore";
import type { IPlatformVersionRepository } from "@/core/interfaces/IPlatformVersionRepository";

export const silentLogger = pino({ level: "silent" });

export const createImage = (
  imageId: string,
  overrides: Partial<ImageDescriptor> = {},
): ImageDescriptor => ({
  imageId,
  creationDate: "2024-01-01T00:00:00.000Z",
  name: `image-${imageId}`,
  rootDeviceName: "/dev/xvda",
  blockDeviceMappings: [
    {
      DeviceName: "/dev/xvda",
      Ebs: { SnapshotId: `snap-${imageId}`, VolumeSize: 8, VolumeType: "gp3" },
    },
  ],
  tags: {},
  metadata: {},
  ...overrides,
});

export const createResolvedDefinition = (
  platform: string,
  overrides: Partial<ResolvedDefinition> = {},
): ResolvedDefinition => ({
  shortName: platform.toLowerCase(),
  path: `/gold-image/platforms/${platform.toLowerCase()}`,
  platform,
  source: `ami:ami-${platform.toLowerCase()}`,
  documentName: "GoldImage-Build",
  image: createImage(`ami-${platform.toLowerCase()}`),
  finalBlockDevices: [],
  ...overrides,
});

export const createMockImageRepository = (
  images: ImageDescriptor[] = [],
) => ({
  describeImages: jest
    .fn<IImageRepository["describeImages"]>()
    .mockResolvedValue(images),
});

export const createMockPlatformRepository = () => ({
  listVersions: jest
    .fn<IPlatformVersionRepository["listVersions"]>()
    .mockResolvedValue([]),
  describeVersion: jest.fn<IPlatformVersionRepository["describeVersion"]>(),
});

export const createMockParameterStore = (value: string | null = null) => ({
  getParameter: jest
    .fn<IParameterStore["getParameter"]>()
    .mockResolvedValue(value),
});

export const createMockAutomationRepository = () => ({
  describeExecutions: jest
    .fn<IAutomationRepository["describeExecutions"]>()
    .mockResolvedValue([]),
  getExecution: jest.fn<IAutomationRepository["getExecution"]>(),
  sendSignal: jest
    .fn<IAutomationRepository["sendSignal"]>()
    .mockResolvedValue(undefined),
  startExecution: jest
    .fn<IAutomationRepository["startExecution"]>()
    .mockResolvedValue("exec-new"),
});

export const createMockInstanceRepository = () => ({
  describeInstances: jest
    .fn<IInstanceRepository["describeInstances"]>()
    .mockResolvedValue([]),
  terminateInstances: jest
    .fn<IInstanceRepository["terminateInstances"]>()
    .mockResolvedValue(undefined),
});
