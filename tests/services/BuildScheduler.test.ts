/**
 * BuildScheduler 테스트
 */

import { describe, it, expect } from "@jest/globals";
import {
  BuildScheduler,
  platformKeyOf,
  sanitizeTagValue,
  toParameterValue,
} from "@/services/BuildScheduler";
import {
  createImage,
  createMockAutomationRepository,
  createResolvedDefinition,
  silentLogger,
} from "../helpers/fixtures";

describe("BuildScheduler", () => {
  const createScheduler = () => {
    const automation = createMockAutomationRepository();
    return { automation, scheduler: new BuildScheduler(automation, silentLogger) };
  };

  it("지연 시간은 ISO 8601 duration (초 단위)", () => {
    const { scheduler } = createScheduler();
    const definition = createResolvedDefinition("Ubuntu");

    expect(
      [0, 300, 600].map(
        (delay) => scheduler.composeRequest(definition, delay).parameters.delayTime,
      ),
    ).toEqual([["PT0S"], ["PT300S"], ["PT600S"]]);
  });

  it("음수/소수 지연은 RangeError", () => {
    const { scheduler } = createScheduler();
    const definition = createResolvedDefinition("Ubuntu");

    expect(() => scheduler.composeRequest(definition, -1)).toThrow(RangeError);
    expect(() => scheduler.composeRequest(definition, 1.5)).toThrow(RangeError);
  });

  it("문서 파라미터 + 태그 구성", () => {
    const { scheduler } = createScheduler();
    const definition = createResolvedDefinition("Ubuntu 22", {
      path: "/gold-image/platforms/linux/ubuntu-22",
      source: "name:ubuntu/images/*-server-*",
      finalBlockDevices: ['{"DeviceName":"/dev/sda1"}'],
      image: createImage("ami-src"),
    });

    expect(scheduler.composeRequest(definition, 300)).toEqual({
      documentName: "GoldImage-Build",
      parameters: {
        sourceImageId: ["ami-src"],
        imageName: ["Ubuntu 22"],
        platform: ["Ubuntu 22"],
        platformKey: ["ubuntu-22"],
        delayTime: ["PT300S"],
        blockDevices: ['{"DeviceName":"/dev/sda1"}'],
        imageDescription: ["Ubuntu 22"],
      },
      tags: {
        Platform: "Ubuntu 22",
        SourceImageId: "ami-src",
        Source: "name:ubuntu/images/_-server-_",
      },
    });
  });

  it("userData, description, solution stack 반영", () => {
    const { scheduler } = createScheduler();
    const definition = createResolvedDefinition("Node", {
      userData: "#!/bin/bash\necho hi",
      description: "Node gold image",
      image: createImage("ami-eb", { solutionStackName: "64bit Amazon Linux 2023 v6 running Node.js 20" }),
    });

    const request = scheduler.composeRequest(definition, 0);

    expect(request.parameters.userData).toEqual(["#!/bin/bash\necho hi"]);
    expect(request.parameters.imageDescription).toEqual(["Node gold image"]);
    expect(request.parameters.solutionStack).toEqual([
      "64bit Amazon Linux 2023 v6 running Node.js 20",
    ]);
    expect(request.tags.SolutionStack).toBe("64bit Amazon Linux 2023 v6 running Node.js 20");
  });

  it("자유 형식 파라미터는 마지막에 병합 (문자열 외 JSON 직렬화)", () => {
    const { scheduler } = createScheduler();
    const definition = createResolvedDefinition("Ubuntu", {
      parameters: { instanceType: "m5.large", volumes: [1, 2], platform: "Override" },
    });

    const { parameters } = scheduler.composeRequest(definition, 0);

    expect(parameters.instanceType).toEqual(["m5.large"]);
    expect(parameters.volumes).toEqual(["[1,2]"]);
    expect(parameters.platform).toEqual(["Override"]);
  });

  it("submit()은 실행 ID 반환", async () => {
    const { automation, scheduler } = createScheduler();
    const definition = createResolvedDefinition("Ubuntu");

    const executionId = await scheduler.submit(definition, 600);

    expect(executionId).toBe("exec-new");
    expect(automation.startExecution).toHaveBeenCalledWith(
      scheduler.composeRequest(definition, 600),
    );
  });
});

describe("BuildScheduler helpers", () => {
  it("sanitizeTagValue: 와일드카드 치환", () => {
    expect(sanitizeTagValue("name:al2023-ami-*-x86_64?")).toBe("name:al2023-ami-_-x86_64_");
  });

  it("platformKeyOf: 마지막 경로 세그먼트", () => {
    expect(platformKeyOf("/gold-image/platforms/linux/ubuntu-22/", "Ubuntu")).toBe("ubuntu-22");
    expect(platformKeyOf("", "Ubuntu")).toBe("Ubuntu");
  });

  it("toParameterValue: 문자열 외 JSON 직렬화", () => {
    expect(toParameterValue("x")).toEqual(["x"]);
    expect(toParameterValue({ a: 1 })).toEqual(['{"a":1}']);
    expect(toParameterValue(true)).toEqual(["true"]);
  });
});
