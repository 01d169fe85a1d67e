/**
 * SsmSourceResolver 테스트
 */

import { describe, it, expect, jest } from "@jest/globals";
import { resolved } from "@/core/domain/ImageDescriptor";
import type { ISourceResolver } from "@/core/interfaces/ISourceResolver";
import { SsmSourceResolver } from "@/resolvers/SsmSourceResolver";
import { createImage, createMockParameterStore } from "../helpers/fixtures";

const createDirectResolver = () => ({
  scheme: "ami",
  resolve: jest
    .fn<ISourceResolver["resolve"]>()
    .mockResolvedValue(resolved(createImage("ami-from-param"))),
});

describe("SsmSourceResolver", () => {
  it("파라미터 값을 이미지 ID로 ami 전략에 위임", async () => {
    const parameters = createMockParameterStore(" ami-from-param\n");
    const direct = createDirectResolver();
    const resolver = new SsmSourceResolver(parameters, direct);

    const result = await resolver.resolve("/aws/service/ami-latest");

    expect(parameters.getParameter).toHaveBeenCalledWith("/aws/service/ami-latest");
    expect(direct.resolve).toHaveBeenCalledWith("ami-from-param");
    expect(result.status).toBe("resolved");
  });

  it("파라미터가 없으면 not_found", async () => {
    const direct = createDirectResolver();
    const resolver = new SsmSourceResolver(createMockParameterStore(null), direct);

    const result = await resolver.resolve("/missing");

    expect(result).toEqual({ status: "not_found", reason: "Parameter /missing not found" });
    expect(direct.resolve).not.toHaveBeenCalled();
  });

  it("빈 값도 not_found", async () => {
    const resolver = new SsmSourceResolver(
      createMockParameterStore("   "),
      createDirectResolver(),
    );

    const result = await resolver.resolve("/blank");

    expect(result.status).toBe("not_found");
  });
});
