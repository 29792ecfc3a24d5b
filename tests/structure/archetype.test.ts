import { describe, expect, it } from "vitest";

import { classifyArchetype, hasInfrastructure } from "../../src/structure/archetype.js";

describe("classifyArchetype", () => {
  it.each([
    ["libraries_web", "http-client", "web-app"],
    ["libraries_testing", "e2e-framework", "web-app"],
    ["microservices_small", "10-service-social", "service-mesh"],
    ["cli_tools", "build-tool", "cli-tool"],
    ["libraries_testing", "mock-lib", "library"],
    ["libraries_orm", "query-builder", "library"],
    ["mobile_ios", "swiftui-app", "mobile-app"],
    ["mobile_android", "compose-app", "mobile-app"],
    ["games", "unity-game", "game"],
    ["data_engineering", "etl-pipeline", "data-pipeline"],
    ["enterprise_crm", "zoho-clone", "enterprise-app"],
    ["open_source_clones", "react-clone", "enterprise-app"],
  ])("maps %s/%s to %s", (category, template, expected) => {
    expect(classifyArchetype({ category, template })).toBe(expected);
  });

  it("ignores case", () => {
    expect(classifyArchetype({ category: "CLI_TOOLS", template: "Build-Tool" })).toBe("cli-tool");
  });

  it("checks web before microservice", () => {
    expect(classifyArchetype({ category: "microservices_web", template: "gateway" })).toBe(
      "web-app",
    );
  });
});

describe("hasInfrastructure", () => {
  it("is true only for service meshes and enterprise apps", () => {
    expect(hasInfrastructure("service-mesh")).toBe(true);
    expect(hasInfrastructure("enterprise-app")).toBe(true);
    expect(hasInfrastructure("cli-tool")).toBe(false);
    expect(hasInfrastructure("web-app")).toBe(false);
  });
});
