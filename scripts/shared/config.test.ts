import path from "node:path";
import { describe, expect, it } from "vitest";

import { DEFAULT_THRESHOLDS, loadStudyConfig, requireGithubToken, requireSonarToken } from "./config";
import { ConfigurationError } from "./errors";

describe("loadStudyConfig", () => {
  it("falls back to the study defaults", () => {
    const config = loadStudyConfig({});

    expect(config.thresholds).toEqual(DEFAULT_THRESHOLDS);
    expect(config.targets).toEqual({
      rapid: 100,
      slow: 100,
      searchBudget: 1000,
      query: "stars:>50 forks:>50 sort:stars-desc",
    });
    expect(config.dataset).toEqual({ path: path.join("data", "repositories_dataset.json"), format: "json" });
    expect(config.sonar.host).toBe("http://localhost:9000");
    expect(config.databaseUrl).toBeNull();
    expect(config.debug).toBe(false);
  });

  it("lets defined overrides win over the environment field by field", () => {
    const config = loadStudyConfig(
      { MIN_STARS: "80", MIN_FORKS: "75", TARGET_SLOW: "40", DEBUG: "true" },
      { thresholds: { minStars: 200, minForks: undefined }, targets: { rapid: 10, slow: undefined } }
    );

    expect(config.thresholds.minStars).toBe(200);
    expect(config.thresholds.minForks).toBe(75);
    expect(config.targets.rapid).toBe(10);
    expect(config.targets.slow).toBe(40);
    expect(config.targets.query).toBe("stars:>200 forks:>75 sort:stars-desc");
    expect(config.debug).toBe(true);
  });

  it("infers the dataset format from the extension", () => {
    expect(loadStudyConfig({ DATASET_PATH: "out/repos.CSV" }).dataset.format).toBe("csv");
    expect(loadStudyConfig({}, { datasetPath: "out/repos.csv", datasetFormat: "json" }).dataset.format).toBe("json");
  });

  it("rejects malformed values", () => {
    expect(() => loadStudyConfig({ MIN_STARS: "lots" })).toThrow(
      new ConfigurationError("MIN_STARS must be a non-negative integer (got 'lots')")
    );
    expect(() => loadStudyConfig({ DATASET_FORMAT: "xml" })).toThrow(ConfigurationError);
  });

  it("trims a trailing slash from the scanning server host", () => {
    expect(loadStudyConfig({ SONAR_HOST: "http://sonar.test:9000/" }).sonar.host).toBe("http://sonar.test:9000");
  });
});

describe("credential checks", () => {
  it("require the token for the command that needs it", () => {
    expect(() => requireGithubToken(loadStudyConfig({}))).toThrow(ConfigurationError);
    expect(requireGithubToken(loadStudyConfig({ GITHUB_TOKEN: "test-secret" }))).toBe("test-secret");
    expect(() => requireSonarToken(loadStudyConfig({ GITHUB_TOKEN: "test-secret" }))).toThrow(
      "SONAR_TOKEN is required"
    );
  });
});
