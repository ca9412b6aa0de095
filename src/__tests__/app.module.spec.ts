import { promises as fs } from "fs";
import * as path from "path";
import { Test, TestingModule } from "@nestjs/testing";
import { REMOTE_DATA_SOURCE } from "@/adapters/base/remote-data-source.interface";
import { SolarApiAdapter } from "@/adapters/solar/solar-api.adapter";
import { CACHE_STORE } from "@/cache/cache.constants";
import { FileCacheService } from "@/cache/file-cache.service";
import { ConfigService } from "@/config/config.service";
import { RangeControllerService } from "@/integration/services/range-controller.service";
import { ARTIFACT_WRITER } from "@/output/artifact-writer.interface";
import { CsvArtifactWriter } from "@/output/csv-artifact.writer";
import { AppModule } from "../app.module";
import { FakeRemoteDataSource } from "./utils/mock.factories";
import { TestHelpers } from "./utils/test.helpers";

const FAR_FUTURE = new Date(2100, 0, 1);

describe("AppModule", () => {
  const originalEnv = { ...process.env };
  let workDir: string;
  let source: FakeRemoteDataSource;
  let module: TestingModule;

  beforeEach(async () => {
    workDir = await TestHelpers.createTempDir();
    Object.assign(process.env, {
      API_DOMAIN: "http://solar.test",
      DATE_RANGE_START: "2023-02-01",
      DATE_RANGE_END: "2023-02-03",
      EXPECTED_POINTS_PER_DAY: "24",
      ALLOWED_MISSING_POINTS: "2",
      TIME_INTERVAL_MINUTES: "60",
      MAX_CONCURRENT_REQUESTS: "2",
      RETRY_INITIAL_DELAY_MS: "1",
      RETRY_MAX_DELAY_MS: "5",
      CACHE_DIR: path.join(workDir, "cache"),
      OUTPUT_DIR: path.join(workDir, "output"),
    });

    source = new FakeRemoteDataSource();
    module = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(REMOTE_DATA_SOURCE)
      .useValue(source)
      .compile();
    await module.init();
  });

  afterEach(async () => {
    await module.close();
    process.env = { ...originalEnv };
    await TestHelpers.removeTempDir(workDir);
  });

  it("should wire the production implementations behind their tokens", () => {
    expect(module.get(CACHE_STORE)).toBeInstanceOf(FileCacheService);
    expect(module.get(ARTIFACT_WRITER)).toBeInstanceOf(CsvArtifactWriter);
    expect(module.get(SolarApiAdapter)).toBeInstanceOf(SolarApiAdapter);
    expect(module.get(REMOTE_DATA_SOURCE)).toBe(source);
  });

  it("should run a range end to end through the file cache and CSV artifacts", async () => {
    const config = module.get(ConfigService).getPipelineConfig();
    const controller = module.get(RangeControllerService);

    const result = await controller.runRange(config, FAR_FUTURE);

    expect(result.acceptedDays).toBe(3);
    expect(result.readings).toHaveLength(72);
    expect(result.artifactPath).toBe(path.join(workDir, "output", "readings_2023-02-01_2023-02-03.csv"));

    const rangeCsv = await fs.readFile(path.join(workDir, "output", "readings_2023-02-01_2023-02-03.csv"), "utf8");
    expect(rangeCsv.trimEnd().split("\n")).toHaveLength(73);
    const monthCsv = await fs.readFile(path.join(workDir, "output", "months", "2023-02.csv"), "utf8");
    expect(monthCsv).toBe(rangeCsv);

    const cached = (await fs.readdir(path.join(workDir, "cache"))).sort();
    expect(cached).toEqual([
      "power_2023-02-01.json",
      "power_2023-02-02.json",
      "power_2023-02-03.json",
      "weather_2023-02-01.json",
      "weather_2023-02-02.json",
      "weather_2023-02-03.json",
    ]);
  });

  it("should serve a repeated run from the cache", async () => {
    const config = module.get(ConfigService).getPipelineConfig();
    const controller = module.get(RangeControllerService);

    const first = await controller.runRange(config, FAR_FUTURE);
    const callsAfterFirstRun = source.calls.length;
    const second = await controller.runRange(config, FAR_FUTURE);

    expect(callsAfterFirstRun).toBe(6);
    expect(source.calls).toHaveLength(6);
    expect(second.readings).toEqual(first.readings);
  });
});
