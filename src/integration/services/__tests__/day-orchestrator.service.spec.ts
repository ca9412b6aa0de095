import { SourceError } from "@/common/errors";
import { ErrorCode } from "@/common/types/error-handling";
import { createPipelineTestingModule, type PipelineTestContext } from "@/__tests__/utils/test-module.builder";
import { validPayloadHandler } from "@/__tests__/utils/mock.factories";
import { TestDataBuilder } from "@/__tests__/utils/test-data.builders";
import { DayOrchestratorService } from "../day-orchestrator.service";

const DATE = "2023-02-14";

describe("DayOrchestratorService", () => {
  const config = TestDataBuilder.createPipelineConfig();
  let context: PipelineTestContext;
  let orchestrator: DayOrchestratorService;

  beforeEach(async () => {
    context = await createPipelineTestingModule();
    orchestrator = context.module.get(DayOrchestratorService);
  });

  afterEach(async () => {
    await context.module.close();
  });

  it("should fetch, validate and cache a complete day", async () => {
    const result = await orchestrator.runDay(DATE, config);

    expect(result).toEqual({
      date: DATE,
      status: "accepted",
      readings: TestDataBuilder.createDaySet(DATE, config),
      source: "fetched",
    });
    expect(context.cache.puts).toEqual([
      { dataType: "power", date: DATE },
      { dataType: "weather", date: DATE },
    ]);
  });

  it("should drop rows the source reports from outside the day", async () => {
    context.source.handler = async (dataType, date, cfg) =>
      dataType === "power"
        ? TestDataBuilder.createPowerPayload(date, cfg, { count: 25 })
        : TestDataBuilder.createWeatherPayload(date, cfg, { count: 25 });

    const result = await orchestrator.runDay(DATE, config);

    expect(result).toEqual({
      date: DATE,
      status: "accepted",
      readings: TestDataBuilder.createDaySet(DATE, config),
      source: "fetched",
    });
  });

  it("should serve a fully cached day without remote reads", async () => {
    await context.cache.put("power", DATE, TestDataBuilder.createPowerPayload(DATE, config));
    await context.cache.put("weather", DATE, TestDataBuilder.createWeatherPayload(DATE, config));
    context.cache.puts.length = 0;

    const result = await orchestrator.runDay(DATE, config);

    expect(result).toMatchObject({ status: "accepted", source: "cache" });
    expect(context.source.calls).toHaveLength(0);
    expect(context.cache.puts).toHaveLength(0);
  });

  it("should serve a second run of the same day from the cache", async () => {
    const first = await orchestrator.runDay(DATE, config);
    const second = await orchestrator.runDay(DATE, config);

    expect(second).toEqual({ ...first, source: "cache" });
    expect(context.source.calls).toHaveLength(2);
  });

  it("should fetch only the data type missing from the cache", async () => {
    await context.cache.put("power", DATE, TestDataBuilder.createPowerPayload(DATE, config));
    context.cache.puts.length = 0;

    const result = await orchestrator.runDay(DATE, config);

    expect(result).toMatchObject({ status: "accepted", source: "mixed" });
    expect(context.source.calls).toEqual([{ dataType: "weather", date: DATE }]);
    expect(context.cache.puts).toEqual([{ dataType: "weather", date: DATE }]);
  });

  it("should reject the day and cache nothing when a fetch fails", async () => {
    context.source.handler = async (dataType, date, cfg) => {
      if (dataType === "weather") {
        throw new SourceError("HTTP 404", ErrorCode.DATA_NOT_FOUND, { dataType, date, status: 404 });
      }
      return validPayloadHandler(dataType, date, cfg);
    };

    const result = await orchestrator.runDay(DATE, config);

    expect(result).toEqual({ date: DATE, status: "rejected", reason: "fetch failure", failedTypes: ["weather"] });
    expect(context.cache.puts).toHaveLength(0);
  });

  it("should reject a day that fails validation and cache nothing", async () => {
    context.source.handler = async (dataType, date, cfg) =>
      dataType === "power"
        ? TestDataBuilder.createPowerPayload(date, cfg, { count: 10 })
        : TestDataBuilder.createWeatherPayload(date, cfg, { count: 10 });

    const result = await orchestrator.runDay(DATE, config);

    expect(result).toEqual({ date: DATE, status: "rejected", reason: "insufficient points" });
    expect(context.cache.puts).toHaveLength(0);
  });

  it("should reject a day whose power rows are missing from the join", async () => {
    context.source.handler = async (dataType, date, cfg) =>
      dataType === "power"
        ? TestDataBuilder.createPowerPayload(date, cfg, { count: 10 })
        : TestDataBuilder.createWeatherPayload(date, cfg);

    const result = await orchestrator.runDay(DATE, config);

    expect(result).toEqual({ date: DATE, status: "rejected", reason: "too many nulls in power" });
    expect(context.cache.puts).toHaveLength(0);
  });

  it("should reject a day for which the source reports no data", async () => {
    context.source.handler = async () => [];

    const result = await orchestrator.runDay(DATE, config);

    expect(result).toEqual({ date: DATE, status: "rejected", reason: "no data" });
  });

  it("should keep an accepted day when caching it fails", async () => {
    jest.spyOn(context.cache, "put").mockRejectedValue(new Error("read-only file system"));

    const result = await orchestrator.runDay(DATE, config);

    expect(result).toMatchObject({ status: "accepted", source: "fetched" });
  });

  it("should turn an unexpected failure into a rejected day", async () => {
    jest.spyOn(context.cache, "get").mockRejectedValue(new Error("cache offline"));

    await expect(orchestrator.runDay(DATE, config)).resolves.toEqual({
      date: DATE,
      status: "rejected",
      reason: "unexpected error",
    });
  });
});
