import { Test, TestingModule } from "@nestjs/testing";
import { REMOTE_DATA_SOURCE } from "@/adapters/base/remote-data-source.interface";
import { NetworkError, SourceError } from "@/common/errors";
import { ErrorCode } from "@/common/types/error-handling";
import { ConcurrencyLimiter } from "@/common/utils/concurrency-limiter";
import { RetryService } from "@/error-handling/retry.service";
import { FakeRemoteDataSource, validPayloadHandler } from "@/__tests__/utils/mock.factories";
import { TestDataBuilder } from "@/__tests__/utils/test-data.builders";
import { FETCH_LIMITER } from "../fetch-limiter.provider";
import { ReadingFetcherService } from "../reading-fetcher.service";

const DATE = "2023-02-14";

describe("ReadingFetcherService", () => {
  let module: TestingModule;
  let fetcher: ReadingFetcherService;
  let source: FakeRemoteDataSource;

  async function createFetcher(maxConcurrentRequests: number, latencyMs = 0): Promise<void> {
    source = new FakeRemoteDataSource(validPayloadHandler, latencyMs);
    module = await Test.createTestingModule({
      providers: [
        ReadingFetcherService,
        RetryService,
        { provide: REMOTE_DATA_SOURCE, useValue: source },
        { provide: FETCH_LIMITER, useValue: new ConcurrencyLimiter(maxConcurrentRequests) },
      ],
    }).compile();
    fetcher = module.get(ReadingFetcherService);
  }

  afterEach(async () => {
    await module.close();
  });

  it("should return the payload read from the source", async () => {
    await createFetcher(2);
    const config = TestDataBuilder.createPipelineConfig();

    await expect(fetcher.fetch("power", DATE, config)).resolves.toEqual(
      TestDataBuilder.createPowerPayload(DATE, config)
    );
    expect(source.callsFor("power", DATE)).toBe(1);
  });

  it("should make transient failures invisible when a retry succeeds", async () => {
    await createFetcher(2);
    const config = TestDataBuilder.createPipelineConfig({ maxRetryAttempts: 3 });
    let failuresLeft = 2;
    source.handler = async (dataType, date, cfg) => {
      if (failuresLeft > 0) {
        failuresLeft--;
        throw new NetworkError("connection reset", ErrorCode.NETWORK_ERROR, { dataType, date });
      }
      return validPayloadHandler(dataType, date, cfg);
    };

    await expect(fetcher.fetch("weather", DATE, config)).resolves.toEqual(
      TestDataBuilder.createWeatherPayload(DATE, config)
    );
    expect(source.callsFor("weather", DATE)).toBe(3);
  });

  it("should surface the last transient failure once attempts run out", async () => {
    await createFetcher(2);
    const config = TestDataBuilder.createPipelineConfig({ maxRetryAttempts: 2 });
    source.handler = async (dataType, date) => {
      throw new NetworkError("HTTP 503", ErrorCode.SERVICE_UNAVAILABLE, { dataType, date, status: 503 });
    };

    await expect(fetcher.fetch("power", DATE, config)).rejects.toBeInstanceOf(NetworkError);
    expect(source.callsFor("power", DATE)).toBe(2);
  });

  it("should not retry a source refusal", async () => {
    await createFetcher(2);
    const config = TestDataBuilder.createPipelineConfig({ maxRetryAttempts: 5 });
    source.handler = async (dataType, date) => {
      throw new SourceError("HTTP 404", ErrorCode.DATA_NOT_FOUND, { dataType, date, status: 404 });
    };

    await expect(fetcher.fetch("power", DATE, config)).rejects.toBeInstanceOf(SourceError);
    expect(source.callsFor("power", DATE)).toBe(1);
  });

  it("should never exceed the shared request bound", async () => {
    await createFetcher(3, 5);
    const config = TestDataBuilder.createPipelineConfig({ maxConcurrentRequests: 3 });
    const dates = Array.from({ length: 10 }, (_, i) => `2023-02-${String(i + 1).padStart(2, "0")}`);

    const results = await Promise.all(
      dates.flatMap(date => [fetcher.fetch("power", date, config), fetcher.fetch("weather", date, config)])
    );

    expect(results).toHaveLength(20);
    expect(source.calls).toHaveLength(20);
    expect(source.peakInFlight).toBeLessThanOrEqual(3);
    expect(fetcher.getLimiterStats()).toEqual({ capacity: 3, inFlight: 0, peakInFlight: 3, pending: 0 });
  });

  it("should hold the slot while waiting to retry", async () => {
    await createFetcher(1);
    const config = TestDataBuilder.createPipelineConfig({
      maxRetryAttempts: 2,
      retryInitialDelayMs: 20,
      retryMaxDelayMs: 20,
    });
    let powerFailed = false;
    const started: string[] = [];
    source.handler = async (dataType, date, cfg) => {
      started.push(dataType);
      if (dataType === "power" && !powerFailed) {
        powerFailed = true;
        throw new NetworkError("timeout", ErrorCode.TIMEOUT_ERROR, { dataType, date });
      }
      return validPayloadHandler(dataType, date, cfg);
    };

    await Promise.all([fetcher.fetch("power", DATE, config), fetcher.fetch("weather", DATE, config)]);

    expect(started).toEqual(["power", "power", "weather"]);
  });
});
