import axios, { type AxiosResponse } from "axios";
import { Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import { NetworkError, ParseError, SourceError, type FetchErrorContext } from "@/common/errors";
import type { PipelineConfig } from "@/common/types/config";
import { DATA_TYPE_FIELDS, type DataType, type DateKey, type PartialReading } from "@/common/types/core";
import { ErrorCode } from "@/common/types/error-handling";
import { errorMessage } from "@/common/utils/error.utils";
import type { RemoteDataSource } from "../base/remote-data-source.interface";

export const READINGS_PATH = "/api/v1/readings";

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * HTTP client for the readings API.
 *
 * `GET {apiDomain}/api/v1/readings?date=YYYY-MM-DD&type=<dataType>` answers
 * `{ data: [{ timestamp, <field>: number | null, ... }] }`.
 */
@Injectable()
export class SolarApiAdapter extends BaseService implements RemoteDataSource {
  readonly sourceName = "solar-api";

  async read(dataType: DataType, date: DateKey, config: PipelineConfig): Promise<PartialReading[]> {
    const url = `${config.apiDomain}${READINGS_PATH}`;
    const context: FetchErrorContext = { dataType, date };

    let response: AxiosResponse<unknown>;
    try {
      response = await axios.get<unknown>(url, {
        params: { date, type: dataType },
        headers: { Accept: "application/json", ...config.requestHeaders },
        timeout: config.requestTimeoutMs,
        validateStatus: () => true,
      });
    } catch (error) {
      throw this.transportError(error, context);
    }

    this.checkStatus(response.status, { ...context, status: response.status });

    if (response.status === 204) {
      return [];
    }

    const readings = this.parseBody(response.data, { ...context, status: response.status });
    this.logDebug(`${dataType} ${date}: ${readings.length} rows`, "SolarApi");
    return readings;
  }

  private transportError(error: unknown, context: FetchErrorContext): NetworkError {
    const code = isRecord(error) && typeof error.code === "string" ? error.code : undefined;
    const timedOut = code !== undefined && TIMEOUT_CODES.has(code);

    return new NetworkError(
      `${timedOut ? "Request timed out" : "Request failed"} for ${context.dataType} ${context.date}: ${errorMessage(error)}`,
      timedOut ? ErrorCode.TIMEOUT_ERROR : ErrorCode.NETWORK_ERROR,
      { ...context, cause: error }
    );
  }

  private checkStatus(status: number, context: FetchErrorContext): void {
    if (status >= 200 && status < 300) {
      return;
    }

    const subject = `${context.dataType} ${context.date}`;

    if (status === 408) {
      throw new NetworkError(`Source timed out (HTTP 408) for ${subject}`, ErrorCode.TIMEOUT_ERROR, context);
    }
    if (status === 429) {
      throw new NetworkError(`Rate limited (HTTP 429) for ${subject}`, ErrorCode.RATE_LIMIT_EXCEEDED, context);
    }
    if (status >= 500) {
      throw new NetworkError(`Source unavailable (HTTP ${status}) for ${subject}`, ErrorCode.SERVICE_UNAVAILABLE, context);
    }
    if (status === 404) {
      throw new SourceError(`No such resource (HTTP 404) for ${subject}`, ErrorCode.DATA_NOT_FOUND, context);
    }
    throw new SourceError(`Source refused request (HTTP ${status}) for ${subject}`, ErrorCode.DATA_SOURCE_ERROR, context);
  }

  private parseBody(body: unknown, context: FetchErrorContext): PartialReading[] {
    if (body === undefined || body === null || body === "") {
      return [];
    }
    if (!isRecord(body)) {
      throw this.parseError("response body is not a JSON object", context);
    }
    if (body.status === "no_data") {
      return [];
    }
    if (!Array.isArray(body.data)) {
      throw this.parseError("response body has no data array", context);
    }

    return body.data.map((row: unknown, index: number) => this.parseRow(row, index, context));
  }

  private parseRow(row: unknown, index: number, context: FetchErrorContext): PartialReading {
    if (!isRecord(row)) {
      throw this.parseError(`row ${index} is not an object`, context);
    }

    const timestamp = parseTimestamp(row.timestamp);
    if (timestamp === undefined) {
      throw this.parseError(`row ${index} has no parseable timestamp`, context);
    }

    const reading: PartialReading = { timestamp };
    for (const field of DATA_TYPE_FIELDS[context.dataType]) {
      const value = parseFieldValue(row[field]);
      if (value === undefined) {
        throw this.parseError(`row ${index} field ${field} is not numeric`, context);
      }
      reading[field] = value;
    }
    return reading;
  }

  private parseError(detail: string, context: FetchErrorContext): ParseError {
    return new ParseError(
      `Malformed response for ${context.dataType} ${context.date}: ${detail}`,
      ErrorCode.DATA_PARSE_ERROR,
      context
    );
  }
}

/**
 * Epoch milliseconds or an ISO-8601 string; anything else is rejected.
 */
export function parseTimestamp(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
}

/**
 * A number, a numeric string, or null/absent (which reads as null). Undefined means invalid.
 */
export function parseFieldValue(value: unknown): number | null | undefined {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}
