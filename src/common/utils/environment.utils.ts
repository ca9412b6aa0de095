/**
 * Environment Utilities
 * Typed parsing of environment variables with defaults and range checks
 */

type NumericOptions = {
  min?: number;
  max?: number;
  fieldName?: string;
};

export class EnvironmentUtils {
  /**
   * Parse integer from environment variable with validation
   */
  static parseInt(key: string, defaultValue: number, options: NumericOptions = {}): number {
    const value = process.env[key];
    if (!value) return defaultValue;

    const parsed = Number(value.trim());
    if (!Number.isInteger(parsed)) {
      EnvironmentUtils.warn(`Invalid integer value "${value}" for ${options.fieldName || key}, using default ${defaultValue}`);
      return defaultValue;
    }

    return EnvironmentUtils.withinRange(key, parsed, defaultValue, options);
  }

  /**
   * Parse float from environment variable with validation
   */
  static parseFloat(key: string, defaultValue: number, options: NumericOptions = {}): number {
    const value = process.env[key];
    if (!value) return defaultValue;

    const parsed = Number(value.trim());
    if (!Number.isFinite(parsed)) {
      EnvironmentUtils.warn(`Invalid float value "${value}" for ${options.fieldName || key}, using default ${defaultValue}`);
      return defaultValue;
    }

    return EnvironmentUtils.withinRange(key, parsed, defaultValue, options);
  }

  /**
   * Parse boolean from environment variable
   */
  static parseBoolean(key: string, defaultValue: boolean, options: { fieldName?: string } = {}): boolean {
    const value = process.env[key];
    if (!value) return defaultValue;

    const lowerValue = value.toLowerCase();
    if (lowerValue === "true" || lowerValue === "1" || lowerValue === "yes") {
      return true;
    }
    if (lowerValue === "false" || lowerValue === "0" || lowerValue === "no") {
      return false;
    }

    EnvironmentUtils.warn(`Invalid boolean value "${value}" for ${options.fieldName || key}, using default ${defaultValue}`);
    return defaultValue;
  }

  /**
   * Parse string from environment variable, trimmed
   */
  static parseString(key: string, defaultValue: string): string {
    const value = process.env[key]?.trim();
    return value ? value : defaultValue;
  }

  /**
   * Parse JSON from environment variable. The shape is checked by the caller.
   */
  static parseJSON(key: string, defaultValue: unknown): unknown {
    const value = process.env[key];
    if (!value) return defaultValue;

    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch {
      EnvironmentUtils.warn(`Invalid JSON value for ${key}, using default`);
      return defaultValue;
    }
  }

  private static withinRange(key: string, parsed: number, defaultValue: number, options: NumericOptions): number {
    const field = options.fieldName || key;

    if (options.min !== undefined && parsed < options.min) {
      EnvironmentUtils.warn(`Value ${parsed} for ${field} is below minimum ${options.min}, using default ${defaultValue}`);
      return defaultValue;
    }

    if (options.max !== undefined && parsed > options.max) {
      EnvironmentUtils.warn(`Value ${parsed} for ${field} is above maximum ${options.max}, using default ${defaultValue}`);
      return defaultValue;
    }

    return parsed;
  }

  private static warn(message: string): void {
    console.warn(`[EnvironmentUtils] ${message}`);
  }
}
