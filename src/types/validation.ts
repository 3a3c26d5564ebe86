import Joi from "joi";
import { EndpointConfig } from "./endpoint";
import { MAX_DELAY_MS, MonitorConfig, PartialMonitorConfig } from "./config";
import { ValidationResult } from "./common";
import { ConfigurationError } from "./errors";
import { FAILURE_CEILING_MS } from "../analyzer/latency-buckets";

// Target schema. "service" is accepted as an alias of "label".
// Port range is deliberately left to the socket API: an out-of-range port
// shows up as a connect failure, not a startup error.
const targetSchema = Joi.object<EndpointConfig>({
  hostname: Joi.string().trim().min(1).required(),
  port: Joi.number().integer().required(),
  label: Joi.string().allow("").optional(),
}).rename("service", "label", { ignoreUndefined: true });

const probeSchema = Joi.object({
  connectTimeoutMs: Joi.number().integer().positive().max(MAX_DELAY_MS),
});

const samplingSchema = Joi.object({
  intervalMs: Joi.number().integer().min(0).max(MAX_DELAY_MS),
});

const reportingSchema = Joi.object({
  intervalMs: Joi.number().integer().positive().max(MAX_DELAY_MS),
  logDirectory: Joi.string().min(1),
  filePrefix: Joi.string()
    .pattern(/^[\w.-]+$/)
    .messages({
      "string.pattern.base":
        '"reporting.filePrefix" may only contain letters, digits, "_", "." and "-"',
    }),
});

const outputSchema = Joi.object({
  color: Joi.boolean(),
});

// Monitor config file schema; every section is optional and merged over defaults
const partialConfigSchema = Joi.object<PartialMonitorConfig>({
  targets: Joi.array().items(targetSchema),
  probe: probeSchema,
  sampling: samplingSchema,
  reporting: reportingSchema,
  output: outputSchema,
});

const fullConfigSchema = Joi.object<MonitorConfig>({
  targets: Joi.array().items(targetSchema).required(),
  probe: probeSchema.fork(["connectTimeoutMs"], (s) => s.required()),
  sampling: samplingSchema.fork(["intervalMs"], (s) => s.required()),
  reporting: reportingSchema.fork(
    ["intervalMs", "logDirectory", "filePrefix"],
    (s) => s.required()
  ),
  output: outputSchema.fork(["color"], (s) => s.required()),
});

/**
 * Validates and normalizes a partial configuration read from a file or
 * assembled from CLI flags. Throws ConfigurationError on the first pass
 * that finds problems, listing all of them.
 */
export function parsePartialMonitorConfig(
  input: unknown,
  source = "configuration"
): PartialMonitorConfig {
  const result = partialConfigSchema.validate(input, {
    abortEarly: false,
    convert: true,
  });

  if (result.error) {
    throw new ConfigurationError(
      `Invalid ${source}`,
      result.error.details.map((detail) => detail.message),
      result.error
    );
  }

  return result.value;
}

/**
 * Validates a single target entry
 */
export function parseEndpointConfig(input: unknown): EndpointConfig {
  const result = targetSchema.validate(input, {
    abortEarly: false,
    convert: true,
  });

  if (result.error) {
    throw new ConfigurationError(
      "Invalid target",
      result.error.details.map((detail) => detail.message),
      result.error
    );
  }

  return result.value;
}

/**
 * Validates a complete MonitorConfig. Hazards that do not prevent the
 * monitor from running are reported as warnings.
 */
export function validateMonitorConfig(config: MonitorConfig): ValidationResult {
  const result = fullConfigSchema.validate(config, { abortEarly: false });
  const warnings: string[] = [];

  if (config.targets.length === 0) {
    warnings.push("No targets configured; nothing will be probed");
  }

  const timeout = config.probe.connectTimeoutMs;
  if (timeout > FAILURE_CEILING_MS) {
    warnings.push(
      `Connect timeout ${timeout}ms exceeds the ${FAILURE_CEILING_MS}ms failure ceiling; connects slower than ${FAILURE_CEILING_MS}ms are still counted as failures`
    );
  } else if (timeout < FAILURE_CEILING_MS) {
    warnings.push(
      `Connect timeout ${timeout}ms is below the ${FAILURE_CEILING_MS}ms failure ceiling; connects are abandoned before the upper buckets can be reached`
    );
  }

  if (config.reporting.intervalMs < config.sampling.intervalMs) {
    warnings.push(
      "Reporting interval is shorter than the sampling interval; some reports will be empty"
    );
  }

  return {
    isValid: !result.error,
    errors: result.error
      ? result.error.details.map((detail) => detail.message)
      : [],
    warnings,
  };
}
