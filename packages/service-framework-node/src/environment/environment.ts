import { Value } from '@sinclair/typebox/value';
import type { Static, TSchema } from '@sinclair/typebox';
import type {
  EnvContext,
  EnvParser,
  EnvParserConfig,
  EnvSource,
  EnvValidationError,
  ParsedEnv,
} from './types.js';

const SENSITIVE_PATTERNS = [/password/i, /secret/i, /key/i, /token/i, /credential/i, /auth/i];

function redactValue(key: string, value: unknown): unknown {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(key)) ? '[REDACTED]' : value;
}

function coerceEnvironmentValue(value: string, targetType: unknown): unknown {
  switch (targetType) {
    case 'number':
    case 'integer': {
      const parsed = Number(value);
      if (Number.isNaN(parsed)) {
        throw new Error(`Cannot convert "${value}" to number`);
      }
      return parsed;
    }
    case 'boolean': {
      const lower = value.toLowerCase();
      if (['true', '1', 'yes', 'on'].includes(lower)) return true;
      if (['false', '0', 'no', 'off'].includes(lower)) return false;
      throw new Error(`Cannot convert "${value}" to boolean`);
    }
    case 'object':
    case 'array':
      return JSON.parse(value);
    default:
      return value;
  }
}

function coerceEnvValues(source: EnvSource, schema: TSchema): Record<string, unknown> {
  if (schema.type !== 'object' || typeof schema.properties !== 'object') {
    return { ...source };
  }

  const properties: Record<string, TSchema> = schema.properties;
  const coerced: Record<string, unknown> = {};

  for (const [key, propertySchema] of Object.entries(properties)) {
    const value = source[key];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      coerced[key] = coerceEnvironmentValue(value, propertySchema.type);
    } catch {
      // left as the raw string so validation reports it against the schema
      coerced[key] = value;
    }
  }

  return coerced;
}

function collectErrors(
  schema: TSchema,
  value: unknown,
  redactSensitive: boolean,
): EnvValidationError[] {
  const errors: EnvValidationError[] = [];

  for (const error of Value.Errors(schema, value)) {
    const path = error.path.replace(/^\//, '').replace(/\//g, '.') || 'root';
    errors.push({
      path,
      message: error.message,
      value: redactSensitive ? redactValue(path, error.value) : error.value,
    });
  }

  return errors;
}

export function formatValidationErrors(errors: EnvValidationError[]): string {
  const lines = ['Configuration validation failed:'];

  for (const error of errors) {
    const valuePart = error.value !== undefined ? `, received ${JSON.stringify(error.value)}` : '';
    lines.push(`  - ${error.path}: ${error.message}${valuePart}`);
  }

  return lines.join('\n');
}

export function createEnvParser(): EnvParser {
  function validate<T extends TSchema>(
    schema: T,
    source: unknown,
    config: EnvParserConfig = {},
  ): ParsedEnv<Static<T>> {
    if (Value.Check(schema, source)) {
      return { ok: true, config: source };
    }

    return { ok: false, errors: collectErrors(schema, source, config.redactSensitive ?? true) };
  }

  function parse<T extends TSchema>(schema: T, config: EnvParserConfig = {}): Static<T> {
    const source = config.source ?? process.env;
    const withDefaults = Value.Default(schema, coerceEnvValues(source, schema));
    const result = validate(schema, withDefaults, config);

    if (!result.ok) {
      throw new Error(formatValidationErrors(result.errors));
    }

    return result.config;
  }

  return { parse, validate };
}

export function createEnvContext<T extends TSchema>(
  schema: T,
  config?: EnvParserConfig,
): EnvContext<Static<T>> {
  const parsedConfig = createEnvParser().parse(schema, config);

  const nodeEnv =
    typeof parsedConfig === 'object' &&
    parsedConfig !== null &&
    'NODE_ENV' in parsedConfig &&
    typeof parsedConfig.NODE_ENV === 'string'
      ? parsedConfig.NODE_ENV
      : 'development';

  return {
    config: parsedConfig,
    nodeEnv,
  };
}
