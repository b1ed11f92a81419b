import { type Static, type TSchema, Type } from '@sinclair/typebox';

export interface EnvValidationError {
  readonly path: string;
  readonly message: string;
  readonly value?: unknown;
}

export type ParsedEnv<T> =
  | { readonly ok: true; readonly config: T }
  | { readonly ok: false; readonly errors: EnvValidationError[] };

export interface EnvParserConfig {
  readonly redactSensitive?: boolean;
  readonly source?: EnvSource;
}

export interface EnvParser {
  parse<T extends TSchema>(schema: T, config?: EnvParserConfig): Static<T>;
  validate<T extends TSchema>(
    schema: T,
    source: unknown,
    config?: EnvParserConfig,
  ): ParsedEnv<Static<T>>;
}

export interface EnvContext<T = DefaultEnv> {
  readonly config: T;
  readonly nodeEnv: string;
}

export type EnvSource = Record<string, string | undefined>;

export interface DefaultEnv {
  PROCESS_NAME: string;
}

export const DefaultEnvSchemaType = Type.Object({
  PROCESS_NAME: Type.String({ minLength: 1, default: 'doc-analytics' }),
  LOG_LEVEL: Type.String({ default: 'info' }),
  LOG_FORMAT: Type.String({ default: 'human' }),
});

/**
 * Constraint for app env schemas: whatever else they declare, their static
 * type must carry the framework variables.
 */
export type DefaultEnvSchema = TSchema & {
  static: DefaultEnv & { NODE_ENV: string; LOG_LEVEL: string; LOG_FORMAT: string };
};

export type DefaultEnvContext = EnvContext<DefaultEnv>;
