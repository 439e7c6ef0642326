/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

import {
  DEFAULT_INPUT_BUCKET,
  DEFAULT_INPUT_PREFIX,
} from '../../modules/topline-dashboard/core/constants.js';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Object storage
  AWS_REGION: Type.Optional(Type.String({ minLength: 1 })),
  TOPLINE_INPUT_BUCKET: Type.String({ minLength: 1 }),
  TOPLINE_INPUT_PREFIX: Type.String({ minLength: 1 }),
});

export type Env = Static<typeof EnvSchema>;

const nonEmpty = (value: string | undefined): string | undefined =>
  value !== undefined && value !== '' ? value : undefined;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const region = nonEmpty(env['AWS_REGION']);
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    ...(region !== undefined && { AWS_REGION: region }),
    TOPLINE_INPUT_BUCKET: nonEmpty(env['TOPLINE_INPUT_BUCKET']) ?? DEFAULT_INPUT_BUCKET,
    TOPLINE_INPUT_PREFIX: nonEmpty(env['TOPLINE_INPUT_PREFIX']) ?? DEFAULT_INPUT_PREFIX,
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  storage: {
    /** Falls back to the SDK's own region resolution when unset */
    region: env.AWS_REGION,
  },
  input: {
    bucket: env.TOPLINE_INPUT_BUCKET,
    prefix: env.TOPLINE_INPUT_PREFIX,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
