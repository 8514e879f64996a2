/**
 * Rotation Handler
 *
 * Invocation boundary for the vault's rotation schedule. Each invocation
 * carries one step for one secret version.
 */

import { z } from 'zod';
import {
  configureRootLogger,
  createServiceLogger,
  getConfig,
  SchemaError,
  type RotationConfig,
} from '@pgrotate/core';
import { createRotationRuntime, type RotationRuntimeOverrides } from './service.js';
import { ROTATION_STEPS, type RotationRequest, type StepOutcome } from './types.js';

export const RotationEventSchema = z.object({
  SecretId: z.string().min(1),
  ClientRequestToken: z.string().min(1),
  Step: z.enum(ROTATION_STEPS),
});

export type RotationEvent = z.infer<typeof RotationEventSchema>;

export function parseRotationEvent(event: unknown): RotationRequest {
  const result = RotationEventSchema.safeParse(event);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(event)'}: ${issue.message}`)
      .join('; ');
    throw new SchemaError(`Invalid rotation event: ${details}`);
  }

  return {
    secretId: result.data.SecretId,
    token: result.data.ClientRequestToken,
    step: result.data.Step,
  };
}

export interface HandlerOptions {
  /** Defaults to the process configuration */
  config?: RotationConfig;
  overrides?: RotationRuntimeOverrides;
}

export type RotationHandler = (event: unknown) => Promise<StepOutcome>;

export function createHandler(options: HandlerOptions = {}): RotationHandler {
  let loggerConfigured = false;

  return async (event) => {
    const config = options.config ?? getConfig();
    const baseLogging = options.overrides?.logging ?? {};

    if (!baseLogging.logger && !loggerConfigured) {
      configureRootLogger({ level: config.logLevel, format: config.logFormat });
      loggerConfigured = true;
    }

    const logger = createServiceLogger('handler', baseLogging);
    logger.info('Received rotation event', { event });

    let request: RotationRequest;
    try {
      request = parseRotationEvent(event);
    } catch (error) {
      logger.error('Rejected rotation event', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    const runtime = createRotationRuntime(config, {
      ...options.overrides,
      logging: {
        ...baseLogging,
        context: { ...baseLogging.context, correlationId: request.token },
      },
    });

    return runtime.stateMachine.run(request);
  };
}

export const handler = createHandler();
