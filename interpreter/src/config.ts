/**
 * Interpreter configuration.
 *
 * Options come from the embedding code or, for the CLI, from flags and the
 * process environment.
 */

import { z } from 'zod';
import type { HostIO } from './io';

export interface InterpreterOptions {
  /** Where program output goes and input comes from. Defaults to the console. */
  io?: HostIO;
  /** Describe each statement before it runs. */
  trace?: boolean;
  /** Receives trace lines. Defaults to console.error. */
  traceSink?: (line: string) => void;
}

export interface QuillConfig {
  trace: boolean;
}

const EnvSchema = z.object({
  QUILL_TRACE: z.enum(['0', '1', 'true', 'false']).optional(),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Read configuration from environment variables.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): QuillConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`);
  }
  const trace = result.data.QUILL_TRACE;
  return { trace: trace === '1' || trace === 'true' };
}
